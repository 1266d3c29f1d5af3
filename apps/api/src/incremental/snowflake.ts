import { SOURCE, SqlDialect, standardUpdate, TARGET } from './dialect';

export const snowflakeDialect: SqlDialect = {
  platform: 'snowflake',
  currentTimestamp: 'CURRENT_TIMESTAMP()',
  booleanLiteral: value => (value ? 'TRUE' : 'FALSE'),
  truncate: target => `TRUNCATE TABLE ${target};`,
  dmlTarget: () => TARGET,
  deleteMatching: d =>
    [
      `MERGE INTO ${d.target} AS ${TARGET}`,
      `USING ${d.source} AS ${SOURCE}`,
      `ON ${d.on}`,
      `WHEN MATCHED${d.where ? ` AND ${d.where}` : ''} THEN DELETE;`
    ].join('\n'),
  updateFromSource: standardUpdate,
  notMatched: 'WHEN NOT MATCHED',
  rowHash: columns => `HASH(${columns.join(', ')})`,
  subtractInterval: (expr, amount, unit) => `DATEADD(${unit}, -${amount}, ${expr})`,
  watermark: maxQuery => ({
    setup: [`SET max_watermark = (${maxQuery});`],
    bound: '$max_watermark'
  }),
  mergeStyle: 'merge',
  begin: 'BEGIN TRANSACTION;',
  commit: 'COMMIT;'
};
