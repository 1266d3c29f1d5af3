import { SOURCE, SqlDialect, standardUpdate, TARGET } from './dialect';

export const postgresqlDialect: SqlDialect = {
  platform: 'postgresql',
  currentTimestamp: 'CURRENT_TIMESTAMP',
  booleanLiteral: value => (value ? 'TRUE' : 'FALSE'),
  truncate: target => `TRUNCATE TABLE ${target};`,
  dmlTarget: () => TARGET,
  deleteMatching: d =>
    `DELETE FROM ${d.target} AS ${TARGET}\nUSING ${d.source} AS ${SOURCE}\nWHERE ${d.on}${d.where ? ` AND ${d.where}` : ''};`,
  updateFromSource: standardUpdate,
  notMatched: 'WHEN NOT MATCHED',
  rowHash: columns => `md5(ROW(${columns.join(', ')})::text)`,
  subtractInterval: (expr, amount, unit) => `${expr} - INTERVAL '${amount} ${unit}${amount === 1 ? '' : 's'}'`,
  watermark: maxQuery => ({ setup: [], bound: `(${maxQuery})` }),
  mergeStyle: 'on_conflict',
  begin: 'BEGIN;',
  commit: 'COMMIT;'
};
