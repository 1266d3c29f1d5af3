import { CAPABILITIES } from '../render/capabilities';
import { quoteIdentifier } from '../render/sql';
import { SOURCE, SqlDialect } from './dialect';

const { quoteStyle, alwaysQuote } = CAPABILITIES.redshift;

export const redshiftDialect: SqlDialect = {
  platform: 'redshift',
  currentTimestamp: 'GETDATE()',
  booleanLiteral: value => (value ? 'TRUE' : 'FALSE'),
  // TRUNCATE commits the open transaction on Redshift
  truncate: target => `DELETE FROM ${target};`,
  dmlTarget: tableName => quoteIdentifier(tableName, quoteStyle, alwaysQuote),
  deleteMatching: d =>
    `DELETE FROM ${d.target}\nUSING ${d.source} AS ${SOURCE}\nWHERE ${d.on}${d.where ? ` AND ${d.where}` : ''};`,
  updateFromSource: u =>
    `UPDATE ${u.target}\nSET ${u.assignments.join(',\n    ')}\nFROM ${u.source} AS ${SOURCE}\nWHERE ${u.on}${u.where ? ` AND ${u.where}` : ''};`,
  notMatched: 'WHEN NOT MATCHED',
  rowHash: columns => `MD5(${columns.map(c => `NVL(CAST(${c} AS VARCHAR(65535)), '~')`).join(" || '|' || ")})`,
  subtractInterval: (expr, amount, unit) => `DATEADD(${unit}, -${amount}, ${expr})`,
  watermark: maxQuery => ({ setup: [], bound: `(${maxQuery})` }),
  mergeStyle: null,
  begin: 'BEGIN TRANSACTION;',
  commit: 'COMMIT;'
};
