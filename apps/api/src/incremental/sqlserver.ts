import { SOURCE, SqlDialect, TARGET } from './dialect';

const joined = (target: string, source: string, on: string, where?: string) =>
  `FROM ${target} AS ${TARGET}\nINNER JOIN ${source} AS ${SOURCE}\n  ON ${on}${where ? `\nWHERE ${where}` : ''};`;

export const sqlserverDialect: SqlDialect = {
  platform: 'sqlserver',
  currentTimestamp: 'SYSUTCDATETIME()',
  booleanLiteral: value => (value ? '1' : '0'),
  truncate: target => `TRUNCATE TABLE ${target};`,
  dmlTarget: () => TARGET,
  deleteMatching: d => `DELETE ${TARGET}\n${joined(d.target, d.source, d.on, d.where)}`,
  updateFromSource: u => `UPDATE ${TARGET}\nSET ${u.assignments.join(',\n    ')}\n${joined(u.target, u.source, u.on, u.where)}`,
  notMatched: 'WHEN NOT MATCHED BY TARGET',
  rowHash: columns => {
    const parts = columns.map(c => `ISNULL(CAST(${c} AS NVARCHAR(MAX)), N'~')`);
    return `HASHBYTES('SHA2_256', ${parts.length === 1 ? parts[0] : `CONCAT_WS('|', ${parts.join(', ')})`})`;
  },
  subtractInterval: (expr, amount, unit) => `DATEADD(${unit}, -${amount}, ${expr})`,
  watermark: (maxQuery, physicalType) => ({
    setup: [`DECLARE @max_watermark ${physicalType} = (${maxQuery});`],
    bound: '@max_watermark'
  }),
  mergeStyle: 'merge',
  begin: 'BEGIN TRANSACTION;',
  commit: 'COMMIT TRANSACTION;'
};
