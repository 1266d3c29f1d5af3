import { SqlDialect, standardDelete, standardUpdate, TARGET } from './dialect';

export const bigqueryDialect: SqlDialect = {
  platform: 'bigquery',
  currentTimestamp: 'CURRENT_TIMESTAMP()',
  booleanLiteral: value => (value ? 'TRUE' : 'FALSE'),
  // TRUNCATE is not allowed inside a multi-statement transaction
  truncate: target => `DELETE FROM ${target} WHERE TRUE;`,
  dmlTarget: () => TARGET,
  deleteMatching: standardDelete,
  updateFromSource: standardUpdate,
  notMatched: 'WHEN NOT MATCHED',
  rowHash: columns => `FARM_FINGERPRINT(TO_JSON_STRING(STRUCT(${columns.join(', ')})))`,
  subtractInterval: (expr, amount, unit, logicalType) =>
    logicalType === 'date'
      ? `DATE_SUB(${expr}, INTERVAL ${amount} DAY)`
      : `TIMESTAMP_SUB(${expr}, INTERVAL ${amount} ${unit.toUpperCase()})`,
  // DECLARE has to open the script, ahead of BEGIN TRANSACTION
  watermark: (maxQuery, physicalType) => ({
    setup: [`DECLARE max_watermark ${physicalType} DEFAULT (${maxQuery});`],
    bound: 'max_watermark'
  }),
  mergeStyle: 'merge',
  begin: 'BEGIN TRANSACTION;',
  commit: 'COMMIT TRANSACTION;'
};
