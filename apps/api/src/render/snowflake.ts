import { CanonicalSchema, ColumnDefinition } from '../types/schema';
import { CAPABILITIES } from './capabilities';
import { decimalArgs, PlatformRendererSpec } from './base';
import { shellQuote, sqlString } from './sql';

const caps = CAPABILITIES.snowflake;
const MAX_VARCHAR = 16777216;

const physicalType = (column: ColumnDefinition): string => {
  switch (column.logicalType) {
    case 'integer':
    case 'bigint':
      return 'NUMBER(38,0)';
    case 'float':
      return 'FLOAT';
    case 'decimal':
      return `NUMBER${decimalArgs(column)}`;
    case 'string':
      return `VARCHAR(${Math.min(column.maxLength ?? MAX_VARCHAR, MAX_VARCHAR)})`;
    case 'text':
      return `VARCHAR(${MAX_VARCHAR})`;
    case 'boolean':
      return 'BOOLEAN';
    case 'date':
      return 'DATE';
    case 'timestamp':
      return 'TIMESTAMP_NTZ';
    case 'timestamptz':
      return 'TIMESTAMP_TZ';
    case 'json':
      return 'VARIANT';
    case 'binary':
      return 'BINARY';
  }
};

const tableRef = (schema: CanonicalSchema, tableName: string, quote: (id: string) => string) => {
  const namespace = schema.datasetName ?? (schema.projectId ? caps.defaultSchema : undefined);
  return [schema.projectId, namespace, tableName]
    .filter((part): part is string => Boolean(part))
    .map(quote)
    .join('.');
};

const ddl: PlatformRendererSpec['ddl'] = (ctx, options) => {
  const { schema } = ctx;
  const columns = schema.columns.map(c => {
    const comment = c.description ? ` COMMENT ${sqlString(c.description)}` : '';
    return `  ${ctx.quote(c.name)} ${ctx.types[c.name]}${c.nullable ? '' : ' NOT NULL'}${comment}`;
  });

  const verb = options.replace
    ? 'CREATE OR REPLACE TABLE'
    : options.ifNotExists
      ? 'CREATE TABLE IF NOT EXISTS'
      : 'CREATE TABLE';
  const parts = [`${verb} ${ctx.tableRef} (\n${columns.join(',\n')}\n)`];
  const cluster = schema.optimization.clusterColumns;
  if (cluster.length) parts.push(`CLUSTER BY (${cluster.map(ctx.quote).join(', ')})`);
  if (schema.description) parts.push(`COMMENT = ${sqlString(schema.description)}`);
  return `${parts.join('\n')};`;
};

// Stage references (@stage/path) are not string literals.
const source = (dataReference: string) => (dataReference.startsWith('@') ? dataReference : sqlString(dataReference));

const loadSql: PlatformRendererSpec['loadSql'] = (ctx, dataReference, options) => {
  const format =
    options.format === 'csv'
      ? [
          "TYPE = 'CSV'",
          `FIELD_DELIMITER = ${sqlString(options.delimiter)}`,
          `SKIP_HEADER = ${options.header ? 1 : 0}`,
          `FIELD_OPTIONALLY_ENCLOSED_BY = '"'`
        ]
      : [`TYPE = ${sqlString(options.format.toUpperCase())}`];
  const lines = [`COPY INTO ${ctx.tableRef}`, `FROM ${source(dataReference)}`, `FILE_FORMAT = (${format.join(' ')})`];
  if (options.format !== 'csv') lines.push('MATCH_BY_COLUMN_NAME = CASE_INSENSITIVE');
  lines.push("ON_ERROR = 'ABORT_STATEMENT';");
  return lines.join('\n');
};

export const snowflakeRenderer: PlatformRendererSpec = {
  capabilities: caps,
  physicalType,
  tableRef,
  ddl,
  cliCreate: (_ctx, statement) => `snowsql -q ${shellQuote(statement)}`,
  cliLoad: (ctx, dataReference, options) => `snowsql -q ${shellQuote(loadSql(ctx, dataReference, options))}`,
  loadSql
};
