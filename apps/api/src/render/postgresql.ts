import { ColumnDefinition } from '../types/schema';
import { CAPABILITIES } from './capabilities';
import { decimalArgs, PlatformRendererSpec, RenderContext, unsupportedFormat } from './base';
import { shellQuote, sqlString } from './sql';

const caps = CAPABILITIES.postgresql;

const physicalType = (column: ColumnDefinition): string => {
  switch (column.logicalType) {
    case 'integer':
      return 'INTEGER';
    case 'bigint':
      return 'BIGINT';
    case 'float':
      return 'DOUBLE PRECISION';
    case 'decimal':
      return `NUMERIC${decimalArgs(column)}`;
    case 'string':
      return `VARCHAR(${column.maxLength ?? 255})`;
    case 'text':
      return 'TEXT';
    case 'boolean':
      return 'BOOLEAN';
    case 'date':
      return 'DATE';
    case 'timestamp':
      return 'TIMESTAMP';
    case 'timestamptz':
      return 'TIMESTAMPTZ';
    case 'json':
      return 'JSONB';
    case 'binary':
      return 'BYTEA';
  }
};

const ddl: PlatformRendererSpec['ddl'] = (ctx, options) => {
  const { schema } = ctx;
  const columns = schema.columns.map(c => `  ${ctx.quote(c.name)} ${ctx.types[c.name]}${c.nullable ? '' : ' NOT NULL'}`);
  const verb = options.ifNotExists && !options.replace ? 'CREATE TABLE IF NOT EXISTS' : 'CREATE TABLE';
  let create = `${verb} ${ctx.tableRef} (\n${columns.join(',\n')}\n)`;
  const [partition] = schema.optimization.partitionColumns;
  if (partition !== undefined) create += `\nPARTITION BY RANGE (${ctx.quote(partition)})`;

  const statements = [`${create};`];
  if (options.replace) statements.unshift(`DROP TABLE IF EXISTS ${ctx.tableRef};`);
  if (schema.description) statements.push(`COMMENT ON TABLE ${ctx.tableRef} IS ${sqlString(schema.description)};`);
  for (const c of schema.columns) {
    if (c.description) {
      statements.push(`COMMENT ON COLUMN ${ctx.tableRef}.${ctx.quote(c.name)} IS ${sqlString(c.description)};`);
    }
  }
  return statements.join('\n');
};

const copyStatement = (ctx: RenderContext, dataReference: string, delimiter: string, header: boolean) => {
  const columns = ctx.schema.columns.map(c => ctx.quote(c.name)).join(', ');
  const settings = ['FORMAT csv', `HEADER ${header}`];
  if (delimiter !== ',') settings.push(`DELIMITER ${sqlString(delimiter)}`);
  return `COPY ${ctx.tableRef} (${columns}) FROM ${sqlString(dataReference)} WITH (${settings.join(', ')})`;
};

const psql = (statement: string) => `psql "$DATABASE_URL" -c ${shellQuote(statement)}`;

export const postgresqlRenderer: PlatformRendererSpec = {
  capabilities: caps,
  physicalType,
  tableRef: (schema, tableName, quote) =>
    [schema.datasetName, tableName]
      .filter((part): part is string => Boolean(part))
      .map(quote)
      .join('.'),
  ddl,
  cliCreate: (_ctx, statement) => psql(statement),
  // \copy reads the file client-side
  cliLoad: (ctx, dataReference, options) => {
    if (options.format !== 'csv') return unsupportedFormat(caps, options.format);
    return psql(`\\${copyStatement(ctx, dataReference, options.delimiter, options.header)}`);
  },
  loadSql: (ctx, dataReference, options) => {
    if (options.format !== 'csv') return unsupportedFormat(caps, options.format);
    return `${copyStatement(ctx, dataReference, options.delimiter, options.header)};`;
  }
};
