import { ColumnDefinition } from '../types/schema';
import { CAPABILITIES } from './capabilities';
import { decimalArgs, PlatformRendererSpec, RenderContext } from './base';
import { shellQuote, sqlString } from './sql';

const caps = CAPABILITIES.redshift;
const MAX_VARCHAR = 65535;

const physicalType = (column: ColumnDefinition): string => {
  switch (column.logicalType) {
    case 'integer':
      return 'INTEGER';
    case 'bigint':
      return 'BIGINT';
    case 'float':
      return 'DOUBLE PRECISION';
    case 'decimal':
      return `DECIMAL${decimalArgs(column)}`;
    case 'string':
      return `VARCHAR(${Math.min(column.maxLength ?? 256, MAX_VARCHAR)})`;
    case 'text':
      return `VARCHAR(${MAX_VARCHAR})`;
    case 'boolean':
      return 'BOOLEAN';
    case 'date':
      return 'DATE';
    case 'timestamp':
      return 'TIMESTAMP';
    case 'timestamptz':
      return 'TIMESTAMPTZ';
    case 'json':
      return 'SUPER';
    case 'binary':
      return 'VARBYTE';
  }
};

const comments = (ctx: RenderContext) => {
  const out: string[] = [];
  if (ctx.schema.description) out.push(`COMMENT ON TABLE ${ctx.tableRef} IS ${sqlString(ctx.schema.description)};`);
  for (const c of ctx.schema.columns) {
    if (c.description) {
      out.push(`COMMENT ON COLUMN ${ctx.tableRef}.${ctx.quote(c.name)} IS ${sqlString(c.description)};`);
    }
  }
  return out;
};

const ddl: PlatformRendererSpec['ddl'] = (ctx, options) => {
  const { schema } = ctx;
  const hints = schema.optimization;
  const columns = schema.columns.map(c => `  ${ctx.quote(c.name)} ${ctx.types[c.name]}${c.nullable ? '' : ' NOT NULL'}`);

  const verb = options.ifNotExists && !options.replace ? 'CREATE TABLE IF NOT EXISTS' : 'CREATE TABLE';
  const create = [`${verb} ${ctx.tableRef} (\n${columns.join(',\n')}\n)`];
  if (hints.distributionColumn !== undefined) {
    create.push('DISTSTYLE KEY', `DISTKEY(${ctx.quote(hints.distributionColumn)})`);
  }
  if (hints.sortColumns.length) create.push(`SORTKEY(${hints.sortColumns.map(ctx.quote).join(', ')})`);

  const statements = [`${create.join('\n')};`, ...comments(ctx)];
  if (options.replace) statements.unshift(`DROP TABLE IF EXISTS ${ctx.tableRef};`);
  return statements.join('\n');
};

const psql = (statement: string) =>
  `psql -h "$REDSHIFT_HOST" -p 5439 -U "$REDSHIFT_USER" -d "$REDSHIFT_DATABASE" -c ${shellQuote(statement)}`;

const loadSql: PlatformRendererSpec['loadSql'] = (ctx, dataReference, options) => {
  const lines = [
    `COPY ${ctx.tableRef}`,
    `FROM ${sqlString(dataReference)}`,
    options.iamRole ? `IAM_ROLE ${sqlString(options.iamRole)}` : 'IAM_ROLE default'
  ];
  if (options.format === 'csv') {
    lines.push('FORMAT AS CSV');
    if (options.delimiter !== ',') lines.push(`DELIMITER ${sqlString(options.delimiter)}`);
    if (options.header) lines.push('IGNOREHEADER 1');
  } else if (options.format === 'json') {
    lines.push("FORMAT AS JSON 'auto'");
  } else {
    lines.push('FORMAT AS PARQUET');
  }
  return `${lines.join('\n')};`;
};

export const redshiftRenderer: PlatformRendererSpec = {
  capabilities: caps,
  physicalType,
  tableRef: (schema, tableName, quote) =>
    [schema.datasetName, tableName]
      .filter((part): part is string => Boolean(part))
      .map(quote)
      .join('.'),
  ddl,
  cliCreate: (_ctx, statement) => psql(statement),
  cliLoad: (ctx, dataReference, options) => psql(loadSql(ctx, dataReference, options)),
  loadSql
};
