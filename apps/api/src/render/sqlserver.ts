import { CanonicalSchema, ColumnDefinition } from '../types/schema';
import { CAPABILITIES } from './capabilities';
import { decimalArgs, PlatformRendererSpec, RenderContext, unsupportedFormat } from './base';
import { shellQuote, sqlString } from './sql';

const caps = CAPABILITIES.sqlserver;
const MAX_NVARCHAR = 4000;

const physicalType = (column: ColumnDefinition): string | null => {
  switch (column.logicalType) {
    case 'integer':
      return 'INT';
    case 'bigint':
      return 'BIGINT';
    case 'float':
      return 'FLOAT';
    case 'decimal':
      return `DECIMAL${decimalArgs(column)}`;
    case 'string': {
      const length = column.maxLength ?? 255;
      return length > MAX_NVARCHAR ? 'NVARCHAR(MAX)' : `NVARCHAR(${length})`;
    }
    case 'text':
      return 'NVARCHAR(MAX)';
    case 'boolean':
      return 'BIT';
    case 'date':
      return 'DATE';
    case 'timestamp':
      return 'DATETIME2';
    case 'timestamptz':
      return 'DATETIMEOFFSET';
    case 'binary':
      return 'VARBINARY(MAX)';
    case 'json':
      return null;
  }
};

const schemaName = (schema: CanonicalSchema) => schema.datasetName ?? caps.defaultSchema ?? 'dbo';

const describe = (ctx: RenderContext, description: string, column?: string) => {
  const target = [`'SCHEMA', ${sqlString(schemaName(ctx.schema))}`, `'TABLE', ${sqlString(ctx.schema.tableName)}`];
  if (column !== undefined) target.push(`'COLUMN', ${sqlString(column)}`);
  return `EXEC sp_addextendedproperty 'MS_Description', N${sqlString(description)}, ${target.join(', ')};`;
};

const ddl: PlatformRendererSpec['ddl'] = (ctx, options) => {
  const { schema } = ctx;
  const columns = schema.columns.map(c => `  ${ctx.quote(c.name)} ${ctx.types[c.name]}${c.nullable ? ' NULL' : ' NOT NULL'}`);
  const create = `CREATE TABLE ${ctx.tableRef} (\n${columns.join(',\n')}\n);`;

  const statements: string[] = [];
  if (options.replace) {
    statements.push(`DROP TABLE IF EXISTS ${ctx.tableRef};`, create);
  } else if (options.ifNotExists) {
    statements.push(`IF OBJECT_ID(N${sqlString(`${schemaName(schema)}.${schema.tableName}`)}, N'U') IS NULL\n${create}`);
  } else {
    statements.push(create);
  }

  const cluster = schema.optimization.clusterColumns;
  if (cluster.length) {
    const index = ctx.quote(`cix_${schema.tableName}`);
    statements.push(`CREATE CLUSTERED INDEX ${index} ON ${ctx.tableRef} (${cluster.map(ctx.quote).join(', ')});`);
  }
  if (schema.description) statements.push(describe(ctx, schema.description));
  for (const c of schema.columns) {
    if (c.description) statements.push(describe(ctx, c.description, c.name));
  }
  return statements.join('\n');
};

const sqlcmd = (statement: string) =>
  `sqlcmd -S "$SQLSERVER_HOST" -d "$SQLSERVER_DATABASE" -Q ${shellQuote(statement)}`;

export const sqlserverRenderer: PlatformRendererSpec = {
  capabilities: caps,
  physicalType,
  tableRef: (schema, tableName, quote) => {
    const parts = [schemaName(schema), tableName];
    if (schema.projectId) parts.unshift(schema.projectId);
    return parts.map(quote).join('.');
  },
  ddl,
  cliCreate: (_ctx, statement) => sqlcmd(statement),
  cliLoad: (ctx, dataReference, options) => {
    if (options.format !== 'csv') return unsupportedFormat(caps, options.format);
    const flags = [
      `bcp ${schemaName(ctx.schema)}.${ctx.schema.tableName} in ${shellQuote(dataReference)}`,
      '-S "$SQLSERVER_HOST"',
      '-d "$SQLSERVER_DATABASE"',
      '-T -c',
      `-t${shellQuote(options.delimiter)}`
    ];
    if (options.header) flags.push('-F 2');
    return flags.join(' ');
  },
  loadSql: (ctx, dataReference, options) => {
    if (options.format !== 'csv') return unsupportedFormat(caps, options.format);
    const settings = ["FORMAT = 'CSV'"];
    if (options.header) settings.push('FIRSTROW = 2');
    settings.push(`FIELDTERMINATOR = ${sqlString(options.delimiter)}`, "ROWTERMINATOR = '0x0a'", 'TABLOCK');
    return `BULK INSERT ${ctx.tableRef}\nFROM ${sqlString(dataReference)}\nWITH (${settings.join(', ')});`;
  }
};
