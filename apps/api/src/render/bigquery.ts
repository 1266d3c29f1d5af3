import { CanonicalSchema, ColumnDefinition } from '../types/schema';
import { getColumn } from '../schema/canonical';
import { CAPABILITIES } from './capabilities';
import { decimalArgs, PlatformRendererSpec, RenderContext } from './base';
import { shellQuote, sqlString } from './sql';

const caps = CAPABILITIES.bigquery;

const physicalType = (column: ColumnDefinition): string => {
  switch (column.logicalType) {
    case 'integer':
    case 'bigint':
      return 'INT64';
    case 'float':
      return 'FLOAT64';
    case 'decimal': {
      const { precision, scale = 0 } = column;
      // NUMERIC holds 29 integer digits and 9 fractional digits
      if (precision !== undefined && (scale > 9 || precision - scale > 29)) return `BIGNUMERIC${decimalArgs(column)}`;
      return `NUMERIC${decimalArgs(column)}`;
    }
    case 'string':
      return column.maxLength ? `STRING(${column.maxLength})` : 'STRING';
    case 'text':
      return 'STRING';
    case 'boolean':
      return 'BOOL';
    case 'date':
      return 'DATE';
    case 'timestamp':
    case 'timestamptz':
      return 'TIMESTAMP';
    case 'json':
      return 'JSON';
    case 'binary':
      return 'BYTES';
  }
};

const doubleQuoted = (value: string) => `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;

const qualifiedName = (schema: CanonicalSchema, tableName: string) =>
  [schema.projectId, schema.datasetName, tableName].filter(Boolean).join('.');

const partitionClause = (ctx: RenderContext) => {
  const [ref] = ctx.schema.optimization.partitionColumns;
  if (ref === undefined) return null;
  const column = getColumn(ctx.schema, ref);
  const name = ctx.quote(column?.name ?? ref);
  return column?.logicalType === 'date' ? `PARTITION BY ${name}` : `PARTITION BY DATE(${name})`;
};

const ddl: PlatformRendererSpec['ddl'] = (ctx, options) => {
  const { schema } = ctx;
  const hints = schema.optimization;
  const columns = schema.columns.map(c => {
    const description = c.description ? ` OPTIONS(description=${doubleQuoted(c.description)})` : '';
    return `  ${ctx.quote(c.name)} ${ctx.types[c.name]}${c.nullable ? '' : ' NOT NULL'}${description}`;
  });

  const verb = options.replace
    ? 'CREATE OR REPLACE TABLE'
    : options.ifNotExists
      ? 'CREATE TABLE IF NOT EXISTS'
      : 'CREATE TABLE';
  const parts = [`${verb} ${ctx.tableRef} (\n${columns.join(',\n')}\n)`];

  const partition = partitionClause(ctx);
  if (partition) parts.push(partition);
  if (hints.clusterColumns.length) parts.push(`CLUSTER BY ${hints.clusterColumns.map(ctx.quote).join(', ')}`);

  const tableOptions: string[] = [];
  if (hints.partitionExpirationDays !== undefined) {
    tableOptions.push(`partition_expiration_days=${hints.partitionExpirationDays}`);
  }
  if (hints.requirePartitionFilter) tableOptions.push('require_partition_filter=true');
  if (schema.description) tableOptions.push(`description=${doubleQuoted(schema.description)}`);
  if (tableOptions.length) parts.push(`OPTIONS(\n  ${tableOptions.join(',\n  ')}\n)`);

  return `${parts.join('\n')};`;
};

const schemaFile = (schema: CanonicalSchema) => `${schema.tableName}_schema.json`;

const bqTableId = (schema: CanonicalSchema) =>
  `${schema.projectId ? `${schema.projectId}:` : ''}${schema.datasetName}.${schema.tableName}`;

export const bigqueryRenderer: PlatformRendererSpec = {
  capabilities: caps,
  checkQualifiers: schema =>
    schema.datasetName ? [] : [`BigQuery requires a dataset name for table '${schema.tableName}'`],
  physicalType,
  tableRef: (schema, tableName) => `\`${qualifiedName(schema, tableName)}\``,
  ddl,
  cliCreate: ctx => {
    const { schema } = ctx;
    const hints = schema.optimization;
    const flags = ['bq mk --table'];
    const [partition] = hints.partitionColumns;
    if (partition !== undefined) {
      flags.push(`--time_partitioning_field=${partition}`, '--time_partitioning_type=DAY');
      if (hints.partitionExpirationDays !== undefined) {
        flags.push(`--time_partitioning_expiration=${hints.partitionExpirationDays * 86400}`);
      }
      if (hints.requirePartitionFilter) flags.push('--require_partition_filter=true');
    }
    if (hints.clusterColumns.length) flags.push(`--clustering_fields=${hints.clusterColumns.join(',')}`);
    if (schema.description) flags.push(`--description=${shellQuote(schema.description)}`);
    flags.push(bqTableId(schema), schemaFile(schema));
    return flags.join(' ');
  },
  cliLoad: (ctx, dataReference, options) => {
    const { schema } = ctx;
    const flags = ['bq load'];
    if (options.format === 'csv') {
      flags.push('--source_format=CSV');
      if (options.header) flags.push('--skip_leading_rows=1');
      if (options.delimiter !== ',') flags.push(`--field_delimiter=${shellQuote(options.delimiter)}`);
    } else {
      flags.push(`--source_format=${options.format === 'json' ? 'NEWLINE_DELIMITED_JSON' : 'PARQUET'}`);
    }
    flags.push(bqTableId(schema), shellQuote(dataReference));
    if (options.format !== 'parquet') flags.push(schemaFile(schema));
    return flags.join(' ');
  },
  loadSql: (ctx, dataReference, options) => {
    const settings = [`format = ${sqlString(options.format.toUpperCase())}`];
    if (options.format === 'csv') {
      if (options.header) settings.push('skip_leading_rows = 1');
      if (options.delimiter !== ',') settings.push(`field_delimiter = ${sqlString(options.delimiter)}`);
    }
    settings.push(`uris = [${sqlString(dataReference)}]`);
    return `LOAD DATA INTO ${ctx.tableRef}\nFROM FILES (\n  ${settings.join(',\n  ')}\n);`;
  },
  schemaJson: ctx =>
    ctx.schema.columns.map(c => ({
      name: c.name,
      type: ctx.types[c.name].replace(/\(.*\)$/, ''),
      mode: c.nullable ? 'NULLABLE' : 'REQUIRED',
      ...(c.description !== undefined && { description: c.description })
    }))
};
