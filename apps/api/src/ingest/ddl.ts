import pkg from 'node-sql-parser';
import { CanonicalSchema } from '../types/schema';
import { ValidationError } from '../errors';
import { ColumnInput, createCanonicalSchema } from '../schema/canonical';

const { Parser } = pkg;

type Node = Record<string, unknown>;

const isRecord = (value: unknown): value is Node => typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (value: unknown) => (typeof value === 'string' ? value : undefined);
const asNumber = (value: unknown) => (typeof value === 'number' && Number.isFinite(value) ? value : undefined);

type MappedType = Pick<ColumnInput, 'logicalType' | 'maxLength' | 'precision' | 'scale'>;

export const mapSqlType = (dataType: string, length?: number, scale?: number): MappedType => {
  const t = dataType.toLowerCase().trim();
  const is = (...names: string[]) => names.includes(t);

  if (is('bigint', 'int8', 'bigserial', 'int64')) return { logicalType: 'bigint' };
  if (is('int', 'integer', 'int4', 'smallint', 'int2', 'tinyint', 'mediumint', 'serial', 'smallserial')) {
    return { logicalType: 'integer' };
  }
  if (is('decimal', 'numeric', 'number', 'bignumeric', 'money')) {
    return {
      logicalType: 'decimal',
      ...(length !== undefined && { precision: length, scale: scale ?? 0 })
    };
  }
  if (is('float', 'float4', 'float8', 'float64', 'double', 'double precision', 'real')) return { logicalType: 'float' };
  if (is('bool', 'boolean', 'bit')) return { logicalType: 'boolean' };
  if (t === 'date') return { logicalType: 'date' };
  if (is('timestamptz', 'timestamp_tz', 'timestamp with time zone', 'datetimeoffset')) return { logicalType: 'timestamptz' };
  if (t.startsWith('timestamp') || t.startsWith('datetime')) return { logicalType: 'timestamp' };
  if (is('text', 'mediumtext', 'longtext', 'clob', 'ntext')) return { logicalType: 'text' };
  if (is('json', 'jsonb', 'variant', 'super', 'object')) return { logicalType: 'json' };
  if (is('blob', 'bytea', 'binary', 'varbinary', 'bytes', 'varbyte', 'longblob')) return { logicalType: 'binary' };
  if (t.includes('char') || is('string', 'uuid')) {
    return { logicalType: 'string', ...(length !== undefined && { maxLength: length }) };
  }
  return { logicalType: 'string' };
};

const DIALECTS: Record<string, string> = {
  postgres: 'postgresql',
  postgresql: 'postgresql',
  redshift: 'redshift',
  mysql: 'mysql',
  mariadb: 'mariadb',
  sqlite: 'sqlite',
  bigquery: 'bigquery',
  snowflake: 'snowflake',
  sqlserver: 'transactsql',
  mssql: 'transactsql'
};

const normalizeDialect = (dialect: string) => DIALECTS[dialect.toLowerCase()] ?? 'postgresql';

// The parser nests identifiers differently per dialect and version.
const identifier = (raw: unknown): string | undefined => {
  if (typeof raw === 'string') return raw;
  if (!isRecord(raw)) return undefined;
  return (
    asString(raw.value) ??
    identifier(raw.expr) ??
    identifier(raw.column) ??
    identifier(raw.name) ??
    asString(raw.table)
  );
};

const tableName = (raw: unknown) => {
  const first = Array.isArray(raw) ? raw[0] : raw;
  if (isRecord(first)) return { name: identifier(first.table) ?? identifier(first), db: asString(first.db) };
  return { name: identifier(first), db: undefined };
};

export type ParsedTable = {
  schema: CanonicalSchema;
  primaryKeys: string[];
};

const columnsOf = (node: Node) => {
  const defs = Array.isArray(node.create_definitions) ? node.create_definitions : [];
  const columns: ColumnInput[] = [];
  const primaryKeys: string[] = [];

  for (const def of defs) {
    if (!isRecord(def)) continue;
    if (def.resource === 'constraint' && asString(def.constraint_type)?.toLowerCase() === 'primary key') {
      const keys = Array.isArray(def.definition) ? def.definition : [];
      for (const key of keys) {
        const name = identifier(key);
        if (name) primaryKeys.push(name);
      }
      continue;
    }
    if (!def.column) continue;
    const name = identifier(def.column);
    if (!name) continue;

    const definition = isRecord(def.definition) ? def.definition : {};
    const dataType = asString(definition.dataType) ?? asString(definition.data_type) ?? 'string';
    const suffix = Array.isArray(definition.suffix) ? definition.suffix.filter((s): s is string => typeof s === 'string') : [];
    const fullType = [dataType, ...suffix].join(' ');
    const isPrimary = Boolean(def.primary_key);
    if (isPrimary) primaryKeys.push(name);
    const notNull = isRecord(def.nullable) && asString(def.nullable.type)?.toLowerCase() === 'not null';

    columns.push({
      name,
      nullable: !(notNull || isPrimary),
      ...mapSqlType(fullType, asNumber(definition.length), asNumber(definition.scale))
    });
  }
  // table-level PRIMARY KEY constraints may follow the columns they name
  const keyed = new Set(primaryKeys.map(k => k.toLowerCase()));
  return {
    columns: columns.map(c => (keyed.has(c.name.toLowerCase()) ? { ...c, nullable: false } : c)),
    primaryKeys
  };
};

/** Reads CREATE TABLE statements back into canonical schemas; other statements are skipped. */
export const ingestDDL = (ddl: string, dialect = 'postgresql'): ParsedTable[] => {
  const parser = new Parser();
  let ast: unknown;
  try {
    ast = parser.astify(ddl, { database: normalizeDialect(dialect) });
  } catch (err) {
    throw new ValidationError(`Could not parse DDL: ${err instanceof Error ? err.message : String(err)}`);
  }
  const nodes: unknown[] = Array.isArray(ast) ? ast : [ast];
  const tables: ParsedTable[] = [];

  for (const node of nodes) {
    if (!isRecord(node) || node.type !== 'create' || node.keyword !== 'table') continue;
    const { name, db } = tableName(node.table);
    if (!name) continue;
    const { columns, primaryKeys } = columnsOf(node);
    tables.push({
      schema: createCanonicalSchema({ tableName: name, ...(db ? { datasetName: db } : {}), columns }),
      primaryKeys
    });
  }
  return tables;
};
