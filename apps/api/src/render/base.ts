import { CanonicalSchema, ColumnDefinition } from '../types/schema';
import { UnsupportedCapabilityError, ValidationError } from '../errors';
import { getColumn, validateSchema, withResolvedHints } from '../schema/canonical';
import { Platform, PlatformCapabilities } from './capabilities';
import { quoteIdentifier } from './sql';

export type DdlOptions = {
  replace?: boolean;
  ifNotExists?: boolean;
};

export type LoadFormat = 'csv' | 'json' | 'parquet';

export type LoadOptions = {
  format?: LoadFormat;
  header?: boolean;
  delimiter?: string;
  iamRole?: string; // Redshift
};

export type ResolvedLoadOptions = {
  format: LoadFormat;
  header: boolean;
  delimiter: string;
  iamRole?: string;
};

export type SchemaField = {
  name: string;
  type: string;
  mode: 'REQUIRED' | 'NULLABLE';
  description?: string;
};

export type Renderer = {
  readonly platform: Platform;
  readonly schema: CanonicalSchema;
  readonly capabilities: PlatformCapabilities;
  validate: () => string[];
  toPhysicalType: (column: ColumnDefinition) => string;
  toPhysicalTypes: () => Record<string, string>;
  toDdl: (options?: DdlOptions) => string;
  toCliCreate: () => string;
  toCliLoad: (dataReference: string, options?: LoadOptions) => string;
  toLoadSql: (dataReference: string, options?: LoadOptions) => string;
  supportsJsonSchema: () => boolean;
  toSchemaJson: () => SchemaField[];
  tableRef: (tableName?: string) => string;
  quote: (identifier: string) => string;
};

/** What a platform module hands to the renderer; everything else is shared. */
export type RenderContext = {
  schema: CanonicalSchema;
  capabilities: PlatformCapabilities;
  quote: (identifier: string) => string;
  tableRef: string;
  types: Record<string, string>;
};

export type PlatformRendererSpec = {
  capabilities: PlatformCapabilities;
  /** Construction-time checks such as a required dataset qualifier. */
  checkQualifiers?: (schema: CanonicalSchema) => string[];
  /** Returns null for a logical type the platform cannot store. */
  physicalType: (column: ColumnDefinition) => string | null;
  tableRef: (schema: CanonicalSchema, tableName: string, quote: (id: string) => string) => string;
  ddl: (ctx: RenderContext, options: DdlOptions) => string;
  cliCreate: (ctx: RenderContext, ddl: string) => string;
  cliLoad: (ctx: RenderContext, dataReference: string, options: ResolvedLoadOptions) => string;
  loadSql: (ctx: RenderContext, dataReference: string, options: ResolvedLoadOptions) => string;
  schemaJson?: (ctx: RenderContext) => SchemaField[];
};

const TYPE_LABEL: Record<string, string> = {
  date: 'DATE',
  timestamp: 'TIMESTAMP',
  timestamptz: 'TIMESTAMPTZ'
};

/** Capability violations for a structurally valid schema; empty means renderable. */
export const validateCapabilities = (schema: CanonicalSchema, caps: PlatformCapabilities): string[] => {
  const errors: string[] = [];
  const hints = schema.optimization;
  const name = caps.displayName;

  if (hints.partitionColumns.length) {
    if (!caps.partitioning) {
      errors.push(`${name} does not support partitioning (partition_columns: ${hints.partitionColumns.join(', ')})`);
    } else {
      if (hints.partitionColumns.length > caps.partitioning.maxColumns) {
        errors.push(
          `${name} supports max ${caps.partitioning.maxColumns} partition column(s), got ${hints.partitionColumns.length}`
        );
      }
      const allowed = caps.partitioning.allowedTypes;
      if (allowed) {
        for (const ref of hints.partitionColumns) {
          const column = getColumn(schema, ref);
          if (column && !allowed.includes(column.logicalType)) {
            const labels = allowed.map(t => TYPE_LABEL[t] ?? t.toUpperCase());
            errors.push(
              `${name} partition column '${column.name}' must be one of ${[...new Set(labels)].join('/')}, got ${column.logicalType}`
            );
          }
        }
      }
    }
  }

  if (hints.clusterColumns.length) {
    if (!caps.clustering) {
      const advice = caps.sortKeys ? '; use sort_columns instead' : '';
      errors.push(`${name} does not support clustering (cluster_columns: ${hints.clusterColumns.join(', ')})${advice}`);
    } else if (hints.clusterColumns.length > caps.clustering.maxColumns) {
      errors.push(`${name} supports max ${caps.clustering.maxColumns} cluster columns, got ${hints.clusterColumns.length}`);
    }
  }

  if (hints.sortColumns.length && !caps.sortKeys) {
    errors.push(`${name} does not support sort keys (sort_columns: ${hints.sortColumns.join(', ')})`);
  }
  if (hints.distributionColumn !== undefined && !caps.distributionKey) {
    errors.push(`${name} does not support distribution keys (distribution_column: ${hints.distributionColumn})`);
  }
  if (!caps.partitionOptions) {
    if (hints.partitionExpirationDays !== undefined) {
      errors.push(`${name} does not support partition_expiration_days`);
    }
    if (hints.requirePartitionFilter) {
      errors.push(`${name} does not support require_partition_filter`);
    }
  }

  for (const column of schema.columns) {
    if (caps.unsupportedTypes.includes(column.logicalType)) {
      errors.push(`${name} does not support logical type ${column.logicalType} (column '${column.name}')`);
    }
  }
  return errors;
};

const resolveLoadOptions = (options: LoadOptions = {}): ResolvedLoadOptions => ({
  format: options.format ?? 'csv',
  header: options.header ?? true,
  delimiter: options.delimiter ?? ',',
  ...(options.iamRole !== undefined && { iamRole: options.iamRole })
});

export const createRenderer = (spec: PlatformRendererSpec, schema: CanonicalSchema): Renderer => {
  const caps = spec.capabilities;
  const structural = [...validateSchema(schema), ...(spec.checkQualifiers?.(schema) ?? [])];
  if (structural.length) {
    throw new ValidationError(`Cannot render '${schema.tableName}' for ${caps.displayName}`, structural);
  }

  const quote = (identifier: string) => quoteIdentifier(identifier, caps.quoteStyle, caps.alwaysQuote);
  const tableRef = (tableName = schema.tableName) => spec.tableRef(schema, tableName, quote);
  const validate = () => validateCapabilities(schema, caps);

  const toPhysicalType = (column: ColumnDefinition) => {
    const type = spec.physicalType(column);
    if (type === null) {
      throw new UnsupportedCapabilityError(
        `${caps.displayName} does not support logical type ${column.logicalType} (column '${column.name}')`,
        caps.platform,
        `type:${column.logicalType}`
      );
    }
    return type;
  };

  const toPhysicalTypes = () => {
    const types: Record<string, string> = {};
    for (const column of schema.columns) types[column.name] = toPhysicalType(column);
    return types;
  };

  // Generation never emits text for a schema that fails validate().
  const context = (): RenderContext => {
    const issues = validate();
    if (issues.length) {
      throw new ValidationError(`Schema '${schema.tableName}' is not valid for ${caps.displayName}`, issues);
    }
    return {
      schema: withResolvedHints(schema),
      capabilities: caps,
      quote,
      tableRef: tableRef(),
      types: toPhysicalTypes()
    };
  };

  const toDdl = (options: DdlOptions = {}) => spec.ddl(context(), options);

  return {
    platform: caps.platform,
    schema,
    capabilities: caps,
    validate,
    toPhysicalType,
    toPhysicalTypes,
    toDdl,
    toCliCreate: () => {
      const ctx = context();
      return spec.cliCreate(ctx, spec.ddl(ctx, {}));
    },
    toCliLoad: (dataReference, options) => spec.cliLoad(context(), dataReference, resolveLoadOptions(options)),
    toLoadSql: (dataReference, options) => spec.loadSql(context(), dataReference, resolveLoadOptions(options)),
    supportsJsonSchema: () => caps.jsonSchema,
    toSchemaJson: () => {
      if (!spec.schemaJson) {
        throw new UnsupportedCapabilityError(
          `${caps.displayName} does not support a JSON schema artifact; use toDdl() instead`,
          caps.platform,
          'json_schema'
        );
      }
      return spec.schemaJson(context());
    },
    tableRef,
    quote
  };
};

export const unsupportedFormat = (caps: PlatformCapabilities, format: LoadFormat): never => {
  throw new UnsupportedCapabilityError(
    `${caps.displayName} bulk load does not support ${format} files`,
    caps.platform,
    `load_format:${format}`
  );
};

export const decimalArgs = (column: ColumnDefinition) =>
  column.precision === undefined ? '' : `(${column.precision},${column.scale ?? 0})`;
