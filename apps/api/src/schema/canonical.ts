import {
  CanonicalSchema,
  ColumnDefinition,
  LogicalType,
  NUMERIC_TYPES,
  OptimizationHints,
  TabularSample,
  TEMPORAL_TYPES
} from '../types/schema';
import { ValidationError } from '../errors';
import { inferColumnType } from '../utils/profile';
import { standardizeColumnNames } from '../utils/names';

export type ColumnInput = {
  name: string;
  logicalType: LogicalType;
  nullable?: boolean;
  originalName?: string;
  maxLength?: number;
  precision?: number;
  scale?: number;
  description?: string;
  dateFormat?: string;
  timezone?: string;
};

export type HintsInput = {
  partitionColumns?: readonly string[];
  clusterColumns?: readonly string[];
  sortColumns?: readonly string[];
  distributionColumn?: string;
  partitionExpirationDays?: number;
  requirePartitionFilter?: boolean;
};

export type SchemaInput = {
  tableName: string;
  datasetName?: string;
  projectId?: string;
  columns: readonly ColumnInput[];
  optimization?: HintsInput;
  description?: string;
};

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

// Optional keys are left off entirely rather than set to undefined so that
// schemas compare equal after a document round-trip.
export const createColumn = (input: ColumnInput): ColumnDefinition => {
  const column: Mutable<ColumnDefinition> = {
    name: input.name,
    logicalType: input.logicalType,
    nullable: input.nullable ?? true
  };
  if (input.originalName !== undefined) column.originalName = input.originalName;
  if (input.maxLength !== undefined) column.maxLength = input.maxLength;
  if (input.precision !== undefined) column.precision = input.precision;
  if (input.scale !== undefined) column.scale = input.scale;
  if (input.description !== undefined) column.description = input.description;
  if (input.dateFormat !== undefined) column.dateFormat = input.dateFormat;
  if (input.timezone !== undefined) column.timezone = input.timezone;
  return Object.freeze(column);
};

export const createHints = (input: HintsInput = {}): OptimizationHints => {
  const hints: Mutable<OptimizationHints> = {
    partitionColumns: Object.freeze([...(input.partitionColumns ?? [])]),
    clusterColumns: Object.freeze([...(input.clusterColumns ?? [])]),
    sortColumns: Object.freeze([...(input.sortColumns ?? [])]),
    requirePartitionFilter: input.requirePartitionFilter ?? false
  };
  if (input.distributionColumn !== undefined) hints.distributionColumn = input.distributionColumn;
  if (input.partitionExpirationDays !== undefined) hints.partitionExpirationDays = input.partitionExpirationDays;
  return Object.freeze(hints);
};

export const createCanonicalSchema = (input: SchemaInput): CanonicalSchema => {
  const schema: Mutable<CanonicalSchema> = {
    tableName: input.tableName,
    columns: Object.freeze(input.columns.map(createColumn)),
    optimization: createHints(input.optimization)
  };
  if (input.datasetName !== undefined) schema.datasetName = input.datasetName;
  if (input.projectId !== undefined) schema.projectId = input.projectId;
  if (input.description !== undefined) schema.description = input.description;
  return Object.freeze(schema);
};

export const getColumn = (schema: CanonicalSchema, name: string) => {
  const lower = name.toLowerCase();
  return schema.columns.find(c => c.name.toLowerCase() === lower);
};

export const columnNames = (schema: CanonicalSchema) => schema.columns.map(c => c.name);

export const hasOptimizations = (hints: OptimizationHints) =>
  hints.partitionColumns.length > 0 ||
  hints.clusterColumns.length > 0 ||
  hints.sortColumns.length > 0 ||
  hints.distributionColumn !== undefined;

export const withTableName = (schema: CanonicalSchema, tableName: string): CanonicalSchema =>
  createCanonicalSchema({ ...schema, tableName });

/** Rewrites hint references to the columns' own spelling; unknown references are kept for validation to report. */
export const withResolvedHints = (schema: CanonicalSchema): CanonicalSchema => {
  const resolve = (ref: string) => getColumn(schema, ref)?.name ?? ref;
  const hints = schema.optimization;
  return createCanonicalSchema({
    ...schema,
    optimization: {
      ...hints,
      partitionColumns: hints.partitionColumns.map(resolve),
      clusterColumns: hints.clusterColumns.map(resolve),
      sortColumns: hints.sortColumns.map(resolve),
      distributionColumn: hints.distributionColumn === undefined ? undefined : resolve(hints.distributionColumn)
    }
  });
};

export const withoutOptimizations = (schema: CanonicalSchema): CanonicalSchema =>
  createCanonicalSchema({ ...schema, optimization: {} });

const validateColumn = (column: ColumnDefinition): string[] => {
  const errors: string[] = [];
  const { name, logicalType } = column;
  if (!name.trim()) errors.push('Column name cannot be empty');
  if ((column.precision !== undefined || column.scale !== undefined) && logicalType !== 'decimal') {
    errors.push(`Column '${name}': precision/scale only apply to decimal, got ${logicalType}`);
  }
  if (column.precision !== undefined && (!Number.isInteger(column.precision) || column.precision < 1)) {
    errors.push(`Column '${name}': precision must be a positive integer`);
  }
  if (column.scale !== undefined && (!Number.isInteger(column.scale) || column.scale < 0)) {
    errors.push(`Column '${name}': scale must be a non-negative integer`);
  }
  if (column.precision !== undefined && column.scale !== undefined && column.scale > column.precision) {
    errors.push(`Column '${name}': scale ${column.scale} exceeds precision ${column.precision}`);
  }
  if (column.maxLength !== undefined) {
    if (logicalType !== 'string') {
      errors.push(`Column '${name}': max_length only applies to string, got ${logicalType}`);
    } else if (!Number.isInteger(column.maxLength) || column.maxLength < 1) {
      errors.push(`Column '${name}': max_length must be a positive integer`);
    }
  }
  if ((column.dateFormat !== undefined || column.timezone !== undefined) && !TEMPORAL_TYPES.has(logicalType)) {
    errors.push(`Column '${name}': date_format/timezone only apply to date or timestamp columns, got ${logicalType}`);
  }
  return errors;
};

/** Structural checks only; platform capability checks live in the renderers. Empty means valid. */
export const validateSchema = (schema: CanonicalSchema): string[] => {
  const errors: string[] = [];
  if (!schema.tableName.trim()) errors.push('Table name is required');
  if (!schema.columns.length) errors.push(`Table '${schema.tableName}' has no columns`);

  const seen = new Set<string>();
  for (const column of schema.columns) {
    const key = column.name.toLowerCase();
    if (seen.has(key)) errors.push(`Duplicate column name '${column.name}'`);
    seen.add(key);
    errors.push(...validateColumn(column));
  }

  const hints = schema.optimization;
  const checkRefs = (label: string, refs: readonly string[]) => {
    for (const ref of refs) {
      if (!seen.has(ref.toLowerCase())) errors.push(`${label} column '${ref}' not found in schema`);
    }
  };
  checkRefs('Partition', hints.partitionColumns);
  checkRefs('Cluster', hints.clusterColumns);
  checkRefs('Sort', hints.sortColumns);
  if (hints.distributionColumn !== undefined) checkRefs('Distribution', [hints.distributionColumn]);

  if (hints.partitionColumns.length > 1) {
    errors.push(`Only one partition column is supported, got ${hints.partitionColumns.length}`);
  }
  if (hints.partitionExpirationDays !== undefined) {
    if (!Number.isInteger(hints.partitionExpirationDays) || hints.partitionExpirationDays < 1) {
      errors.push('partition_expiration_days must be a positive integer');
    } else if (!hints.partitionColumns.length) {
      errors.push('partition_expiration_days requires a partition column');
    }
  }
  if (hints.requirePartitionFilter && !hints.partitionColumns.length) {
    errors.push('require_partition_filter requires a partition column');
  }
  return errors;
};

export const assertValidSchema = (schema: CanonicalSchema) => {
  const errors = validateSchema(schema);
  if (errors.length) throw new ValidationError(`Invalid schema '${schema.tableName}'`, errors);
};

export const isNumericColumn = (column: ColumnDefinition) => NUMERIC_TYPES.has(column.logicalType);
export const isTemporalColumn = (column: ColumnDefinition) => TEMPORAL_TYPES.has(column.logicalType);

export type InferSchemaOptions = {
  datasetName?: string;
  projectId?: string;
  description?: string;
  standardizeColumns?: boolean;
  stringMaxLength?: number;
  /** Hint columns may be given by original or standardized name. */
  optimization?: HintsInput;
};

export type InferredSchema = {
  schema: CanonicalSchema;
  columnMapping: Record<string, string>;
};

export const inferCanonicalSchema = (
  sample: TabularSample,
  tableName: string,
  options: InferSchemaOptions = {}
): InferredSchema => {
  const originals = sample.columns.map(c => c.name);
  const standardize = options.standardizeColumns ?? true;
  const names = standardize ? standardizeColumnNames(originals).names : originals;

  const columnMapping: Record<string, string> = {};
  originals.forEach((original, i) => {
    if (!Object.hasOwn(columnMapping, original)) columnMapping[original] = names[i];
  });

  const columns: ColumnInput[] = sample.columns.map((col, i) => {
    const inferred = inferColumnType(col.values, {
      nullCount: col.nullCount,
      stringMaxLength: options.stringMaxLength
    });
    return {
      name: names[i],
      originalName: col.name,
      logicalType: inferred.logicalType,
      nullable: inferred.nullable,
      precision: inferred.precision,
      scale: inferred.scale,
      dateFormat: inferred.dateFormat
    };
  });

  const resolve = (ref: string) => (Object.hasOwn(columnMapping, ref) ? columnMapping[ref] : ref);
  const hints = options.optimization ?? {};
  const schema = createCanonicalSchema({
    tableName,
    datasetName: options.datasetName,
    projectId: options.projectId,
    description: options.description,
    columns,
    optimization: {
      ...hints,
      partitionColumns: hints.partitionColumns?.map(resolve),
      clusterColumns: hints.clusterColumns?.map(resolve),
      sortColumns: hints.sortColumns?.map(resolve),
      distributionColumn: hints.distributionColumn === undefined ? undefined : resolve(hints.distributionColumn)
    }
  });

  assertValidSchema(schema);
  return { schema, columnMapping };
};
