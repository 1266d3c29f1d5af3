import { z } from 'zod';
import { CanonicalSchema, LOGICAL_TYPES } from '../types/schema';
import { ValidationError } from '../errors';
import { assertValidSchema, createCanonicalSchema, HintsInput } from './canonical';

const ColumnDocument = z.object({
  name: z.string().min(1),
  logical_type: z.enum(LOGICAL_TYPES),
  nullable: z.boolean().default(true),
  original_name: z.string().optional(),
  max_length: z.number().int().positive().optional(),
  precision: z.number().int().positive().optional(),
  scale: z.number().int().nonnegative().optional(),
  description: z.string().optional(),
  date_format: z.string().optional(),
  timezone: z.string().optional()
});

export const OptimizationDocument = z.object({
  partition_columns: z.array(z.string()).default([]),
  cluster_columns: z.array(z.string()).default([]),
  sort_columns: z.array(z.string()).default([]),
  distribution_column: z.string().nullish(),
  partition_expiration_days: z.number().int().positive().nullish(),
  require_partition_filter: z.boolean().default(false)
});

export const SchemaDocument = z.object({
  table_name: z.string().min(1),
  dataset_name: z.string().optional(),
  project_id: z.string().optional(),
  description: z.string().optional(),
  columns: z.array(ColumnDocument).min(1),
  optimization: OptimizationDocument.default({})
});

export type SchemaDocument = z.input<typeof SchemaDocument>;

export const schemaToDocument = (schema: CanonicalSchema): SchemaDocument => {
  const { optimization: hints } = schema;
  return {
    table_name: schema.tableName,
    ...(schema.datasetName !== undefined && { dataset_name: schema.datasetName }),
    ...(schema.projectId !== undefined && { project_id: schema.projectId }),
    ...(schema.description !== undefined && { description: schema.description }),
    columns: schema.columns.map(c => ({
      name: c.name,
      logical_type: c.logicalType,
      nullable: c.nullable,
      ...(c.originalName !== undefined && { original_name: c.originalName }),
      ...(c.maxLength !== undefined && { max_length: c.maxLength }),
      ...(c.precision !== undefined && { precision: c.precision }),
      ...(c.scale !== undefined && { scale: c.scale }),
      ...(c.description !== undefined && { description: c.description }),
      ...(c.dateFormat !== undefined && { date_format: c.dateFormat }),
      ...(c.timezone !== undefined && { timezone: c.timezone })
    })),
    optimization: {
      partition_columns: [...hints.partitionColumns],
      cluster_columns: [...hints.clusterColumns],
      sort_columns: [...hints.sortColumns],
      distribution_column: hints.distributionColumn ?? null,
      partition_expiration_days: hints.partitionExpirationDays ?? null,
      require_partition_filter: hints.requirePartitionFilter
    }
  };
};

const toHints = (o: z.output<typeof OptimizationDocument>): HintsInput => ({
  partitionColumns: o.partition_columns,
  clusterColumns: o.cluster_columns,
  sortColumns: o.sort_columns,
  distributionColumn: o.distribution_column ?? undefined,
  partitionExpirationDays: o.partition_expiration_days ?? undefined,
  requirePartitionFilter: o.require_partition_filter
});

const describeIssue = (issue: z.ZodIssue) => `${issue.path.join('.') || 'document'}: ${issue.message}`;

/** Parses a persisted document; hint references must name columns, but no platform is checked. */
export const schemaFromDocument = (input: unknown): CanonicalSchema => {
  const parsed = SchemaDocument.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid schema document', parsed.error.issues.map(describeIssue));
  }
  const doc = parsed.data;
  const schema = createCanonicalSchema({
    tableName: doc.table_name,
    datasetName: doc.dataset_name,
    projectId: doc.project_id,
    description: doc.description,
    columns: doc.columns.map(c => ({
      name: c.name,
      logicalType: c.logical_type,
      nullable: c.nullable,
      originalName: c.original_name,
      maxLength: c.max_length,
      precision: c.precision,
      scale: c.scale,
      description: c.description,
      dateFormat: c.date_format,
      timezone: c.timezone
    })),
    optimization: toHints(doc.optimization)
  });
  assertValidSchema(schema);
  return schema;
};

/** Parses the `optimization` block on its own, e.g. hints sent alongside an upload. */
export const hintsFromDocument = (input: unknown): HintsInput => {
  const parsed = OptimizationDocument.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid optimization hints', parsed.error.issues.map(describeIssue));
  }
  return toHints(parsed.data);
};

export const schemaToJson = (schema: CanonicalSchema) => JSON.stringify(schemaToDocument(schema), null, 2);

export const schemaFromJson = (json: string): CanonicalSchema => {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new ValidationError(`Schema document is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return schemaFromDocument(raw);
};
