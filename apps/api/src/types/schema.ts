export const LOGICAL_TYPES = [
  'integer',
  'bigint',
  'float',
  'decimal',
  'string',
  'text',
  'boolean',
  'date',
  'timestamp',
  'timestamptz',
  'json',
  'binary'
] as const;

export type LogicalType = (typeof LOGICAL_TYPES)[number];

export const TEMPORAL_TYPES: ReadonlySet<LogicalType> = new Set<LogicalType>(['date', 'timestamp', 'timestamptz']);
export const NUMERIC_TYPES: ReadonlySet<LogicalType> = new Set<LogicalType>(['integer', 'bigint', 'float', 'decimal']);


export type ColumnDefinition = {
  readonly name: string;
  readonly logicalType: LogicalType;
  readonly nullable: boolean;
  readonly originalName?: string; // pre-standardization header
  readonly maxLength?: number; // string only
  readonly precision?: number; // decimal only
  readonly scale?: number; // decimal only
  readonly description?: string;
  readonly dateFormat?: string; // date/timestamp only
  readonly timezone?: string;
};

export type OptimizationHints = {
  readonly partitionColumns: readonly string[];
  readonly clusterColumns: readonly string[];
  readonly sortColumns: readonly string[];
  readonly distributionColumn?: string;
  readonly partitionExpirationDays?: number;
  readonly requirePartitionFilter: boolean;
};

export type CanonicalSchema = {
  readonly tableName: string;
  readonly datasetName?: string;
  readonly projectId?: string;
  readonly columns: readonly ColumnDefinition[];
  readonly optimization: OptimizationHints;
  readonly description?: string;
};

export type RawValue = string | number | boolean | null | undefined;

export type SampleColumn = {
  name: string;
  values: RawValue[]; // sampled, in row order
  nullCount: number; // over the full column, not just the sample
};

export type TabularSample = {
  columns: SampleColumn[];
  rowCount: number;
  source?: string; // csv|excel|rows
};

export type KeyCandidate = {
  columns: string[];
  confidence: number; // 0..1
  uniqueness: number; // 0..1
  completeness: number; // 0..1
  cardinality: number;
  isComposite: boolean;
  reasoning: string;
};
