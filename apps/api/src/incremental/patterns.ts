import { CanonicalSchema } from '../types/schema';
import { ConfigurationError } from '../errors';
import { getColumn, isNumericColumn, isTemporalColumn } from '../schema/canonical';
import { parseLookback } from './lookback';

export const LOAD_PATTERNS = [
  'full_refresh',
  'append',
  'upsert',
  'delete_insert',
  'incremental_timestamp',
  'incremental_append',
  'scd_type1',
  'scd_type2',
  'cdc',
  'snapshot'
] as const;

export type LoadPattern = (typeof LOAD_PATTERNS)[number];

export const MERGE_STRATEGIES = ['update_all', 'update_changed', 'update_selective', 'update_none'] as const;
export type MergeStrategy = (typeof MERGE_STRATEGIES)[number];

export const DELETE_STRATEGIES = ['hard_delete', 'soft_delete', 'ignore'] as const;
export type DeleteStrategy = (typeof DELETE_STRATEGIES)[number];

export const isLoadPattern = (value: unknown): value is LoadPattern =>
  LOAD_PATTERNS.some(p => p === value);

export type IncrementalConfig = {
  loadPattern: LoadPattern;
  primaryKeys: string[];
  mergeStrategy: MergeStrategy;
  updateColumns: string[];
  incrementalColumn?: string;
  lookbackWindow?: string;
  effectiveDateColumn: string;
  expirationDateColumn: string;
  isCurrentColumn: string;
  expirationSentinel: string;
  hashColumns: string[];
  operationColumn?: string;
  sequenceColumn?: string;
  insertOperation: string;
  updateOperation: string;
  deleteOperation: string;
  deleteStrategy: DeleteStrategy;
  softDeleteColumn?: string;
  snapshotColumn: string;
  stagingTable?: string;
  useTransaction: boolean;
};

export type IncrementalConfigInput = Partial<IncrementalConfig> & { loadPattern: LoadPattern };

export const DEFAULT_EXPIRATION_SENTINEL = '9999-12-31';

export const createIncrementalConfig = (input: IncrementalConfigInput): IncrementalConfig => ({
  ...input,
  primaryKeys: input.primaryKeys ?? [],
  mergeStrategy: input.mergeStrategy ?? 'update_all',
  updateColumns: input.updateColumns ?? [],
  effectiveDateColumn: input.effectiveDateColumn ?? 'effective_from',
  expirationDateColumn: input.expirationDateColumn ?? 'effective_to',
  isCurrentColumn: input.isCurrentColumn ?? 'is_current',
  expirationSentinel: input.expirationSentinel ?? DEFAULT_EXPIRATION_SENTINEL,
  hashColumns: input.hashColumns ?? [],
  insertOperation: input.insertOperation ?? 'I',
  updateOperation: input.updateOperation ?? 'U',
  deleteOperation: input.deleteOperation ?? 'D',
  deleteStrategy: input.deleteStrategy ?? 'ignore',
  snapshotColumn: input.snapshotColumn ?? 'snapshot_at',
  useTransaction: input.useTransaction ?? true
});

type Requirement = 'primary_keys' | 'incremental_column' | 'hash_columns' | 'scd_columns' | 'operation_column';

/** Fields each pattern cannot run without. */
export const PATTERN_REQUIREMENTS: Readonly<Record<LoadPattern, readonly Requirement[]>> = {
  full_refresh: [],
  append: [],
  snapshot: [],
  upsert: ['primary_keys'],
  delete_insert: ['primary_keys'],
  scd_type1: ['primary_keys'],
  incremental_append: ['primary_keys'],
  incremental_timestamp: ['incremental_column'],
  scd_type2: ['primary_keys', 'hash_columns', 'scd_columns'],
  cdc: ['primary_keys', 'operation_column']
};

const fail = (field: string, message: string): never => {
  throw new ConfigurationError(message, field);
};

const requireColumns = (schema: CanonicalSchema, field: string, columns: readonly string[]) => {
  for (const name of columns) {
    if (!getColumn(schema, name)) fail(field, `${field} column '${name}' not found in schema '${schema.tableName}'`);
  }
};

/**
 * Checks the config against the pattern's required fields and the schema.
 * Throws ConfigurationError naming the first offending field.
 */
export const validateIncrementalConfig = (config: IncrementalConfig, schema: CanonicalSchema) => {
  const pattern = config.loadPattern;
  if (!isLoadPattern(pattern)) fail('load_pattern', `Unknown load pattern '${String(pattern)}'`);

  for (const requirement of PATTERN_REQUIREMENTS[pattern]) {
    switch (requirement) {
      case 'primary_keys':
        if (!config.primaryKeys.length) fail('primary_keys', `primary_keys cannot be empty for ${pattern}`);
        break;
      case 'incremental_column':
        if (!config.incrementalColumn) fail('incremental_column', `incremental_column is required for ${pattern}`);
        break;
      case 'hash_columns':
        if (!config.hashColumns.length) fail('hash_columns', `hash_columns cannot be empty for ${pattern}`);
        break;
      case 'scd_columns':
        if (!config.effectiveDateColumn) fail('effective_date_column', `effective_date_column is required for ${pattern}`);
        if (!config.expirationDateColumn) {
          fail('expiration_date_column', `expiration_date_column is required for ${pattern}`);
        }
        if (!config.isCurrentColumn) fail('is_current_column', `is_current_column is required for ${pattern}`);
        requireColumns(schema, 'effective_date_column', [config.effectiveDateColumn]);
        requireColumns(schema, 'expiration_date_column', [config.expirationDateColumn]);
        requireColumns(schema, 'is_current_column', [config.isCurrentColumn]);
        break;
      case 'operation_column':
        if (!config.operationColumn) fail('operation_column', `operation_column is required for ${pattern}`);
        break;
    }
  }

  requireColumns(schema, 'primary_keys', config.primaryKeys);
  requireColumns(schema, 'hash_columns', config.hashColumns);
  requireColumns(schema, 'update_columns', config.updateColumns);
  if (config.operationColumn) requireColumns(schema, 'operation_column', [config.operationColumn]);
  if (config.sequenceColumn) requireColumns(schema, 'sequence_column', [config.sequenceColumn]);

  if (pattern === 'upsert' && config.mergeStrategy === 'update_selective' && !config.updateColumns.length) {
    fail('update_columns', 'update_columns cannot be empty for merge strategy update_selective');
  }

  if (pattern === 'cdc' && config.deleteStrategy === 'soft_delete') {
    if (!config.softDeleteColumn) fail('soft_delete_column', 'soft_delete_column is required for soft_delete');
    else requireColumns(schema, 'soft_delete_column', [config.softDeleteColumn]);
  }

  if (pattern === 'incremental_timestamp' && config.incrementalColumn) {
    const column = getColumn(schema, config.incrementalColumn);
    if (!column) {
      return fail('incremental_column', `incremental_column '${config.incrementalColumn}' not found in schema '${schema.tableName}'`);
    }
    if (!isTemporalColumn(column) && !isNumericColumn(column)) {
      fail('incremental_column', `incremental_column '${column.name}' must be a date, timestamp or numeric column, got ${column.logicalType}`);
    }
    if (config.lookbackWindow) {
      const lookback = parseLookback(config.lookbackWindow);
      if (!lookback) fail('lookback_window', `lookback_window '${config.lookbackWindow}' must look like '2 hours' or '1 day'`);
      if (!isTemporalColumn(column)) {
        fail('lookback_window', `lookback_window needs a date or timestamp incremental_column, got ${column.logicalType}`);
      }
      if (column.logicalType === 'date' && lookback && lookback.unit !== 'day') {
        fail('lookback_window', `lookback_window on date column '${column.name}' must be in days`);
      }
    }
  }
};

export type PatternMetadata = {
  pattern: LoadPattern;
  name: string;
  description: string;
  complexity: 'simple' | 'moderate' | 'advanced';
  requiresPrimaryKey: boolean;
  supportsDeletes: boolean;
  preservesHistory: boolean;
  useCases: string[];
};

const PATTERN_METADATA: Readonly<Record<LoadPattern, PatternMetadata>> = {
  full_refresh: {
    pattern: 'full_refresh',
    name: 'Full Refresh',
    description: 'Empty the target, then copy every staged row into it',
    complexity: 'simple',
    requiresPrimaryKey: false,
    supportsDeletes: true,
    preservesHistory: false,
    useCases: ['small dimension tables', 'lookup tables', 'complete reloads']
  },
  append: {
    pattern: 'append',
    name: 'Append Only',
    description: 'Insert every staged row with no matching',
    complexity: 'simple',
    requiresPrimaryKey: false,
    supportsDeletes: false,
    preservesHistory: true,
    useCases: ['event logs', 'immutable facts', 'clickstream']
  },
  upsert: {
    pattern: 'upsert',
    name: 'Upsert (Merge)',
    description: 'Update matched rows and insert new ones',
    complexity: 'moderate',
    requiresPrimaryKey: true,
    supportsDeletes: false,
    preservesHistory: false,
    useCases: ['customer records', 'product catalogs', 'slowly changing facts']
  },
  delete_insert: {
    pattern: 'delete_insert',
    name: 'Delete + Insert',
    description: 'Delete target rows whose keys were staged, then insert all staged rows',
    complexity: 'moderate',
    requiresPrimaryKey: true,
    supportsDeletes: false,
    preservesHistory: false,
    useCases: ['platforms without merge', 'partition replacement', 'batch corrections']
  },
  incremental_timestamp: {
    pattern: 'incremental_timestamp',
    name: 'Incremental by Timestamp',
    description: 'Insert staged rows newer than the target high-water mark',
    complexity: 'moderate',
    requiresPrimaryKey: false,
    supportsDeletes: false,
    preservesHistory: true,
    useCases: ['event logs', 'time series', 'audit trails']
  },
  incremental_append: {
    pattern: 'incremental_append',
    name: 'Incremental Append',
    description: 'Insert only staged rows whose keys are not in the target',
    complexity: 'simple',
    requiresPrimaryKey: true,
    supportsDeletes: false,
    preservesHistory: true,
    useCases: ['deduplicated event logs', 'idempotent reloads']
  },
  scd_type1: {
    pattern: 'scd_type1',
    name: 'SCD Type 1',
    description: 'Overwrite matched rows in place and insert new ones; no history',
    complexity: 'moderate',
    requiresPrimaryKey: true,
    supportsDeletes: false,
    preservesHistory: false,
    useCases: ['dimension corrections', 'current-state dimensions']
  },
  scd_type2: {
    pattern: 'scd_type2',
    name: 'SCD Type 2',
    description: 'Close out changed current rows and insert new current versions',
    complexity: 'advanced',
    requiresPrimaryKey: true,
    supportsDeletes: false,
    preservesHistory: true,
    useCases: ['customer history', 'price history', 'compliance audit']
  },
  cdc: {
    pattern: 'cdc',
    name: 'Change Data Capture',
    description: 'Apply insert, update and delete operations captured from a source',
    complexity: 'advanced',
    requiresPrimaryKey: true,
    supportsDeletes: true,
    preservesHistory: false,
    useCases: ['database replication', 'real-time sync', 'event sourcing']
  },
  snapshot: {
    pattern: 'snapshot',
    name: 'Snapshot',
    description: 'Insert every staged row tagged with the load time',
    complexity: 'simple',
    requiresPrimaryKey: false,
    supportsDeletes: false,
    preservesHistory: true,
    useCases: ['daily balances', 'inventory levels', 'point-in-time reporting']
  }
};

export const getPatternMetadata = (pattern: LoadPattern) => PATTERN_METADATA[pattern];

export const getAllPatterns = () => LOAD_PATTERNS.map(p => PATTERN_METADATA[p]);

export const getSimplePatterns = () => getAllPatterns().filter(m => m.complexity === 'simple').map(m => m.pattern);

export const getAdvancedPatterns = () => getAllPatterns().filter(m => m.complexity === 'advanced').map(m => m.pattern);

/** Patterns whose use cases mention the search term (case-insensitive). */
export const listPatternsForUseCase = (useCase: string) => {
  const term = useCase.trim().toLowerCase();
  if (!term) return [];
  return getAllPatterns()
    .filter(m => m.useCases.some(u => u.includes(term)) || m.description.toLowerCase().includes(term))
    .map(m => m.pattern);
};
