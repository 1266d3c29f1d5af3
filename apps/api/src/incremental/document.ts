import { z } from 'zod';
import { ValidationError } from '../errors';
import { DELETE_STRATEGIES, IncrementalConfigInput, LOAD_PATTERNS, MERGE_STRATEGIES } from './patterns';

const names = z.array(z.string().min(1));

/** Wire form of an incremental config, snake_case like the schema document. */
export const IncrementalConfigDocument = z.object({
  load_pattern: z.enum(LOAD_PATTERNS),
  primary_keys: names.optional(),
  merge_strategy: z.enum(MERGE_STRATEGIES).optional(),
  update_columns: names.optional(),
  incremental_column: z.string().min(1).optional(),
  lookback_window: z.string().min(1).optional(),
  effective_date_column: z.string().min(1).optional(),
  expiration_date_column: z.string().min(1).optional(),
  is_current_column: z.string().min(1).optional(),
  expiration_sentinel: z.string().regex(/^\d{4}-\d{2}-\d{2}( \d{2}:\d{2}:\d{2})?$/).optional(),
  hash_columns: names.optional(),
  operation_column: z.string().min(1).optional(),
  sequence_column: z.string().min(1).optional(),
  insert_operation: z.string().optional(),
  update_operation: z.string().optional(),
  delete_operation: z.string().optional(),
  delete_strategy: z.enum(DELETE_STRATEGIES).optional(),
  soft_delete_column: z.string().min(1).optional(),
  snapshot_column: z.string().min(1).optional(),
  staging_table: z.string().min(1).optional(),
  use_transaction: z.boolean().optional()
});

export type IncrementalConfigDocument = z.input<typeof IncrementalConfigDocument>;

export const incrementalConfigFromDocument = (input: unknown): IncrementalConfigInput => {
  const parsed = IncrementalConfigDocument.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ValidationError('Invalid incremental config', issues);
  }
  const d = parsed.data;
  return {
    loadPattern: d.load_pattern,
    primaryKeys: d.primary_keys,
    mergeStrategy: d.merge_strategy,
    updateColumns: d.update_columns,
    incrementalColumn: d.incremental_column,
    lookbackWindow: d.lookback_window,
    effectiveDateColumn: d.effective_date_column,
    expirationDateColumn: d.expiration_date_column,
    isCurrentColumn: d.is_current_column,
    expirationSentinel: d.expiration_sentinel,
    hashColumns: d.hash_columns,
    operationColumn: d.operation_column,
    sequenceColumn: d.sequence_column,
    insertOperation: d.insert_operation,
    updateOperation: d.update_operation,
    deleteOperation: d.delete_operation,
    deleteStrategy: d.delete_strategy,
    softDeleteColumn: d.soft_delete_column,
    snapshotColumn: d.snapshot_column,
    stagingTable: d.staging_table,
    useTransaction: d.use_transaction
  };
};
