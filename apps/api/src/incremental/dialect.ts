import { LogicalType } from '../types/schema';
import { Platform } from '../render/capabilities';
import { IntervalUnit, Lookback } from './lookback';

/** The two sides of every join: the target table alias and the staged rows alias. */
export const TARGET = 'target';
export const SOURCE = 'source';

export type DeleteMatching = {
  target: string; // table reference
  tableName: string; // unqualified target name
  source: string; // table reference or parenthesized subquery
  on: string; // join condition over TARGET/SOURCE aliases
  where?: string;
};

export type UpdateFromSource = DeleteMatching & {
  assignments: string[]; // `col = expr`, unqualified left side
};

export type Watermark = {
  setup: string[];
  bound: string;
};

/** SQL fragments that differ between platforms; recipes are built from these. */
export type SqlDialect = {
  platform: Platform;
  currentTimestamp: string;
  booleanLiteral: (value: boolean) => string;
  truncate: (target: string) => string;
  /** Alias that DELETE/UPDATE conditions use for the target; Redshift cannot alias it. */
  dmlTarget: (tableName: string) => string;
  deleteMatching: (d: DeleteMatching) => string;
  updateFromSource: (u: UpdateFromSource) => string;
  notMatched: string;
  /** Null-safe fingerprint over qualified column expressions. */
  rowHash: (columns: string[]) => string;
  subtractInterval: (expr: string, amount: number, unit: IntervalUnit, logicalType: LogicalType) => string;
  /** How MAX(watermark) reaches the filter: a script variable or an inline subquery. */
  watermark: (maxQuery: string, physicalType: string) => Watermark;
  /** `merge` and `on_conflict` can upsert in one statement; null cannot. */
  mergeStyle: 'merge' | 'on_conflict' | null;
  begin: string;
  commit: string;
};

export const cast = (expr: string, type: string) => `CAST(${expr} AS ${type})`;

export const joinOn = (keys: string[], quote: (id: string) => string, left = TARGET, right = SOURCE) =>
  keys.map(k => `${left}.${quote(k)} = ${right}.${quote(k)}`).join(' AND ');

export const withLookback = (dialect: SqlDialect, expr: string, lookback: Lookback | null, logicalType: LogicalType) =>
  lookback ? dialect.subtractInterval(expr, lookback.amount, lookback.unit, logicalType) : expr;

// Most dialects share these shapes; a platform overrides what it spells differently.
export const standardDelete = (d: DeleteMatching) => {
  const where = d.where ? ` AND ${d.where}` : '';
  return `DELETE FROM ${d.target} AS ${TARGET}\nWHERE EXISTS (\n  SELECT 1 FROM ${d.source} AS ${SOURCE}\n  WHERE ${d.on}${where}\n);`;
};

export const standardUpdate = (u: UpdateFromSource) => {
  const where = u.where ? ` AND ${u.where}` : '';
  return `UPDATE ${u.target} AS ${TARGET}\nSET ${u.assignments.join(',\n    ')}\nFROM ${u.source} AS ${SOURCE}\nWHERE ${u.on}${where};`;
};
