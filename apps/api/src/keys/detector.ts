import { KeyCandidate, RawValue, SampleColumn, TabularSample } from '../types/schema';
import { ValidationError } from '../errors';
import { inferColumnType, isNullMarker } from '../utils/profile';

export type DetectOptions = {
  maxComposite?: number;
  minUniqueness?: number;
  minConfidence?: number;
};

const KEY_NAME = /id|key|pk/i;
const KEY_TYPES = new Set(['integer', 'bigint', 'string']);

const sampleSize = (sample: TabularSample) => Math.max(0, ...sample.columns.map(c => c.values.length));

const cell = (value: RawValue) => (isNullMarker(value) ? null : String(value).trim());

type TupleStats = {
  rows: number;
  complete: number;
  distinct: number;
  duplicates: string[][];
};

const tupleStats = (columns: SampleColumn[], rows: number): TupleStats => {
  const counts = new Map<string, { count: number; tuple: string[] }>();
  let complete = 0;
  for (let i = 0; i < rows; i++) {
    const tuple: string[] = [];
    for (const column of columns) {
      const value = cell(column.values[i]);
      if (value === null) break;
      tuple.push(value);
    }
    // a key with a null in it identifies nothing
    if (tuple.length < columns.length) continue;
    complete++;
    const key = JSON.stringify(tuple);
    const entry = counts.get(key);
    if (entry) entry.count++;
    else counts.set(key, { count: 1, tuple });
  }
  const duplicates = [...counts.values()].filter(e => e.count > 1).map(e => e.tuple);
  return { rows, complete, distinct: counts.size, duplicates };
};

const round4 = (n: number) => Math.round(n * 10000) / 10000;
const pct = (n: number) => `${(n * 100).toFixed(1)}%`;

const combinations = <T>(items: T[], size: number): T[][] => {
  if (size === 0) return [[]];
  const out: T[][] = [];
  items.forEach((item, i) => {
    for (const rest of combinations(items.slice(i + 1), size - 1)) out.push([item, ...rest]);
  });
  return out;
};

/**
 * Proposes columns or column pairs that uniquely identify rows, best first.
 * Confidence weighs uniqueness (0.4), completeness (0.3), key-like names (0.2)
 * and key-friendly types (0.1), minus 0.1 per extra column.
 */
export const detectKeys = (sample: TabularSample, options: DetectOptions = {}): KeyCandidate[] => {
  const maxComposite = options.maxComposite ?? 2;
  const minUniqueness = options.minUniqueness ?? 0.995;
  const minConfidence = options.minConfidence ?? 0;
  const rows = sampleSize(sample);
  if (!rows) return [];

  const eligible = sample.columns.filter(c => c.values.some(v => !isNullMarker(v)));
  const types = new Map(eligible.map(c => [c.name, inferColumnType(c.values).logicalType]));
  const order = new Map(sample.columns.map((c, i) => [c.name, i]));

  const accepted: KeyCandidate[] = [];
  for (let size = 1; size <= maxComposite; size++) {
    for (const set of combinations(eligible, size)) {
      const names = set.map(c => c.name);
      if (accepted.some(a => a.columns.every(n => names.includes(n)))) continue;

      const stats = tupleStats(set, rows);
      const uniqueness = stats.distinct / rows;
      if (uniqueness < minUniqueness) continue;
      const completeness = stats.complete / rows;
      const nameShare = names.filter(n => KEY_NAME.test(n)).length / names.length;
      const typeShare = names.filter(n => KEY_TYPES.has(types.get(n) ?? '')).length / names.length;
      const raw = 0.4 * uniqueness + 0.3 * completeness + 0.2 * nameShare + 0.1 * typeShare - 0.1 * (names.length - 1);
      const confidence = round4(Math.min(1, Math.max(0, raw)));

      const notes = [`${pct(uniqueness)} unique`, `${pct(completeness)} complete`];
      if (nameShare > 0) notes.push('key-like name');
      if (names.length > 1) notes.push(`composite of ${names.length} columns`);

      accepted.push({
        columns: names,
        confidence,
        uniqueness: round4(uniqueness),
        completeness: round4(completeness),
        cardinality: stats.distinct,
        isComposite: names.length > 1,
        reasoning: notes.join(', ')
      });
    }
  }

  const firstIndex = (c: KeyCandidate) => Math.min(...c.columns.map(n => order.get(n) ?? 0));
  return accepted
    .filter(c => c.confidence >= minConfidence)
    .sort(
      (a, b) =>
        b.confidence - a.confidence || a.columns.length - b.columns.length || firstIndex(a) - firstIndex(b)
    );
};

export const autoDetectBestKey = (sample: TabularSample, options: DetectOptions = {}): KeyCandidate | null =>
  detectKeys(sample, options)[0] ?? null;

export const suggestPrimaryKeys = (sample: TabularSample, max = 3, options: DetectOptions = {}) =>
  detectKeys(sample, options)
    .slice(0, max)
    .map(c => c.columns);

export type KeyValidation = {
  valid: boolean;
  errors: string[];
};

const findColumns = (sample: TabularSample, keys: string[]) => {
  const missing = keys.filter(k => !sample.columns.some(c => c.name === k));
  const columns = keys.flatMap(k => sample.columns.filter(c => c.name === k));
  return { missing, columns };
};

export const validatePrimaryKeys = (
  sample: TabularSample,
  keys: string[],
  options: { allowNulls?: boolean; allowDuplicates?: boolean } = {}
): KeyValidation => {
  if (!keys.length) return { valid: false, errors: ['At least one key column is required'] };
  const { missing, columns } = findColumns(sample, keys);
  const errors = missing.map(k => `Key column '${k}' not found`);
  if (missing.length) return { valid: false, errors };

  const rows = sampleSize(sample);
  if (!options.allowNulls) {
    for (const column of columns) {
      const nulls = column.values.filter(isNullMarker).length;
      if (nulls) errors.push(`Key column '${column.name}' has ${nulls} null value(s)`);
    }
  }
  if (!options.allowDuplicates) {
    const stats = tupleStats(columns, rows);
    const duplicates = stats.complete - stats.distinct;
    if (duplicates) errors.push(`Key (${keys.join(', ')}) has ${duplicates} duplicate row(s)`);
  }
  return { valid: !errors.length, errors };
};

export type KeyAnalysis = {
  columns: string[];
  rowCount: number;
  uniqueCombinations: number;
  uniquenessPercent: number;
  nullCounts: Record<string, number>;
  duplicateExamples: string[][];
};

export const analyzeKeyColumns = (sample: TabularSample, keys: string[]): KeyAnalysis => {
  const { missing, columns } = findColumns(sample, keys);
  if (missing.length) throw new ValidationError('Key column(s) not found', missing.map(k => `Key column '${k}' not found`));
  const rows = sampleSize(sample);
  const stats = tupleStats(columns, rows);
  const nullCounts: Record<string, number> = {};
  for (const column of columns) nullCounts[column.name] = column.values.filter(isNullMarker).length;
  return {
    columns: keys,
    rowCount: rows,
    uniqueCombinations: stats.distinct,
    uniquenessPercent: rows ? Math.round((stats.distinct / rows) * 10000) / 100 : 0,
    nullCounts,
    duplicateExamples: stats.duplicates.slice(0, 5)
  };
};

export const formatKeyCandidate = (candidate: KeyCandidate) =>
  `${candidate.columns.join(' + ')} (confidence ${candidate.confidence.toFixed(2)}): ${candidate.reasoning}`;
