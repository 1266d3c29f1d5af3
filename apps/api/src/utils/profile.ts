import { LogicalType, RawValue } from '../types/schema';
import { bestTemporalMatch } from './dates';

export const DEFAULT_STRING_MAX_LENGTH = 65535;

const BOOLEAN_TOKENS = new Set(['true', 'false', 'yes', 'no', 'y', 'n', '1', '0', 't', 'f']);
const NULL_MARKERS = new Set(['null', 'nan', 'n/a']);

// Leading zeros mark identifiers ("007"), not numbers.
const INTEGER_RE = /^[+-]?(0|[1-9]\d*)$/;
const FLOAT_RE = /^[+-]?(?:(?:0|[1-9]\d*)(?:\.\d+)?|\.\d+)(?:[eE][+-]?\d+)?$/;

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export type InferredType = {
  logicalType: LogicalType;
  nullable: boolean;
  precision?: number;
  scale?: number;
  dateFormat?: string;
};

export type InferOptions = {
  /** Nulls in the full column; the sample alone may miss them. */
  nullCount?: number;
  stringMaxLength?: number;
};

export const isNullMarker = (value: RawValue) => {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'boolean') return false;
  const trimmed = value.trim();
  return trimmed === '' || NULL_MARKERS.has(trimmed.toLowerCase());
};

const toText = (value: RawValue) => String(value).trim();

// Holds for samples past the engine's argument limit.
const longestBy = (values: string[], measure: (value: string) => number) =>
  values.reduce((longest, v) => Math.max(longest, measure(v)), 0);

const unsigned = (value: string) => value.replace(/^[+-]/, '');

const inferNumeric = (values: string[]): Omit<InferredType, 'nullable'> | null => {
  if (values.every(v => INTEGER_RE.test(v))) {
    const ints = values.map(v => BigInt(v));
    if (ints.some(n => n < INT64_MIN || n > INT64_MAX)) {
      const digits = longestBy(values, v => unsigned(v).length);
      return digits <= 38 ? { logicalType: 'decimal', precision: digits, scale: 0 } : null;
    }
    const wide = ints.some(n => n < INT32_MIN || n > INT32_MAX);
    return { logicalType: wide ? 'bigint' : 'integer' };
  }

  if (!values.every(v => FLOAT_RE.test(v))) return null;

  const scales = values.map(v => (/[eE]/.test(v) ? -1 : (v.split('.')[1] ?? '').length));
  const scale = scales[0];
  if (scale > 0 && scales.every(s => s === scale)) {
    const intDigits = longestBy(values, v => unsigned(v).split('.')[0].length);
    const precision = Math.min(38, Math.max(18, intDigits + scale));
    return { logicalType: 'decimal', precision, scale: Math.min(scale, precision) };
  }
  return { logicalType: 'float' };
};

/**
 * Infers a logical type for one column. Checks run in a fixed order
 * (boolean, numeric, temporal, string) so ambiguous columns always resolve
 * the same way: a column of years such as 2021, 2022 is an integer.
 */
export const inferColumnType = (values: RawValue[], options: InferOptions = {}): InferredType => {
  const maxLength = options.stringMaxLength ?? DEFAULT_STRING_MAX_LENGTH;
  const present = values.filter(v => !isNullMarker(v)).map(toText);
  const nullable = (options.nullCount ?? 0) > 0 || present.length < values.length;

  if (!present.length) return { logicalType: 'string', nullable: true };

  const lowered = present.map(v => v.toLowerCase());
  if (lowered.every(v => BOOLEAN_TOKENS.has(v)) && new Set(lowered).size >= 2) {
    return { logicalType: 'boolean', nullable };
  }

  const numeric = inferNumeric(present);
  if (numeric) return { ...numeric, nullable };

  const temporal = bestTemporalMatch(present);
  if (temporal && temporal.ratio >= 0.5) {
    return {
      logicalType: temporal.pattern.hasTime ? 'timestamp' : 'date',
      nullable,
      dateFormat: temporal.pattern.format
    };
  }

  const longest = longestBy(present, v => v.length);
  return { logicalType: longest <= maxLength ? 'string' : 'text', nullable };
};
