import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { RawValue, SampleColumn, TabularSample } from '../types/schema';
import { ValidationError } from '../errors';
import { isNullMarker } from '../utils/profile';

export const DEFAULT_SAMPLE_LIMIT = 1000;

type Row = Record<string, unknown>;

export const stripExt = (name: string) => name.replace(/\.(csv|tsv|txt|xlsx|xls)$/i, '');

const isSpreadsheet = (filename: string) => /\.xlsx?$/i.test(filename);

const toRawValue = (value: unknown): RawValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
};

const parseRows = (buffer: Buffer, filename: string) => {
  if (isSpreadsheet(filename)) {
    const workbook = XLSX.read(buffer, { type: 'buffer' });
    const sheetName = workbook.SheetNames[0];
    if (sheetName === undefined) throw new ValidationError(`Workbook '${filename}' has no sheets`);
    const worksheet = workbook.Sheets[sheetName];
    const rows = XLSX.utils.sheet_to_json<Row>(worksheet, { defval: '' });
    const header = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1 })[0] ?? [];
    return { rows, fields: header.map(h => String(h)), source: 'excel' as const };
  }

  const text = buffer.toString('utf-8');
  const parsed = Papa.parse<Row>(text, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false
  });

  if (parsed.errors?.length) {
    const first = parsed.errors[0];
    const row = first.row === undefined ? '' : ` (row ${first.row + 1})`;
    throw new ValidationError(`CSV parse error${row}: ${first.message}`);
  }

  return { rows: parsed.data || [], fields: parsed.meta.fields ?? [], source: 'csv' as const };
};

/**
 * Builds a sample from parsed rows: values from the first `sampleLimit` rows,
 * null counts over every row.
 */
export const sampleFromRows = (
  rows: Row[],
  options: { sampleLimit?: number; fields?: string[]; source?: string } = {}
): TabularSample => {
  const limit = options.sampleLimit ?? DEFAULT_SAMPLE_LIMIT;
  const fields = options.fields?.length ? options.fields : Object.keys(rows[0] || {});
  const sampled = rows.slice(0, limit);

  const columns: SampleColumn[] = fields.map(name => {
    const values = sampled.map(r => toRawValue(r[name]));
    const nullCount = rows.reduce((n, r) => n + (isNullMarker(toRawValue(r[name])) ? 1 : 0), 0);
    return { name, values, nullCount };
  });

  return { columns, rowCount: rows.length, ...(options.source ? { source: options.source } : {}) };
};

export type IngestedFile = {
  tableName: string;
  sample: TabularSample;
};

export const ingestTabularBuffer = (
  buffer: Buffer,
  filename: string,
  options: { sampleLimit?: number } = {}
): IngestedFile => {
  const { rows, fields, source } = parseRows(buffer, filename);
  if (!fields.length) throw new ValidationError(`'${filename}' has no header row`);
  return {
    tableName: stripExt(filename),
    sample: sampleFromRows(rows, { sampleLimit: options.sampleLimit, fields, source })
  };
};
