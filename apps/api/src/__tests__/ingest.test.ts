import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { ValidationError } from '../errors';
import { ingestTabularBuffer, sampleFromRows, stripExt } from '../ingest/csv';
import { ingestDDL, mapSqlType } from '../ingest/ddl';
import { inferCanonicalSchema } from '../schema/canonical';

const makeWorkbookBuffer = () => {
  const data = [
    ['id', 'name'],
    [1, 'Alice'],
    [2, 'Bob']
  ];
  const sheet = XLSX.utils.aoa_to_sheet(data);
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, sheet, 'Sheet1');
  return XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
};

describe('ingestTabularBuffer', () => {
  const csv = 'id,name,amount\n1,Alice,10.50\n2,Bob,\n3,Cara,7.25';

  it('parses CSV into a sample', () => {
    const { tableName, sample } = ingestTabularBuffer(Buffer.from(csv), 'people.csv');
    expect(tableName).toBe('people');
    expect(sample.rowCount).toBe(3);
    expect(sample.source).toBe('csv');
    expect(sample.columns.map(c => c.name)).toEqual(['id', 'name', 'amount']);
    expect(sample.columns[2]).toEqual({ name: 'amount', values: ['10.50', '', '7.25'], nullCount: 1 });
  });

  it('limits sampled values but counts nulls over every row', () => {
    const { sample } = ingestTabularBuffer(Buffer.from(csv), 'people.csv', { sampleLimit: 1 });
    expect(sample.columns[2]).toEqual({ name: 'amount', values: ['10.50'], nullCount: 1 });
    expect(sample.rowCount).toBe(3);
  });

  it('parses XLSX and infers schema', () => {
    const { tableName, sample } = ingestTabularBuffer(Buffer.from(makeWorkbookBuffer()), 'employees.xlsx');
    expect(tableName).toBe('employees');
    expect(sample.source).toBe('excel');
    expect(sample.columns[0].values).toEqual([1, 2]);

    const { schema } = inferCanonicalSchema(sample, tableName);
    expect(schema.columns.map(c => [c.name, c.logicalType])).toEqual([
      ['id', 'integer'],
      ['name', 'string']
    ]);
  });

  it('reports malformed CSV', () => {
    expect(() => ingestTabularBuffer(Buffer.from('a,b\n1,2,3'), 'bad.csv')).toThrow(ValidationError);
  });

  it('strips known extensions only', () => {
    expect(stripExt('orders.CSV')).toBe('orders');
    expect(stripExt('orders.parquet')).toBe('orders.parquet');
  });
});

describe('sampleFromRows', () => {
  it('uses the first row for field names when none are given', () => {
    const sample = sampleFromRows([{ a: 'x', b: null }, { a: 'y', b: 'z' }]);
    expect(sample.columns).toEqual([
      { name: 'a', values: ['x', 'y'], nullCount: 0 },
      { name: 'b', values: [null, 'z'], nullCount: 1 }
    ]);
  });
});

describe('mapSqlType', () => {
  it('maps platform types back to logical types', () => {
    expect(mapSqlType('VARCHAR', 100)).toEqual({ logicalType: 'string', maxLength: 100 });
    expect(mapSqlType('NUMERIC', 12, 2)).toEqual({ logicalType: 'decimal', precision: 12, scale: 2 });
    expect(mapSqlType('INT64')).toEqual({ logicalType: 'bigint' });
    expect(mapSqlType('timestamp with time zone')).toEqual({ logicalType: 'timestamptz' });
    expect(mapSqlType('DATETIME2')).toEqual({ logicalType: 'timestamp' });
    expect(mapSqlType('JSONB')).toEqual({ logicalType: 'json' });
    expect(mapSqlType('geography')).toEqual({ logicalType: 'string' });
  });
});

describe('ingestDDL', () => {
  it('parses CREATE TABLE statements', () => {
    const ddl = `
      CREATE TABLE donors (
        donor_id uuid,
        donor_name text,
        join_date date
      );
    `;
    const tables = ingestDDL(ddl, 'postgres');
    expect(tables).toHaveLength(1);
    expect(tables[0].schema.tableName).toBe('donors');
    expect(tables[0].schema.columns.map(c => c.name)).toEqual(['donor_id', 'donor_name', 'join_date']);
    expect(tables[0].schema.columns.map(c => c.logicalType)).toEqual(['string', 'text', 'date']);
    expect(tables[0].primaryKeys).toEqual([]);
  });

  it('keeps lengths, precision and nullability', () => {
    const [orders] = ingestDDL(`
      CREATE TABLE orders (
        order_id BIGINT PRIMARY KEY,
        customer VARCHAR(100) NOT NULL,
        total NUMERIC(12, 2),
        placed_at TIMESTAMP
      );
    `);
    expect(orders.primaryKeys).toEqual(['order_id']);
    expect(orders.schema.columns).toEqual([
      { name: 'order_id', logicalType: 'bigint', nullable: false },
      { name: 'customer', logicalType: 'string', nullable: false, maxLength: 100 },
      { name: 'total', logicalType: 'decimal', nullable: true, precision: 12, scale: 2 },
      { name: 'placed_at', logicalType: 'timestamp', nullable: true }
    ]);
  });

  it('rejects text that does not parse', () => {
    expect(() => ingestDDL('CREATE TABLE (')).toThrow(ValidationError);
  });
});
