import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors';
import {
  assertValidSchema,
  columnNames,
  createCanonicalSchema,
  getColumn,
  hasOptimizations,
  inferCanonicalSchema,
  validateSchema,
  withoutOptimizations
} from '../schema/canonical';
import { hintsFromDocument, schemaFromDocument, schemaFromJson, schemaToDocument, schemaToJson } from '../schema/document';
import { TabularSample } from '../types/schema';

const orders = () =>
  createCanonicalSchema({
    tableName: 'orders',
    datasetName: 'sales',
    columns: [
      { name: 'order_id', logicalType: 'integer', nullable: false },
      { name: 'amount', logicalType: 'decimal', precision: 10, scale: 2 },
      { name: 'ordered_at', logicalType: 'timestamp', description: 'When the order was placed' }
    ],
    optimization: { partitionColumns: ['ordered_at'], clusterColumns: ['order_id'] }
  });

describe('createCanonicalSchema', () => {
  it('fills defaults and freezes the result', () => {
    const schema = createCanonicalSchema({ tableName: 't', columns: [{ name: 'a', logicalType: 'string' }] });
    expect(schema.columns[0]).toEqual({ name: 'a', logicalType: 'string', nullable: true });
    expect(schema.optimization).toEqual({
      partitionColumns: [],
      clusterColumns: [],
      sortColumns: [],
      requirePartitionFilter: false
    });
    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.columns[0])).toBe(true);
  });

  it('looks up columns case-insensitively', () => {
    expect(getColumn(orders(), 'ORDER_ID')?.name).toBe('order_id');
    expect(getColumn(orders(), 'missing')).toBeUndefined();
  });

  it('strips hints', () => {
    const stripped = withoutOptimizations(orders());
    expect(stripped.optimization.partitionColumns).toEqual([]);
    expect(hasOptimizations(orders().optimization)).toBe(true);
    expect(hasOptimizations(stripped.optimization)).toBe(false);
    expect(columnNames(stripped)).toEqual(['order_id', 'amount', 'ordered_at']);
  });
});

describe('validateSchema', () => {
  it('accepts a well-formed schema', () => {
    expect(validateSchema(orders())).toEqual([]);
  });

  it('reports structural problems', () => {
    const schema = createCanonicalSchema({
      tableName: 'bad',
      columns: [
        { name: 'id', logicalType: 'integer', precision: 5 },
        { name: 'ID', logicalType: 'string' },
        { name: 'price', logicalType: 'decimal', precision: 4, scale: 6 }
      ],
      optimization: { clusterColumns: ['nope'], requirePartitionFilter: true }
    });
    expect(validateSchema(schema)).toEqual([
      "Column 'id': precision/scale only apply to decimal, got integer",
      "Duplicate column name 'ID'",
      "Column 'price': scale 6 exceeds precision 4",
      "Cluster column 'nope' not found in schema",
      'require_partition_filter requires a partition column'
    ]);
  });

  it('rejects an empty table', () => {
    const schema = createCanonicalSchema({ tableName: 'empty', columns: [] });
    expect(() => assertValidSchema(schema)).toThrow(ValidationError);
    expect(validateSchema(schema)).toEqual(["Table 'empty' has no columns"]);
  });
});

describe('inferCanonicalSchema', () => {
  const sample: TabularSample = {
    rowCount: 3,
    columns: [
      { name: 'Customer ID', values: ['1', '2', '3'], nullCount: 0 },
      { name: 'Signup Date', values: ['2024-01-01', '2024-01-02', ''], nullCount: 1 },
      { name: 'Balance', values: ['10.50', '20.00', '30.25'], nullCount: 0 }
    ]
  };

  it('standardizes names and keeps the originals', () => {
    const { schema, columnMapping } = inferCanonicalSchema(sample, 'customers', { datasetName: 'crm' });
    expect(columnMapping).toEqual({
      'Customer ID': 'customer_id',
      'Signup Date': 'signup_date',
      Balance: 'balance'
    });
    expect(schema.columns).toEqual([
      { name: 'customer_id', originalName: 'Customer ID', logicalType: 'integer', nullable: false },
      { name: 'signup_date', originalName: 'Signup Date', logicalType: 'date', nullable: true, dateFormat: '%Y-%m-%d' },
      { name: 'balance', originalName: 'Balance', logicalType: 'decimal', nullable: false, precision: 18, scale: 2 }
    ]);
  });

  it('resolves hints given by original column name', () => {
    const { schema } = inferCanonicalSchema(sample, 'customers', {
      datasetName: 'crm',
      optimization: { partitionColumns: ['Signup Date'], clusterColumns: ['customer_id'] }
    });
    expect(schema.optimization.partitionColumns).toEqual(['signup_date']);
    expect(schema.optimization.clusterColumns).toEqual(['customer_id']);
  });

  it('fails on hints that name unknown columns', () => {
    expect(() =>
      inferCanonicalSchema(sample, 'customers', { optimization: { sortColumns: ['nope'] } })
    ).toThrow("Invalid schema 'customers': Sort column 'nope' not found in schema");
  });
});

describe('schema documents', () => {
  it('writes snake_case with explicit nulls for absent hints', () => {
    const doc = schemaToDocument(orders());
    expect(doc.table_name).toBe('orders');
    expect(doc.columns?.[1]).toEqual({ name: 'amount', logical_type: 'decimal', nullable: true, precision: 10, scale: 2 });
    expect(doc.optimization).toEqual({
      partition_columns: ['ordered_at'],
      cluster_columns: ['order_id'],
      sort_columns: [],
      distribution_column: null,
      partition_expiration_days: null,
      require_partition_filter: false
    });
  });

  it('reads back an equal schema', () => {
    expect(schemaFromJson(schemaToJson(orders()))).toEqual(orders());
    expect(schemaFromDocument(schemaToDocument(orders()))).toEqual(orders());
  });

  it('applies document defaults', () => {
    const schema = schemaFromDocument({ table_name: 'events', columns: [{ name: 'id', logical_type: 'bigint' }] });
    expect(schema.columns[0].nullable).toBe(true);
    expect(schema.optimization.requirePartitionFilter).toBe(false);
  });

  it('lists every invalid field', () => {
    try {
      schemaFromDocument({ table_name: '', columns: [{ name: 'x', logical_type: 'money' }] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (!(err instanceof ValidationError)) return;
      expect(err.issues).toHaveLength(2);
      expect(err.issues[0]).toMatch(/^table_name: /);
      expect(err.issues[1]).toMatch(/^columns\.0\.logical_type: /);
    }
  });

  it('rejects hints that name missing columns', () => {
    expect(() =>
      schemaFromDocument({
        table_name: 'events',
        columns: [{ name: 'id', logical_type: 'bigint' }],
        optimization: { cluster_columns: ['zzz'] }
      })
    ).toThrow("Invalid schema 'events': Cluster column 'zzz' not found in schema");
  });

  it('reports malformed JSON as a validation error', () => {
    expect(() => schemaFromJson('{not json')).toThrow(ValidationError);
  });

  it('parses a standalone optimization block', () => {
    expect(hintsFromDocument({ cluster_columns: ['a'], partition_expiration_days: 30 })).toEqual({
      partitionColumns: [],
      clusterColumns: ['a'],
      sortColumns: [],
      distributionColumn: undefined,
      partitionExpirationDays: 30,
      requirePartitionFilter: false
    });
  });
});
