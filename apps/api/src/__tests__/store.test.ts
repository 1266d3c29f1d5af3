import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createCanonicalSchema } from '../schema/canonical';
import { createSchemaStore, SchemaStore } from '../store';

const orders = createCanonicalSchema({
  tableName: 'orders',
  datasetName: 'sales',
  columns: [
    { name: 'order_id', logicalType: 'bigint', nullable: false },
    { name: 'total', logicalType: 'decimal', precision: 12, scale: 2 }
  ],
  optimization: { clusterColumns: ['order_id'] }
});

describe('schema store', () => {
  let store: SchemaStore;

  beforeEach(() => {
    store = createSchemaStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('saves and reads back a schema', () => {
    store.save('orders', orders);
    const stored = store.get('orders');
    expect(stored?.name).toBe('orders');
    expect(stored?.schema).toEqual(orders);
  });

  it('overwrites on save', () => {
    store.save('orders', orders);
    store.save('orders', createCanonicalSchema({ ...orders, tableName: 'orders_v2' }));
    expect(store.get('orders')?.schema.tableName).toBe('orders_v2');
    expect(store.list()).toHaveLength(1);
  });

  it('lists by name', () => {
    store.save('b', orders);
    store.save('a', orders);
    expect(store.list().map(s => [s.name, s.tableName])).toEqual([
      ['a', 'orders'],
      ['b', 'orders']
    ]);
  });

  it('removes schemas', () => {
    store.save('orders', orders);
    expect(store.remove('orders')).toBe(true);
    expect(store.remove('orders')).toBe(false);
    expect(store.get('orders')).toBeNull();
  });
});
