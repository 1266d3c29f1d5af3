import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../app';
import { loadConfig } from '../config';
import { createSchemaStore, SchemaStore } from '../store';

const ordersDoc = {
  table_name: 'orders',
  columns: [{ name: 'id', logical_type: 'integer', nullable: false }]
};

describe('api', () => {
  let store: SchemaStore;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    store = createSchemaStore(':memory:');
    app = createApp({ config: loadConfig({}), store });
  });

  afterEach(() => {
    store.close();
  });

  it('reports health', async () => {
    const res = await request(app).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  it('lists platforms and load patterns', async () => {
    const res = await request(app).get('/api/platforms');
    expect(res.body.platforms.map((p: { platform: string }) => p.platform)).toEqual([
      'bigquery',
      'snowflake',
      'redshift',
      'postgresql',
      'sqlserver'
    ]);
    expect(res.body.patterns).toHaveLength(10);
  });

  describe('POST /api/schema/infer', () => {
    it('infers a schema from an upload and renders DDL', async () => {
      const csv = 'Order ID,Amount,Placed\n1,19.99,2024-01-01\n2,29.99,2024-01-02';
      const res = await request(app)
        .post('/api/schema/infer')
        .field('dataset_name', 'sales')
        .field('platform', 'bigquery')
        .attach('file', Buffer.from(csv), 'orders.csv');

      expect(res.status).toBe(200);
      expect(res.body.row_count).toBe(2);
      expect(res.body.column_mapping).toEqual({ 'Order ID': 'order_id', Amount: 'amount', Placed: 'placed' });
      expect(res.body.schema.columns.map((c: { logical_type: string }) => c.logical_type)).toEqual([
        'integer',
        'decimal',
        'date'
      ]);
      expect(res.body.ddl).toBe(
        'CREATE TABLE `sales.orders` (\n  order_id INT64 NOT NULL,\n  amount NUMERIC(18,2) NOT NULL,\n  placed DATE NOT NULL\n);'
      );
    });

    it('requires a file', async () => {
      const res = await request(app).post('/api/schema/infer');
      expect(res.status).toBe(400);
      expect(res.body.error).toBe('A CSV or XLSX file is required');
    });
  });

  describe('POST /api/schema/render', () => {
    it('renders every artifact for a platform', async () => {
      const res = await request(app)
        .post('/api/schema/render')
        .send({ platform: 'snowflake', schema: ordersDoc, options: { data_reference: '@stage/orders.csv' } });

      expect(res.status).toBe(200);
      expect(res.body.ddl).toBe('CREATE TABLE orders (\n  id NUMBER(38,0) NOT NULL\n);');
      expect(res.body.physical_types).toEqual({ id: 'NUMBER(38,0)' });
      expect(res.body.cli_create).toBe("snowsql -q 'CREATE TABLE orders (\n  id NUMBER(38,0) NOT NULL\n);'");
      expect(res.body.load_sql.startsWith('COPY INTO orders\nFROM @stage/orders.csv\n')).toBe(true);
      expect(res.body.schema_json).toBeUndefined();
    });

    it('returns capability violations as a 400', async () => {
      const res = await request(app)
        .post('/api/schema/render')
        .send({
          platform: 'bigquery',
          schema: {
            table_name: 'wide',
            dataset_name: 'd',
            columns: ['a', 'b', 'c', 'd', 'e'].map(name => ({ name, logical_type: 'string' })),
            optimization: { cluster_columns: ['a', 'b', 'c', 'd', 'e'] }
          }
        });
      expect(res.status).toBe(400);
      expect(res.body.issues).toEqual(['BigQuery supports max 4 cluster columns, got 5']);
    });

    it('returns unknown platforms as a 422', async () => {
      const res = await request(app).post('/api/schema/render').send({ platform: 'oracle', schema: ordersDoc });
      expect(res.status).toBe(422);
      expect(res.body.code).toBe('UNSUPPORTED_CAPABILITY');
    });
  });

  describe('POST /api/incremental/:platform', () => {
    it('reports the offending config field', async () => {
      const res = await request(app)
        .post('/api/incremental/bigquery')
        .send({ schema: { ...ordersDoc, dataset_name: 'sales' }, config: { load_pattern: 'upsert', primary_keys: [] } });
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({
        code: 'CONFIGURATION_ERROR',
        field: 'primary_keys',
        error: 'primary_keys cannot be empty for upsert'
      });
    });

    it('returns a load plan', async () => {
      const res = await request(app)
        .post('/api/incremental/postgres')
        .send({ schema: ordersDoc, config: { load_pattern: 'append', use_transaction: false } });
      expect(res.status).toBe(200);
      expect(res.body.platform).toBe('postgresql');
      expect(res.body.statements).toEqual([
        'INSERT INTO "orders" ("id")\nSELECT source."id"\nFROM "orders_staging" AS source;'
      ]);
      expect(res.body.staging_ddl).toBeNull();
    });
  });

  describe('POST /api/keys/detect', () => {
    const csv = 'id,region\n1,east\n2,east\n3,west';

    it('proposes keys', async () => {
      const res = await request(app).post('/api/keys/detect').attach('file', Buffer.from(csv), 'regions.csv');
      expect(res.status).toBe(200);
      expect(res.body.best.columns).toEqual(['id']);
      expect(res.body.candidates).toHaveLength(1);
    });

    it('validates given keys', async () => {
      const res = await request(app)
        .post('/api/keys/detect')
        .field('keys', 'region')
        .attach('file', Buffer.from(csv), 'regions.csv');
      expect(res.body.validation).toEqual({ valid: false, errors: ['Key (region) has 1 duplicate row(s)'] });
      expect(res.body.analysis.uniqueCombinations).toBe(2);
    });
  });

  describe('POST /api/ingest/ddl', () => {
    it('returns schema documents', async () => {
      const res = await request(app).post('/api/ingest/ddl').send({ ddl: 'CREATE TABLE t (id INT NOT NULL)' });
      expect(res.status).toBe(200);
      expect(res.body.tables[0].schema.columns).toEqual([{ name: 'id', logical_type: 'integer', nullable: false }]);
      expect(res.body.tables[0].primary_keys).toEqual([]);
    });

    it('requires DDL', async () => {
      const res = await request(app).post('/api/ingest/ddl').send({});
      expect(res.status).toBe(400);
    });
  });

  describe('/api/schemas', () => {
    it('stores, lists and deletes schemas', async () => {
      const put = await request(app).put('/api/schemas/orders').send(ordersDoc);
      expect(put.status).toBe(200);

      const get = await request(app).get('/api/schemas/orders');
      expect(get.body.schema.table_name).toBe('orders');
      expect(get.body.schema.columns).toEqual(ordersDoc.columns);

      const list = await request(app).get('/api/schemas');
      expect(list.body.schemas.map((s: { name: string }) => s.name)).toEqual(['orders']);

      expect((await request(app).delete('/api/schemas/orders')).body).toEqual({ ok: true });
      expect((await request(app).get('/api/schemas/orders')).status).toBe(404);
    });

    it('rejects invalid documents', async () => {
      const res = await request(app).put('/api/schemas/bad').send({ table_name: 'bad', columns: [] });
      expect(res.status).toBe(400);
      expect(res.body.code).toBe('VALIDATION_ERROR');
    });

    it('does not store hints that name missing columns', async () => {
      const res = await request(app)
        .put('/api/schemas/ghost')
        .send({
          table_name: 'ghost',
          columns: [{ name: 'id', logical_type: 'bigint' }],
          optimization: { cluster_columns: ['zzz'] }
        });
      expect(res.status).toBe(400);
      expect(res.body.issues).toEqual(["Cluster column 'zzz' not found in schema"]);
      expect((await request(app).get('/api/schemas/ghost')).status).toBe(404);
    });
  });
});
