import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { CanonicalSchema } from './types/schema';
import { schemaFromJson, schemaToJson } from './schema/document';
import { logger } from './logger';

export type StoredSchema = {
  name: string;
  schema: CanonicalSchema;
  updatedAt: string;
};

export type SchemaStore = {
  save: (name: string, schema: CanonicalSchema) => StoredSchema;
  get: (name: string) => StoredSchema | null;
  list: () => Array<{ name: string; tableName: string; updatedAt: string }>;
  remove: (name: string) => boolean;
  close: () => void;
};

type Row = { name: string; document: string; updated_at: string };

/** Persisted IR documents keyed by name. Pass ':memory:' for a throwaway store. */
export const createSchemaStore = (file: string): SchemaStore => {
  if (file !== ':memory:') fs.mkdirSync(path.dirname(file), { recursive: true });
  const db = new Database(file);
  if (file !== ':memory:') db.pragma('journal_mode = WAL');
  db.exec(`
    CREATE TABLE IF NOT EXISTS schemas (
      name TEXT PRIMARY KEY,
      table_name TEXT NOT NULL,
      document TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  const upsert = db.prepare(`
    INSERT INTO schemas (name, table_name, document, updated_at)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(name) DO UPDATE SET
      table_name = excluded.table_name,
      document = excluded.document,
      updated_at = excluded.updated_at
  `);
  const select = db.prepare<[string], Row>('SELECT name, document, updated_at FROM schemas WHERE name = ?');
  const selectAll = db.prepare<[], { name: string; table_name: string; updated_at: string }>(
    'SELECT name, table_name, updated_at FROM schemas ORDER BY name'
  );
  const remove = db.prepare<[string]>('DELETE FROM schemas WHERE name = ?');

  return {
    save: (name, schema) => {
      const updatedAt = new Date().toISOString();
      upsert.run(name, schema.tableName, schemaToJson(schema), updatedAt);
      logger.debug({ name, table: schema.tableName }, 'schema saved');
      return { name, schema, updatedAt };
    },
    get: name => {
      const row = select.get(name);
      if (!row) return null;
      return { name: row.name, schema: schemaFromJson(row.document), updatedAt: row.updated_at };
    },
    list: () => selectAll.all().map(r => ({ name: r.name, tableName: r.table_name, updatedAt: r.updated_at })),
    remove: name => remove.run(name).changes > 0,
    close: () => db.close()
  };
};

export const defaultStorePath = (dataDir: string) => path.join(dataDir, 'schemas.db');
