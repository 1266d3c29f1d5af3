import express from 'express';
import cors from 'cors';
import multer from 'multer';
import { z } from 'zod';

import { AppConfig, loadConfig } from './config';
import { ConfigurationError, UnsupportedCapabilityError, ValidationError } from './errors';
import { logger } from './logger';
import { ingestTabularBuffer } from './ingest/csv';
import { ingestDDL } from './ingest/ddl';
import { hasOptimizations, inferCanonicalSchema } from './schema/canonical';
import { hintsFromDocument, schemaFromDocument, schemaToDocument } from './schema/document';
import { CAPABILITIES, getRenderer, supportedPlatforms } from './render';
import { generateLoadPlan, getAllPatterns, incrementalConfigFromDocument } from './incremental';
import { analyzeKeyColumns, detectKeys, validatePrimaryKeys } from './keys/detector';
import { createSchemaStore, defaultStorePath, SchemaStore } from './store';

export type AppOptions = {
  config?: AppConfig;
  store?: SchemaStore;
};

type ErrorBody = { error: string; code?: string; issues?: string[]; field?: string };

const errorResponse = (err: unknown): { status: number; body: ErrorBody } => {
  if (err instanceof ValidationError) return { status: 400, body: { error: err.message, code: err.code, issues: err.issues } };
  if (err instanceof ConfigurationError) return { status: 400, body: { error: err.message, code: err.code, field: err.field } };
  if (err instanceof UnsupportedCapabilityError) return { status: 422, body: { error: err.message, code: err.code } };
  return { status: 500, body: { error: err instanceof Error ? err.message : String(err) } };
};

const sendError = (res: express.Response, err: unknown, fallback: string) => {
  const { status, body } = errorResponse(err);
  if (status === 500) logger.error({ err }, fallback);
  res.status(status).json({ ...body, error: body.error || fallback });
};

const parseBody = <T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> => {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid request',
      parsed.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`)
    );
  }
  return parsed.data;
};

// multipart fields arrive as strings
const jsonField = (value: string | undefined, field: string): unknown => {
  if (value === undefined || !value.trim()) return undefined;
  try {
    return JSON.parse(value);
  } catch {
    throw new ValidationError(`${field} must be valid JSON`);
  }
};

const InferFields = z.object({
  table_name: z.string().min(1).optional(),
  dataset_name: z.string().min(1).optional(),
  project_id: z.string().min(1).optional(),
  description: z.string().optional(),
  standardize_columns: z.enum(['true', 'false']).optional(),
  optimization: z.string().optional(),
  platform: z.string().optional()
});

const LoadOptionsBody = z.object({
  format: z.enum(['csv', 'json', 'parquet']).optional(),
  header: z.boolean().optional(),
  delimiter: z.string().min(1).optional(),
  iam_role: z.string().optional()
});

const RenderBody = z.object({
  platform: z.string().min(1),
  schema: z.unknown(),
  options: z
    .object({
      replace: z.boolean().optional(),
      if_not_exists: z.boolean().optional(),
      data_reference: z.string().min(1).optional(),
      load: LoadOptionsBody.optional()
    })
    .default({})
});

const IncrementalBody = z.object({
  schema: z.unknown(),
  table_name: z.string().min(1).optional(),
  config: z.unknown()
});

const KeyFields = z.object({
  keys: z.string().optional(),
  max_composite: z.coerce.number().int().min(1).max(4).optional(),
  min_uniqueness: z.coerce.number().min(0).max(1).optional()
});

const DdlBody = z.object({
  ddl: z.string().min(1, 'DDL is required'),
  dialect: z.string().optional()
});

export const createApp = (options: AppOptions = {}) => {
  const config = options.config ?? loadConfig();
  const store = options.store ?? createSchemaStore(defaultStorePath(config.dataDir));

  const app = express();
  const upload = multer({ limits: { fileSize: 50 * 1024 * 1024 } });

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/platforms', (_req, res) => {
    res.json({ platforms: supportedPlatforms().map(p => CAPABILITIES[p]), patterns: getAllPatterns() });
  });

  app.post('/api/schema/infer', upload.single('file'), (req, res) => {
    try {
      const file = req.file;
      if (!file) return res.status(400).json({ error: 'A CSV or XLSX file is required' });
      const fields = parseBody(InferFields, req.body);

      const ingested = ingestTabularBuffer(file.buffer, file.originalname, { sampleLimit: config.sampleLimit });
      const hints = jsonField(fields.optimization, 'optimization');
      const { schema, columnMapping } = inferCanonicalSchema(ingested.sample, fields.table_name ?? ingested.tableName, {
        datasetName: fields.dataset_name,
        projectId: fields.project_id,
        description: fields.description,
        standardizeColumns: fields.standardize_columns !== 'false',
        stringMaxLength: config.stringMaxLength,
        optimization: hints === undefined ? undefined : hintsFromDocument(hints)
      });
      logger.info(
        {
          file: file.originalname,
          columns: schema.columns.length,
          rows: ingested.sample.rowCount,
          optimized: hasOptimizations(schema.optimization)
        },
        'schema inferred'
      );

      const ddl = fields.platform ? getRenderer(fields.platform, schema).toDdl() : undefined;
      res.json({
        schema: schemaToDocument(schema),
        column_mapping: columnMapping,
        row_count: ingested.sample.rowCount,
        ...(ddl !== undefined && { ddl })
      });
    } catch (err) {
      sendError(res, err, 'Schema inference failed');
    }
  });

  app.post('/api/schema/render', (req, res) => {
    try {
      const body = parseBody(RenderBody, req.body);
      const schema = schemaFromDocument(body.schema);
      const renderer = getRenderer(body.platform, schema);
      const issues = renderer.validate();
      if (issues.length) {
        throw new ValidationError(`Schema '${schema.tableName}' is not valid for ${renderer.capabilities.displayName}`, issues);
      }

      const { options } = body;
      const load = {
        format: options.load?.format,
        header: options.load?.header,
        delimiter: options.load?.delimiter,
        iamRole: options.load?.iam_role
      };
      const dataReference = options.data_reference;
      res.json({
        platform: renderer.platform,
        table: renderer.tableRef(),
        ddl: renderer.toDdl({ replace: options.replace, ifNotExists: options.if_not_exists }),
        physical_types: renderer.toPhysicalTypes(),
        cli_create: renderer.toCliCreate(),
        ...(dataReference !== undefined && {
          cli_load: renderer.toCliLoad(dataReference, load),
          load_sql: renderer.toLoadSql(dataReference, load)
        }),
        ...(renderer.supportsJsonSchema() && { schema_json: renderer.toSchemaJson() })
      });
    } catch (err) {
      sendError(res, err, 'Render failed');
    }
  });

  app.post('/api/incremental/:platform', (req, res) => {
    try {
      const body = parseBody(IncrementalBody, req.body);
      const schema = schemaFromDocument(body.schema);
      const input = incrementalConfigFromDocument(body.config);
      const plan = generateLoadPlan(req.params.platform, schema, body.table_name ?? schema.tableName, {
        ...input,
        expirationSentinel: input.expirationSentinel ?? config.expirationSentinel
      });
      logger.info({ platform: plan.platform, pattern: plan.pattern, table: plan.targetTable }, 'load plan generated');
      res.json({
        platform: plan.platform,
        pattern: plan.pattern,
        target_table: plan.targetTable,
        staging_table: plan.stagingTable,
        staging_ddl: plan.stagingDdl,
        statements: plan.statements,
        sql: plan.sql
      });
    } catch (err) {
      sendError(res, err, 'Load plan generation failed');
    }
  });

  app.post('/api/keys/detect', upload.single('file'), (req, res) => {
    try {
      const file = req.file;
      if (!file) return res.status(400).json({ error: 'A CSV or XLSX file is required' });
      const fields = parseBody(KeyFields, req.body);
      const { sample } = ingestTabularBuffer(file.buffer, file.originalname, { sampleLimit: config.sampleLimit });

      const keys = fields.keys
        ?.split(',')
        .map(k => k.trim())
        .filter(Boolean);
      if (keys?.length) {
        res.json({ validation: validatePrimaryKeys(sample, keys), analysis: analyzeKeyColumns(sample, keys) });
        return;
      }
      const candidates = detectKeys(sample, {
        maxComposite: fields.max_composite ?? config.keyMaxComposite,
        minUniqueness: fields.min_uniqueness ?? config.keyMinUniqueness
      });
      res.json({ candidates, best: candidates[0] ?? null });
    } catch (err) {
      sendError(res, err, 'Key detection failed');
    }
  });

  app.post('/api/ingest/ddl', (req, res) => {
    try {
      const { ddl, dialect } = parseBody(DdlBody, req.body);
      const tables = ingestDDL(ddl, dialect || 'postgresql');
      res.json({
        tables: tables.map(t => ({ schema: schemaToDocument(t.schema), primary_keys: t.primaryKeys }))
      });
    } catch (err) {
      sendError(res, err, 'DDL ingest failed');
    }
  });

  app.get('/api/schemas', (_req, res) => {
    try {
      res.json({ schemas: store.list() });
    } catch (err) {
      sendError(res, err, 'Failed to list schemas');
    }
  });

  app.get('/api/schemas/:name', (req, res) => {
    try {
      const stored = store.get(req.params.name);
      if (!stored) return res.status(404).json({ error: `Schema '${req.params.name}' not found` });
      res.json({ name: stored.name, updated_at: stored.updatedAt, schema: schemaToDocument(stored.schema) });
    } catch (err) {
      sendError(res, err, 'Failed to read schema');
    }
  });

  app.put('/api/schemas/:name', (req, res) => {
    try {
      const schema = schemaFromDocument(req.body);
      const stored = store.save(req.params.name, schema);
      res.json({ name: stored.name, updated_at: stored.updatedAt, schema: schemaToDocument(stored.schema) });
    } catch (err) {
      sendError(res, err, 'Failed to save schema');
    }
  });

  app.delete('/api/schemas/:name', (req, res) => {
    try {
      if (!store.remove(req.params.name)) {
        return res.status(404).json({ error: `Schema '${req.params.name}' not found` });
      }
      res.json({ ok: true });
    } catch (err) {
      sendError(res, err, 'Failed to delete schema');
    }
  });

  return app;
};
