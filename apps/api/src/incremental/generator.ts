import { CanonicalSchema } from '../types/schema';
import { ConfigurationError, UnsupportedCapabilityError } from '../errors';
import {
  assertValidSchema,
  columnNames,
  createCanonicalSchema,
  getColumn,
  isTemporalColumn,
  withoutOptimizations,
  withTableName
} from '../schema/canonical';
import { getRenderer, Renderer } from '../render';
import { CAPABILITIES, Platform } from '../render/capabilities';
import { sqlString } from '../render/sql';
import { cast, joinOn, SOURCE, SqlDialect, TARGET, withLookback } from './dialect';
import { parseLookback } from './lookback';
import { getPatternMetadata, IncrementalConfig, LoadPattern, MergeStrategy, validateIncrementalConfig } from './patterns';

export type LoadPlan = {
  platform: Platform;
  pattern: LoadPattern;
  targetTable: string;
  stagingTable: string;
  /** null for patterns that read an existing source table as-is. */
  stagingDdl: string | null;
  /** Logical statements in execution order, without transaction control. */
  statements: string[];
  /** The full script, wrapped in a transaction when the config asks for one. */
  sql: string;
};

export type IncrementalGenerator = {
  platform: Platform;
  supportsPattern: (pattern: LoadPattern) => boolean;
  generate: (schema: CanonicalSchema, tableName: string, config: IncrementalConfig) => LoadPlan;
  generateStagingDdl: (schema: CanonicalSchema, tableName: string, config: IncrementalConfig) => string;
  maxWatermarkQuery: (schema: CanonicalSchema, tableName: string, column: string) => string;
};

type Recipe = {
  setup: string[];
  statements: string[];
};

type PlanContext = {
  d: SqlDialect;
  schema: CanonicalSchema;
  config: IncrementalConfig;
  renderer: Renderer;
  tableName: string;
  target: string;
  staging: string;
  q: (identifier: string) => string;
  columns: string[];
};

const STAGED_PATTERNS: ReadonlySet<LoadPattern> = new Set<LoadPattern>(['full_refresh', 'append', 'snapshot']);

const sameName = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();
const without = (names: string[], excluded: readonly (string | undefined)[]) =>
  names.filter(n => !excluded.some(e => e !== undefined && sameName(n, e)));

const stagingName = (tableName: string, config: IncrementalConfig) => config.stagingTable || `${tableName}_staging`;

const sourceList = (ctx: PlanContext, names: string[]) => names.map(n => `${SOURCE}.${ctx.q(n)}`);

const insertSelect = (ctx: PlanContext, columns: string[], exprs: string[], from: string, where?: string) =>
  [
    `INSERT INTO ${ctx.target} (${columns.map(ctx.q).join(', ')})`,
    `SELECT ${exprs.join(', ')}`,
    `FROM ${from} AS ${SOURCE}`,
    ...(where ? [`WHERE ${where}`] : [])
  ].join('\n') + ';';

const insertAll = (ctx: PlanContext, where?: string) =>
  insertSelect(ctx, ctx.columns, sourceList(ctx, ctx.columns), ctx.staging, where);

const notExistsInTarget = (ctx: PlanContext, extra?: string) =>
  `NOT EXISTS (\n  SELECT 1 FROM ${ctx.target} AS ${TARGET}\n  WHERE ${joinOn(ctx.config.primaryKeys, ctx.q)}${extra ? ` AND ${extra}` : ''}\n)`;

const updateColumnsFor = (ctx: PlanContext, strategy: MergeStrategy) => {
  switch (strategy) {
    case 'update_none':
      return [];
    case 'update_selective':
      return without(ctx.config.updateColumns, ctx.config.primaryKeys);
    case 'update_all':
    case 'update_changed':
      return without(ctx.columns, ctx.config.primaryKeys);
  }
};

const changed = (ctx: PlanContext, columns: string[], left = TARGET) =>
  `${ctx.d.rowHash(columns.map(c => `${left}.${ctx.q(c)}`))} <> ${ctx.d.rowHash(sourceList(ctx, columns))}`;

const mergeStatement = (ctx: PlanContext, strategy: MergeStrategy) => {
  const { q, config } = ctx;
  const updates = updateColumnsFor(ctx, strategy);
  const lines = [`MERGE INTO ${ctx.target} AS ${TARGET}`, `USING ${ctx.staging} AS ${SOURCE}`, `ON ${joinOn(config.primaryKeys, q)}`];
  if (updates.length) {
    const condition = strategy === 'update_changed' ? ` AND ${changed(ctx, updates)}` : '';
    lines.push(`WHEN MATCHED${condition} THEN`, `  UPDATE SET ${updates.map(c => `${q(c)} = ${SOURCE}.${q(c)}`).join(', ')}`);
  }
  lines.push(
    `${ctx.d.notMatched} THEN`,
    `  INSERT (${ctx.columns.map(q).join(', ')})`,
    `  VALUES (${sourceList(ctx, ctx.columns).join(', ')});`
  );
  return lines.join('\n');
};

const onConflictStatement = (ctx: PlanContext, strategy: MergeStrategy) => {
  const { q, config } = ctx;
  const updates = updateColumnsFor(ctx, strategy);
  const head = [
    `INSERT INTO ${ctx.target} AS ${TARGET} (${ctx.columns.map(q).join(', ')})`,
    `SELECT ${sourceList(ctx, ctx.columns).join(', ')}`,
    `FROM ${ctx.staging} AS ${SOURCE}`
  ];
  const conflict = `ON CONFLICT (${config.primaryKeys.map(q).join(', ')})`;
  if (!updates.length) return [...head, `${conflict} DO NOTHING;`].join('\n');

  const lines = [...head, `${conflict} DO UPDATE SET`, `  ${updates.map(c => `${q(c)} = EXCLUDED.${q(c)}`).join(',\n  ')}`];
  if (strategy === 'update_changed') {
    const current = updates.map(c => `${TARGET}.${q(c)}`).join(', ');
    const incoming = updates.map(c => `EXCLUDED.${q(c)}`).join(', ');
    lines.push(`WHERE (${current}) IS DISTINCT FROM (${incoming})`);
  }
  return `${lines.join('\n')};`;
};

const upsertStatements = (ctx: PlanContext, strategy: MergeStrategy): string[] => {
  switch (ctx.d.mergeStyle) {
    case 'merge':
      return [mergeStatement(ctx, strategy)];
    case 'on_conflict':
      return [onConflictStatement(ctx, strategy)];
    case null:
      throw new UnsupportedCapabilityError(
        `${CAPABILITIES[ctx.d.platform].displayName} has no native MERGE; use the delete_insert load pattern instead of upsert`,
        ctx.d.platform,
        'load_pattern:upsert'
      );
  }
};

const fullRefresh = (ctx: PlanContext): Recipe => ({
  setup: [],
  statements: [ctx.d.truncate(ctx.target), insertAll(ctx)]
});

const append = (ctx: PlanContext): Recipe => ({ setup: [], statements: [insertAll(ctx)] });

const upsert = (ctx: PlanContext): Recipe => ({ setup: [], statements: upsertStatements(ctx, ctx.config.mergeStrategy) });

const deleteInsert = (ctx: PlanContext): Recipe => {
  const t = ctx.d.dmlTarget(ctx.tableName);
  return {
    setup: [],
    statements: [
      ctx.d.deleteMatching({
        target: ctx.target,
        tableName: ctx.tableName,
        source: ctx.staging,
        on: joinOn(ctx.config.primaryKeys, ctx.q, t)
      }),
      insertAll(ctx)
    ]
  };
};

const incrementalTimestamp = (ctx: PlanContext): Recipe => {
  const { config, q } = ctx;
  const column = getColumn(ctx.schema, config.incrementalColumn ?? '');
  if (!column) return append(ctx); // unreachable after validation
  const physical = ctx.renderer.toPhysicalType(column);
  const fallback = isTemporalColumn(column) ? cast("'1970-01-01'", physical) : '0';
  const maxQuery = `SELECT COALESCE(MAX(${q(column.name)}), ${fallback}) FROM ${ctx.target}`;
  const watermark = ctx.d.watermark(maxQuery, physical);
  const lookback = config.lookbackWindow ? parseLookback(config.lookbackWindow) : null;
  const bound = withLookback(ctx.d, watermark.bound, lookback, column.logicalType);
  return {
    setup: watermark.setup,
    statements: [insertAll(ctx, `${SOURCE}.${q(column.name)} > ${bound}`)]
  };
};

const incrementalAppend = (ctx: PlanContext): Recipe => ({
  setup: [],
  statements: [insertAll(ctx, notExistsInTarget(ctx))]
});

const scdType1 = (ctx: PlanContext): Recipe => {
  if (ctx.d.mergeStyle) return { setup: [], statements: upsertStatements(ctx, 'update_all') };

  // Overwrite in place, then add the keys the target has not seen.
  const t = ctx.d.dmlTarget(ctx.tableName);
  const updates = without(ctx.columns, ctx.config.primaryKeys);
  const statements: string[] = [];
  if (updates.length) {
    statements.push(
      ctx.d.updateFromSource({
        target: ctx.target,
        tableName: ctx.tableName,
        source: ctx.staging,
        on: joinOn(ctx.config.primaryKeys, ctx.q, t),
        assignments: updates.map(c => `${ctx.q(c)} = ${SOURCE}.${ctx.q(c)}`)
      })
    );
  }
  statements.push(insertAll(ctx, notExistsInTarget(ctx)));
  return { setup: [], statements };
};

const resolveName = (ctx: PlanContext, name: string) => getColumn(ctx.schema, name)?.name ?? name;

const physicalOf = (ctx: PlanContext, name: string) => {
  const column = getColumn(ctx.schema, name);
  return column ? ctx.renderer.toPhysicalType(column) : 'TIMESTAMP';
};

const scdType2 = (ctx: PlanContext): Recipe => {
  const { d, q, config } = ctx;
  const effective = resolveName(ctx, config.effectiveDateColumn);
  const expiration = resolveName(ctx, config.expirationDateColumn);
  const current = resolveName(ctx, config.isCurrentColumn);
  const now = d.currentTimestamp;
  const t = d.dmlTarget(ctx.tableName);

  const closeOut = d.updateFromSource({
    target: ctx.target,
    tableName: ctx.tableName,
    source: ctx.staging,
    on: joinOn(config.primaryKeys, q, t),
    where: `${t}.${q(current)} = ${d.booleanLiteral(true)} AND ${changed(ctx, config.hashColumns, t)}`,
    assignments: [`${q(expiration)} = ${cast(now, physicalOf(ctx, expiration))}`, `${q(current)} = ${d.booleanLiteral(false)}`]
  });

  const exprs = ctx.columns.map(c => {
    if (sameName(c, effective)) return `${cast(now, physicalOf(ctx, effective))} AS ${q(c)}`;
    if (sameName(c, expiration)) return `${cast(sqlString(config.expirationSentinel), physicalOf(ctx, expiration))} AS ${q(c)}`;
    if (sameName(c, current)) return `${d.booleanLiteral(true)} AS ${q(c)}`;
    return `${SOURCE}.${q(c)}`;
  });
  const insertVersions = insertSelect(
    ctx,
    ctx.columns,
    exprs,
    ctx.staging,
    notExistsInTarget(ctx, `${TARGET}.${q(current)} = ${d.booleanLiteral(true)}`)
  );

  return { setup: [], statements: [closeOut, insertVersions] };
};

const CDC_CHANGES = 'cdc_changes';

const latestChanges = (ctx: PlanContext, sequence: string) => {
  const keys = ctx.config.primaryKeys.map(k => `staged.${ctx.q(k)}`).join(', ');
  return [
    'SELECT * FROM (',
    `  SELECT staged.*, ROW_NUMBER() OVER (PARTITION BY ${keys} ORDER BY staged.${ctx.q(sequence)} DESC) AS cdc_row_rank`,
    `  FROM ${ctx.staging} AS staged`,
    ') AS ranked',
    'WHERE cdc_row_rank = 1'
  ].join('\n');
};

const cdc = (ctx: PlanContext): Recipe => {
  const { d, q, config } = ctx;
  const operation = config.operationColumn ?? '';
  const op = `${SOURCE}.${q(resolveName(ctx, operation))}`;
  const isDelete = `${op} = ${sqlString(config.deleteOperation)}`;
  const isUpsert = `${op} IN (${sqlString(config.insertOperation)}, ${sqlString(config.updateOperation)})`;
  const soft = config.deleteStrategy === 'soft_delete' ? config.softDeleteColumn : undefined;

  const dataColumns = without(ctx.columns, [operation, config.sequenceColumn]);
  const updates = without(dataColumns, [...config.primaryKeys, soft]).map(c => `${q(c)} = ${SOURCE}.${q(c)}`);
  if (soft) updates.push(`${q(resolveName(ctx, soft))} = ${d.booleanLiteral(false)}`);
  const values = dataColumns.map(c => (soft && sameName(c, soft) ? d.booleanLiteral(false) : `${SOURCE}.${q(c)}`));

  const setup: string[] = [];
  const statements: string[] = [];
  let source = ctx.staging;
  if (config.sequenceColumn) {
    if (d.mergeStyle === 'merge' || d.platform === 'postgresql') {
      source = `(\n${latestChanges(ctx, config.sequenceColumn)}\n)`;
    } else {
      statements.push(`CREATE TEMP TABLE ${CDC_CHANGES} AS\n${latestChanges(ctx, config.sequenceColumn)};`);
      source = CDC_CHANGES;
    }
  }

  if (d.mergeStyle === 'merge') {
    const lines = [`MERGE INTO ${ctx.target} AS ${TARGET}`, `USING ${source} AS ${SOURCE}`, `ON ${joinOn(config.primaryKeys, q)}`];
    if (config.deleteStrategy === 'hard_delete') lines.push(`WHEN MATCHED AND ${isDelete} THEN`, '  DELETE');
    if (soft) {
      lines.push(`WHEN MATCHED AND ${isDelete} THEN`, `  UPDATE SET ${q(resolveName(ctx, soft))} = ${d.booleanLiteral(true)}`);
    }
    if (updates.length) lines.push(`WHEN MATCHED AND ${isUpsert} THEN`, `  UPDATE SET ${updates.join(', ')}`);
    lines.push(
      `${d.notMatched} AND ${isUpsert} THEN`,
      `  INSERT (${dataColumns.map(q).join(', ')})`,
      `  VALUES (${values.join(', ')});`
    );
    statements.push(lines.join('\n'));
    return { setup, statements };
  }

  // No single-statement merge: apply deletes, then updates, then inserts.
  const t = d.dmlTarget(ctx.tableName);
  const on = joinOn(config.primaryKeys, q, t);
  const base = { target: ctx.target, tableName: ctx.tableName, source, on };
  if (config.deleteStrategy === 'hard_delete') statements.push(d.deleteMatching({ ...base, where: isDelete }));
  if (soft) {
    statements.push(
      d.updateFromSource({ ...base, where: isDelete, assignments: [`${q(resolveName(ctx, soft))} = ${d.booleanLiteral(true)}`] })
    );
  }
  if (updates.length) statements.push(d.updateFromSource({ ...base, where: isUpsert, assignments: updates }));
  statements.push(insertSelect(ctx, dataColumns, values, source, `${isUpsert} AND ${notExistsInTarget(ctx)}`));
  if (source === CDC_CHANGES) statements.push(`DROP TABLE ${CDC_CHANGES};`);
  return { setup, statements };
};

const snapshot = (ctx: PlanContext): Recipe => {
  const { q, config } = ctx;
  const existing = getColumn(ctx.schema, config.snapshotColumn);
  const stamp = ctx.d.currentTimestamp;
  if (existing) {
    const exprs = ctx.columns.map(c => (sameName(c, existing.name) ? `${stamp} AS ${q(c)}` : `${SOURCE}.${q(c)}`));
    return { setup: [], statements: [insertSelect(ctx, ctx.columns, exprs, ctx.staging)] };
  }
  const columns = [...ctx.columns, config.snapshotColumn];
  const exprs = [...sourceList(ctx, ctx.columns), `${stamp} AS ${q(config.snapshotColumn)}`];
  return { setup: [], statements: [insertSelect(ctx, columns, exprs, ctx.staging)] };
};

const recipeFor = (ctx: PlanContext): Recipe => {
  const pattern = ctx.config.loadPattern;
  switch (pattern) {
    case 'full_refresh':
      return fullRefresh(ctx);
    case 'append':
      return append(ctx);
    case 'upsert':
      return upsert(ctx);
    case 'delete_insert':
      return deleteInsert(ctx);
    case 'incremental_timestamp':
      return incrementalTimestamp(ctx);
    case 'incremental_append':
      return incrementalAppend(ctx);
    case 'scd_type1':
      return scdType1(ctx);
    case 'scd_type2':
      return scdType2(ctx);
    case 'cdc':
      return cdc(ctx);
    case 'snapshot':
      return snapshot(ctx);
    default: {
      const unhandled: never = pattern;
      throw new Error(`Unhandled load pattern: ${String(unhandled)}`);
    }
  }
};

/** Staged rows carry the source columns only; SCD bookkeeping columns live on the target. */
const stagingSchema = (schema: CanonicalSchema, name: string, config: IncrementalConfig) => {
  const base = withoutOptimizations(withTableName(schema, name));
  if (config.loadPattern !== 'scd_type2') return base;
  const bookkeeping = [config.effectiveDateColumn, config.expirationDateColumn, config.isCurrentColumn];
  return createCanonicalSchema({
    ...base,
    columns: base.columns.filter(c => !bookkeeping.some(b => sameName(b, c.name)))
  });
};

/** Config references match columns case-insensitively; quoted SQL needs each column's own spelling. */
const withColumnSpelling = (schema: CanonicalSchema, config: IncrementalConfig): IncrementalConfig => {
  const name = (ref: string) => getColumn(schema, ref)?.name ?? ref;
  const optional = (ref: string | undefined) => (ref === undefined ? undefined : name(ref));
  return {
    ...config,
    primaryKeys: config.primaryKeys.map(name),
    updateColumns: config.updateColumns.map(name),
    hashColumns: config.hashColumns.map(name),
    incrementalColumn: optional(config.incrementalColumn),
    effectiveDateColumn: name(config.effectiveDateColumn),
    expirationDateColumn: name(config.expirationDateColumn),
    isCurrentColumn: name(config.isCurrentColumn),
    operationColumn: optional(config.operationColumn),
    sequenceColumn: optional(config.sequenceColumn),
    softDeleteColumn: optional(config.softDeleteColumn),
    snapshotColumn: name(config.snapshotColumn)
  };
};

export const createIncrementalGenerator = (d: SqlDialect): IncrementalGenerator => {
  const caps = CAPABILITIES[d.platform];

  const supportsPattern = (pattern: LoadPattern) => pattern !== 'upsert' || d.mergeStyle !== null;

  const generateStagingDdl = (schema: CanonicalSchema, tableName: string, config: IncrementalConfig) => {
    assertValidSchema(schema);
    return getRenderer(d.platform, stagingSchema(schema, stagingName(tableName, config), config)).toDdl({ replace: true });
  };

  const maxWatermarkQuery = (schema: CanonicalSchema, tableName: string, column: string) => {
    assertValidSchema(schema);
    const watermark = getColumn(schema, column);
    if (!watermark) {
      throw new ConfigurationError(
        `incremental_column column '${column}' not found in schema '${schema.tableName}'`,
        'incremental_column'
      );
    }
    const renderer = getRenderer(d.platform, withoutOptimizations(withTableName(schema, tableName)));
    return `SELECT MAX(${renderer.quote(watermark.name)}) AS max_watermark FROM ${renderer.tableRef()};`;
  };

  const generate = (schema: CanonicalSchema, tableName: string, input: IncrementalConfig): LoadPlan => {
    // Hint references are checked here because the load path strips hints below.
    assertValidSchema(schema);
    validateIncrementalConfig(input, schema);
    const config = withColumnSpelling(schema, input);
    if (!supportsPattern(config.loadPattern)) {
      throw new UnsupportedCapabilityError(
        `${caps.displayName} does not support the ${config.loadPattern} load pattern; use delete_insert instead`,
        d.platform,
        `load_pattern:${config.loadPattern}`
      );
    }

    // Hints only shape CREATE TABLE; they never block a load.
    const renderer = getRenderer(d.platform, withoutOptimizations(withTableName(schema, tableName)));
    const staging = stagingName(tableName, config);
    const ctx: PlanContext = {
      d,
      schema,
      config,
      renderer,
      tableName,
      target: renderer.tableRef(),
      staging: renderer.tableRef(staging),
      q: renderer.quote,
      columns: columnNames(schema)
    };

    const recipe = recipeFor(ctx);
    const statements = [...recipe.setup, ...recipe.statements];
    const body = config.useTransaction ? [d.begin, ...recipe.statements, d.commit] : recipe.statements;
    const header = `-- ${getPatternMetadata(config.loadPattern).name}: ${ctx.staging} -> ${ctx.target}`;

    return {
      platform: d.platform,
      pattern: config.loadPattern,
      targetTable: ctx.target,
      stagingTable: ctx.staging,
      stagingDdl: STAGED_PATTERNS.has(config.loadPattern) ? null : generateStagingDdl(schema, tableName, config),
      statements,
      sql: [header, ...recipe.setup, ...body].join('\n\n')
    };
  };

  return { platform: d.platform, supportsPattern, generate, generateStagingDdl, maxWatermarkQuery };
};
