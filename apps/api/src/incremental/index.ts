import { CanonicalSchema } from '../types/schema';
import { resolvePlatform } from '../render';
import { Platform } from '../render/capabilities';
import { bigqueryDialect } from './bigquery';
import { SqlDialect } from './dialect';
import { createIncrementalGenerator, IncrementalGenerator, LoadPlan } from './generator';
import { createIncrementalConfig, IncrementalConfigInput } from './patterns';
import { postgresqlDialect } from './postgresql';
import { redshiftDialect } from './redshift';
import { snowflakeDialect } from './snowflake';
import { sqlserverDialect } from './sqlserver';

const DIALECTS: Readonly<Record<Platform, SqlDialect>> = {
  bigquery: bigqueryDialect,
  snowflake: snowflakeDialect,
  redshift: redshiftDialect,
  postgresql: postgresqlDialect,
  sqlserver: sqlserverDialect
};

export const getIncrementalGenerator = (platform: string): IncrementalGenerator =>
  createIncrementalGenerator(DIALECTS[resolvePlatform(platform)]);

export const generateLoadPlan = (
  platform: string,
  schema: CanonicalSchema,
  tableName: string,
  config: IncrementalConfigInput
): LoadPlan => getIncrementalGenerator(platform).generate(schema, tableName, createIncrementalConfig(config));

/** Shortcut for an upsert keyed on `primaryKeys`. */
export const generateMergeSql = (platform: string, schema: CanonicalSchema, tableName: string, primaryKeys: string[]) =>
  generateLoadPlan(platform, schema, tableName, { loadPattern: 'upsert', primaryKeys }).sql;

export type { IncrementalGenerator, LoadPlan } from './generator';
export type { SqlDialect } from './dialect';
export * from './patterns';
export { IncrementalConfigDocument, incrementalConfigFromDocument } from './document';
export { parseLookback } from './lookback';
