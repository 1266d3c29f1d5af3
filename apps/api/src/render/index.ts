import { CanonicalSchema } from '../types/schema';
import { UnsupportedCapabilityError } from '../errors';
import { CAPABILITIES, isPlatform, Platform, PLATFORMS } from './capabilities';
import { createRenderer, PlatformRendererSpec, Renderer, validateCapabilities } from './base';
import { bigqueryRenderer } from './bigquery';
import { snowflakeRenderer } from './snowflake';
import { redshiftRenderer } from './redshift';
import { postgresqlRenderer } from './postgresql';
import { sqlserverRenderer } from './sqlserver';

const RENDERERS: Readonly<Record<Platform, PlatformRendererSpec>> = {
  bigquery: bigqueryRenderer,
  snowflake: snowflakeRenderer,
  redshift: redshiftRenderer,
  postgresql: postgresqlRenderer,
  sqlserver: sqlserverRenderer
};

const ALIASES: Record<string, Platform> = {
  bq: 'bigquery',
  postgres: 'postgresql',
  pg: 'postgresql',
  mssql: 'sqlserver'
};

export const supportedPlatforms = (): Platform[] => [...PLATFORMS];

/** Resolves a user-supplied platform name; unknown names are an error, never a default. */
export const resolvePlatform = (name: string): Platform => {
  const key = name.trim().toLowerCase();
  if (isPlatform(key)) return key;
  if (Object.hasOwn(ALIASES, key)) return ALIASES[key];
  throw new UnsupportedCapabilityError(
    `Unknown platform '${name}'. Supported: ${PLATFORMS.join(', ')}`,
    name,
    'platform'
  );
};

export const getRenderer = (platform: string, schema: CanonicalSchema): Renderer =>
  createRenderer(RENDERERS[resolvePlatform(platform)], schema);

export const validateForPlatform = (platform: string, schema: CanonicalSchema) =>
  validateCapabilities(schema, CAPABILITIES[resolvePlatform(platform)]);

export { CAPABILITIES, getCapabilities, isPlatform, PLATFORMS, supportsJsonSchema } from './capabilities';
export type { Platform, PlatformCapabilities } from './capabilities';
export type { DdlOptions, LoadFormat, LoadOptions, Renderer, SchemaField } from './base';
