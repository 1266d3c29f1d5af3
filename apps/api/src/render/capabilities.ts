import { LogicalType } from '../types/schema';

export const PLATFORMS = ['bigquery', 'snowflake', 'redshift', 'postgresql', 'sqlserver'] as const;

export type Platform = (typeof PLATFORMS)[number];

export const isPlatform = (value: unknown): value is Platform =>
  PLATFORMS.some(p => p === value);

export type QuoteStyle = 'backtick' | 'double' | 'bracket';

export type PlatformCapabilities = {
  platform: Platform;
  displayName: string;
  partitioning: { maxColumns: number; allowedTypes?: readonly LogicalType[] } | null;
  clustering: { maxColumns: number } | null;
  sortKeys: boolean;
  distributionKey: boolean;
  nativeMerge: boolean;
  jsonSchema: boolean;
  partitionOptions: boolean; // expiration days + require filter
  requiresDataset: boolean;
  defaultSchema?: string;
  quoteStyle: QuoteStyle;
  alwaysQuote: boolean;
  unsupportedTypes: readonly LogicalType[];
};

export const CAPABILITIES: Readonly<Record<Platform, PlatformCapabilities>> = {
  bigquery: {
    platform: 'bigquery',
    displayName: 'BigQuery',
    partitioning: { maxColumns: 1, allowedTypes: ['date', 'timestamp', 'timestamptz'] },
    clustering: { maxColumns: 4 },
    sortKeys: false,
    distributionKey: false,
    nativeMerge: true,
    jsonSchema: true,
    partitionOptions: true,
    requiresDataset: true,
    quoteStyle: 'backtick',
    alwaysQuote: false,
    unsupportedTypes: []
  },
  snowflake: {
    platform: 'snowflake',
    displayName: 'Snowflake',
    partitioning: null,
    clustering: { maxColumns: 4 },
    sortKeys: false,
    distributionKey: false,
    nativeMerge: true,
    jsonSchema: false,
    partitionOptions: false,
    requiresDataset: false,
    defaultSchema: 'PUBLIC',
    quoteStyle: 'double',
    alwaysQuote: false,
    unsupportedTypes: []
  },
  redshift: {
    platform: 'redshift',
    displayName: 'Redshift',
    partitioning: null,
    clustering: null,
    sortKeys: true,
    distributionKey: true,
    nativeMerge: false,
    jsonSchema: false,
    partitionOptions: false,
    requiresDataset: false,
    defaultSchema: 'public',
    quoteStyle: 'double',
    alwaysQuote: false,
    unsupportedTypes: []
  },
  postgresql: {
    platform: 'postgresql',
    displayName: 'PostgreSQL',
    partitioning: { maxColumns: 1 },
    clustering: null,
    sortKeys: false,
    distributionKey: false,
    nativeMerge: true, // INSERT ... ON CONFLICT
    jsonSchema: false,
    partitionOptions: false,
    requiresDataset: false,
    defaultSchema: 'public',
    quoteStyle: 'double',
    alwaysQuote: true,
    unsupportedTypes: []
  },
  sqlserver: {
    platform: 'sqlserver',
    displayName: 'SQL Server',
    partitioning: null,
    clustering: { maxColumns: 16 },
    sortKeys: false,
    distributionKey: false,
    nativeMerge: true,
    jsonSchema: false,
    partitionOptions: false,
    requiresDataset: false,
    defaultSchema: 'dbo',
    quoteStyle: 'bracket',
    alwaysQuote: true,
    unsupportedTypes: ['json']
  }
};

export const getCapabilities = (platform: Platform) => CAPABILITIES[platform];

export const supportsJsonSchema = (platform: Platform) => CAPABILITIES[platform].jsonSchema;
