import { describe, it, expect } from 'vitest';
import { UnsupportedCapabilityError, ValidationError } from '../errors';
import { ColumnInput, columnNames, createCanonicalSchema, HintsInput } from '../schema/canonical';
import { getRenderer, resolvePlatform, supportedPlatforms, supportsJsonSchema, validateForPlatform } from '../render';
import { quoteIdentifier, shellQuote, sqlString } from '../render/sql';

const COLUMNS: ColumnInput[] = [
  { name: 'event_id', logicalType: 'bigint', nullable: false },
  { name: 'user_id', logicalType: 'string' },
  { name: 'amount', logicalType: 'decimal', precision: 10, scale: 2 },
  { name: 'event_ts', logicalType: 'timestamp', description: 'Event time' },
  { name: 'is_test', logicalType: 'boolean' }
];

const events = (optimization: HintsInput = {}) =>
  createCanonicalSchema({ tableName: 'events', datasetName: 'analytics', columns: COLUMNS, optimization });

describe('sql helpers', () => {
  it('quotes only when needed unless forced', () => {
    expect(quoteIdentifier('order_id', 'double', false)).toBe('order_id');
    expect(quoteIdentifier('order id', 'double', false)).toBe('"order id"');
    expect(quoteIdentifier('a"b', 'double', true)).toBe('"a""b"');
    expect(quoteIdentifier('a]b', 'bracket', true)).toBe('[a]]b]');
    expect(quoteIdentifier('2nd', 'backtick', false)).toBe('`2nd`');
  });

  it('escapes literals', () => {
    expect(sqlString("it's")).toBe("'it''s'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});

describe('platform resolution', () => {
  it('accepts aliases', () => {
    expect(resolvePlatform('BQ')).toBe('bigquery');
    expect(resolvePlatform('postgres')).toBe('postgresql');
    expect(resolvePlatform('mssql')).toBe('sqlserver');
  });

  it('rejects unknown platforms', () => {
    expect(() => resolvePlatform('oracle')).toThrow(UnsupportedCapabilityError);
    expect(() => resolvePlatform('oracle')).toThrow(
      "Unknown platform 'oracle'. Supported: bigquery, snowflake, redshift, postgresql, sqlserver"
    );
  });

  it('knows which platforms emit a JSON schema', () => {
    expect(supportsJsonSchema('bigquery')).toBe(true);
    expect(supportsJsonSchema('redshift')).toBe(false);
  });
});

describe('BigQuery', () => {
  const schema = events({ partitionColumns: ['event_ts'], clusterColumns: ['user_id', 'event_id'] });

  it('renders partitioned, clustered DDL', () => {
    expect(getRenderer('bigquery', schema).toDdl()).toBe(
      [
        'CREATE TABLE `analytics.events` (',
        '  event_id INT64 NOT NULL,',
        '  user_id STRING,',
        '  amount NUMERIC(10,2),',
        '  event_ts TIMESTAMP OPTIONS(description="Event time"),',
        '  is_test BOOL',
        ')',
        'PARTITION BY DATE(event_ts)',
        'CLUSTER BY user_id, event_id;'
      ].join('\n')
    );
  });

  it('renders bq commands', () => {
    const renderer = getRenderer('bigquery', schema);
    expect(renderer.toCliCreate()).toBe(
      'bq mk --table --time_partitioning_field=event_ts --time_partitioning_type=DAY ' +
        '--clustering_fields=user_id,event_id analytics.events events_schema.json'
    );
    expect(renderer.toCliLoad('gs://bucket/events.csv')).toBe(
      "bq load --source_format=CSV --skip_leading_rows=1 analytics.events 'gs://bucket/events.csv' events_schema.json"
    );
    expect(renderer.toLoadSql('gs://bucket/events.csv')).toBe(
      "LOAD DATA INTO `analytics.events`\nFROM FILES (\n  format = 'CSV',\n  skip_leading_rows = 1,\n  uris = ['gs://bucket/events.csv']\n);"
    );
  });

  it('emits a JSON schema without length suffixes', () => {
    expect(getRenderer('bigquery', schema).toSchemaJson()).toEqual([
      { name: 'event_id', type: 'INT64', mode: 'REQUIRED' },
      { name: 'user_id', type: 'STRING', mode: 'NULLABLE' },
      { name: 'amount', type: 'NUMERIC', mode: 'NULLABLE' },
      { name: 'event_ts', type: 'TIMESTAMP', mode: 'NULLABLE', description: 'Event time' },
      { name: 'is_test', type: 'BOOL', mode: 'NULLABLE' }
    ]);
  });

  it('rejects more than four cluster columns', () => {
    const renderer = getRenderer(
      'bigquery',
      events({ clusterColumns: ['event_id', 'user_id', 'amount', 'event_ts', 'is_test'] })
    );
    expect(renderer.validate()).toEqual(['BigQuery supports max 4 cluster columns, got 5']);
    expect(() => renderer.toDdl()).toThrow(ValidationError);
  });

  it('requires temporal partition columns', () => {
    expect(validateForPlatform('bigquery', events({ partitionColumns: ['event_id'] }))).toEqual([
      "BigQuery partition column 'event_id' must be one of DATE/TIMESTAMP/TIMESTAMPTZ, got bigint"
    ]);
  });

  it('spells hint columns the way the schema does', () => {
    const renderer = getRenderer('bigquery', events({ partitionColumns: ['EVENT_TS'], clusterColumns: ['User_Id'] }));
    expect(renderer.toCliCreate()).toBe(
      'bq mk --table --time_partitioning_field=event_ts --time_partitioning_type=DAY ' +
        '--clustering_fields=user_id analytics.events events_schema.json'
    );
    expect(renderer.toDdl().split('\n').slice(-2)).toEqual(['PARTITION BY DATE(event_ts)', 'CLUSTER BY user_id;']);
  });

  it('requires a dataset', () => {
    expect(() => getRenderer('bigquery', createCanonicalSchema({ tableName: 'events', columns: COLUMNS }))).toThrow(
      "Cannot render 'events' for BigQuery: BigQuery requires a dataset name for table 'events'"
    );
  });
});

describe('Snowflake', () => {
  it('renders clustered DDL with comments', () => {
    expect(getRenderer('snowflake', events({ clusterColumns: ['event_ts'] })).toDdl({ replace: true })).toBe(
      [
        'CREATE OR REPLACE TABLE analytics.events (',
        '  event_id NUMBER(38,0) NOT NULL,',
        '  user_id VARCHAR(16777216),',
        '  amount NUMBER(10,2),',
        "  event_ts TIMESTAMP_NTZ COMMENT 'Event time',",
        '  is_test BOOLEAN',
        ')',
        'CLUSTER BY (event_ts);'
      ].join('\n')
    );
  });

  it('copies from a stage', () => {
    const renderer = getRenderer('snowflake', events());
    expect(renderer.toLoadSql('@stage/events/', { format: 'parquet' })).toBe(
      [
        'COPY INTO analytics.events',
        'FROM @stage/events/',
        "FILE_FORMAT = (TYPE = 'PARQUET')",
        'MATCH_BY_COLUMN_NAME = CASE_INSENSITIVE',
        "ON_ERROR = 'ABORT_STATEMENT';"
      ].join('\n')
    );
    expect(renderer.toLoadSql('s3://bucket/events.csv').split('\n')[2]).toBe(
      `FILE_FORMAT = (TYPE = 'CSV' FIELD_DELIMITER = ',' SKIP_HEADER = 1 FIELD_OPTIONALLY_ENCLOSED_BY = '"')`
    );
  });

  it('does not partition', () => {
    expect(validateForPlatform('snowflake', events({ partitionColumns: ['event_ts'] }))).toEqual([
      'Snowflake does not support partitioning (partition_columns: event_ts)'
    ]);
  });

  it('has no JSON schema artifact', () => {
    expect(() => getRenderer('snowflake', events()).toSchemaJson()).toThrow(UnsupportedCapabilityError);
  });
});

describe('Redshift', () => {
  it('renders distribution and sort keys', () => {
    const renderer = getRenderer('redshift', events({ distributionColumn: 'user_id', sortColumns: ['event_ts'] }));
    expect(renderer.toDdl({ replace: true })).toBe(
      [
        'DROP TABLE IF EXISTS analytics.events;',
        'CREATE TABLE analytics.events (',
        '  event_id BIGINT NOT NULL,',
        '  user_id VARCHAR(256),',
        '  amount DECIMAL(10,2),',
        '  event_ts TIMESTAMP,',
        '  is_test BOOLEAN',
        ')',
        'DISTSTYLE KEY',
        'DISTKEY(user_id)',
        'SORTKEY(event_ts);',
        "COMMENT ON COLUMN analytics.events.event_ts IS 'Event time';"
      ].join('\n')
    );
  });

  it('points cluster hints at sort keys', () => {
    expect(validateForPlatform('redshift', events({ clusterColumns: ['user_id'] }))).toEqual([
      'Redshift does not support clustering (cluster_columns: user_id); use sort_columns instead'
    ]);
  });

  it('renders COPY with an IAM role', () => {
    const sql = getRenderer('redshift', events()).toLoadSql('s3://bucket/events.csv', {
      iamRole: 'arn:aws:iam::000000000000:role/loader'
    });
    expect(sql).toBe(
      "COPY analytics.events\nFROM 's3://bucket/events.csv'\nIAM_ROLE 'arn:aws:iam::000000000000:role/loader'\nFORMAT AS CSV\nIGNOREHEADER 1;"
    );
  });
});

describe('PostgreSQL', () => {
  it('always quotes identifiers', () => {
    expect(getRenderer('postgresql', events({ partitionColumns: ['event_ts'] })).toDdl({ ifNotExists: true })).toBe(
      [
        'CREATE TABLE IF NOT EXISTS "analytics"."events" (',
        '  "event_id" BIGINT NOT NULL,',
        '  "user_id" VARCHAR(255),',
        '  "amount" NUMERIC(10,2),',
        '  "event_ts" TIMESTAMP,',
        '  "is_test" BOOLEAN',
        ')',
        'PARTITION BY RANGE ("event_ts");',
        `COMMENT ON COLUMN "analytics"."events"."event_ts" IS 'Event time';`
      ].join('\n')
    );
  });

  it('loads CSV only', () => {
    const renderer = getRenderer('pg', events());
    expect(renderer.toLoadSql('/data/events.csv')).toBe(
      `COPY "analytics"."events" ("event_id", "user_id", "amount", "event_ts", "is_test") FROM '/data/events.csv' WITH (FORMAT csv, HEADER true);`
    );
    expect(() => renderer.toLoadSql('/data/events.json', { format: 'json' })).toThrow(
      'PostgreSQL bulk load does not support json files'
    );
  });
});

describe('SQL Server', () => {
  it('renders a clustered index and extended properties', () => {
    expect(getRenderer('sqlserver', events({ clusterColumns: ['event_id'] })).toDdl()).toBe(
      [
        'CREATE TABLE [analytics].[events] (',
        '  [event_id] BIGINT NOT NULL,',
        '  [user_id] NVARCHAR(255) NULL,',
        '  [amount] DECIMAL(10,2) NULL,',
        '  [event_ts] DATETIME2 NULL,',
        '  [is_test] BIT NULL',
        ');',
        'CREATE CLUSTERED INDEX [cix_events] ON [analytics].[events] ([event_id]);',
        "EXEC sp_addextendedproperty 'MS_Description', N'Event time', 'SCHEMA', 'analytics', 'TABLE', 'events', 'COLUMN', 'event_ts';"
      ].join('\n')
    );
  });

  it('has no json type', () => {
    const schema = createCanonicalSchema({
      tableName: 'docs',
      columns: [{ name: 'payload', logicalType: 'json' }]
    });
    const renderer = getRenderer('sqlserver', schema);
    expect(renderer.validate()).toEqual(["SQL Server does not support logical type json (column 'payload')"]);
    expect(() => renderer.toPhysicalType(schema.columns[0])).toThrow(UnsupportedCapabilityError);
  });
});

describe('every platform', () => {
  // descriptions and hints name columns again in trailing statements
  const plain = createCanonicalSchema({
    tableName: 'events',
    datasetName: 'analytics',
    columns: COLUMNS.map(c => ({ name: c.name, logicalType: c.logicalType, nullable: c.nullable }))
  });

  it('lists each column once, in schema order', () => {
    for (const platform of supportedPlatforms()) {
      const renderer = getRenderer(platform, plain);
      const ddl = renderer.toDdl();
      const positions = plain.columns.map(c => {
        const quoted = renderer.quote(c.name);
        expect(ddl.split(quoted), `${platform} ${c.name}`).toHaveLength(2);
        return ddl.indexOf(quoted);
      });
      expect(positions, platform).toEqual([...positions].sort((a, b) => a - b));
    }
  });

  it('maps every column to a physical type', () => {
    for (const platform of supportedPlatforms()) {
      expect(Object.keys(getRenderer(platform, plain).toPhysicalTypes()), platform).toEqual(columnNames(plain));
    }
  });

  it('resolves hint spelling on Snowflake and Redshift too', () => {
    expect(getRenderer('snowflake', events({ clusterColumns: ['EVENT_TS'] })).toDdl().split('\n').pop()).toBe(
      'CLUSTER BY (event_ts);'
    );
    const redshift = getRenderer('redshift', events({ distributionColumn: 'USER_ID', sortColumns: ['Event_Ts'] })).toDdl();
    expect(redshift.split('\n').slice(-4, -1)).toEqual(['DISTSTYLE KEY', 'DISTKEY(user_id)', 'SORTKEY(event_ts);']);
  });
});
