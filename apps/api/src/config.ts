import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8080),
  DATA_DIR: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  SAMPLE_LIMIT: z.coerce.number().int().positive().default(1000),
  STRING_MAX_LENGTH: z.coerce.number().int().positive().default(65535),
  SCD2_EXPIRATION_SENTINEL: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}( \d{2}:\d{2}:\d{2})?$/, 'expected YYYY-MM-DD')
    .default('9999-12-31'),
  KEY_MIN_UNIQUENESS: z.coerce.number().min(0).max(1).default(0.995),
  KEY_MAX_COMPOSITE: z.coerce.number().int().min(1).max(4).default(2)
});

export type AppConfig = {
  env: 'development' | 'test' | 'production';
  port: number;
  dataDir: string;
  logLevel: string;
  sampleLimit: number;
  stringMaxLength: number;
  expirationSentinel: string;
  keyMinUniqueness: number;
  keyMaxComposite: number;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = String(issue?.path[0] ?? 'env');
    throw new ConfigurationError(`Invalid ${field}: ${issue?.message ?? 'unknown error'}`, field);
  }
  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    dataDir: e.DATA_DIR || path.join(process.cwd(), 'data'),
    logLevel: e.LOG_LEVEL,
    sampleLimit: e.SAMPLE_LIMIT,
    stringMaxLength: e.STRING_MAX_LENGTH,
    expirationSentinel: e.SCD2_EXPIRATION_SENTINEL,
    keyMinUniqueness: e.KEY_MIN_UNIQUENESS,
    keyMaxComposite: e.KEY_MAX_COMPOSITE
  };
};
