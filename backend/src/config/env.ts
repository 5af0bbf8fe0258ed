/**
 * Environment configuration.
 *
 * process.env is populated by dotenv at the entry point; this module
 * only parses and defaults it.
 */

import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  // Weight overrides persist to Mongo when set, otherwise in memory
  MONGO_URL: z.string().optional(),
  DB_NAME: z.string().default('regime_allocator'),

  // Market data
  FRED_API_KEY: z.string().optional(),
  MARKET_PROXY_TICKER: z.string().default('URTH'),
  VIX_TICKER: z.string().default('^VIX'),
  FRED_SPREAD_SERIES: z.string().default('BAMLC0A4CBBB'),
  HISTORY_RANGE: z.string().default('5y'),
  MARKET_CACHE_TTL_MIN: z.coerce.number().positive().default(30),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

export const env: Env = loadEnv();
