/**
 * config/env.ts — Zod-validated environment configuration
 * Fails fast at startup if any database secret is missing.
 * Provides typed access to all config values.
 */
import { z } from 'zod';

const envSchema = z.object({
  // ── Server ──
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  API_BASE: z.string().default('/api'),
  ALLOWED_ORIGINS: z.string().optional(),

  // ── PostgreSQL (provisioned secrets) ──
  DB_USER: z.string().min(1).describe('Database user'),
  DB_PASSWORD: z.string().min(1).describe('Database password'),
  DB_HOST: z.string().min(1).describe('Database host'),
  DB_PORT: z.coerce.number().int().min(1).max(65535).describe('Database port'),
  DB_NAME: z.string().min(1).describe('Database name'),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(0),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(5),
  DB_SSL: z.enum(['true', 'false']).default('false').transform(v => v === 'true'),
  DB_QUERY_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30_000),

  // ── Cache TTL (seconds) ──
  CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(600),

  // ── Logging ──
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // ── Error Tracking ──
  SENTRY_DSN: z.string().url().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate environment. Exits the process on failure.
 */
function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('❌ Environment validation failed:');
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();
