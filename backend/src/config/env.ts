/**
 * config/env.ts — Zod-validated environment configuration
 * Fails fast at startup if a value is malformed.
 * Provides typed access to all config values.
 */
import { z } from 'zod';

const flag = z.enum(['true', 'false', '1', '0']).transform(v => v === 'true' || v === '1');

const envSchema = z.object({
  // ── Server ──
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  API_BASE: z.string().startsWith('/').default('/api'),
  ALLOWED_ORIGINS: z.string().default('*'),

  // ── Dataset ──
  DATA_FILE: z.string().min(1).default('data/HouseListings.csv').describe('Listings CSV, relative to cwd'),
  DATA_ENCODING: z.enum(['latin1', 'utf8']).default('latin1'),
  INCOME_SEED: z.coerce.number().int().default(42),
  INCOME_MIN: z.coerce.number().min(0).default(40_000),
  INCOME_MAX: z.coerce.number().min(0).default(120_000),
  HISTOGRAM_BIN_WIDTH: z.coerce.number().positive().default(50_000),

  // ── Redis ──
  REDIS_URL: z.string().default('redis://localhost:6379'),
  REDIS_KEY_PREFIX: z.string().default('housing:'),

  // ── Rate Limiting ──
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(300),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60_000),

  // ── Cache TTL (seconds) ──
  CACHE_VIEW_TTL: z.coerce.number().int().min(10).default(600),     // 10 min

  // ── Logging ──
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // ── Error Tracking ──
  SENTRY_DSN: z.string().url().optional(),

  // ── Feature flags ──
  ENABLE_REDIS_CACHE: flag.default('false'),
}).refine(e => e.INCOME_MIN < e.INCOME_MAX, {
  message: 'INCOME_MIN must be below INCOME_MAX',
  path: ['INCOME_MIN'],
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate a raw environment map. Blank strings count as unset so that
 * `FOO=` in a .env file falls back to the default.
 */
export function parseEnv(raw: Record<string, string | undefined>) {
  const cleaned: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw)) {
    if (v !== undefined && v !== '') cleaned[k] = v;
  }
  return envSchema.safeParse(cleaned);
}

function loadEnv(): Env {
  const result = parseEnv(process.env);
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
