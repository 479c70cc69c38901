/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * I funnel all app settings (port, data lake root, segment ceiling, scheduler
 * time, fetch timeouts) through this file so there's one place to look and one
 * place to validate. Every other module imports `config` instead of reading
 * process.env directly.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * (e.g. "4194304" → 4194304) at startup. If anything is missing or invalid, the
 * app exits immediately with the issue tree. The result is a nested `config`
 * object exported with `as const`.
 *
 * Booleans go through `z.stringbool()` so "false" really means false
 * (`z.coerce.boolean()` would turn any non-empty string into true).
 */
import 'dotenv/config';

import { z } from 'zod/v4';

import { isValidTimeZone } from '@shared/timezone';

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  /** Root directory of the flat-file data lake. */
  DATA_DIR: z.string().min(1).default('./data'),
  /** Byte ceiling per segment file (4 MiB keeps each file under common hosting caps). */
  STORE_MAX_SEGMENT_BYTES: z.coerce.number().int().min(1024).default(4 * 1024 * 1024),
  STORE_FORMAT: z.enum(['json', 'msgpack']).default('json'),

  FRESHNESS_WINDOW_HOURS: z.coerce.number().positive().default(24),
  /** Per-request timeout for every upstream HTTP call. */
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  /** Upper bound on one adapter's complete run (fetch + parse, all pages). */
  ADAPTER_RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),

  SCHEDULER_ENABLED: z.stringbool().default(true),
  SCHEDULER_HOUR: z.coerce.number().int().min(0).max(23).default(18),
  SCHEDULER_MINUTE: z.coerce.number().int().min(0).max(59).default(0),
  SCHEDULER_TIMEZONE: z
    .string()
    .refine(isValidTimeZone, { message: 'SCHEDULER_TIMEZONE must be an IANA time zone' })
    .default('America/New_York'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  log: {
    level: env.LOG_LEVEL,
  },

  store: {
    dataDir: env.DATA_DIR,
    maxSegmentBytes: env.STORE_MAX_SEGMENT_BYTES,
    format: env.STORE_FORMAT,
  },

  update: {
    freshnessWindowMs: env.FRESHNESS_WINDOW_HOURS * 60 * 60 * 1000,
    fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
    runTimeoutMs: env.ADAPTER_RUN_TIMEOUT_MS,
  },

  scheduler: {
    enabled: env.SCHEDULER_ENABLED,
    hour: env.SCHEDULER_HOUR,
    minute: env.SCHEDULER_MINUTE,
    timezone: env.SCHEDULER_TIMEZONE,
  },
} as const;

export type AppConfig = typeof config;
