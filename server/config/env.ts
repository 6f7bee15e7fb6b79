// =============================================================
// File: server/config/env.ts
// Description: Environment loading + validation. Every setting
//              the server reads goes through this schema, so a
//              bad .env fails at startup rather than mid-sale.
// =============================================================

import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_API_PORT, DEFAULT_DB_PORT, PURCHASE_CANCEL_MODES } from '../../shared/constants';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

const booleanString = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.coerce.number().int().positive().default(DEFAULT_API_PORT),

  /** pg for PostgreSQL, better-sqlite3 for a local file or :memory: */
  DB_CLIENT: z.enum(['pg', 'better-sqlite3']).default('pg'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(DEFAULT_DB_PORT),
  DB_NAME: z.string().default('retail_pos'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_FILENAME: z.string().default('./data/retail-pos.sqlite'),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_MIGRATE_ON_START: booleanString.default('true'),
  DB_SEED_DEMO_DATA: booleanString.default('false'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  UNIT_OF_WORK_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  UNIT_OF_WORK_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(50),
  /** PostgreSQL only: SET LOCAL lock_timeout for every unit of work. 0 disables. */
  UNIT_OF_WORK_LOCK_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),

  PURCHASE_CANCEL_MODE: z
    .enum([PURCHASE_CANCEL_MODES.DELETE, PURCHASE_CANCEL_MODES.STATUS])
    .default(PURCHASE_CANCEL_MODES.DELETE),
});

export type Env = z.infer<typeof envSchema>;

let cached: Env | null = null;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

export function getEnv(): Env {
  if (!cached) {
    cached = parseEnv(process.env);
  }
  return cached;
}
