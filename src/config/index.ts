/**
 * Runtime configuration, validated once at startup.
 */

import { z } from 'zod';
import { loadTierConfig, type TierConfig } from './tiers';
import type { Tier } from '@/types/billing';

const databaseEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DB_POOL_SIZE: z.coerce.number().int().positive().default(20),
});

const envSchema = databaseEnvSchema.extend({
  PORT: z.coerce.number().int().positive().default(3000),
  REDIS_URL: z.string().min(1).optional(),
  REDIS_KEY_PREFIX: z.string().default('burst:'),
  REDIS_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(250),
  BILLING_WEBHOOK_SECRET: z.string().min(1, 'BILLING_WEBHOOK_SECRET is required'),
  WEBHOOK_TOLERANCE_SECONDS: z.coerce.number().int().nonnegative().default(300),
  WEBHOOK_MAX_RETRIES: z.coerce.number().int().nonnegative().default(5),
  PRICE_ID_PRO: z.string().min(1).optional(),
  PRICE_ID_ENTERPRISE: z.string().min(1).optional(),
  TIER_CONFIG_PATH: z.string().min(1).optional(),
  USAGE_ANALYTICS_SAMPLE_RATE: z.coerce.number().int().positive().default(1),
  USAGE_ANALYTICS_FLUSH_MS: z.coerce.number().int().positive().default(10_000),
  FALLBACK_SWEEP_MS: z.coerce.number().int().positive().default(60_000),
});

export interface DatabaseConfig {
  url: string;
  poolSize: number;
  ssl: boolean;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  redis: {
    url: string | null;
    keyPrefix: string;
    commandTimeoutMs: number;
  };
  webhook: {
    secret: string;
    toleranceSeconds: number;
    maxRetries: number;
  };
  tiers: TierConfig;
  analytics: {
    sampleRate: number;
    flushIntervalMs: number;
  };
  fallbackSweepMs: number;
}

function parseEnv<S extends z.ZodTypeAny>(schema: S, env: NodeJS.ProcessEnv): z.infer<S> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

/**
 * Connection settings alone, read by the pool when it is created so that
 * importing the database client does not require the rest of the environment.
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const e = parseEnv(databaseEnvSchema, env);
  return { url: e.DATABASE_URL, poolSize: e.DB_POOL_SIZE, ssl: e.NODE_ENV === 'production' };
}

/** Validates the whole environment, connection settings included. */

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = parseEnv(envSchema, env);

  const priceRefs: Record<string, Tier> = {};
  if (e.PRICE_ID_PRO) priceRefs[e.PRICE_ID_PRO] = 'pro';
  if (e.PRICE_ID_ENTERPRISE) priceRefs[e.PRICE_ID_ENTERPRISE] = 'enterprise';

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    redis: {
      url: e.REDIS_URL ?? null,
      keyPrefix: e.REDIS_KEY_PREFIX,
      commandTimeoutMs: e.REDIS_COMMAND_TIMEOUT_MS,
    },
    webhook: {
      secret: e.BILLING_WEBHOOK_SECRET,
      toleranceSeconds: e.WEBHOOK_TOLERANCE_SECONDS,
      maxRetries: e.WEBHOOK_MAX_RETRIES,
    },
    tiers: loadTierConfig({ path: e.TIER_CONFIG_PATH, priceRefs }),
    analytics: {
      sampleRate: e.USAGE_ANALYTICS_SAMPLE_RATE,
      flushIntervalMs: e.USAGE_ANALYTICS_FLUSH_MS,
    },
    fallbackSweepMs: e.FALLBACK_SWEEP_MS,
  };
}
