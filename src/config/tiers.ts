/**
 * Tier Configuration
 *
 * Versioned per-tier monthly limits, provider price → tier mapping and
 * per-endpoint-class burst limits. Defaults live here; an optional JSON file
 * (TIER_CONFIG_PATH) replaces them wholesale after validation.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { TIERS, UNLIMITED, type Tier, type UsageLimits } from '@/types/billing';

/** Rolling window for burst limiting. Not configurable. */
export const BURST_WINDOW_MS = 5 * 60 * 1000;

export interface TierDefinition {
  displayName: string;
  limits: UsageLimits;
  dataRetentionDays: number;
}

export interface TierConfig {
  version: number;
  tiers: Record<Tier, TierDefinition>;
  /** Provider price reference → tier */
  priceRefs: Record<string, Tier>;
  burst: {
    defaultLimit: number;
    endpointClasses: Record<string, number>;
  };
}

const limitValue = z.number().int().min(UNLIMITED);

const tierDefinitionSchema = z.object({
  displayName: z.string().min(1),
  limits: z.object({
    api_calls: limitValue,
    exports: limitValue,
    sentiment_analysis: limitValue,
  }),
  dataRetentionDays: z.number().int().positive(),
});

export const tierConfigSchema = z.object({
  version: z.number().int().positive(),
  tiers: z.object({
    free: tierDefinitionSchema,
    pro: tierDefinitionSchema,
    enterprise: tierDefinitionSchema,
  }),
  priceRefs: z.record(z.enum(TIERS)).default({}),
  burst: z.object({
    defaultLimit: z.number().int().positive(),
    endpointClasses: z.record(z.number().int().positive()),
  }),
});

export const DEFAULT_TIER_CONFIG: TierConfig = {
  version: 1,
  tiers: {
    free: {
      displayName: 'Free',
      limits: { api_calls: 100, exports: 5, sentiment_analysis: 50 },
      dataRetentionDays: 30,
    },
    pro: {
      displayName: 'Pro',
      limits: { api_calls: 10_000, exports: 100, sentiment_analysis: 1_000 },
      dataRetentionDays: 90,
    },
    enterprise: {
      displayName: 'Enterprise',
      limits: { api_calls: UNLIMITED, exports: UNLIMITED, sentiment_analysis: UNLIMITED },
      dataRetentionDays: 365,
    },
  },
  priceRefs: {},
  burst: {
    defaultLimit: 60,
    endpointClasses: {
      dashboard: 20,
      query: 60,
      collect: 30,
      export: 5,
      sentiment: 20,
    },
  },
};

export interface LoadTierConfigOptions {
  path?: string;
  /** Extra price refs (from env) merged over whatever the file declares */
  priceRefs?: Record<string, Tier>;
}

export function loadTierConfig(options: LoadTierConfigOptions = {}): TierConfig {
  let base: TierConfig = DEFAULT_TIER_CONFIG;

  if (options.path) {
    const raw: unknown = JSON.parse(readFileSync(options.path, 'utf8'));
    const parsed = tierConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid tier config at ${options.path}: ${issues}`);
    }
    base = parsed.data;
  }

  return {
    ...base,
    priceRefs: { ...base.priceRefs, ...options.priceRefs },
  };
}

/**
 * Copy of a tier's limits, suitable for storing as a subscription snapshot.
 */
export function limitsForTier(config: TierConfig, tier: Tier): UsageLimits {
  return { ...config.tiers[tier].limits };
}

export function tierForPriceRef(config: TierConfig, priceRef: string): Tier | null {
  return config.priceRefs[priceRef] ?? null;
}

export function burstLimitFor(config: TierConfig, endpointClass: string): number {
  return config.burst.endpointClasses[endpointClass] ?? config.burst.defaultLimit;
}
