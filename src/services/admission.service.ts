/**
 * Admission Control
 *
 * One allow/deny decision per request:
 *   snapshot → billing period → monthly pre-check → burst → atomic record
 *
 * The monthly check runs before the burst check so an exhausted quota is
 * reported as such even while the burst window is also full. A request that
 * loses the race between pre-check and record is denied as MONTHLY_LIMIT.
 */

import { burstLimitFor, limitsForTier, type TierConfig } from '@/config/tiers';
import { AccountNotFoundError } from '@/errors/webhook';
import { StoreUnavailableError } from '@/errors/store';
import { logger } from '@/utils/logger';
import { resolveBillingPeriod, type ResolvedPeriod } from './billingPeriod';
import { BurstLimiter, type BurstDecision } from './burstLimiter.service';
import { MemorySlidingWindow, type CounterStore } from './counterStore';
import { isEntitled } from './subscriptionLifecycle';
import { UsageLedger, isUnlimited, type UsageStore } from './usageLedger.service';
import type { UsageAnalytics } from './usageAnalytics.service';
import type { SubscriptionStore } from './subscriptionStore.service';
import type {
  AccountSnapshot,
  Subscription,
  Tier,
  UsageLimits,
  UsageType,
} from '@/types/billing';

export type DenialReason = 'MONTHLY_LIMIT' | 'BURST_LIMIT';

export interface AdmissionRequest {
  accountId: string;
  endpointClass: string;
  usageType: UsageType;
  cost?: number;
  now?: Date;
}

export interface MonthlyUsage {
  used: number;
  limit: number;
  /** null when unlimited */
  remaining: number | null;
  resetAt: Date;
  periodSource: ResolvedPeriod['source'];
  periodStale: boolean;
}

export interface AdmissionDecision {
  permitted: boolean;
  reason: DenialReason | null;
  accountId: string;
  tier: Tier;
  endpointClass: string;
  usageType: UsageType;
  monthly: MonthlyUsage;
  burst: BurstDecision | null;
  headers: Record<string, string>;
}

/** What an account is entitled to right now. */
export interface Entitlement {
  snapshot: AccountSnapshot;
  /** Subscription whose limits apply; null means free tier */
  subscription: Subscription | null;
  tier: Tier;
  limits: UsageLimits;
  period: ResolvedPeriod;
}

export function resolveEntitlement(snapshot: AccountSnapshot, tiers: TierConfig, now: Date): Entitlement {
  const subscription =
    snapshot.subscription && isEntitled(snapshot.subscription.status) ? snapshot.subscription : null;

  return {
    snapshot,
    subscription,
    tier: subscription ? subscription.tier : 'free',
    limits: subscription ? subscription.limits : limitsForTier(tiers, 'free'),
    period: resolveBillingPeriod(snapshot, now),
  };
}

function resetSeconds(period: ResolvedPeriod): string {
  return String(Math.floor(period.end.getTime() / 1000));
}

function monthlyHeaders(tier: Tier, monthly: MonthlyUsage, period: ResolvedPeriod): Record<string, string> {
  return {
    'X-RateLimit-Limit': isUnlimited(monthly.limit) ? 'unlimited' : String(monthly.limit),
    'X-RateLimit-Remaining': monthly.remaining === null ? 'unlimited' : String(monthly.remaining),
    'X-RateLimit-Reset': resetSeconds(period),
    'X-User-Tier': tier,
  };
}

function burstHeaders(tier: Tier, burst: BurstDecision): Record<string, string> {
  return {
    'X-RateLimit-Type': 'burst',
    'X-RateLimit-Window': '5_minutes',
    'X-RateLimit-Current': String(burst.currentCount),
    'X-RateLimit-Limit': String(burst.limit),
    'Retry-After': String(Math.max(1, Math.ceil(burst.retryAfterMs / 1000))),
    'X-User-Tier': tier,
  };
}

export interface AdmissionControllerOptions {
  subscriptions: SubscriptionStore;
  ledger: UsageLedger;
  burst: BurstLimiter;
  tiers: TierConfig;
  analytics?: UsageAnalytics | null;
}

export class AdmissionController {
  private readonly log = logger.child({ component: 'admission' });

  constructor(private readonly options: AdmissionControllerOptions) {}

  get tiers(): TierConfig {
    return this.options.tiers;
  }

  get ledger(): UsageLedger {
    return this.options.ledger;
  }

  async entitlement(accountId: string, now: Date): Promise<Entitlement> {
    let snapshot: AccountSnapshot | null;
    try {
      snapshot = await this.options.subscriptions.getSnapshot(accountId);
    } catch (err) {
      throw new StoreUnavailableError('subscriptions', err);
    }
    if (!snapshot) {
      throw new AccountNotFoundError(`account ${accountId}`);
    }

    const entitlement = resolveEntitlement(snapshot, this.options.tiers, now);
    if (entitlement.period.stale) {
      this.log.warn('Subscription period bounds unusable, using calendar month', {
        accountId,
        subscriptionId: snapshot.subscription?.id,
        periodStart: snapshot.subscription?.currentPeriodStart?.toISOString() ?? null,
        periodEnd: snapshot.subscription?.currentPeriodEnd?.toISOString() ?? null,
      });
    }
    return entitlement;
  }

  async evaluate(request: AdmissionRequest): Promise<AdmissionDecision> {
    const now = request.now ?? new Date();
    const cost = request.cost ?? 1;
    const { accountId, endpointClass, usageType } = request;

    const { subscription, tier, limits, period } = await this.entitlement(accountId, now);
    const limit = limits[usageType];
    const query = { accountId, usageType, period };

    const base = { accountId, tier, endpointClass, usageType };
    const monthlyOf = (used: number): MonthlyUsage => ({
      used,
      limit,
      remaining: isUnlimited(limit) ? null : Math.max(0, limit - used),
      resetAt: period.end,
      periodSource: period.source,
      periodStale: period.stale,
    });

    const precheck = await this.options.ledger.check(query, limit, cost);
    if (!precheck.permitted) {
      const monthly = monthlyOf(precheck.used);
      return {
        ...base,
        permitted: false,
        reason: 'MONTHLY_LIMIT',
        monthly,
        burst: null,
        headers: monthlyHeaders(tier, monthly, period),
      };
    }

    const burst = await this.options.burst.allow(accountId, endpointClass, now);
    if (!burst.permitted) {
      return {
        ...base,
        permitted: false,
        reason: 'BURST_LIMIT',
        monthly: monthlyOf(precheck.used),
        burst,
        headers: burstHeaders(tier, burst),
      };
    }

    const recorded = await this.options.ledger.checkAndRecord({
      ...query,
      subscriptionId: subscription?.id ?? null,
      endpointClass,
      cost,
      limit,
    });
    const monthly = monthlyOf(recorded.used);

    if (!recorded.permitted) {
      return {
        ...base,
        permitted: false,
        reason: 'MONTHLY_LIMIT',
        monthly,
        burst,
        headers: monthlyHeaders(tier, monthly, period),
      };
    }

    this.options.analytics?.track(accountId, usageType, cost, now);

    return {
      ...base,
      permitted: true,
      reason: null,
      monthly,
      burst,
      headers: monthlyHeaders(tier, monthly, period),
    };
  }

  sweepFallback(now: Date = new Date()): number {
    return this.options.burst.sweepFallback(now);
  }
}

export interface AdmissionDependencies {
  subscriptions: SubscriptionStore;
  usageStore: UsageStore;
  counterStore: CounterStore | null;
  tiers: TierConfig;
  analytics?: UsageAnalytics | null;
}

/**
 * Wires the controller with its own in-process burst fallback.
 */
export function createAdmissionController(deps: AdmissionDependencies): AdmissionController {
  const burst = new BurstLimiter({
    store: deps.counterStore,
    fallback: new MemorySlidingWindow(),
    limitFor: (endpointClass) => burstLimitFor(deps.tiers, endpointClass),
  });

  return new AdmissionController({
    subscriptions: deps.subscriptions,
    ledger: new UsageLedger(deps.usageStore),
    burst,
    tiers: deps.tiers,
    analytics: deps.analytics,
  });
}
