/**
 * Billing snapshot: the read-only projection behind GET /v1/billing/status.
 */

import { isUnlimited } from './usageLedger.service';
import type { AdmissionController } from './admission.service';
import type { SubscriptionStatus, Tier, UsageLimits, UsageType } from '@/types/billing';

export interface BillingSnapshot {
  accountId: string;
  tier: Tier;
  status: SubscriptionStatus;
  period: {
    start: string;
    end: string;
    source: 'subscription' | 'calendar_month';
    stale: boolean;
  };
  nextBilledAt: string | null;
  trial: { start: string | null; end: string | null } | null;
  limits: UsageLimits;
  usage: Record<UsageType, number>;
  /** Percent of limit consumed, two decimals; null when unlimited */
  usagePercentage: Record<UsageType, number | null>;
  dataRetentionDays: number;
  customerPortalUrl: string | null;
  cancelledAt: string | null;
  tierConfigVersion: number;
}

function percentage(used: number, limit: number): number | null {
  if (isUnlimited(limit)) return null;
  if (limit === 0) return used > 0 ? 100 : 0;
  return Math.round((used / limit) * 10_000) / 100;
}

export async function getBillingSnapshot(
  admission: AdmissionController,
  accountId: string,
  now: Date = new Date()
): Promise<BillingSnapshot> {
  const { snapshot, subscription, tier, limits, period } = await admission.entitlement(accountId, now);
  const usage = await admission.ledger.usageByType(accountId, period);
  const current = snapshot.subscription;

  return {
    accountId,
    tier,
    status: current?.status ?? snapshot.account.status,
    period: {
      start: period.start.toISOString(),
      end: period.end.toISOString(),
      source: period.source,
      stale: period.stale,
    },
    nextBilledAt: subscription?.nextBilledAt?.toISOString() ?? null,
    trial:
      current && (current.trialStart || current.trialEnd)
        ? {
            start: current.trialStart?.toISOString() ?? null,
            end: current.trialEnd?.toISOString() ?? null,
          }
        : null,
    limits,
    usage,
    usagePercentage: {
      api_calls: percentage(usage.api_calls, limits.api_calls),
      exports: percentage(usage.exports, limits.exports),
      sentiment_analysis: percentage(usage.sentiment_analysis, limits.sentiment_analysis),
    },
    dataRetentionDays: subscription?.dataRetentionDays ?? admission.tiers.tiers.free.dataRetentionDays,
    customerPortalUrl: current?.portalUrl ?? null,
    cancelledAt: current?.cancelledAt?.toISOString() ?? null,
    tierConfigVersion: admission.tiers.version,
  };
}
