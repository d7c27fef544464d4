/**
 * Shared test data builders
 */

import { DEFAULT_TIER_CONFIG, limitsForTier, type TierConfig } from '@/config/tiers';
import { computeWebhookSignature } from '@/utils/crypto';
import type { NewSubscription } from '@/services/subscriptionStore.service';
import type { Tier } from '@/types/billing';

export const WEBHOOK_SECRET = 'test-secret';

export const TEST_TIERS: TierConfig = {
  ...DEFAULT_TIER_CONFIG,
  priceRefs: {
    pri_pro: 'pro',
    pri_enterprise: 'enterprise',
  },
};

export function subscriptionInput(
  accountId: string,
  tier: Tier,
  overrides: Partial<NewSubscription> = {}
): NewSubscription {
  return {
    accountId,
    externalRef: `sub_${accountId.slice(0, 8)}`,
    customerRef: `ctm_${accountId.slice(0, 8)}`,
    priceRef: tier === 'free' ? null : `pri_${tier}`,
    tier,
    status: 'active',
    currentPeriodStart: new Date('2026-03-10T00:00:00Z'),
    currentPeriodEnd: new Date('2026-04-10T00:00:00Z'),
    nextBilledAt: new Date('2026-04-10T00:00:00Z'),
    trialStart: null,
    trialEnd: null,
    limits: limitsForTier(TEST_TIERS, tier),
    dataRetentionDays: TEST_TIERS.tiers[tier].dataRetentionDays,
    currency: 'USD',
    portalUrl: null,
    cancelledAt: null,
    lastEventAt: null,
    ...overrides,
  };
}

export interface SignedWebhook {
  rawBody: Uint8Array;
  signatureHeader: string;
  timestampHeader: string;
}

export function signWebhook(
  payload: unknown,
  now: Date,
  secret: string = WEBHOOK_SECRET
): SignedWebhook {
  const body = typeof payload === 'string' ? payload : JSON.stringify(payload);
  const rawBody = new TextEncoder().encode(body);
  const timestamp = String(Math.floor(now.getTime() / 1000));
  const h1 = computeWebhookSignature(secret, timestamp, rawBody);
  return {
    rawBody,
    signatureHeader: `ts=${timestamp};h1=${h1}`,
    timestampHeader: timestamp,
  };
}

export interface SubscriptionEventOptions {
  eventId: string;
  eventType: string;
  occurredAt: string;
  subscriptionId: string;
  customerId: string;
  status?: 'active' | 'trialing' | 'past_due' | 'paused' | 'canceled';
  priceId?: string;
  accountId?: string;
  periodStart?: string;
  periodEnd?: string;
}

export function subscriptionEvent(options: SubscriptionEventOptions) {
  return {
    event_id: options.eventId,
    event_type: options.eventType,
    occurred_at: options.occurredAt,
    data: {
      id: options.subscriptionId,
      status: options.status ?? 'active',
      customer_id: options.customerId,
      items: options.priceId ? [{ price: { id: options.priceId } }] : [],
      current_billing_period: {
        starts_at: options.periodStart ?? '2026-03-10T00:00:00Z',
        ends_at: options.periodEnd ?? '2026-04-10T00:00:00Z',
      },
      next_billed_at: options.periodEnd ?? '2026-04-10T00:00:00Z',
      currency_code: 'USD',
      custom_data: options.accountId ? { account_id: options.accountId } : null,
    },
  };
}
