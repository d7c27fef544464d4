/**
 * Billing period resolution. Pure: same snapshot and clock, same answer.
 */

import type { AccountSnapshot, BillingPeriod, SubscriptionStatus } from '@/types/billing';

/** Statuses whose subscription bounds and limits are honored. */
export const ENTITLED_STATUSES: ReadonlySet<SubscriptionStatus> = new Set([
  'active',
  'trialing',
  'past_due',
]);

export interface ResolvedPeriod extends BillingPeriod {
  source: 'subscription' | 'calendar_month';
  /** Entitled subscription whose bounds were missing, inverted or already ended */
  stale: boolean;
}

export function calendarMonth(now: Date): BillingPeriod {
  const year = now.getUTCFullYear();
  const month = now.getUTCMonth();
  return {
    start: new Date(Date.UTC(year, month, 1)),
    end: new Date(Date.UTC(year, month + 1, 1)),
  };
}

export function resolveBillingPeriod(
  snapshot: Pick<AccountSnapshot, 'subscription'>,
  now: Date
): ResolvedPeriod {
  const subscription = snapshot.subscription;

  if (!subscription || !ENTITLED_STATUSES.has(subscription.status)) {
    return { ...calendarMonth(now), source: 'calendar_month', stale: false };
  }

  const { currentPeriodStart: start, currentPeriodEnd: end } = subscription;
  if (start && end && end.getTime() > start.getTime() && end.getTime() > now.getTime()) {
    return { start, end, source: 'subscription', stale: false };
  }

  return { ...calendarMonth(now), source: 'calendar_month', stale: true };
}
