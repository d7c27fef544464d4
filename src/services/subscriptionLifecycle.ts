/**
 * Subscription state machine.
 *
 *   inactive → trialing → active → { past_due, paused } → cancelled
 *
 * past_due returns to active on a successful payment, paused on resume.
 * Any non-terminal state may be cancelled; cancelled is terminal (a new
 * checkout creates a new subscription instead).
 */

import { ENTITLED_STATUSES } from './billingPeriod';
import type { Subscription, SubscriptionStatus, Tier } from '@/types/billing';

const TRANSITIONS: Record<SubscriptionStatus, readonly SubscriptionStatus[]> = {
  inactive: ['trialing', 'active', 'past_due', 'paused', 'cancelled'],
  trialing: ['active', 'past_due', 'paused', 'cancelled'],
  active: ['past_due', 'paused', 'cancelled'],
  past_due: ['active', 'paused', 'cancelled'],
  paused: ['active', 'cancelled'],
  cancelled: [],
};

export function canTransition(from: SubscriptionStatus, to: SubscriptionStatus): boolean {
  return from === to || TRANSITIONS[from].includes(to);
}

export type ProviderStatus = 'active' | 'trialing' | 'past_due' | 'paused' | 'canceled';

export function fromProviderStatus(status: ProviderStatus): SubscriptionStatus {
  return status === 'canceled' ? 'cancelled' : status;
}

export function isEntitled(status: SubscriptionStatus): boolean {
  return ENTITLED_STATUSES.has(status);
}

/**
 * Account-level tier/status implied by a subscription. Non-entitled
 * subscriptions (paused, cancelled) leave the account on the free tier.
 */
export function accountStateFor(
  subscription: Pick<Subscription, 'tier' | 'status'>
): { tier: Tier; status: SubscriptionStatus } {
  return {
    tier: isEntitled(subscription.status) ? subscription.tier : 'free',
    status: subscription.status,
  };
}
