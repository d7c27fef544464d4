/**
 * Billing domain types shared by the admission services, stores and routes.
 */

export const TIERS = ['free', 'pro', 'enterprise'] as const;
export type Tier = (typeof TIERS)[number];

export const SUBSCRIPTION_STATUSES = [
  'inactive',
  'trialing',
  'active',
  'past_due',
  'paused',
  'cancelled',
] as const;
export type SubscriptionStatus = (typeof SUBSCRIPTION_STATUSES)[number];

export const USAGE_TYPES = ['api_calls', 'exports', 'sentiment_analysis'] as const;
export type UsageType = (typeof USAGE_TYPES)[number];

/** Limit value meaning "no cap". */
export const UNLIMITED = -1;

export type UsageLimits = Record<UsageType, number>;

export interface BillingPeriod {
  start: Date;
  end: Date;
}

export interface Account {
  id: string;
  tier: Tier;
  status: SubscriptionStatus;
  customerRef: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Subscription {
  id: string;
  accountId: string;
  externalRef: string;
  customerRef: string | null;
  priceRef: string | null;
  tier: Tier;
  status: SubscriptionStatus;
  currentPeriodStart: Date | null;
  currentPeriodEnd: Date | null;
  nextBilledAt: Date | null;
  trialStart: Date | null;
  trialEnd: Date | null;
  // Snapshot taken when the tier was assigned; later edits to tier config do not apply
  limits: UsageLimits;
  dataRetentionDays: number;
  currency: string | null;
  portalUrl: string | null;
  cancelledAt: Date | null;
  lastEventAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface AccountSnapshot {
  account: Account;
  /** Most recent subscription that is not cancelled, if any. */
  subscription: Subscription | null;
}
