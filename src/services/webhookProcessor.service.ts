/**
 * Webhook Event Processor
 *
 * Authenticates provider webhooks, deduplicates them by event id, and applies
 * subscription state transitions. Every handler and its audit outcome commit
 * in one transaction, so a failed event leaves no partial state behind.
 */

import { z } from 'zod';
import { verifyWebhookSignature } from '@/utils/crypto';
import { logger } from '@/utils/logger';
import { StoreUnavailableError } from '@/errors/store';
import { AccountNotFoundError } from '@/errors/webhook';
import { limitsForTier, tierForPriceRef, type TierConfig } from '@/config/tiers';
import {
  accountStateFor,
  canTransition,
  fromProviderStatus,
} from './subscriptionLifecycle';
import type { Account, Subscription, SubscriptionStatus, Tier } from '@/types/billing';
import type { SubscriptionPatch, SubscriptionStore } from './subscriptionStore.service';
import type {
  BillingEventOutcome,
  BillingEventStore,
  BillingTransactionRunner,
  ClaimResult,
} from './billingEvents.service';

export const SUPPORTED_EVENT_TYPES = [
  'subscription.created',
  'subscription.updated',
  'subscription.canceled',
  'subscription.paused',
  'subscription.resumed',
  'subscription.activated',
  'subscription.past_due',
  'subscription.trialing',
  'subscription.trial_ended',
  'transaction.completed',
  'transaction.payment_failed',
  'customer.created',
  'customer.updated',
] as const;
export type SupportedEventType = (typeof SUPPORTED_EVENT_TYPES)[number];

const SUPPORTED = new Set<string>(SUPPORTED_EVENT_TYPES);

function isSupportedEventType(type: string): type is SupportedEventType {
  return SUPPORTED.has(type);
}

// Stale 'processing' claims older than this are assumed abandoned
const DEFAULT_STALE_CLAIM_MS = 5 * 60 * 1000;

const isoDate = z.string().datetime({ offset: true }).transform((value) => new Date(value));

const envelopeSchema = z.object({
  event_id: z.string().min(1),
  event_type: z.string().min(1),
  occurred_at: isoDate.optional(),
  data: z.record(z.unknown()),
});

const customDataSchema = z
  .object({ account_id: z.string().min(1).optional() })
  .passthrough()
  .nullable()
  .optional();

const subscriptionDataSchema = z.object({
  id: z.string().min(1),
  status: z.enum(['active', 'trialing', 'past_due', 'paused', 'canceled']),
  customer_id: z.string().min(1),
  items: z
    .array(z.object({ price: z.object({ id: z.string().min(1) }) }))
    .default([]),
  current_billing_period: z
    .object({ starts_at: isoDate, ends_at: isoDate })
    .nullable()
    .optional(),
  next_billed_at: isoDate.nullable().optional(),
  trial_dates: z
    .object({ starts_at: isoDate, ends_at: isoDate })
    .nullable()
    .optional(),
  canceled_at: isoDate.nullable().optional(),
  currency_code: z.string().length(3).optional(),
  custom_data: customDataSchema,
});
type SubscriptionData = z.infer<typeof subscriptionDataSchema>;

const transactionDataSchema = z.object({
  id: z.string().min(1),
  subscription_id: z.string().min(1).nullable().optional(),
  customer_id: z.string().min(1).nullable().optional(),
});

const customerDataSchema = z.object({
  id: z.string().min(1),
  email: z.string().optional(),
  custom_data: customDataSchema,
  management_urls: z
    .object({ customer_portal: z.string().url().nullable().optional() })
    .nullable()
    .optional(),
});

/** Target status implied by the event type, where the type alone decides it. */
const EVENT_STATUS: Partial<Record<SupportedEventType, SubscriptionStatus>> = {
  'subscription.canceled': 'cancelled',
  'subscription.paused': 'paused',
  'subscription.resumed': 'active',
  'subscription.activated': 'active',
  'subscription.past_due': 'past_due',
  'subscription.trialing': 'trialing',
};

export type WebhookOutcome =
  | { status: 'processed'; eventId: string; eventType: string }
  | { status: 'ignored'; eventId: string; eventType: string; reason: string }
  | { status: 'duplicate'; eventId: string; eventType: string }
  | { status: 'failed'; eventId: string; eventType: string; error: string; retryCount: number }
  | { status: 'exhausted'; eventId: string; eventType: string; retryCount: number }
  | { status: 'malformed'; error: string };

interface HandlerContext {
  store: SubscriptionStore;
  eventType: SupportedEventType;
  data: Record<string, unknown>;
  occurredAt: Date | null;
  now: Date;
}

interface HandlerResult {
  status: 'processed' | 'ignored';
  reason?: string;
  accountId: string | null;
  subscriptionId: string | null;
}

export interface WebhookProcessorOptions {
  secret: string;
  toleranceSeconds: number;
  maxRetries: number;
  tiers: TierConfig;
  transaction: BillingTransactionRunner;
  /** Claims events and records outcomes that fall outside a handler transaction. */
  events: BillingEventStore;
  staleClaimMs?: number;
}

export interface ReceiveInput {
  rawBody: Uint8Array;
  signatureHeader: string;
  timestampHeader: string;
  now?: Date;
}

export class WebhookProcessor {
  private readonly log = logger.child({ component: 'webhook-processor' });

  constructor(private readonly options: WebhookProcessorOptions) {}

  /**
   * Throws WebhookAuthenticationError for a bad signature (nothing recorded)
   * and StoreUnavailableError when the event could not be claimed.
   */
  async receive(input: ReceiveInput): Promise<WebhookOutcome> {
    const now = input.now ?? new Date();

    verifyWebhookSignature({
      secret: this.options.secret,
      rawBody: input.rawBody,
      signatureHeader: input.signatureHeader,
      timestampHeader: input.timestampHeader,
      toleranceSeconds: this.options.toleranceSeconds,
      now,
    });

    const rawPayload = new TextDecoder().decode(input.rawBody);
    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(rawPayload);
    } catch (err) {
      this.log.error('Webhook payload is not valid JSON', { error: String(err) });
      return { status: 'malformed', error: 'payload is not valid JSON' };
    }

    const envelope = envelopeSchema.safeParse(parsedJson);
    if (!envelope.success) {
      const error = envelope.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      this.log.error('Webhook envelope rejected', { error });
      return { status: 'malformed', error };
    }

    const { event_id: eventId, event_type: eventType, data } = envelope.data;
    const occurredAt = envelope.data.occurred_at ?? null;

    let claim: ClaimResult;
    try {
      claim = await this.options.events.claim(
        { eventId, eventType, rawPayload, occurredAt, receivedAt: now },
        {
          maxRetries: this.options.maxRetries,
          staleBefore: new Date(now.getTime() - (this.options.staleClaimMs ?? DEFAULT_STALE_CLAIM_MS)),
        }
      );
    } catch (err) {
      throw new StoreUnavailableError('billing_events', err);
    }

    if (claim.kind === 'duplicate') {
      this.log.debug('Duplicate webhook delivery', { eventId, eventType, status: claim.status });
      return { status: 'duplicate', eventId, eventType };
    }
    if (claim.kind === 'exhausted') {
      this.log.warn('Webhook retries exhausted', { eventId, eventType, retryCount: claim.retryCount });
      return { status: 'exhausted', eventId, eventType, retryCount: claim.retryCount };
    }

    if (!isSupportedEventType(eventType)) {
      this.log.info('Ignoring unsupported webhook event type', { eventId, eventType });
      await this.record(this.options.events, eventId, {
        status: 'ignored',
        error: 'unsupported event type',
        accountId: null,
        subscriptionId: null,
        processedAt: now,
      });
      return { status: 'ignored', eventId, eventType, reason: 'unsupported event type' };
    }

    let result: HandlerResult;
    try {
      result = await this.options.transaction(async ({ subscriptions, events }) => {
        const handled = await this.dispatch({ store: subscriptions, eventType, data, occurredAt, now });
        await this.record(events, eventId, {
          status: handled.status,
          error: handled.reason ?? null,
          accountId: handled.accountId,
          subscriptionId: handled.subscriptionId,
          processedAt: now,
        });
        return handled;
      });
    } catch (err) {
      return await this.fail(eventId, eventType, claim.retryCount, err, now);
    }

    if (result.status === 'ignored') {
      const reason = result.reason ?? 'no state change';
      this.log.info('Webhook event ignored', { eventId, eventType, reason });
      return { status: 'ignored', eventId, eventType, reason };
    }
    return { status: 'processed', eventId, eventType };
  }

  /**
   * Records the failure so a redelivery may re-claim the event. When the
   * handler itself succeeded but its outcome could not be written, the
   * transaction has rolled back and the store outage is rethrown instead.
   */
  private async fail(
    eventId: string,
    eventType: string,
    retryCount: number,
    err: unknown,
    now: Date
  ): Promise<WebhookOutcome> {
    const error = err instanceof Error ? err.message : String(err);
    this.log.error('Webhook event failed', { eventId, eventType, retryCount, error });

    await this.record(this.options.events, eventId, {
      status: 'failed',
      error,
      accountId: null,
      subscriptionId: null,
      processedAt: now,
    });

    if (err instanceof StoreUnavailableError) {
      throw err;
    }
    return { status: 'failed', eventId, eventType, error, retryCount };
  }

  private async record(events: BillingEventStore, eventId: string, outcome: BillingEventOutcome): Promise<void> {
    try {
      await events.complete(eventId, outcome);
    } catch (err) {
      throw new StoreUnavailableError('billing_events', err);
    }
  }

  private dispatch(ctx: HandlerContext): Promise<HandlerResult> {
    switch (ctx.eventType) {
      case 'subscription.created':
      case 'subscription.updated':
      case 'subscription.canceled':
      case 'subscription.paused':
      case 'subscription.resumed':
      case 'subscription.activated':
      case 'subscription.past_due':
      case 'subscription.trialing':
      case 'subscription.trial_ended':
        return this.handleSubscriptionEvent(ctx);
      case 'transaction.completed':
        return this.handleTransaction(ctx, 'completed');
      case 'transaction.payment_failed':
        return this.handleTransaction(ctx, 'payment_failed');
      case 'customer.created':
      case 'customer.updated':
        return this.handleCustomer(ctx);
    }
  }

  // =====================================================
  // SUBSCRIPTION EVENTS
  // =====================================================

  private async handleSubscriptionEvent(ctx: HandlerContext): Promise<HandlerResult> {
    const data = subscriptionDataSchema.parse(ctx.data);
    const target = EVENT_STATUS[ctx.eventType] ?? fromProviderStatus(data.status);

    const existing = await ctx.store.findSubscriptionByExternalRef(data.id);
    if (!existing) {
      return this.createSubscription(ctx, data, target);
    }

    const ignored = this.checkApplicable(ctx, existing, target);
    if (ignored) return ignored;

    const priceRef = data.items[0]?.price.id ?? null;
    const resolvedTier = priceRef ? tierForPriceRef(this.options.tiers, priceRef) : null;
    if (priceRef && !resolvedTier) {
      this.log.warn('Unmapped price reference, tier unchanged', { priceRef, subscriptionId: existing.id });
    }
    const tierChanged = resolvedTier !== null && resolvedTier !== existing.tier;

    const patch: SubscriptionPatch = {
      status: target,
      customerRef: data.customer_id,
      priceRef: priceRef ?? existing.priceRef,
      lastEventAt: latest(existing.lastEventAt, ctx.occurredAt),
    };

    if (resolvedTier && resolvedTier !== existing.tier) {
      patch.tier = resolvedTier;
      patch.limits = limitsForTier(this.options.tiers, resolvedTier);
      patch.dataRetentionDays = this.options.tiers.tiers[resolvedTier].dataRetentionDays;
    }
    // Period bounds are replaced wholesale whenever the payload carries them
    if (data.current_billing_period !== undefined) {
      patch.currentPeriodStart = data.current_billing_period?.starts_at ?? null;
      patch.currentPeriodEnd = data.current_billing_period?.ends_at ?? null;
    }
    if (data.next_billed_at !== undefined) {
      patch.nextBilledAt = data.next_billed_at;
    }
    if (ctx.eventType === 'subscription.trial_ended') {
      patch.trialStart = null;
      patch.trialEnd = null;
    } else if (data.trial_dates !== undefined) {
      patch.trialStart = data.trial_dates?.starts_at ?? null;
      patch.trialEnd = data.trial_dates?.ends_at ?? null;
    }
    if (data.currency_code) {
      patch.currency = data.currency_code;
    }
    if (target === 'cancelled' && existing.status !== 'cancelled') {
      patch.cancelledAt = data.canceled_at ?? ctx.occurredAt ?? ctx.now;
    }

    const updated = await ctx.store.updateSubscription(existing.id, patch);
    await ctx.store.updateAccount(updated.accountId, accountStateFor(updated));

    this.log.info('Subscription updated', {
      subscriptionId: updated.id,
      accountId: updated.accountId,
      from: existing.status,
      to: updated.status,
      tier: updated.tier,
      tierChanged,
    });

    return { status: 'processed', accountId: updated.accountId, subscriptionId: updated.id };
  }

  private async createSubscription(
    ctx: HandlerContext,
    data: SubscriptionData,
    status: SubscriptionStatus
  ): Promise<HandlerResult> {
    const account = await this.resolveAccount(ctx.store, data.custom_data?.account_id, data.customer_id);

    if (status === 'cancelled') {
      return {
        status: 'ignored',
        reason: 'cancelled subscription is not on record',
        accountId: account.id,
        subscriptionId: null,
      };
    }

    const open = await ctx.store.findOpenSubscription(account.id);
    if (open) {
      this.log.warn('Superseding open subscription with a new checkout', {
        accountId: account.id,
        previous: open.externalRef,
        next: data.id,
      });
      await ctx.store.updateSubscription(open.id, {
        status: 'cancelled',
        cancelledAt: ctx.occurredAt ?? ctx.now,
      });
    }

    const priceRef = data.items[0]?.price.id ?? null;
    let tier: Tier | null = priceRef ? tierForPriceRef(this.options.tiers, priceRef) : null;
    if (!tier) {
      this.log.warn('Unmapped price reference, keeping account tier', { priceRef, accountId: account.id });
      tier = account.tier;
    }

    const created = await ctx.store.insertSubscription({
      accountId: account.id,
      externalRef: data.id,
      customerRef: data.customer_id,
      priceRef,
      tier,
      status,
      currentPeriodStart: data.current_billing_period?.starts_at ?? null,
      currentPeriodEnd: data.current_billing_period?.ends_at ?? null,
      nextBilledAt: data.next_billed_at ?? null,
      trialStart: data.trial_dates?.starts_at ?? null,
      trialEnd: data.trial_dates?.ends_at ?? null,
      limits: limitsForTier(this.options.tiers, tier),
      dataRetentionDays: this.options.tiers.tiers[tier].dataRetentionDays,
      currency: data.currency_code ?? null,
      portalUrl: null,
      cancelledAt: null,
      lastEventAt: ctx.occurredAt,
    });

    await ctx.store.updateAccount(account.id, {
      ...accountStateFor(created),
      customerRef: account.customerRef ?? data.customer_id,
    });

    this.log.info('Subscription created', {
      subscriptionId: created.id,
      accountId: account.id,
      tier: created.tier,
      status: created.status,
    });

    return { status: 'processed', accountId: account.id, subscriptionId: created.id };
  }

  // =====================================================
  // TRANSACTION EVENTS
  // =====================================================

  private async handleTransaction(
    ctx: HandlerContext,
    kind: 'completed' | 'payment_failed'
  ): Promise<HandlerResult> {
    const data = transactionDataSchema.parse(ctx.data);

    let subscription: Subscription | null = null;
    if (data.subscription_id) {
      subscription = await ctx.store.findSubscriptionByExternalRef(data.subscription_id);
    } else if (data.customer_id) {
      const account = await ctx.store.findAccountByCustomerRef(data.customer_id);
      subscription = account ? await ctx.store.findOpenSubscription(account.id) : null;
    }

    if (!subscription) {
      return {
        status: 'ignored',
        reason: 'no subscription on record for transaction',
        accountId: null,
        subscriptionId: null,
      };
    }

    const target: SubscriptionStatus | null =
      kind === 'completed'
        ? subscription.status === 'past_due' ? 'active' : null
        : subscription.status === 'active' || subscription.status === 'trialing' ? 'past_due' : null;

    if (!target) {
      return {
        status: 'ignored',
        reason: `no transition for ${subscription.status} subscription`,
        accountId: subscription.accountId,
        subscriptionId: subscription.id,
      };
    }

    const ignored = this.checkApplicable(ctx, subscription, target);
    if (ignored) return ignored;

    const updated = await ctx.store.updateSubscription(subscription.id, {
      status: target,
      lastEventAt: latest(subscription.lastEventAt, ctx.occurredAt),
    });
    await ctx.store.updateAccount(updated.accountId, accountStateFor(updated));

    this.log.info('Subscription payment state changed', {
      subscriptionId: updated.id,
      accountId: updated.accountId,
      from: subscription.status,
      to: target,
    });

    return { status: 'processed', accountId: updated.accountId, subscriptionId: updated.id };
  }

  // =====================================================
  // CUSTOMER EVENTS
  // =====================================================

  private async handleCustomer(ctx: HandlerContext): Promise<HandlerResult> {
    const data = customerDataSchema.parse(ctx.data);
    const hint = data.custom_data?.account_id;

    const account = hint
      ? await this.resolveAccount(ctx.store, hint, data.id)
      : await ctx.store.findAccountByCustomerRef(data.id);

    if (!account) {
      return {
        status: 'ignored',
        reason: 'customer is not linked to an account',
        accountId: null,
        subscriptionId: null,
      };
    }

    if (account.customerRef !== data.id) {
      await ctx.store.updateAccount(account.id, { customerRef: data.id });
    }

    let subscriptionId: string | null = null;
    const portalUrl = data.management_urls?.customer_portal;
    if (portalUrl !== undefined) {
      const open = await ctx.store.findOpenSubscription(account.id);
      if (open) {
        await ctx.store.updateSubscription(open.id, { portalUrl });
        subscriptionId = open.id;
      }
    }

    return { status: 'processed', accountId: account.id, subscriptionId };
  }

  // =====================================================
  // HELPERS
  // =====================================================

  private async resolveAccount(
    store: SubscriptionStore,
    accountId: string | undefined,
    customerRef: string
  ): Promise<Account> {
    if (accountId) {
      const account = await store.findAccount(accountId);
      if (account) return account;
      throw new AccountNotFoundError(`account ${accountId}`);
    }
    const account = await store.findAccountByCustomerRef(customerRef);
    if (account) return account;
    throw new AccountNotFoundError(`customer ${customerRef}`);
  }

  /** Stale or illegal events are recorded as ignored instead of applied. */
  private checkApplicable(
    ctx: HandlerContext,
    subscription: Subscription,
    target: SubscriptionStatus
  ): HandlerResult | null {
    if (
      ctx.occurredAt &&
      subscription.lastEventAt &&
      ctx.occurredAt.getTime() < subscription.lastEventAt.getTime()
    ) {
      return {
        status: 'ignored',
        reason: 'stale event: older than the last applied event',
        accountId: subscription.accountId,
        subscriptionId: subscription.id,
      };
    }
    if (!canTransition(subscription.status, target)) {
      this.log.warn('Rejected subscription transition', {
        subscriptionId: subscription.id,
        from: subscription.status,
        to: target,
      });
      return {
        status: 'ignored',
        reason: `invalid transition ${subscription.status} -> ${target}`,
        accountId: subscription.accountId,
        subscriptionId: subscription.id,
      };
    }
    return null;
  }
}

function latest(current: Date | null, candidate: Date | null): Date | null {
  if (!candidate) return current;
  if (!current) return candidate;
  return candidate.getTime() > current.getTime() ? candidate : current;
}
