import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AdmissionController,
  createAdmissionController,
  type AdmissionRequest,
} from '@/services/admission.service';
import { RedisCounterStore } from '@/services/counterStore';
import { UsageAnalytics } from '@/services/usageAnalytics.service';
import { WebhookProcessor } from '@/services/webhookProcessor.service';
import { calendarMonth } from '@/services/billingPeriod';
import { StoreUnavailableError } from '@/errors/store';
import { AccountNotFoundError } from '@/errors/webhook';
import { logger } from '@/utils/logger';
import {
  FakeRedisScripts,
  InMemoryBillingEventStore,
  inMemoryBillingTransaction,
  InMemoryRollupWriter,
  InMemorySubscriptionStore,
  InMemoryUsageStore,
} from '../../helpers/stores';
import {
  TEST_TIERS,
  WEBHOOK_SECRET,
  signWebhook,
  subscriptionEvent,
  subscriptionInput,
} from '../../helpers/fixtures';
import type { Account } from '@/types/billing';

const NOW = new Date('2026-03-20T12:00:00Z');
const MARCH = calendarMonth(NOW);
const SUBSCRIPTION_PERIOD = {
  start: new Date('2026-03-10T00:00:00Z'),
  end: new Date('2026-04-10T00:00:00Z'),
};

function at(offsetMs: number): Date {
  return new Date(NOW.getTime() + offsetMs);
}

describe('AdmissionController', () => {
  let subs: InMemorySubscriptionStore;
  let usage: InMemoryUsageStore;
  let redis: FakeRedisScripts;
  let rollups: InMemoryRollupWriter;
  let analytics: UsageAnalytics;
  let controller: AdmissionController;
  let account: Account;

  function request(overrides: Partial<AdmissionRequest> = {}): AdmissionRequest {
    return {
      accountId: account.id,
      endpointClass: 'query',
      usageType: 'api_calls',
      now: NOW,
      ...overrides,
    };
  }

  beforeEach(() => {
    subs = new InMemorySubscriptionStore();
    usage = new InMemoryUsageStore();
    redis = new FakeRedisScripts();
    rollups = new InMemoryRollupWriter();
    analytics = new UsageAnalytics({ writer: rollups, sampleRate: 1 });
    controller = createAdmissionController({
      subscriptions: subs,
      usageStore: usage,
      counterStore: new RedisCounterStore(redis),
      tiers: TEST_TIERS,
      analytics,
    });
    account = subs.addAccount();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('burst limit', () => {
    it('denies the 21st dashboard request inside five minutes on the free tier', async () => {
      for (let i = 0; i < 20; i++) {
        const decision = await controller.evaluate(request({ endpointClass: 'dashboard', now: at(i * 1000) }));
        expect(decision.permitted).toBe(true);
      }

      const denied = await controller.evaluate(request({ endpointClass: 'dashboard', now: at(20_000) }));

      expect(denied.permitted).toBe(false);
      expect(denied.reason).toBe('BURST_LIMIT');
      expect(denied.burst).toMatchObject({ currentCount: 20, limit: 20, retryAfterMs: 280_000, source: 'shared' });
      expect(denied.monthly.used).toBe(20);
      expect(denied.headers).toEqual({
        'X-RateLimit-Type': 'burst',
        'X-RateLimit-Window': '5_minutes',
        'X-RateLimit-Current': '20',
        'X-RateLimit-Limit': '20',
        'Retry-After': '280',
        'X-User-Tier': 'free',
      });
    });

    it('does not record usage for a burst denial', async () => {
      for (let i = 0; i < 21; i++) {
        await controller.evaluate(request({ endpointClass: 'dashboard', now: at(i * 1000) }));
      }

      expect(usage.rows).toHaveLength(20);
    });

    it('admits again once the oldest request leaves the window', async () => {
      for (let i = 0; i < 20; i++) {
        await controller.evaluate(request({ endpointClass: 'dashboard', now: at(i * 1000) }));
      }

      const decision = await controller.evaluate(request({ endpointClass: 'dashboard', now: at(300_000) }));

      expect(decision.permitted).toBe(true);
      expect(decision.burst?.currentCount).toBe(20);
    });

    it('fails open to the in-process window when the counter store errors', async () => {
      redis.failWith = new Error('connect ECONNREFUSED 127.0.0.1:6379');

      const decision = await controller.evaluate(request());

      expect(decision.permitted).toBe(true);
      expect(decision.burst?.source).toBe('fallback');
      expect(usage.rows).toHaveLength(1);
    });
  });

  describe('monthly quota', () => {
    it('admits the 100th call and denies the 101st with quota headers', async () => {
      usage.seed({ accountId: account.id, usageType: 'api_calls', period: MARCH }, 99);
      const reset = String(Date.UTC(2026, 3, 1) / 1000);

      const last = await controller.evaluate(request());
      expect(last.permitted).toBe(true);
      expect(last.monthly).toMatchObject({ used: 100, limit: 100, remaining: 0, periodSource: 'calendar_month' });
      expect(last.headers).toEqual({
        'X-RateLimit-Limit': '100',
        'X-RateLimit-Remaining': '0',
        'X-RateLimit-Reset': reset,
        'X-User-Tier': 'free',
      });

      const denied = await controller.evaluate(request());
      expect(denied.permitted).toBe(false);
      expect(denied.reason).toBe('MONTHLY_LIMIT');
      expect(denied.burst).toBeNull();
      expect(denied.monthly.resetAt).toEqual(new Date('2026-04-01T00:00:00Z'));
      expect(denied.headers).toEqual({
        'X-RateLimit-Limit': '100',
        'X-RateLimit-Remaining': '0',
        'X-RateLimit-Reset': reset,
        'X-User-Tier': 'free',
      });
      expect(usage.rows).toHaveLength(100);
    });

    it('reports the monthly limit when both windows are exhausted', async () => {
      for (let i = 0; i < 5; i++) {
        const decision = await controller.evaluate(
          request({ endpointClass: 'export', usageType: 'exports', now: at(i * 1000) })
        );
        expect(decision.permitted).toBe(true);
      }
      const callsBefore = redis.calls;

      const denied = await controller.evaluate(
        request({ endpointClass: 'export', usageType: 'exports', now: at(5000) })
      );

      expect(denied.reason).toBe('MONTHLY_LIMIT');
      expect(redis.calls).toBe(callsBefore);
    });

    it('never lets concurrent requests exceed the limit', async () => {
      usage.seed({ accountId: account.id, usageType: 'exports', period: MARCH }, 2);

      const decisions = await Promise.all(
        Array.from({ length: 10 }, () =>
          controller.evaluate(request({ endpointClass: 'collect', usageType: 'exports' }))
        )
      );

      expect(decisions.filter((d) => d.permitted)).toHaveLength(3);
      expect(decisions.filter((d) => d.reason === 'MONTHLY_LIMIT')).toHaveLength(7);
      expect(usage.rows).toHaveLength(5);
    });

    it('denies a cost that does not fit in the remaining quota', async () => {
      usage.seed({ accountId: account.id, usageType: 'exports', period: MARCH }, 3);

      const decision = await controller.evaluate(
        request({ endpointClass: 'export', usageType: 'exports', cost: 3 })
      );

      expect(decision).toMatchObject({ permitted: false, reason: 'MONTHLY_LIMIT' });
      expect(decision.monthly).toMatchObject({ used: 3, remaining: 2 });
    });

    it('rejects a non-positive cost', async () => {
      await expect(controller.evaluate(request({ cost: 0 }))).rejects.toBeInstanceOf(RangeError);
    });

    it('fails closed when the ledger is unreachable', async () => {
      usage.failing = true;

      await expect(controller.evaluate(request())).rejects.toBeInstanceOf(StoreUnavailableError);
      expect(redis.calls).toBe(0);
    });
  });

  describe('entitlement', () => {
    it('uses the subscription period and limits snapshot', async () => {
      subs.addSubscription(subscriptionInput(account.id, 'pro'));
      usage.seed({ accountId: account.id, usageType: 'api_calls', period: SUBSCRIPTION_PERIOD }, 150);

      const decision = await controller.evaluate(request());

      expect(decision.tier).toBe('pro');
      expect(decision.monthly).toMatchObject({
        used: 151,
        limit: 10_000,
        remaining: 9_849,
        resetAt: SUBSCRIPTION_PERIOD.end,
        periodSource: 'subscription',
        periodStale: false,
      });
    });

    it('keeps paid limits while past due', async () => {
      subs.addSubscription(subscriptionInput(account.id, 'pro', { status: 'past_due' }));

      const decision = await controller.evaluate(request());

      expect(decision.tier).toBe('pro');
      expect(decision.monthly.limit).toBe(10_000);
    });

    it('falls back to free limits and the calendar month while paused', async () => {
      subs.addSubscription(subscriptionInput(account.id, 'pro', { status: 'paused' }));

      const decision = await controller.evaluate(request());

      expect(decision.tier).toBe('free');
      expect(decision.monthly).toMatchObject({
        limit: 100,
        resetAt: MARCH.end,
        periodSource: 'calendar_month',
        periodStale: false,
      });
    });

    it('uses the calendar month and warns when the period has lapsed', async () => {
      const warn = vi.spyOn(logger, 'warn');
      subs.addSubscription(
        subscriptionInput(account.id, 'pro', {
          currentPeriodStart: new Date('2026-02-10T00:00:00Z'),
          currentPeriodEnd: new Date('2026-03-10T00:00:00Z'),
        })
      );

      const decision = await controller.evaluate(request());

      expect(decision.tier).toBe('pro');
      expect(decision.monthly).toMatchObject({ periodSource: 'calendar_month', periodStale: true, resetAt: MARCH.end });
      expect(warn).toHaveBeenCalledWith(
        'Subscription period bounds unusable, using calendar month',
        expect.objectContaining({ accountId: account.id, periodEnd: '2026-03-10T00:00:00.000Z' })
      );
    });

    it('applies a mid-period upgrade on the next request without resetting usage', async () => {
      subs.addSubscription(
        subscriptionInput(account.id, 'pro', { externalRef: 'sub_001', customerRef: 'ctm_001' })
      );
      usage.seed({ accountId: account.id, usageType: 'api_calls', period: SUBSCRIPTION_PERIOD }, 150);
      await controller.evaluate(request());

      const events = new InMemoryBillingEventStore();
      const processor = new WebhookProcessor({
        secret: WEBHOOK_SECRET,
        toleranceSeconds: 300,
        maxRetries: 5,
        tiers: TEST_TIERS,
        transaction: inMemoryBillingTransaction(subs, events),
        events,
      });
      const outcome = await processor.receive({
        ...signWebhook(
          subscriptionEvent({
            eventId: 'evt_upgrade',
            eventType: 'subscription.updated',
            occurredAt: '2026-03-20T11:59:00Z',
            subscriptionId: 'sub_001',
            customerId: 'ctm_001',
            priceId: 'pri_enterprise',
          }),
          NOW
        ),
        now: NOW,
      });
      expect(outcome.status).toBe('processed');

      const decision = await controller.evaluate(request({ now: at(1000) }));

      expect(decision.tier).toBe('enterprise');
      expect(decision.monthly).toMatchObject({ used: 152, limit: -1, remaining: null });
      expect(decision.headers).toMatchObject({
        'X-RateLimit-Limit': 'unlimited',
        'X-RateLimit-Remaining': 'unlimited',
        'X-User-Tier': 'enterprise',
      });
    });

    it('rejects unknown accounts', async () => {
      await expect(
        controller.evaluate(request({ accountId: '22222222-2222-2222-2222-222222222222' }))
      ).rejects.toBeInstanceOf(AccountNotFoundError);
    });

    it('fails closed when subscriptions cannot be read', async () => {
      subs.failReads = true;

      await expect(controller.evaluate(request())).rejects.toMatchObject({
        name: 'StoreUnavailableError',
        store: 'subscriptions',
      });
    });
  });

  describe('analytics', () => {
    it('tracks admitted requests only', async () => {
      usage.seed({ accountId: account.id, usageType: 'api_calls', period: MARCH }, 99);

      await controller.evaluate(request());
      await controller.evaluate(request());
      await analytics.flush();

      expect([...rollups.rows.values()]).toEqual([
        { accountId: account.id, usageType: 'api_calls', periodDate: '2026-03-20', count: 1 },
      ]);
    });
  });
});
