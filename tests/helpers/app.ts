/**
 * Test App Helpers
 *
 * Builds the Hono app over in-memory stores so route tests never open a
 * database or Redis connection.
 */

import { createApp } from '@/app';
import { createAdmissionController, type AdmissionController } from '@/services/admission.service';
import { RedisCounterStore } from '@/services/counterStore';
import { WebhookProcessor } from '@/services/webhookProcessor.service';
import { ACCOUNT_HEADER } from '@/middleware/account';
import {
  FakeRedisScripts,
  InMemoryBillingEventStore,
  InMemorySubscriptionStore,
  InMemoryUsageStore,
  inMemoryBillingTransaction,
} from './stores';
import { TEST_TIERS, WEBHOOK_SECRET } from './fixtures';

export interface TestApp {
  app: ReturnType<typeof createApp>;
  admission: AdmissionController;
  processor: WebhookProcessor;
  subscriptions: InMemorySubscriptionStore;
  usage: InMemoryUsageStore;
  events: InMemoryBillingEventStore;
  redis: FakeRedisScripts;
}

export function createTestApp(): TestApp {
  const subscriptions = new InMemorySubscriptionStore();
  const usage = new InMemoryUsageStore();
  const events = new InMemoryBillingEventStore();
  const redis = new FakeRedisScripts();

  const admission = createAdmissionController({
    subscriptions,
    usageStore: usage,
    counterStore: new RedisCounterStore(redis),
    tiers: TEST_TIERS,
  });
  const processor = new WebhookProcessor({
    secret: WEBHOOK_SECRET,
    toleranceSeconds: 300,
    maxRetries: 5,
    tiers: TEST_TIERS,
    transaction: inMemoryBillingTransaction(subscriptions, events),
    events,
  });

  return {
    app: createApp({ admission, webhooks: processor }),
    admission,
    processor,
    subscriptions,
    usage,
    events,
    redis,
  };
}

/**
 * Headers the upstream gateway would forward for an authenticated account
 */
export function accountHeaders(accountId: string): Headers {
  const headers = new Headers();
  headers.set(ACCOUNT_HEADER, accountId);
  headers.set('content-type', 'application/json');
  return headers;
}
