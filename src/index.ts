/**
 * API Server
 *
 * Hono server for:
 * - Admission decisions (/v1/admission/*)
 * - Billing snapshot (/v1/billing/*)
 * - Billing provider webhooks (/webhooks/*)
 */

import { serve } from '@hono/node-server';
import { loadConfig } from '@/config';
import { createApp } from '@/app';
import { closeDatabase } from '@/db/client';
import { closeRedis, createRedisClient, redisScriptRunner } from '@/db/redis';
import { createAdmissionController } from '@/services/admission.service';
import { PostgresBillingEventStore, postgresBillingTransaction } from '@/services/billingEvents.service';
import { RedisCounterStore } from '@/services/counterStore';
import { PostgresSubscriptionStore } from '@/services/subscriptionStore.service';
import { PostgresRollupWriter, UsageAnalytics } from '@/services/usageAnalytics.service';
import { PostgresUsageStore } from '@/services/usageLedger.service';
import { WebhookProcessor } from '@/services/webhookProcessor.service';
import { logger } from '@/utils/logger';

const config = loadConfig();

const redis = config.redis.url
  ? createRedisClient({
      url: config.redis.url,
      keyPrefix: config.redis.keyPrefix,
      commandTimeoutMs: config.redis.commandTimeoutMs,
    })
  : null;

if (!redis) {
  logger.warn('REDIS_URL not set: burst limits are enforced per instance only');
}

const subscriptions = new PostgresSubscriptionStore();
const analytics = new UsageAnalytics({
  writer: new PostgresRollupWriter(),
  sampleRate: config.analytics.sampleRate,
});

const admission = createAdmissionController({
  subscriptions,
  usageStore: new PostgresUsageStore(),
  counterStore: redis ? new RedisCounterStore(redisScriptRunner(redis)) : null,
  tiers: config.tiers,
  analytics,
});

const webhooks = new WebhookProcessor({
  secret: config.webhook.secret,
  toleranceSeconds: config.webhook.toleranceSeconds,
  maxRetries: config.webhook.maxRetries,
  tiers: config.tiers,
  transaction: postgresBillingTransaction(),
  events: new PostgresBillingEventStore(),
});

const app = createApp({ admission, webhooks });

analytics.start(config.analytics.flushIntervalMs);

const sweeper = setInterval(() => {
  const removed = admission.sweepFallback();
  if (removed > 0) {
    logger.debug('Swept idle fallback burst windows', { removed });
  }
}, config.fallbackSweepMs);
sweeper.unref();

// Capture server reference for graceful shutdown with request drain
const server = serve({
  fetch: app.fetch,
  port: config.port,
});

logger.info('API server listening', {
  port: config.port,
  tierConfigVersion: config.tiers.version,
  sharedCounters: redis !== null,
});

function gracefulShutdown(signal: string) {
  logger.info(`${signal} received: shutting down gracefully...`);
  server.close(() => {
    logger.info('HTTP server closed, draining connections');
    clearInterval(sweeper);
    analytics
      .stop()
      .then(() => (redis ? closeRedis(redis) : undefined))
      .then(() => closeDatabase())
      .then(() => {
        logger.info('Connections closed');
        process.exit(0);
      })
      .catch((err) => {
        logger.error('Error during shutdown', { error: String(err) });
        process.exit(1);
      });
  });
  // Force exit after 10 seconds if drain takes too long
  setTimeout(() => {
    logger.error('Forced shutdown after 10s timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
