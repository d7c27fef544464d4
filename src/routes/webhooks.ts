/**
 * Webhook Routes
 *
 * Billing provider webhook handler: signature-gated, NOT behind account
 * resolution. Has its own middleware stack: security headers, body limit,
 * IP rate limit, error handler.
 */

import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import type { HonoEnv } from '@/types/hono';
import { clientIp, consumeIngressLimit, IngressTier } from '@/services/rateLimit.service';
import { SUPPORTED_EVENT_TYPES, type WebhookProcessor } from '@/services/webhookProcessor.service';
import { WebhookAuthenticationError } from '@/errors/webhook';
import { StoreUnavailableError } from '@/errors/store';
import { logger } from '@/utils/logger';

export const SIGNATURE_HEADER = 'paddle-signature';
export const TIMESTAMP_HEADER = 'paddle-timestamp';

export function createWebhookRoutes(processor: WebhookProcessor): Hono<HonoEnv> {
  const webhooks = new Hono<HonoEnv>();

  // 1. Security headers (subset, no CORS needed for server-to-server)
  webhooks.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Cache-Control', 'no-store');
  });

  // 2. Body cap: 256KB
  webhooks.use('*', bodyLimit({ maxSize: 256 * 1024 }));

  // 3. IP-based rate limiting: 100 req/min per IP
  webhooks.use('*', async (c, next) => {
    const ip = clientIp((name) => c.req.header(name));
    const result = await consumeIngressLimit(`webhook:ip:${ip}`, IngressTier.WEBHOOK);
    if (!result.allowed) {
      c.header('Retry-After', String(result.retryAfter || 60));
      return c.json({ error: 'Rate limit exceeded' }, 429);
    }
    return next();
  });

  // 4. Dedicated error handler: acknowledge so the sender stops redelivering,
  //    except when nothing could be recorded
  webhooks.onError((err, c) => {
    if (err instanceof StoreUnavailableError) {
      logger.error('Webhook not recorded, asking sender to retry', { error: err.message });
      return c.json({ received: false, error: 'Temporarily unavailable' }, 503);
    }
    logger.error('Webhook error', { error: String(err), path: c.req.path });
    return c.json({ received: true, error: 'Internal processing error' }, 200);
  });

  /**
   * POST /webhooks/billing
   * Verifies the raw body, then dedupes and applies the event.
   */
  webhooks.post('/billing', async (c) => {
    const signature = c.req.header(SIGNATURE_HEADER);
    const timestamp = c.req.header(TIMESTAMP_HEADER);

    if (!signature || !timestamp) {
      return c.json({ error: 'Missing Paddle-Signature or Paddle-Timestamp header' }, 400);
    }

    const rawBody = new Uint8Array(await c.req.arrayBuffer());

    try {
      const outcome = await processor.receive({
        rawBody,
        signatureHeader: signature,
        timestampHeader: timestamp,
      });
      return c.json({ received: true, ...outcome }, 200);
    } catch (err) {
      if (err instanceof WebhookAuthenticationError) {
        logger.warn('Billing webhook signature verification failed', { reason: err.reason });
        return c.json({ error: 'Invalid signature' }, 401);
      }
      throw err;
    }
  });

  /**
   * GET /webhooks/billing/status
   */
  webhooks.get('/billing/status', (c) => {
    return c.json({
      status: 'ok',
      supportedEvents: SUPPORTED_EVENT_TYPES,
    });
  });

  return webhooks;
}
