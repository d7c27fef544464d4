/**
 * HTTP application
 *
 * Built from injected services so the server entry point wires Postgres and
 * Redis while tests wire in-memory stores.
 */

import { Hono } from 'hono';
import { securityHeaders } from '@/middleware/securityHeaders';
import { errorHandler, handleError } from '@/middleware/errorHandler';
import { accountResolver } from '@/middleware/account';
import { createWebhookRoutes } from '@/routes/webhooks';
import { createBillingRoutes } from '@/routes/billing';
import { createAdmissionRoutes } from '@/routes/admission';
import type { AdmissionController } from '@/services/admission.service';
import type { WebhookProcessor } from '@/services/webhookProcessor.service';
import type { HonoEnv } from '@/types/hono';

export interface AppServices {
  admission: AdmissionController;
  webhooks: WebhookProcessor;
}

export function createApp(services: AppServices): Hono<HonoEnv> {
  const app = new Hono<HonoEnv>();

  // Webhooks carry their own middleware stack and are mounted before
  // account resolution
  app.route('/webhooks', createWebhookRoutes(services.webhooks));

  app.use('/v1/*', securityHeaders);
  app.use('/v1/*', errorHandler);
  app.use('/v1/*', accountResolver);

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      tierConfigVersion: services.admission.tiers.version,
    });
  });

  app.route('/v1/admission', createAdmissionRoutes(services.admission));
  app.route('/v1/billing', createBillingRoutes(services.admission));

  // Global error handler (catches errors that escape middleware)
  app.onError((error, c) => handleError(error, c));

  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
        },
      },
      404
    );
  });

  return app;
}
