/**
 * Admission Routes
 *
 * Decision endpoint for the API gateway: one call per inbound request,
 * answered with the same headers the gateway forwards to the client.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { HonoEnv } from '@/types/hono';
import { requireAccount } from '@/middleware/account';
import { USAGE_TYPES } from '@/types/billing';
import type { AdmissionController } from '@/services/admission.service';

const checkSchema = z.object({
  endpointClass: z.string().min(1).max(50).regex(/^[a-z0-9_-]+$/),
  usageType: z.enum(USAGE_TYPES),
  cost: z.number().int().positive().max(10_000).optional(),
});

export function createAdmissionRoutes(controller: AdmissionController): Hono<HonoEnv> {
  const admission = new Hono<HonoEnv>();

  admission.use('*', requireAccount);

  /**
   * POST /v1/admission/check
   * 200 when admitted, 429 with rate-limit headers when denied
   */
  admission.post(
    '/check',
    zValidator('json', checkSchema, (result, c) => {
      if (!result.success) {
        return c.json(
          {
            error: {
              code: 'VALIDATION_ERROR',
              message: 'Invalid request data',
              details: result.error.issues,
            },
          },
          400
        );
      }
    }),
    async (c) => {
      const accountId = c.get('accountId');
      if (!accountId) {
        return c.json({ error: { code: 'UNAUTHENTICATED', message: 'Authentication required' } }, 401);
      }
      const body = c.req.valid('json');

      const decision = await controller.evaluate({
        accountId,
        endpointClass: body.endpointClass,
        usageType: body.usageType,
        cost: body.cost,
      });

      for (const [name, value] of Object.entries(decision.headers)) {
        c.header(name, value);
      }

      return c.json(
        {
          permitted: decision.permitted,
          reason: decision.reason,
          tier: decision.tier,
          monthly: {
            used: decision.monthly.used,
            limit: decision.monthly.limit,
            remaining: decision.monthly.remaining,
            resetAt: decision.monthly.resetAt.toISOString(),
            periodStale: decision.monthly.periodStale,
          },
          burst: decision.burst
            ? {
                current: decision.burst.currentCount,
                limit: decision.burst.limit,
                retryAfterMs: decision.burst.retryAfterMs,
                source: decision.burst.source,
              }
            : null,
        },
        decision.permitted ? 200 : 429
      );
    }
  );

  return admission;
}
