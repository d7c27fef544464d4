/**
 * Admission Control Middleware
 *
 * Gates a route on the account's monthly quota and burst window. Sets the
 * rate-limit headers on every outcome; denials are thrown as typed errors
 * and rendered as 429 by the global error handler.
 */

import type { MiddlewareHandler } from 'hono';
import type { HonoEnv } from '@/types/hono';
import type { UsageType } from '@/types/billing';
import { BurstExceededError, QuotaExceededError } from '@/errors/admission';
import type { AdmissionController, AdmissionDecision } from '@/services/admission.service';

export interface AdmissionRouteOptions {
  endpointClass: string;
  usageType: UsageType;
  cost?: number;
}

export function denialError(decision: AdmissionDecision): QuotaExceededError | BurstExceededError {
  if (decision.reason === 'BURST_LIMIT' && decision.burst) {
    return new BurstExceededError(
      decision.endpointClass,
      decision.burst.currentCount,
      decision.burst.limit,
      decision.burst.retryAfterMs,
      decision.headers
    );
  }
  return new QuotaExceededError(
    decision.usageType,
    decision.monthly.used,
    decision.monthly.limit,
    decision.monthly.resetAt,
    decision.headers
  );
}

export function admissionControl(
  controller: AdmissionController,
  options: AdmissionRouteOptions
): MiddlewareHandler<HonoEnv> {
  return async (c, next) => {
    const accountId = c.get('accountId');
    if (!accountId) {
      return c.json(
        { error: { code: 'UNAUTHENTICATED', message: 'Authentication required' } },
        401
      );
    }

    const decision = await controller.evaluate({
      accountId,
      endpointClass: options.endpointClass,
      usageType: options.usageType,
      cost: options.cost,
    });

    if (!decision.permitted) {
      throw denialError(decision);
    }

    for (const [name, value] of Object.entries(decision.headers)) {
      c.header(name, value);
    }
    c.set('admission', decision);
    await next();
  };
}
