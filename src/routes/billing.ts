/**
 * Billing Routes
 *
 * Read-only view of the account's subscription, limits and current usage.
 */

import { Hono } from 'hono';
import type { HonoEnv } from '@/types/hono';
import { requireAccount } from '@/middleware/account';
import { getBillingSnapshot } from '@/services/billing.service';
import type { AdmissionController } from '@/services/admission.service';

export function createBillingRoutes(admission: AdmissionController): Hono<HonoEnv> {
  const billing = new Hono<HonoEnv>();

  billing.use('*', requireAccount);

  /**
   * GET /v1/billing/status
   * Tier, status, period, limits and exact current-period usage
   */
  billing.get('/status', async (c) => {
    const accountId = c.get('accountId');
    if (!accountId) {
      return c.json({ error: { code: 'UNAUTHENTICATED', message: 'Authentication required' } }, 401);
    }
    return c.json(await getBillingSnapshot(admission, accountId));
  });

  return billing;
}
