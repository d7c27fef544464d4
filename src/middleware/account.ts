/**
 * Account Resolution Middleware
 *
 * Authentication happens upstream; the gateway forwards the authenticated
 * account id in X-Account-Id. Malformed ids are treated as absent.
 */

import type { Context, MiddlewareHandler, Next } from 'hono';
import type { HonoEnv } from '@/types/hono';
import { isAccountId } from '@/services/subscriptionStore.service';

export const ACCOUNT_HEADER = 'x-account-id';

export const accountResolver: MiddlewareHandler<HonoEnv> = async (c: Context<HonoEnv>, next: Next) => {
  const accountId = c.req.header(ACCOUNT_HEADER)?.trim();
  if (accountId && isAccountId(accountId)) {
    c.set('accountId', accountId);
  }
  await next();
};

/**
 * Reject requests without a resolved account
 */
export const requireAccount: MiddlewareHandler<HonoEnv> = async (c: Context<HonoEnv>, next: Next) => {
  if (!c.get('accountId')) {
    return c.json(
      { error: { code: 'UNAUTHENTICATED', message: 'Authentication required' } },
      401
    );
  }
  await next();
};
