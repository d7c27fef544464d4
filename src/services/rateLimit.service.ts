/**
 * Ingress Rate Limiting
 *
 * Per-IP protection for unauthenticated, signature-gated endpoints (the
 * billing webhook). Separate from account burst limiting: this guards the
 * process, not a customer's quota.
 */

import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { logger } from '@/utils/logger';

export enum IngressTier {
  WEBHOOK = 'webhook',
}

const INGRESS_LIMIT_CONFIG: Record<IngressTier, { points: number; duration: number; blockDuration: number }> = {
  [IngressTier.WEBHOOK]: {
    points: 100, // 100 requests
    duration: 60, // per 60 seconds
    blockDuration: 60,
  },
};

let limiters = createLimiters();

function createLimiters(): Record<IngressTier, RateLimiterMemory> {
  return {
    [IngressTier.WEBHOOK]: new RateLimiterMemory(INGRESS_LIMIT_CONFIG[IngressTier.WEBHOOK]),
  };
}

export interface IngressLimitResult {
  allowed: boolean;
  remainingPoints: number;
  retryAfter?: number; // Seconds to wait before retry
}

/**
 * Consume one point for `key`. Limiter errors fail open.
 */
export async function consumeIngressLimit(key: string, tier: IngressTier): Promise<IngressLimitResult> {
  try {
    const result: RateLimiterRes = await limiters[tier].consume(key);
    return { allowed: true, remainingPoints: result.remainingPoints };
  } catch (error) {
    if (error instanceof RateLimiterRes) {
      return {
        allowed: false,
        remainingPoints: 0,
        retryAfter: Math.ceil(error.msBeforeNext / 1000),
      };
    }

    logger.error('Ingress rate limiter error', { error: String(error) });
    return { allowed: true, remainingPoints: INGRESS_LIMIT_CONFIG[tier].points };
  }
}

/**
 * Extract the client IP from proxy headers
 */
export function clientIp(header: (name: string) => string | undefined): string {
  return header('x-forwarded-for')?.split(',')[0]?.trim()
    || header('x-real-ip')
    || 'unknown';
}

/**
 * Reset all ingress limiters (for testing only)
 */
export function resetIngressLimits(): void {
  limiters = createLimiters();
}
