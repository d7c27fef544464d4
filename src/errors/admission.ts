/**
 * Admission Errors
 *
 * Thrown by the admissionControl middleware when a request is denied.
 * Caught by errorHandler → returns 429 with the decision's rate-limit headers.
 */

import type { UsageType } from '@/types/billing';

export class QuotaExceededError extends Error {
  readonly code = 'QUOTA_EXCEEDED' as const;
  constructor(
    readonly usageType: UsageType,
    readonly used: number,
    readonly limit: number,
    readonly resetAt: Date,
    readonly headers: Record<string, string> = {},
  ) {
    super(`Monthly ${usageType} quota exhausted: ${used}/${limit}`);
    this.name = 'QuotaExceededError';
  }
}

export class BurstExceededError extends Error {
  readonly code = 'BURST_LIMIT_EXCEEDED' as const;
  constructor(
    readonly endpointClass: string,
    readonly current: number,
    readonly limit: number,
    readonly retryAfterMs: number,
    readonly headers: Record<string, string> = {},
  ) {
    super(`Burst limit reached for ${endpointClass}: ${current}/${limit} in the last 5 minutes`);
    this.name = 'BurstExceededError';
  }
}
