/**
 * Burst Limiter
 *
 * Rolling five-minute cap per (account, endpoint class). Uses the shared
 * counter store when one is configured and falls back to a process-local
 * window when it errors. Never fails closed: an unreachable store degrades
 * to per-instance counting, not to denials.
 */

import { BURST_WINDOW_MS } from '@/config/tiers';
import { logger } from '@/utils/logger';
import type { CounterStore, MemorySlidingWindow, SlidingWindowResult } from './counterStore';

export interface BurstDecision {
  permitted: boolean;
  currentCount: number;
  limit: number;
  /** 0 when permitted */
  retryAfterMs: number;
  windowMs: number;
  source: 'shared' | 'fallback';
}

export interface BurstLimiterOptions {
  store: CounterStore | null;
  fallback: MemorySlidingWindow;
  limitFor: (endpointClass: string) => number;
  windowMs?: number;
}

export class BurstLimiter {
  private readonly windowMs: number;
  private degraded = false;
  private readonly log = logger.child({ component: 'burst-limiter' });

  constructor(private readonly options: BurstLimiterOptions) {
    this.windowMs = options.windowMs ?? BURST_WINDOW_MS;
  }

  async allow(accountId: string, endpointClass: string, now: Date): Promise<BurstDecision> {
    const key = `${accountId}:${endpointClass}`;
    const limit = this.options.limitFor(endpointClass);
    const nowMs = now.getTime();

    let result: SlidingWindowResult;
    let source: BurstDecision['source'] = 'shared';

    if (this.options.store) {
      try {
        result = await this.options.store.acquire(key, nowMs, this.windowMs, limit);
        if (this.degraded) {
          this.degraded = false;
          this.log.info('Shared counter store recovered', { store: this.options.store.name });
        }
      } catch (err) {
        if (!this.degraded) {
          this.degraded = true;
          this.log.warn('Shared counter store unavailable, using in-process fallback', {
            store: this.options.store.name,
            error: String(err),
          });
        }
        source = 'fallback';
        result = this.options.fallback.acquire(key, nowMs, this.windowMs, limit);
      }
    } else {
      source = 'fallback';
      result = this.options.fallback.acquire(key, nowMs, this.windowMs, limit);
    }

    return {
      permitted: result.permitted,
      currentCount: result.count,
      limit,
      retryAfterMs: result.permitted ? 0 : this.retryAfter(result.oldestMs, nowMs),
      windowMs: this.windowMs,
      source,
    };
  }

  /** True while the last shared-store call failed. */
  get isDegraded(): boolean {
    return this.degraded;
  }

  sweepFallback(now: Date): number {
    return this.options.fallback.sweep(now.getTime(), this.windowMs);
  }

  private retryAfter(oldestMs: number | null, nowMs: number): number {
    if (oldestMs === null) return this.windowMs;
    return Math.max(0, oldestMs + this.windowMs - nowMs);
  }
}
