/**
 * Sliding-window counter stores for burst limiting.
 *
 * A window is a sorted set of request timestamps per key. Acquiring a slot
 * prunes entries at or before `now - window`, then admits the request only if
 * the remaining count is below the limit. Redis runs this as one Lua script so
 * concurrent callers on any instance observe a consistent count.
 */

import { randomUUID } from 'crypto';
import { StoreUnavailableError } from '@/errors/store';

export interface SlidingWindowResult {
  permitted: boolean;
  /** Entries in the window after this call (including the admitted request) */
  count: number;
  /** Timestamp (ms) of the oldest entry still in the window, if known */
  oldestMs: number | null;
}

export interface CounterStore {
  readonly name: string;
  acquire(key: string, nowMs: number, windowMs: number, limit: number): Promise<SlidingWindowResult>;
}

/** The slice of a Redis client the counter store needs. */
export interface ScriptRunner {
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
}

const SLIDING_WINDOW_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])
redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local count = redis.call('ZCARD', key)
if count < limit then
  redis.call('ZADD', key, now, ARGV[4])
  redis.call('PEXPIRE', key, window)
  return {1, count + 1, 0}
end
local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
local oldestScore = -1
if oldest[2] then oldestScore = tonumber(oldest[2]) end
return {0, count, oldestScore}
`;

function isNumberTriple(value: unknown): value is [number, number, number] {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    value.every((item) => typeof item === 'number' && Number.isFinite(item))
  );
}

export class RedisCounterStore implements CounterStore {
  readonly name = 'redis';

  constructor(private readonly runner: ScriptRunner) {}

  async acquire(key: string, nowMs: number, windowMs: number, limit: number): Promise<SlidingWindowResult> {
    let reply: unknown;
    try {
      reply = await this.runner.eval(
        SLIDING_WINDOW_SCRIPT,
        1,
        key,
        nowMs,
        windowMs,
        limit,
        `${nowMs}:${randomUUID()}`
      );
    } catch (err) {
      throw new StoreUnavailableError('counter', err);
    }

    if (!isNumberTriple(reply)) {
      throw new StoreUnavailableError('counter', new Error('unexpected sliding window reply'));
    }

    const [permitted, count, oldest] = reply;
    return {
      permitted: permitted === 1,
      count,
      oldestMs: permitted === 1 || oldest < 0 ? null : oldest,
    };
  }
}

/**
 * Process-local fallback used while the shared store is unreachable.
 * Timestamps per key are kept sorted ascending.
 */
export class MemorySlidingWindow {
  private readonly windows = new Map<string, number[]>();

  acquire(key: string, nowMs: number, windowMs: number, limit: number): SlidingWindowResult {
    const live = this.prune(this.windows.get(key) ?? [], nowMs - windowMs);

    if (live.length >= limit) {
      this.store(key, live);
      return { permitted: false, count: live.length, oldestMs: live.length > 0 ? live[0] : null };
    }

    let insertAt = live.length;
    while (insertAt > 0 && live[insertAt - 1] > nowMs) insertAt--;
    live.splice(insertAt, 0, nowMs);
    this.store(key, live);
    return { permitted: true, count: live.length, oldestMs: null };
  }

  /** Drops expired entries and empty keys; returns the number of keys removed. */
  sweep(nowMs: number, windowMs: number): number {
    let removed = 0;
    for (const [key, entries] of this.windows) {
      const live = this.prune(entries, nowMs - windowMs);
      if (live.length === 0) {
        this.windows.delete(key);
        removed++;
      } else if (live !== entries) {
        this.windows.set(key, live);
      }
    }
    return removed;
  }

  get size(): number {
    return this.windows.size;
  }

  private prune(entries: number[], cutoff: number): number[] {
    let drop = 0;
    while (drop < entries.length && entries[drop] <= cutoff) drop++;
    return drop > 0 ? entries.slice(drop) : entries;
  }

  private store(key: string, entries: number[]): void {
    if (entries.length === 0) {
      this.windows.delete(key);
    } else {
      this.windows.set(key, entries);
    }
  }
}
