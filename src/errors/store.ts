/**
 * Raised when a backing store cannot answer. Callers decide whether to fail
 * open (burst counters) or closed (usage ledger, subscription state).
 */

export type StoreName = 'counter' | 'ledger' | 'subscriptions' | 'billing_events' | 'rollups';

export class StoreUnavailableError extends Error {
  readonly code = 'STORE_UNAVAILABLE' as const;
  constructor(
    readonly store: StoreName,
    cause?: unknown,
  ) {
    super(`${store} store unavailable${cause instanceof Error ? `: ${cause.message}` : ''}`, { cause });
    this.name = 'StoreUnavailableError';
  }
}
