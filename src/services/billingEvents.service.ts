/**
 * Billing Event Store
 *
 * Append-only audit trail and idempotency gate for provider webhooks. The
 * unique event id decides the first writer; a failed event may be re-claimed
 * by a redelivery until its retry bound, and a claim left in `processing` by
 * a crashed worker becomes reclaimable once it is older than the stale cutoff.
 */

import { eq } from 'drizzle-orm';
import { db as rootDb, sql, type Database } from '@/db/client';
import { billingEvents } from '@/db/schema';
import { PostgresSubscriptionStore, type SubscriptionStore } from './subscriptionStore.service';

export type ProcessingStatus = 'processing' | 'processed' | 'ignored' | 'failed';

export interface BillingEventReceipt {
  eventId: string;
  eventType: string;
  rawPayload: string;
  occurredAt: Date | null;
  receivedAt: Date;
}

export interface ClaimOptions {
  maxRetries: number;
  staleBefore: Date;
}

export type ClaimResult =
  | { kind: 'claimed'; retryCount: number }
  | { kind: 'duplicate'; status: ProcessingStatus }
  | { kind: 'exhausted'; retryCount: number };

export interface BillingEventOutcome {
  status: Exclude<ProcessingStatus, 'processing'>;
  error: string | null;
  accountId: string | null;
  subscriptionId: string | null;
  processedAt: Date;
}

export interface BillingEventStore {
  claim(receipt: BillingEventReceipt, options: ClaimOptions): Promise<ClaimResult>;
  complete(eventId: string, outcome: BillingEventOutcome): Promise<void>;
}

/** Stores whose writes commit or roll back together. */
export interface BillingTransactionScope {
  subscriptions: SubscriptionStore;
  events: BillingEventStore;
}

export type BillingTransactionRunner = <T>(
  fn: (scope: BillingTransactionScope) => Promise<T>
) => Promise<T>;

export function postgresBillingTransaction(database: Database = rootDb): BillingTransactionRunner {
  return async (fn) =>
    await database.transaction(async (tx) =>
      fn({ subscriptions: new PostgresSubscriptionStore(tx), events: new PostgresBillingEventStore(tx) })
    );
}

export class PostgresBillingEventStore implements BillingEventStore {
  constructor(private readonly database: Database = rootDb) {}

  // Claims always commit on the root connection, outside any caller transaction
  async claim(receipt: BillingEventReceipt, options: ClaimOptions): Promise<ClaimResult> {
    const claimed = await sql<{ retry_count: number }[]>`
      INSERT INTO billing_events
        (event_id, event_type, raw_payload, occurred_at, processing_status, retry_count, received_at)
      VALUES
        (${receipt.eventId}, ${receipt.eventType}, ${receipt.rawPayload}, ${receipt.occurredAt},
         'processing', 0, ${receipt.receivedAt})
      ON CONFLICT (event_id) DO UPDATE SET
        processing_status = 'processing',
        processing_error = NULL,
        retry_count = billing_events.retry_count + 1,
        received_at = EXCLUDED.received_at
      WHERE (billing_events.processing_status = 'failed'
             AND billing_events.retry_count < ${options.maxRetries})
         OR (billing_events.processing_status = 'processing'
             AND billing_events.received_at < ${options.staleBefore})
      RETURNING retry_count
    `;

    if (claimed.length > 0) {
      return { kind: 'claimed', retryCount: claimed[0].retry_count };
    }

    const [existing] = await sql<{ processing_status: ProcessingStatus; retry_count: number }[]>`
      SELECT processing_status, retry_count FROM billing_events WHERE event_id = ${receipt.eventId}
    `;

    if (existing?.processing_status === 'failed') {
      return { kind: 'exhausted', retryCount: existing.retry_count };
    }
    return { kind: 'duplicate', status: existing?.processing_status ?? 'processing' };
  }

  async complete(eventId: string, outcome: BillingEventOutcome): Promise<void> {
    await this.database
      .update(billingEvents)
      .set({
        processingStatus: outcome.status,
        processingError: outcome.error,
        accountId: outcome.accountId,
        subscriptionId: outcome.subscriptionId,
        processedAt: outcome.processedAt,
      })
      .where(eq(billingEvents.eventId, eventId));
  }
}
