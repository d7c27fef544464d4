/**
 * Usage Ledger
 *
 * Monthly quota enforcement over an append-only ledger in Postgres. The
 * check-and-record path serializes per (account, usage type) with a
 * transaction-scoped advisory lock, so concurrent requests can never push the
 * sum past the limit. Store failures surface as StoreUnavailableError and the
 * caller denies (fail closed).
 */

import { sql, hashToInt, type TransactionSql } from '@/db/client';
import { StoreUnavailableError } from '@/errors/store';
import { USAGE_TYPES, UNLIMITED, type BillingPeriod, type UsageType } from '@/types/billing';

export interface UsageQuery {
  accountId: string;
  usageType: UsageType;
  period: BillingPeriod;
}

export interface UsageAppend extends UsageQuery {
  subscriptionId: string | null;
  endpointClass: string;
  cost: number;
  limit: number;
}

export interface AppendResult {
  appended: boolean;
  /** Ledger total after the call (unchanged when not appended) */
  used: number;
}

export interface UsageStore {
  sumUsage(query: UsageQuery): Promise<number>;
  /** Atomically: sum, compare against limit, append when it fits. */
  appendIfWithinLimit(input: UsageAppend): Promise<AppendResult>;
}

export interface LedgerResult {
  permitted: boolean;
  used: number;
  limit: number;
}

export function isUnlimited(limit: number): boolean {
  return limit === UNLIMITED;
}

function assertCost(cost: number): void {
  if (!Number.isInteger(cost) || cost < 1) {
    throw new RangeError(`Usage cost must be a positive integer, got ${cost}`);
  }
}

export class UsageLedger {
  constructor(private readonly store: UsageStore) {}

  /**
   * Read-only pre-check. Does not record anything.
   */
  async check(query: UsageQuery, limit: number, cost = 1): Promise<LedgerResult> {
    assertCost(cost);
    const used = await this.sum(query);
    return {
      permitted: isUnlimited(limit) || used + cost <= limit,
      used,
      limit,
    };
  }

  async checkAndRecord(input: UsageAppend): Promise<LedgerResult> {
    assertCost(input.cost);
    let result: AppendResult;
    try {
      result = await this.store.appendIfWithinLimit(input);
    } catch (err) {
      throw new StoreUnavailableError('ledger', err);
    }
    return { permitted: result.appended, used: result.used, limit: input.limit };
  }

  async usageByType(accountId: string, period: BillingPeriod): Promise<Record<UsageType, number>> {
    const totals = await Promise.all(
      USAGE_TYPES.map((usageType) => this.sum({ accountId, usageType, period }))
    );
    return {
      api_calls: totals[0],
      exports: totals[1],
      sentiment_analysis: totals[2],
    };
  }

  private async sum(query: UsageQuery): Promise<number> {
    try {
      return await this.store.sumUsage(query);
    } catch (err) {
      throw new StoreUnavailableError('ledger', err);
    }
  }
}

export class PostgresUsageStore implements UsageStore {
  async sumUsage({ accountId, usageType, period }: UsageQuery): Promise<number> {
    const rows = await sql<{ used: number }[]>`
      SELECT COALESCE(SUM(cost_units), 0)::int AS used
      FROM usage_records
      WHERE account_id = ${accountId}
        AND usage_type = ${usageType}
        AND billing_period_start = ${period.start}
        AND billing_period_end = ${period.end}
    `;
    return rows[0]?.used ?? 0;
  }

  async appendIfWithinLimit(input: UsageAppend): Promise<AppendResult> {
    const { accountId, usageType, period } = input;

    return await sql.begin(async (rawTx) => {
      const tx = rawTx as TransactionSql;

      if (!isUnlimited(input.limit)) {
        await tx`SELECT pg_advisory_xact_lock(${hashToInt(`${accountId}:${usageType}`)})`;
      }

      const rows = await tx<{ used: number }[]>`
        SELECT COALESCE(SUM(cost_units), 0)::int AS used
        FROM usage_records
        WHERE account_id = ${accountId}
          AND usage_type = ${usageType}
          AND billing_period_start = ${period.start}
          AND billing_period_end = ${period.end}
      `;
      const used = rows[0]?.used ?? 0;

      if (!isUnlimited(input.limit) && used + input.cost > input.limit) {
        return { appended: false, used };
      }

      await tx`
        INSERT INTO usage_records
          (account_id, subscription_id, usage_type, endpoint_class, cost_units,
           billing_period_start, billing_period_end)
        VALUES
          (${accountId}, ${input.subscriptionId}, ${usageType}, ${input.endpointClass}, ${input.cost},
           ${period.start}, ${period.end})
      `;
      return { appended: true, used: used + input.cost };
    });
  }
}
