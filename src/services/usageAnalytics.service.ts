/**
 * Usage Analytics
 *
 * Buffered, non-authoritative daily counters for dashboards. Admitted
 * requests are optionally sampled 1-in-N; a sampled hit is recorded with
 * weight N so totals stay unbiased. Nothing here is read for allow/deny.
 */

import { sql } from '@/db/client';
import { logger } from '@/utils/logger';
import type { UsageType } from '@/types/billing';

export interface RollupRow {
  accountId: string;
  usageType: UsageType;
  /** YYYY-MM-DD (UTC) */
  periodDate: string;
  count: number;
}

export interface RollupWriter {
  upsertDailyCount(row: RollupRow): Promise<void>;
}

export class PostgresRollupWriter implements RollupWriter {
  async upsertDailyCount(row: RollupRow): Promise<void> {
    await sql`
      INSERT INTO usage_daily_rollups (account_id, usage_type, period_date, count, updated_at)
      VALUES (${row.accountId}, ${row.usageType}, ${row.periodDate}::date, ${row.count}, NOW())
      ON CONFLICT (account_id, usage_type, period_date)
      DO UPDATE SET
        count = usage_daily_rollups.count + EXCLUDED.count,
        updated_at = NOW()
    `;
  }
}

export interface UsageAnalyticsOptions {
  writer: RollupWriter;
  /** 1 records every hit; N records roughly one in N with weight N */
  sampleRate: number;
  random?: () => number;
}

export class UsageAnalytics {
  private readonly buffer = new Map<string, RollupRow>();
  private flushInterval: ReturnType<typeof setInterval> | null = null;
  private readonly random: () => number;

  constructor(private readonly options: UsageAnalyticsOptions) {
    this.random = options.random ?? Math.random;
  }

  track(accountId: string, usageType: UsageType, cost: number, now: Date): void {
    const rate = this.options.sampleRate;
    if (rate > 1 && this.random() >= 1 / rate) return;
    const weight = rate > 1 ? cost * rate : cost;

    const periodDate = now.toISOString().slice(0, 10);
    const key = `${accountId}:${usageType}:${periodDate}`;
    const row = this.buffer.get(key);
    if (row) {
      row.count += weight;
    } else {
      this.buffer.set(key, { accountId, usageType, periodDate, count: weight });
    }
  }

  get pending(): number {
    return this.buffer.size;
  }

  /**
   * Writes buffered counters; returns the number of rows written.
   */
  async flush(): Promise<number> {
    if (this.buffer.size === 0) return 0;

    const rows = Array.from(this.buffer.values());
    this.buffer.clear();

    let written = 0;
    for (const row of rows) {
      try {
        await this.options.writer.upsertDailyCount(row);
        written++;
      } catch (err) {
        logger.error('Failed to flush usage rollup', { ...row, error: String(err) });
      }
    }
    return written;
  }

  start(intervalMs: number): void {
    if (this.flushInterval) return;
    this.flushInterval = setInterval(() => {
      this.flush().catch((err) => {
        logger.error('Usage rollup flush error', { error: String(err) });
      });
    }, intervalMs);
  }

  async stop(): Promise<void> {
    if (this.flushInterval) {
      clearInterval(this.flushInterval);
      this.flushInterval = null;
    }
    await this.flush();
  }
}
