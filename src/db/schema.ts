/**
 * Database Schema Definitions
 * Drizzle ORM 0.39.x schema for PostgreSQL
 *
 * Mirrors db/migrations/001_admission_control.sql. Raw-SQL paths
 * (usage ledger, billing event claims, rollup upserts) rely on the same
 * table and column names.
 */

import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  integer,
  jsonb,
  text,
  bigserial,
  date,
  check,
  unique,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type { SubscriptionStatus, Tier, UsageLimits, UsageType } from '@/types/billing';

/**
 * Tenant accounts. `tier` and `subscriptionStatus` are a denormalized view of
 * the current subscription, maintained by the webhook processor.
 */
export const accounts = pgTable(
  'accounts',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tier: varchar('tier', { length: 20 }).notNull().default('free').$type<Tier>(),
    subscriptionStatus: varchar('subscription_status', { length: 20 })
      .notNull()
      .default('inactive')
      .$type<SubscriptionStatus>(),
    customerRef: varchar('customer_ref', { length: 255 }).unique(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  }
);

export const subscriptions = pgTable(
  'subscriptions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    accountId: uuid('account_id').notNull().references(() => accounts.id, { onDelete: 'cascade' }),
    externalRef: varchar('external_ref', { length: 255 }).notNull().unique(),
    customerRef: varchar('customer_ref', { length: 255 }),
    priceRef: varchar('price_ref', { length: 255 }),
    tier: varchar('tier', { length: 20 }).notNull().$type<Tier>(),
    status: varchar('status', { length: 20 }).notNull().$type<SubscriptionStatus>(),
    currentPeriodStart: timestamp('current_period_start', { withTimezone: true }),
    currentPeriodEnd: timestamp('current_period_end', { withTimezone: true }),
    nextBilledAt: timestamp('next_billed_at', { withTimezone: true }),
    trialStart: timestamp('trial_start', { withTimezone: true }),
    trialEnd: timestamp('trial_end', { withTimezone: true }),
    limits: jsonb('limits').notNull().$type<UsageLimits>(),
    dataRetentionDays: integer('data_retention_days').notNull(),
    currency: varchar('currency', { length: 3 }),
    portalUrl: text('portal_url'),
    cancelledAt: timestamp('cancelled_at', { withTimezone: true }),
    lastEventAt: timestamp('last_event_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    accountIdx: index('idx_subscriptions_account').on(table.accountId),
    customerIdx: index('idx_subscriptions_customer').on(table.customerRef),
    // At most one non-cancelled subscription per account
    openPerAccount: uniqueIndex('uniq_subscriptions_open_account')
      .on(table.accountId)
      .where(sql`status <> 'cancelled'`),
  })
);

/**
 * Append-only usage ledger. Sums over (account, usage type, exact period
 * bounds) are the source of truth for monthly quotas.
 */
export const usageRecords = pgTable(
  'usage_records',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    accountId: uuid('account_id').notNull().references(() => accounts.id, { onDelete: 'cascade' }),
    subscriptionId: uuid('subscription_id').references(() => subscriptions.id, { onDelete: 'set null' }),
    usageType: varchar('usage_type', { length: 50 }).notNull().$type<UsageType>(),
    endpointClass: varchar('endpoint_class', { length: 50 }).notNull(),
    costUnits: integer('cost_units').notNull().default(1),
    billingPeriodStart: timestamp('billing_period_start', { withTimezone: true }).notNull(),
    billingPeriodEnd: timestamp('billing_period_end', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    periodIdx: index('idx_usage_records_period').on(
      table.accountId,
      table.usageType,
      table.billingPeriodStart,
      table.billingPeriodEnd
    ),
    costPositive: check('usage_records_cost_positive', sql`${table.costUnits} > 0`),
  })
);

export const billingEvents = pgTable(
  'billing_events',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    eventId: varchar('event_id', { length: 255 }).notNull().unique(),
    eventType: varchar('event_type', { length: 100 }).notNull(),
    rawPayload: text('raw_payload').notNull(),
    occurredAt: timestamp('occurred_at', { withTimezone: true }),
    processingStatus: varchar('processing_status', { length: 20 })
      .notNull()
      .default('processing')
      .$type<'processing' | 'processed' | 'ignored' | 'failed'>(),
    processingError: text('processing_error'),
    retryCount: integer('retry_count').notNull().default(0),
    accountId: uuid('account_id'),
    subscriptionId: uuid('subscription_id'),
    receivedAt: timestamp('received_at', { withTimezone: true }).notNull().defaultNow(),
    processedAt: timestamp('processed_at', { withTimezone: true }),
  },
  (table) => ({
    statusIdx: index('idx_billing_events_status').on(table.processingStatus),
    receivedIdx: index('idx_billing_events_received').on(table.receivedAt),
  })
);

/**
 * Approximate daily usage for dashboards. Never read by admission decisions.
 */
export const usageDailyRollups = pgTable(
  'usage_daily_rollups',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    accountId: uuid('account_id').notNull().references(() => accounts.id, { onDelete: 'cascade' }),
    usageType: varchar('usage_type', { length: 50 }).notNull().$type<UsageType>(),
    periodDate: date('period_date').notNull(),
    count: integer('count').notNull().default(0),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    accountTypeDate: unique('uniq_usage_daily_rollups').on(
      table.accountId,
      table.usageType,
      table.periodDate
    ),
  })
);

export type AccountRow = typeof accounts.$inferSelect;
export type SubscriptionRow = typeof subscriptions.$inferSelect;
export type NewSubscriptionRow = typeof subscriptions.$inferInsert;
export type BillingEventRow = typeof billingEvents.$inferSelect;
