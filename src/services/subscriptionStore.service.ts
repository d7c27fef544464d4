/**
 * Subscription State Store
 *
 * Durable account + subscription state. Read by every admission decision,
 * written only by the webhook processor.
 */

import { and, desc, eq, ne } from 'drizzle-orm';
import { db as rootDb, type Database } from '@/db/client';
import { accounts, subscriptions, type AccountRow, type SubscriptionRow } from '@/db/schema';
import type {
  Account,
  AccountSnapshot,
  Subscription,
  SubscriptionStatus,
  Tier,
} from '@/types/billing';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isAccountId(value: string): boolean {
  return UUID_PATTERN.test(value);
}

export type NewSubscription = Omit<Subscription, 'id' | 'createdAt' | 'updatedAt'>;

export type SubscriptionPatch = Partial<
  Omit<Subscription, 'id' | 'accountId' | 'externalRef' | 'createdAt' | 'updatedAt'>
>;

export interface AccountPatch {
  tier?: Tier;
  status?: SubscriptionStatus;
  customerRef?: string;
}

export interface SubscriptionStore {
  getSnapshot(accountId: string): Promise<AccountSnapshot | null>;
  findAccount(accountId: string): Promise<Account | null>;
  findAccountByCustomerRef(customerRef: string): Promise<Account | null>;
  findSubscriptionByExternalRef(externalRef: string): Promise<Subscription | null>;
  findOpenSubscription(accountId: string): Promise<Subscription | null>;
  insertSubscription(input: NewSubscription): Promise<Subscription>;
  updateSubscription(id: string, patch: SubscriptionPatch): Promise<Subscription>;
  updateAccount(accountId: string, patch: AccountPatch): Promise<void>;
}

function toAccount(row: AccountRow): Account {
  return {
    id: row.id,
    tier: row.tier,
    status: row.subscriptionStatus,
    customerRef: row.customerRef,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toSubscription(row: SubscriptionRow): Subscription {
  return { ...row, limits: { ...row.limits } };
}

export class PostgresSubscriptionStore implements SubscriptionStore {
  constructor(private readonly database: Database = rootDb) {}

  async getSnapshot(accountId: string): Promise<AccountSnapshot | null> {
    const account = await this.findAccount(accountId);
    if (!account) return null;
    return { account, subscription: await this.findOpenSubscription(accountId) };
  }

  async findAccount(accountId: string): Promise<Account | null> {
    if (!isAccountId(accountId)) return null;
    const [row] = await this.database
      .select()
      .from(accounts)
      .where(eq(accounts.id, accountId))
      .limit(1);
    return row ? toAccount(row) : null;
  }

  async findAccountByCustomerRef(customerRef: string): Promise<Account | null> {
    const [row] = await this.database
      .select()
      .from(accounts)
      .where(eq(accounts.customerRef, customerRef))
      .limit(1);
    return row ? toAccount(row) : null;
  }

  async findSubscriptionByExternalRef(externalRef: string): Promise<Subscription | null> {
    const [row] = await this.database
      .select()
      .from(subscriptions)
      .where(eq(subscriptions.externalRef, externalRef))
      .limit(1);
    return row ? toSubscription(row) : null;
  }

  async findOpenSubscription(accountId: string): Promise<Subscription | null> {
    const [row] = await this.database
      .select()
      .from(subscriptions)
      .where(and(eq(subscriptions.accountId, accountId), ne(subscriptions.status, 'cancelled')))
      .orderBy(desc(subscriptions.createdAt))
      .limit(1);
    return row ? toSubscription(row) : null;
  }

  async insertSubscription(input: NewSubscription): Promise<Subscription> {
    const [row] = await this.database.insert(subscriptions).values(input).returning();
    return toSubscription(row);
  }

  async updateSubscription(id: string, patch: SubscriptionPatch): Promise<Subscription> {
    const [row] = await this.database
      .update(subscriptions)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(subscriptions.id, id))
      .returning();
    if (!row) {
      throw new Error(`Subscription ${id} not found`);
    }
    return toSubscription(row);
  }

  async updateAccount(accountId: string, patch: AccountPatch): Promise<void> {
    await this.database
      .update(accounts)
      .set({
        tier: patch.tier,
        subscriptionStatus: patch.status,
        customerRef: patch.customerRef,
        updatedAt: new Date(),
      })
      .where(eq(accounts.id, accountId));
  }
}
