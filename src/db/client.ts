/**
 * Database Connection Pool
 *
 * Manages PostgreSQL connections using the `postgres` driver
 * with Drizzle ORM for type-safe queries.
 */

import postgres from 'postgres';
import { drizzle, type PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { loadDatabaseConfig } from '@/config';
import * as schema from './schema';

// postgres.TransactionSql uses Omit<Sql, ...> which drops call signatures.
// At runtime, TransactionSql DOES support tagged template calls.
// We restore that signature here.
export type TransactionSql = postgres.TransactionSql<Record<string, unknown>> & {
  <T extends readonly (object | undefined)[] = postgres.Row[]>(
    template: TemplateStringsArray,
    ...parameters: readonly postgres.ParameterOrFragment<never>[]
  ): postgres.PendingQuery<T>;
};

/** Either the root Drizzle handle or one scoped to a transaction. */
export type Database = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

const database = loadDatabaseConfig();

export const sql = postgres(database.url, {
  max: database.poolSize,
  idle_timeout: 20,
  connect_timeout: 10,
  ssl: database.ssl ? 'require' : false,
});

export const db = drizzle(sql, { schema });

/**
 * Stable 32-bit key for pg_advisory_xact_lock
 */
export function hashToInt(input: string): number {
  let hash = 0;
  for (let i = 0; i < input.length; i++) {
    const char = input.charCodeAt(i);
    hash = ((hash << 5) - hash) + char;
    hash |= 0;
  }
  return hash;
}

/**
 * Close database connections (for graceful shutdown)
 */
export async function closeDatabase(): Promise<void> {
  await sql.end();
}
