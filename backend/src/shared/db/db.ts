/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection (one pg pool per process).
 * - Table shapes live in database.schema.ts and must match the migrations.
 *
 * HOW TO USE:
 * - const db = createDb(config.databaseUrl)
 * - DAL functions accept DbExecutor, never the pool.
 */

import pg from 'pg';
import { Kysely, PostgresDialect, type PostgresPool } from 'kysely';

import type { DB } from './database.schema';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both main DB and transactions (pass `trx`).
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return createDbFromPool(pool);
}

/**
 * Builds a Kysely instance on any pg-compatible pool.
 * Used by createDb() and by DAL tests (in-process fake pool).
 */
export function createDbFromPool(pool: PostgresPool): Db {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
