import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import type { BaseLogger } from 'pino';
import * as schema from './schema.js';

/**
 * Opens a postgres.js pool and wraps it in Drizzle.
 *
 * `sql` is kept for DDL and for closing the pool; `db` is the typed
 * query builder the store uses. Server notices (the "already exists"
 * chatter from `CREATE ... IF NOT EXISTS`) go to the logger at debug.
 */
export function createDbClient(databaseUrl: string, log: BaseLogger) {
  const sql = postgres(databaseUrl, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: (notice) => log.debug({ notice: notice.message }, 'Postgres notice'),
  });

  return { sql, db: drizzle(sql, { schema }) };
}

export type DbClient = ReturnType<typeof createDbClient>;
export type Database = DbClient['db'];
export type Sql = DbClient['sql'];
