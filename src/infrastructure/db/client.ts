import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import type { Sql } from 'postgres';
import * as schema from './schema.js';

export interface DbClientOptions {
  /** Pool size. The gateway only reads namespaces; workers write in bulk. */
  maxConnections?: number | undefined;
  /** Shown in `pg_stat_activity`. */
  applicationName?: string | undefined;
}

/**
 * postgres.js pool plus a drizzle instance over the pipeline tables.
 *
 * `sql` stays exposed for the schema bootstrap, the health probe and
 * closing the pool.
 */
export function createDbClient(databaseUrl: string, options: DbClientOptions = {}) {
  const sql: Sql = postgres(databaseUrl, {
    max: options.maxConnections ?? 10,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: { application_name: options.applicationName ?? 'lineage-relay' },
    // CREATE ... IF NOT EXISTS raises NOTICEs on every start.
    onnotice: () => {},
  });

  return { sql, db: drizzle(sql, { schema }) };
}

export type Database = ReturnType<typeof createDbClient>['db'];
