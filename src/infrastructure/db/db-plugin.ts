import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Sql } from 'postgres';
import { createDbClient } from './client.js';
import type { Database } from './client.js';
import { ensureSchema } from './migrate.js';

export interface DbPluginOptions {
  url: string;
  maxConnections?: number | undefined;
}

/** Seconds the pool waits for running queries when the gateway closes. */
const CLOSE_TIMEOUT_S = 5;

/**
 * Opens the Postgres pool for the gateway and makes sure the pipeline
 * tables exist before any route is served.
 *
 * `fastify.db` backs the namespace repository, `fastify.sql` the
 * health probe.
 */
async function dbPlugin(fastify: FastifyInstance, options: DbPluginOptions): Promise<void> {
  const { sql, db } = createDbClient(options.url, {
    maxConnections: options.maxConnections,
    applicationName: 'lineage-relay-gateway',
  });

  await ensureSchema(sql);
  fastify.log.info('Database ready (namespaces + otel tables)');

  fastify.decorate('db', db);
  fastify.decorate('sql', sql);

  fastify.addHook('onClose', async () => {
    await sql.end({ timeout: CLOSE_TIMEOUT_S });
    fastify.log.info('Database pool closed');
  });
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    db: Database;
    sql: Sql;
  }
}
