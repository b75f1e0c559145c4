import Fastify from 'fastify';
import type { FastifyBaseLogger } from 'fastify';
import type { Redis } from 'ioredis';
import type { Sql } from 'postgres';

import {
  IngestionGateway,
  NamespaceAdmin,
  NamespaceRouter,
  Publisher,
} from './application/index.js';
import type { NamespaceRepository, QuotaCounter } from './application/index.js';

import {
  loadConfig,
  redisPlugin,
  dbPlugin,
  RedisStreamTransport,
  RedisQuotaCounter,
  DrizzleNamespaceRepository,
  InMemoryNamespaceRepository,
  redisHealthProbe,
  databaseHealthProbe,
} from './infrastructure/index.js';
import type { PipelineConfig } from './infrastructure/index.js';

import {
  servicesPlugin,
  ingestRoutes,
  namespaceRoutes,
  healthRoutes,
} from './interfaces/http/index.js';
import type { PipelineServices } from './interfaces/http/index.js';

const SERVICE_NAME = 'lineage-relay';
const SERVICE_VERSION = process.env['npm_package_version'] ?? '0.1.0';

/** Largest stream entry the publisher will append. */
const MAX_MESSAGE_BYTES = 2 * 1024 * 1024;

interface GatewayDeps {
  redis: Redis;
  sql: Sql;
  log: FastifyBaseLogger;
}

/** Wires the ingestion use cases onto their Redis and Postgres adapters. */
function buildServices(
  config: Readonly<PipelineConfig>,
  deps: GatewayDeps,
  namespaceRepo: NamespaceRepository,
  quota: QuotaCounter,
): { services: PipelineServices; publisher: Publisher } {
  const defaults = {
    dailyEventQuota: config.namespaces.dailyEventQuota,
    retentionDays: config.namespaces.retentionDays,
  };

  const router = new NamespaceRouter({
    namespaces: namespaceRepo,
    quota,
    autoCreate: config.namespaces.autoCreate,
    defaults,
    log: deps.log,
  });

  const publisher = new Publisher(
    new RedisStreamTransport(deps.redis),
    {
      topics: config.topics,
      partitions: config.partitions,
      retry: config.publish,
      maxMessageBytes: MAX_MESSAGE_BYTES,
    },
    deps.log,
  );

  const gateway = new IngestionGateway(
    router,
    publisher,
    { maxEventBytes: config.maxEventBytes, awaitAcks: config.awaitAcks },
    deps.log,
  );

  const namespaces = new NamespaceAdmin(namespaceRepo, defaults, deps.log, (name) => {
    router.invalidate(name);
  });

  return {
    publisher,
    services: {
      gateway,
      namespaces,
      probes: [redisHealthProbe(deps.redis), databaseHealthProbe(deps.sql)],
      limits: { maxEventsPerRequest: config.maxEventsPerRequest },
      info: { service: SERVICE_NAME, version: SERVICE_VERSION },
    },
  };
}

/**
 * Bootstrap the ingestion gateway.
 *
 * Order:
 * 1) Infrastructure plugins
 * 2) Services + default namespace
 * 3) HTTP routes
 * 4) Register shutdown hooks
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin, { url: config.redisUrl });
  await fastify.register(dbPlugin, { url: config.databaseUrl });

  // --------------------------------------------------
  // Services
  // --------------------------------------------------

  const namespaceRepo: NamespaceRepository = config.namespaces.store === 'memory'
    ? new InMemoryNamespaceRepository()
    : new DrizzleNamespaceRepository(fastify.db);

  const { services, publisher } = buildServices(
    config,
    { redis: fastify.redis, sql: fastify.sql, log: fastify.log },
    namespaceRepo,
    new RedisQuotaCounter(fastify.redis),
  );

  await services.namespaces.ensure(config.namespaces.defaultName, 'Default Namespace');

  await fastify.register(servicesPlugin, { services });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(ingestRoutes);
  await fastify.register(namespaceRoutes);
  await fastify.register(healthRoutes);

  /**
   * IMPORTANT:
   * Registered BEFORE listen(). preClose runs ahead of every onClose hook,
   * so queued appends reach Redis before the connection quits.
   */
  fastify.addHook('preClose', async () => {
    await publisher.drain();
    fastify.log.info('Publisher drained');
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      fastify.log.info({ signal }, 'Shutting down gateway...');
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          fastify.log.error({ err }, 'Gateway shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start gateway', err);
  process.exit(1);
});
