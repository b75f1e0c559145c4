import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';

export interface RedisPluginOptions {
  url: string;
}

/** Longest pause between reconnect attempts. */
const MAX_RECONNECT_DELAY_MS = 5_000;

/**
 * Client settings shared by the gateway and every worker connection.
 * `connectionName` shows up in CLIENT LIST, one per reader.
 */
export function createRedisClient(url: string, connectionName = 'lineage-relay'): Redis {
  return new Redis(url, {
    connectionName,
    // XREADGROUP BLOCK holds a command open; it must not be failed by a retry cap.
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
    retryStrategy: (times) => Math.min(times * 200, MAX_RECONNECT_DELAY_MS),
  });
}

/**
 * Gateway Redis connection: stream appends, quota counters and the
 * health probe all share `fastify.redis`.
 */
async function redisPlugin(fastify: FastifyInstance, options: RedisPluginOptions): Promise<void> {
  const redis = createRedisClient(options.url, 'lineage-relay-gateway');
  redis.on('error', (err: Error) => {
    fastify.log.error({ err }, 'Redis connection error');
  });

  await redis.connect();
  fastify.log.info('Redis connected');

  fastify.decorate('redis', redis);

  fastify.addHook('onClose', async () => {
    await redis.quit();
    fastify.log.info('Redis disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}
