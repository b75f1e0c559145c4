export { loadConfig, ConfigError } from './config.js';
export type { PipelineConfig } from './config.js';
export {
  redisPlugin,
  createRedisClient,
  RedisStreamTransport,
  RedisStreamSubscription,
  RedisQuotaCounter,
  RedisDeadLetterSink,
  redisHealthProbe,
} from './redis/index.js';
export {
  dbPlugin,
  createDbClient,
  ensureSchema,
  DrizzleNamespaceRepository,
  PostgresTimeSeriesStore,
  databaseHealthProbe,
} from './db/index.js';
export type { Database } from './db/index.js';
export { HttpLineageStore } from './lineage/index.js';
export { InMemoryQuotaCounter, InMemoryNamespaceRepository } from './memory/index.js';
export { LineageConsumer, TelemetryConsumer } from './worker/index.js';
