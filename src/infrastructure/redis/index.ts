export { default as redisPlugin, createRedisClient } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { RedisStreamTransport, RedisStreamSubscription, parseStreamReply } from './stream-log.js';
export type { StreamSubscriptionOptions } from './stream-log.js';
export { RedisQuotaCounter, quotaKey } from './quota-counter.js';
export { RedisDeadLetterSink } from './dead-letter-sink.js';
export { redisHealthProbe } from './health.js';
