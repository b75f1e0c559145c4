import { pino } from 'pino';
import {
  decodeMetricRow,
  decodeTraceRow,
} from './application/index.js';
import type { MetricRow, TraceRow } from './application/index.js';
import {
  loadConfig,
  createRedisClient,
  createDbClient,
  ensureSchema,
  RedisStreamSubscription,
  RedisDeadLetterSink,
  PostgresTimeSeriesStore,
  HttpLineageStore,
  LineageConsumer,
  TelemetryConsumer,
} from './infrastructure/index.js';

/**
 * Standalone worker process: one consumer loop per topic.
 *
 * - lineage: per-record forwarding to the lineage store, in log order
 * - spans / metrics: batched bulk inserts into Postgres
 *
 * Each loop reads through its own Redis connection because XREADGROUP
 * BLOCK holds the connection. Scale out by launching more instances with
 * distinct WORKER_ID values; the consumer groups split the entries.
 */
const config = loadConfig();
const log = pino({ level: config.logLevel });

const redis = createRedisClient(config.redisUrl, `lineage-relay-${config.workerId}`);
const readers = {
  lineage: redis.duplicate({ connectionName: `lineage-relay-${config.workerId}-lineage` }),
  spans: redis.duplicate({ connectionName: `lineage-relay-${config.workerId}-spans` }),
  metrics: redis.duplicate({ connectionName: `lineage-relay-${config.workerId}-metrics` }),
};

for (const client of [redis, ...Object.values(readers)]) {
  client.on('error', (err: Error) => {
    log.error({ err }, 'Redis connection error');
  });
}

const { sql, db } = createDbClient(config.databaseUrl, {
  maxConnections: 4,
  applicationName: `lineage-relay-${config.workerId}`,
});

// Abort controller for graceful shutdown
const ac = new AbortController();

function subscribe(topic: string, group: string, connection: typeof redis): RedisStreamSubscription {
  return new RedisStreamSubscription(
    connection,
    { topic, partitions: config.partitions, group, consumer: config.workerId },
    log.child({ component: group }),
  );
}

async function main(): Promise<void> {
  await Promise.all([redis, ...Object.values(readers)].map((client) => client.connect()));
  log.info('Redis connected');

  await ensureSchema(sql);
  log.info('Database ready (namespaces + otel tables)');

  const deadLetters = new RedisDeadLetterSink(redis, config.deadLetterStream);
  const timeSeries = new PostgresTimeSeriesStore(db);

  const lineageSub = subscribe(config.topics.lineage, 'lineage-forwarder', readers.lineage);
  const spanSub = subscribe(config.topics.spans, 'span-writer', readers.spans);
  const metricSub = subscribe(config.topics.metrics, 'metric-writer', readers.metrics);

  for (const sub of [lineageSub, spanSub, metricSub]) {
    await sub.ensureGroups();
  }

  const lineage = new LineageConsumer(
    lineageSub,
    new HttpLineageStore(config.lineageStoreUrl),
    deadLetters,
    { pollBatchSize: 10, pollBlockMs: config.pollBlockMs, forward: config.forward },
    log.child({ component: 'lineage-consumer' }),
  );

  const batching = {
    maxCount: config.batch.maxCount,
    maxAgeMs: config.batch.maxAgeMs,
    checkIntervalMs: config.batch.checkIntervalMs,
    write: config.bulkWrite,
  };

  const spans = new TelemetryConsumer<TraceRow>(
    spanSub,
    {
      decode: decodeTraceRow,
      write: (rows, signal) => timeSeries.insertTraces(rows, signal),
    },
    deadLetters,
    { ...batching, table: 'otel_traces' },
    log.child({ component: 'span-consumer' }),
  );

  const metrics = new TelemetryConsumer<MetricRow>(
    metricSub,
    {
      decode: decodeMetricRow,
      write: (rows, signal) => timeSeries.insertMetrics(rows, signal),
    },
    deadLetters,
    { ...batching, table: 'otel_metrics' },
    log.child({ component: 'metric-consumer' }),
  );

  await Promise.all([
    lineage.run(ac.signal),
    spans.run(ac.signal),
    metrics.run(ac.signal),
  ]);

  await Promise.all([redis, ...Object.values(readers)].map((client) => client.quit()));
  await sql.end();
  log.info('Worker stopped');
}

// Graceful shutdown on SIGINT / SIGTERM: loops finish their current
// record or batch, flush, then connections close.
function shutdown(): void {
  if (ac.signal.aborted) return;
  log.info('Shutting down worker...');
  ac.abort();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
