export { namespaces, otelTraces, otelMetrics } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClientOptions } from './client.js';
export { ensureSchema } from './migrate.js';
export { DrizzleNamespaceRepository } from './namespace-repository.js';
export { PostgresTimeSeriesStore } from './telemetry-store.js';
export { databaseHealthProbe } from './health.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
