import {
  pgTable,
  varchar,
  text,
  integer,
  bigint,
  bigserial,
  doublePrecision,
  timestamp,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';

/**
 * Tenant namespaces.
 *
 * `name` is the natural primary key: producers address a namespace by
 * name, and concurrent auto-creation resolves through ON CONFLICT DO NOTHING.
 */
export const namespaces = pgTable('namespaces', {
  name: varchar('name', { length: 50 }).primaryKey(),
  display_name: varchar('display_name', { length: 255 }).notNull(),
  description: text('description').notNull().default(''),
  owners: jsonb('owners').$type<string[]>().notNull().default([]),
  daily_event_quota: integer('daily_event_quota').notNull(),
  storage_retention_days: integer('storage_retention_days').notNull(),
  tags: jsonb('tags').$type<Record<string, string>>().notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

/**
 * Spans, one row each. Attribute maps are stored flattened to
 * string values so they can be filtered with `->>`.
 */
export const otelTraces = pgTable('otel_traces', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  timestamp: timestamp('timestamp', { withTimezone: true, precision: 6 }).notNull(),
  trace_id: varchar('trace_id', { length: 32 }).notNull(),
  span_id: varchar('span_id', { length: 16 }).notNull(),
  parent_span_id: varchar('parent_span_id', { length: 16 }).notNull().default(''),
  operation_name: varchar('operation_name', { length: 255 }).notNull(),
  service_name: varchar('service_name', { length: 255 }).notNull(),
  duration_ns: bigint('duration_ns', { mode: 'number' }).notNull(),
  status_code: varchar('status_code', { length: 10 }).notNull(),
  span_kind: varchar('span_kind', { length: 20 }).notNull(),
  namespace: varchar('namespace', { length: 50 }).notNull(),
  attributes: jsonb('attributes').$type<Record<string, string>>().notNull().default({}),
  resource_attributes: jsonb('resource_attributes').$type<Record<string, string>>().notNull().default({}),
}, (table) => [
  index('idx_otel_traces_namespace_timestamp').on(table.namespace, table.timestamp),
  index('idx_otel_traces_trace_id').on(table.trace_id),
  index('idx_otel_traces_service_name').on(table.service_name),
]);

/** Metric data points, one row each. */
export const otelMetrics = pgTable('otel_metrics', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  timestamp: timestamp('timestamp', { withTimezone: true, precision: 6 }).notNull(),
  metric_name: varchar('metric_name', { length: 255 }).notNull(),
  metric_type: varchar('metric_type', { length: 20 }).notNull(),
  value: doublePrecision('value').notNull(),
  unit: varchar('unit', { length: 64 }).notNull().default(''),
  service_name: varchar('service_name', { length: 255 }).notNull(),
  namespace: varchar('namespace', { length: 50 }).notNull(),
  attributes: jsonb('attributes').$type<Record<string, string>>().notNull().default({}),
  resource_attributes: jsonb('resource_attributes').$type<Record<string, string>>().notNull().default({}),
}, (table) => [
  index('idx_otel_metrics_namespace_timestamp').on(table.namespace, table.timestamp),
  index('idx_otel_metrics_metric_name').on(table.metric_name),
]);
