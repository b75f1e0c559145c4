import type { Sql } from 'postgres';

/**
 * Creates the pipeline's tables if they are missing.
 * drizzle-kit migrations remain the production path; this keeps a fresh
 * local database usable on first start.
 */
export async function ensureSchema(sql: Sql): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS namespaces (
      name                   VARCHAR(50)  PRIMARY KEY,
      display_name           VARCHAR(255) NOT NULL,
      description            TEXT         NOT NULL DEFAULT '',
      owners                 JSONB        NOT NULL DEFAULT '[]',
      daily_event_quota      INTEGER      NOT NULL,
      storage_retention_days INTEGER      NOT NULL,
      tags                   JSONB        NOT NULL DEFAULT '{}',
      created_at             TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      updated_at             TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS otel_traces (
      id                  BIGSERIAL    PRIMARY KEY,
      timestamp           TIMESTAMPTZ(6) NOT NULL,
      trace_id            VARCHAR(32)  NOT NULL,
      span_id             VARCHAR(16)  NOT NULL,
      parent_span_id      VARCHAR(16)  NOT NULL DEFAULT '',
      operation_name      VARCHAR(255) NOT NULL,
      service_name        VARCHAR(255) NOT NULL,
      duration_ns         BIGINT       NOT NULL,
      status_code         VARCHAR(10)  NOT NULL,
      span_kind           VARCHAR(20)  NOT NULL,
      namespace           VARCHAR(50)  NOT NULL,
      attributes          JSONB        NOT NULL DEFAULT '{}',
      resource_attributes JSONB        NOT NULL DEFAULT '{}'
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS otel_metrics (
      id                  BIGSERIAL    PRIMARY KEY,
      timestamp           TIMESTAMPTZ(6) NOT NULL,
      metric_name         VARCHAR(255) NOT NULL,
      metric_type         VARCHAR(20)  NOT NULL,
      value               DOUBLE PRECISION NOT NULL,
      unit                VARCHAR(64)  NOT NULL DEFAULT '',
      service_name        VARCHAR(255) NOT NULL,
      namespace           VARCHAR(50)  NOT NULL,
      attributes          JSONB        NOT NULL DEFAULT '{}',
      resource_attributes JSONB        NOT NULL DEFAULT '{}'
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_otel_traces_namespace_timestamp ON otel_traces (namespace, timestamp)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_otel_traces_trace_id ON otel_traces (trace_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_otel_traces_service_name ON otel_traces (service_name)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_otel_metrics_namespace_timestamp ON otel_metrics (namespace, timestamp)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_otel_metrics_metric_name ON otel_metrics (metric_name)`);
}
