/**
 * Seams between the pipeline's use cases and its infrastructure.
 * Production adapters live under src/infrastructure; tests supply
 * in-process stand-ins.
 */
import type { TenantNamespace } from '../domain/index.js';
import type { TraceRow, MetricRow } from './telemetry-rows.js';

// ─── Partitioned log ─────────────────────────────────────────

/** Appends one entry to a stream and returns the broker-assigned id. */
export interface LogTransport {
  append(stream: string, fields: Readonly<Record<string, string>>): Promise<string>;
}

/** One delivered, not-yet-committed log entry. */
export interface LogRecord {
  readonly id: string;
  readonly stream: string;
  readonly fields: Readonly<Record<string, string>>;
}

export interface PollOptions {
  /** Maximum records to return. */
  max: number;
  /** Longest time to wait when nothing is available. */
  blockMs: number;
  signal: AbortSignal;
}

/**
 * Consumer-group membership over all partitions of one topic.
 * Records of one partition are returned in log order; `commit`
 * acknowledges them so the group never redelivers them.
 */
export interface LogSubscription {
  readonly topic: string;
  poll(options: PollOptions): Promise<LogRecord[]>;
  commit(records: readonly LogRecord[]): Promise<void>;
}

// ─── Downstream stores ───────────────────────────────────────

/** Record-oriented lineage store; accepts one OpenLineage event per call. */
export interface LineageStore {
  accept(payloadJson: string, signal: AbortSignal): Promise<void>;
}

/** Bulk-insert time-series store, one homogeneous batch per call. */
export interface TimeSeriesStore {
  insertTraces(rows: readonly TraceRow[], signal: AbortSignal): Promise<void>;
  insertMetrics(rows: readonly MetricRow[], signal: AbortSignal): Promise<void>;
}

export interface DeadLetterRecord {
  /** Raw log entry as read, serialized. */
  readonly original_envelope: string;
  readonly failure_reason: string;
  readonly attempt_count: number;
  readonly topic: string;
  readonly stream_id: string;
  readonly tenant_namespace: string;
  readonly failed_at: string;
}

/** Append-only store for events that could not be delivered. */
export interface DeadLetterSink {
  append(record: DeadLetterRecord): Promise<void>;
}

// ─── Namespaces & quota ──────────────────────────────────────

export interface NamespacePatch {
  display_name?: string | undefined;
  description?: string | undefined;
  owners?: string[] | undefined;
  daily_event_quota?: number | undefined;
  storage_retention_days?: number | undefined;
  tags?: Record<string, string> | undefined;
}

export interface NamespaceRepository {
  findByName(name: string): Promise<TenantNamespace | undefined>;
  list(): Promise<TenantNamespace[]>;
  /** Inserts unless the name is taken; resolves undefined on conflict. */
  insert(namespace: TenantNamespace): Promise<TenantNamespace | undefined>;
  update(name: string, patch: NamespacePatch): Promise<TenantNamespace | undefined>;
}

export interface QuotaIncrement {
  readonly admitted: boolean;
  /** Counter value after the call. */
  readonly used: number;
}

/**
 * Per-tenant, per-UTC-day event counters.
 * `tryIncrement` is an atomic compare-and-increment: it only counts the
 * event if the counter is still below `limit`.
 */
export interface QuotaCounter {
  tryIncrement(namespace: string, day: string, limit: number): Promise<QuotaIncrement>;
  current(namespace: string, day: string): Promise<number>;
}

// ─── Health ──────────────────────────────────────────────────

export interface HealthProbe {
  readonly name: string;
  check(): Promise<boolean>;
}
