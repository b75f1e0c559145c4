import type { BaseLogger } from 'pino';
import type {
  DeadLetterRecord,
  DeadLetterSink,
  LineageStore,
  LogRecord,
  LogSubscription,
  LogTransport,
  PollOptions,
  TimeSeriesStore,
} from '../src/application/ports.js';
import type { MetricRow, TraceRow } from '../src/application/telemetry-rows.js';
import type { RetryPolicy } from '../src/application/retry.js';
import { partitionStreams } from '../src/application/partitioning.js';
import { canonicalStringify } from '../src/application/canonical-json.js';
import { encodeEnvelope } from '../src/application/envelope-codec.js';
import type { EventKind } from '../src/domain/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  const log = {
    level: 'info',
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
  };
  return log as typeof log & BaseLogger;
}

/** Retry policy that finishes quickly in tests. */
export function fastPolicy(maxAttempts: number): RetryPolicy {
  return { maxAttempts, backoffBaseMs: 1, backoffMaxMs: 2, attemptTimeoutMs: 1000 };
}

// ─── In-process partitioned log ──────────────────────────────

interface StoredEntry {
  id: string;
  fields: Record<string, string>;
}

/**
 * Stand-in for Redis Streams: append-only streams with consumer groups.
 * Delivered entries stay pending per group until committed; `restart`
 * makes a group redeliver its pending entries, as after a crash.
 */
export class InMemoryLog implements LogTransport {
  readonly streams = new Map<string, StoredEntry[]>();
  private seq = 0;
  private failuresLeft = 0;
  private readonly waiters = new Set<() => void>();

  /** Makes the next `count` appends throw. */
  failNextAppends(count: number): void {
    this.failuresLeft = count;
  }

  async append(stream: string, fields: Readonly<Record<string, string>>): Promise<string> {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error('connection reset');
    }
    this.seq++;
    const id = `${this.seq}-0`;
    const entries = this.streams.get(stream) ?? [];
    entries.push({ id, fields: { ...fields } });
    this.streams.set(stream, entries);
    for (const wake of this.waiters) wake();
    return id;
  }

  entries(stream: string): StoredEntry[] {
    return this.streams.get(stream) ?? [];
  }

  /** Every entry of a topic across its partitions. */
  topicEntries(topic: string, partitions: number): StoredEntry[] {
    return partitionStreams(topic, partitions).flatMap((s) => this.entries(s));
  }

  subscribe(topic: string, partitions: number): InMemorySubscription {
    return new InMemorySubscription(this, topic, partitionStreams(topic, partitions));
  }

  /** Resolves on the next append, abort, or after `ms`. */
  waitForAppend(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.waiters.delete(done);
        signal.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.waiters.add(done);
      signal.addEventListener('abort', done);
    });
  }
}

export class InMemorySubscription implements LogSubscription {
  private readonly cursors = new Map<string, number>();
  private readonly pending = new Map<string, LogRecord>();
  private redeliver: LogRecord[] = [];
  private buffered: LogRecord[] = [];
  readonly committed: LogRecord[] = [];
  pollCount = 0;

  constructor(
    private readonly log: InMemoryLog,
    readonly topic: string,
    private readonly streams: string[],
  ) {}

  async poll(options: PollOptions): Promise<LogRecord[]> {
    this.pollCount++;
    if (options.signal.aborted) return [];

    if (this.buffered.length === 0) {
      this.buffered = this.take(options.max);
      if (this.buffered.length === 0) {
        await this.log.waitForAppend(options.blockMs, options.signal);
        if (options.signal.aborted) return [];
        this.buffered = this.take(options.max);
      }
    }
    return this.buffered.splice(0, options.max);
  }

  async commit(records: readonly LogRecord[]): Promise<void> {
    for (const record of records) {
      if (this.pending.delete(key(record))) this.committed.push(record);
    }
  }

  /** Delivered but not yet committed. */
  get pendingCount(): number {
    return this.pending.size;
  }

  /** Simulates a consumer restart: pending entries are delivered again first. */
  restart(): void {
    this.buffered = [];
    this.redeliver = [...this.pending.values()];
  }

  /** Like XREADGROUP, `max` caps each stream, not the whole read. */
  private take(max: number): LogRecord[] {
    if (this.redeliver.length > 0) {
      const out = this.redeliver;
      this.redeliver = [];
      return out;
    }

    const out: LogRecord[] = [];
    for (const stream of this.streams) {
      const entries = this.log.entries(stream);
      let cursor = this.cursors.get(stream) ?? 0;
      let taken = 0;
      while (taken < max && cursor < entries.length) {
        const entry = entries[cursor];
        cursor++;
        if (entry === undefined) continue;
        const record: LogRecord = { id: entry.id, stream, fields: entry.fields };
        this.pending.set(key(record), record);
        out.push(record);
        taken++;
      }
      this.cursors.set(stream, cursor);
    }
    return out;
  }
}

function key(record: LogRecord): string {
  return `${record.stream}/${record.id}`;
}

// ─── Recording downstream fakes ──────────────────────────────

type Script = (payload: string, call: number) => void;

export class RecordingLineageStore implements LineageStore {
  readonly accepted: string[] = [];
  calls = 0;

  /** `script` may throw to fail a call. */
  constructor(private readonly script: Script = () => {}) {}

  async accept(payloadJson: string): Promise<void> {
    this.calls++;
    this.script(payloadJson, this.calls);
    this.accepted.push(payloadJson);
  }
}

export class RecordingTimeSeriesStore implements TimeSeriesStore {
  readonly traceBatches: TraceRow[][] = [];
  readonly metricBatches: MetricRow[][] = [];
  traceFailures = 0;

  async insertTraces(rows: readonly TraceRow[]): Promise<void> {
    if (this.traceFailures > 0) {
      this.traceFailures--;
      throw new Error('connection terminated');
    }
    this.traceBatches.push([...rows]);
  }

  async insertMetrics(rows: readonly MetricRow[]): Promise<void> {
    this.metricBatches.push([...rows]);
  }
}

export class RecordingDeadLetterSink implements DeadLetterSink {
  readonly records: DeadLetterRecord[] = [];

  async append(record: DeadLetterRecord): Promise<void> {
    this.records.push(record);
  }
}

/** Polls `condition` until it holds or `timeoutMs` passes. */
export async function waitUntil(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('waitUntil timed out');
    await new Promise((resolve) => setTimeout(resolve, 2));
  }
}

let envelopeSeq = 0;

/** Stream entry fields for `payload`, as the publisher would write them. */
export function envelopeFields(
  kind: EventKind,
  payload: unknown,
  tenant = 'team-a',
  partitionKey = 'key',
): Record<string, string> {
  envelopeSeq++;
  return encodeEnvelope({
    event_id: `evt-${envelopeSeq}`,
    tenant_namespace: tenant,
    partition_key: partitionKey,
    payload_kind: kind,
    payload_bytes: canonicalStringify(payload),
    ingested_at: '2026-03-01T10:00:00.000Z',
  });
}

// ─── Event factories ─────────────────────────────────────────

export const RUN_A = '3f2b8c1e-0a4d-4c6b-9e7f-1a2b3c4d5e6f';
export const RUN_B = '7c9e6679-7425-40de-944b-e07fc1f90ae7';
export const TRACE_A = '4bf92f3577b34da6a3ce929d0e0e4736';
export const TRACE_B = '0af7651916cd43dd8448eb211c80319c';

export function lineageEvent(overrides: Record<string, unknown> = {}) {
  return {
    eventType: 'START',
    eventTime: '2026-03-01T10:00:00.000Z',
    run: { runId: RUN_A },
    job: { namespace: 'team-a', name: 'daily_orders' },
    inputs: [{ namespace: 'postgres://warehouse', name: 'public.orders' }],
    outputs: [{ namespace: 'postgres://warehouse', name: 'analytics.orders_daily' }],
    producer: 'https://example.com/producer',
    ...overrides,
  };
}

let spanSeq = 0;

export function span(overrides: Record<string, unknown> = {}) {
  spanSeq++;
  return {
    trace_id: TRACE_A,
    span_id: spanSeq.toString(16).padStart(16, '0'),
    service_name: 'checkout',
    operation_name: 'GET /cart',
    start_time: '2026-03-01T10:00:00.000Z',
    duration: 1_500_000,
    status: 'OK',
    attributes: { 'http.method': 'GET' },
    ...overrides,
  };
}

export function metric(overrides: Record<string, unknown> = {}) {
  return {
    metric_name: 'http.requests',
    metric_type: 'counter',
    value: 1,
    timestamp: '2026-03-01T10:00:00.000Z',
    service_name: 'checkout',
    ...overrides,
  };
}
