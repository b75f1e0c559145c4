import { describe, it, expect, beforeEach } from 'vitest';
import { TelemetryConsumer } from '../../src/infrastructure/worker/telemetry-consumer.js';
import type { TelemetryConsumerOptions } from '../../src/infrastructure/worker/telemetry-consumer.js';
import { decodeMetricRow, decodeTraceRow } from '../../src/application/telemetry-rows.js';
import type { MetricRow, TraceRow } from '../../src/application/telemetry-rows.js';
import {
  envelopeFields,
  fakeLogger,
  fastPolicy,
  InMemoryLog,
  InMemorySubscription,
  metric,
  RecordingDeadLetterSink,
  RecordingTimeSeriesStore,
  span,
  waitUntil,
} from '../helpers.js';

const SPANS = 'otel-spans';
const METRICS = 'otel-metrics';

describe('TelemetryConsumer', () => {
  let log: InMemoryLog;
  let sub: InMemorySubscription;
  let store: RecordingTimeSeriesStore;
  let deadLetters: RecordingDeadLetterSink;
  let logger: ReturnType<typeof fakeLogger>;

  function spanConsumer(options: Partial<TelemetryConsumerOptions> = {}) {
    return new TelemetryConsumer<TraceRow>(
      sub,
      { decode: decodeTraceRow, write: (rows) => store.insertTraces(rows) },
      deadLetters,
      {
        table: 'otel_traces',
        maxCount: 100,
        maxAgeMs: 60_000,
        checkIntervalMs: 5,
        write: fastPolicy(2),
        ...options,
      },
      logger,
    );
  }

  async function appendSpans(count: number): Promise<void> {
    for (let i = 0; i < count; i++) {
      await log.append(`${SPANS}:0`, envelopeFields('span', span()));
    }
  }

  beforeEach(() => {
    log = new InMemoryLog();
    sub = log.subscribe(SPANS, 1);
    store = new RecordingTimeSeriesStore();
    deadLetters = new RecordingDeadLetterSink();
    logger = fakeLogger();
  });

  it('flushes a full batch, then the remainder on shutdown', async () => {
    await appendSpans(150);
    const consumer = spanConsumer();
    const ac = new AbortController();
    const running = consumer.run(ac.signal);

    await waitUntil(() => store.traceBatches.length === 1 && consumer.buffered === 50);
    expect(store.traceBatches[0]).toHaveLength(100);
    expect(sub.committed).toHaveLength(100);

    ac.abort();
    await running;

    expect(store.traceBatches.map((b) => b.length)).toEqual([100, 50]);
    expect(sub.committed).toHaveLength(150);
    expect(consumer.state).toBe('stopped');
    expect(logger.info).toHaveBeenCalledWith(
      { table: 'otel_traces', rows: 50, trigger: 'shutdown', attempts: 1 },
      'Telemetry batch flushed',
    );
  });

  it('flushes a partial batch once its oldest row is old enough', async () => {
    await appendSpans(3);
    const consumer = spanConsumer({ maxAgeMs: 20 });
    const ac = new AbortController();
    const running = consumer.run(ac.signal);

    await waitUntil(() => store.traceBatches.length === 1);
    expect(store.traceBatches[0]).toHaveLength(3);
    expect(logger.info).toHaveBeenCalledWith(
      { table: 'otel_traces', rows: 3, trigger: 'age', attempts: 1 },
      'Telemetry batch flushed',
    );

    ac.abort();
    await running;
    expect(store.traceBatches).toHaveLength(1);
  });

  it('keeps rows in log order within a batch', async () => {
    const spans = [span(), span(), span()];
    for (const s of spans) await log.append(`${SPANS}:0`, envelopeFields('span', s));
    const consumer = spanConsumer({ maxCount: 3 });
    const ac = new AbortController();
    const running = consumer.run(ac.signal);

    await waitUntil(() => store.traceBatches.length === 1);
    ac.abort();
    await running;

    expect(store.traceBatches[0]?.map((r) => r.span_id)).toEqual(spans.map((s) => s.span_id));
  });

  it('dead-letters every row of a batch the store keeps refusing, then commits', async () => {
    store.traceFailures = 10;
    await appendSpans(2);
    const consumer = spanConsumer({ maxAgeMs: 5 });
    const ac = new AbortController();
    const running = consumer.run(ac.signal);

    await waitUntil(() => sub.committed.length === 2);
    ac.abort();
    await running;

    expect(store.traceBatches).toEqual([]);
    expect(deadLetters.records).toHaveLength(2);
    expect(deadLetters.records[0]).toMatchObject({
      failure_reason: 'Error: connection terminated',
      attempt_count: 2,
      topic: SPANS,
      tenant_namespace: 'team-a',
    });
  });

  it('dead-letters a payload that is not a span without holding up the batch', async () => {
    await log.append(`${SPANS}:0`, envelopeFields('span', { trace_id: 'zz' }));
    await appendSpans(1);
    const consumer = spanConsumer({ maxAgeMs: 5 });
    const ac = new AbortController();
    const running = consumer.run(ac.signal);

    await waitUntil(() => store.traceBatches.length === 1);
    ac.abort();
    await running;

    expect(store.traceBatches[0]).toHaveLength(1);
    expect(deadLetters.records).toHaveLength(1);
    expect(deadLetters.records[0]).toMatchObject({
      failure_reason: 'Invalid span payload: Must be 32 hex characters',
      attempt_count: 0,
    });
    expect(sub.committed).toHaveLength(2);
  });

  it('a failing span table does not hold up metrics', async () => {
    store.traceFailures = 1000;
    await appendSpans(5);
    for (let i = 0; i < 5; i++) {
      await log.append(`${METRICS}:0`, envelopeFields('metric', metric({ value: i })));
    }

    const metricSub = log.subscribe(METRICS, 1);
    const metrics = new TelemetryConsumer<MetricRow>(
      metricSub,
      { decode: decodeMetricRow, write: (rows) => store.insertMetrics(rows) },
      deadLetters,
      { table: 'otel_metrics', maxCount: 5, maxAgeMs: 60_000, checkIntervalMs: 5, write: fastPolicy(2) },
      logger,
    );
    const spans = spanConsumer({
      maxAgeMs: 5,
      write: { maxAttempts: 1000, backoffBaseMs: 5, backoffMaxMs: 5, attemptTimeoutMs: 1000 },
    });

    const ac = new AbortController();
    const runningSpans = spans.run(ac.signal);
    const runningMetrics = metrics.run(ac.signal);

    await waitUntil(() => store.metricBatches.length === 1 && store.traceFailures < 1000);
    expect(spans.state).toBe('flushing');
    expect(store.metricBatches[0]?.map((r) => r.value)).toEqual([0, 1, 2, 3, 4]);
    expect(store.traceBatches).toEqual([]);

    ac.abort();
    await runningMetrics;
    store.traceFailures = 0;
    await runningSpans;
    expect(store.traceBatches.map((b) => b.length)).toEqual([5]);
  });
});
