import { describe, it, expect, beforeEach } from 'vitest';
import { IngestionGateway } from '../../src/application/ingestion-gateway.js';
import { NamespaceRouter } from '../../src/application/namespace-router.js';
import { newNamespace } from '../../src/application/namespace-admin.js';
import { Publisher } from '../../src/application/publisher.js';
import { decodeEnvelope } from '../../src/application/envelope-codec.js';
import { InMemoryNamespaceRepository } from '../../src/infrastructure/memory/in-memory-namespace-repo.js';
import { InMemoryQuotaCounter } from '../../src/infrastructure/memory/in-memory-quota-counter.js';
import {
  fakeLogger,
  fastPolicy,
  InMemoryLog,
  lineageEvent,
  metric,
  span,
  RUN_A,
  RUN_B,
} from '../helpers.js';

const topics = { lineage: 'lineage-events', spans: 'otel-spans', metrics: 'otel-metrics' };
const defaults = { dailyEventQuota: 1000, retentionDays: 30 };
const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('IngestionGateway', () => {
  let log: InMemoryLog;
  let publisher: Publisher;
  let logger: ReturnType<typeof fakeLogger>;

  function gateway(options: { quota?: number; awaitAcks?: boolean; maxEventBytes?: number } = {}) {
    const repo = new InMemoryNamespaceRepository([
      newNamespace({ name: 'team-a', daily_event_quota: options.quota ?? 1000 }, defaults, NOW),
    ]);
    const router = new NamespaceRouter({
      namespaces: repo,
      quota: new InMemoryQuotaCounter(),
      autoCreate: false,
      defaults,
      log: logger,
      now: () => NOW,
    });
    return new IngestionGateway(
      router,
      publisher,
      {
        maxEventBytes: options.maxEventBytes ?? 65536,
        awaitAcks: options.awaitAcks,
        now: () => NOW,
      },
      logger,
    );
  }

  beforeEach(() => {
    log = new InMemoryLog();
    logger = fakeLogger();
    publisher = new Publisher(
      log,
      { topics, partitions: 4, retry: fastPolicy(2), maxMessageBytes: 1_000_000 },
      logger,
    );
  });

  it('accepts valid events and reports malformed ones by index', async () => {
    const result = await gateway().ingest('team-a', 'lineage', [
      lineageEvent(),
      lineageEvent({ eventTime: 'not a time' }),
      lineageEvent({ run: { runId: RUN_B }, eventType: 'COMPLETE' }),
    ]);
    await publisher.drain();

    expect(result.tenant_namespace).toBe('team-a');
    expect(result.event_kind).toBe('lineage');
    expect(result.accepted.map((a) => [a.index, a.partition_key])).toEqual([[0, RUN_A], [2, RUN_B]]);
    expect(result.rejected).toEqual([
      {
        index: 1,
        code: 'VALIDATION_FAILED',
        reason: 'Must be a valid ISO-8601 datetime',
        field: 'eventTime',
      },
    ]);
    expect(log.topicEntries('lineage-events', 4)).toHaveLength(2);
    expect(logger.info).toHaveBeenCalledWith(
      { namespace: 'team-a', kind: 'lineage', submitted: 3, accepted: 2, rejected: 1 },
      'Ingest request completed',
    );
  });

  it('wraps each payload in an envelope with the canonical payload bytes', async () => {
    const result = await gateway().ingest('team-a', 'metric', [metric({ value: 7 })]);
    await publisher.drain();

    const [entry] = log.topicEntries('otel-metrics', 4);
    const decoded = decodeEnvelope(entry?.fields ?? {});
    if (!decoded.ok) throw new Error(decoded.reason);

    expect(decoded.envelope).toEqual({
      event_id: result.accepted[0]?.event_id,
      tenant_namespace: 'team-a',
      partition_key: 'checkout',
      payload_kind: 'metric',
      payload_bytes:
        '{"attributes":{},"metric_name":"http.requests","metric_type":"counter","resource_attributes":{},'
        + '"service_name":"checkout","timestamp":"2026-03-01T10:00:00.000Z","unit":"","value":7}',
      ingested_at: '2026-03-01T12:00:00.000Z',
    });
  });

  it('rejects events past the quota without touching the others', async () => {
    const result = await gateway({ quota: 2 }).ingest('team-a', 'span', [span(), span(), span()]);

    expect(result.accepted.map((a) => a.index)).toEqual([0, 1]);
    expect(result.rejected).toEqual([
      {
        index: 2,
        code: 'QUOTA_EXCEEDED',
        reason: "Namespace 'team-a' exhausted its daily quota of 2 events for 2026-03-01",
      },
    ]);
  });

  it('does not charge quota for events that fail validation', async () => {
    const result = await gateway({ quota: 1 }).ingest('team-a', 'span', [
      span({ duration: 'long' }),
      span(),
    ]);

    expect(result.accepted.map((a) => a.index)).toEqual([1]);
    expect(result.rejected.map((r) => r.code)).toEqual(['VALIDATION_FAILED']);
  });

  it('rejects every event of an unknown namespace', async () => {
    const result = await gateway().ingest('team-z', 'metric', [metric(), metric()]);

    expect(result.accepted).toEqual([]);
    expect(result.rejected.map((r) => [r.index, r.code])).toEqual([
      [0, 'UNKNOWN_NAMESPACE'],
      [1, 'UNKNOWN_NAMESPACE'],
    ]);
  });

  it('reports oversized payloads', async () => {
    const result = await gateway({ maxEventBytes: 64 }).ingest('team-a', 'lineage', [lineageEvent()]);

    expect(result.rejected[0]).toMatchObject({ index: 0, code: 'VALIDATION_FAILED', field: '(root)' });
  });

  it('with awaitAcks, reports events the log never acknowledged', async () => {
    log.failNextAppends(2);
    const result = await gateway({ awaitAcks: true }).ingest('team-a', 'metric', [
      metric({ service_name: 'billing' }),
      metric({ service_name: 'billing' }),
    ]);

    expect(result.accepted.map((a) => a.index)).toEqual([1]);
    expect(result.rejected).toHaveLength(1);
    expect(result.rejected[0]).toMatchObject({ index: 0, code: 'PUBLISH_FAILED' });
  });

  it('without awaitAcks, logs delivery failures instead of reporting them', async () => {
    log.failNextAppends(2);
    const result = await gateway().ingest('team-a', 'metric', [metric()]);
    await publisher.drain();

    expect(result.accepted).toHaveLength(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event_id: result.accepted[0]?.event_id }),
      'Event could not be delivered to log',
    );
  });
});
