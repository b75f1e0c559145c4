import type { BaseLogger } from 'pino';
import { describeError } from '../../domain/index.js';
import { Batch } from '../../application/batch.js';
import { decodeEnvelope } from '../../application/envelope-codec.js';
import { retryWithBackoff, sleep } from '../../application/retry.js';
import type { RetryPolicy } from '../../application/retry.js';
import type { RowDecodeResult } from '../../application/telemetry-rows.js';
import type { DeadLetterSink, LogRecord, LogSubscription } from '../../application/ports.js';

export type TelemetryConsumerState = 'idle' | 'accumulating' | 'flushing' | 'stopped';

export type FlushTrigger = 'count' | 'age' | 'shutdown';

export interface TelemetryConsumerOptions {
  /** Table name, used in logs. */
  table: string;
  maxCount: number;
  maxAgeMs: number;
  /** Longest a poll may wait before the age trigger is re-checked. */
  checkIntervalMs: number;
  write: RetryPolicy;
  errorBackoffMs?: number | undefined;
  now?: (() => number) | undefined;
}

/** Per-kind plumbing: how to turn a payload into a row, and how to write rows. */
export interface TelemetrySink<R> {
  decode(payloadJson: string, namespace: string): RowDecodeResult<R>;
  write(rows: readonly R[], signal: AbortSignal): Promise<void>;
}

interface BatchItem<R> {
  readonly record: LogRecord;
  readonly row: R;
}

/**
 * Batches one telemetry topic (spans or metrics) into bulk writes.
 *
 * A batch is flushed when it holds `maxCount` rows or its oldest row has
 * waited `maxAgeMs`. Polls never block longer than `checkIntervalMs` or
 * the time left until the age trigger, whichever is shorter, so a slow
 * trickle still flushes on time.
 *
 * Offsets are committed for the whole batch after a successful write, or
 * after the batch was dead-lettered once its retry budget ran out.
 * Each topic gets its own instance and loop; nothing is shared.
 */
export class TelemetryConsumer<R> {
  private current: TelemetryConsumerState = 'idle';
  private readonly batch: Batch<BatchItem<R>>;

  constructor(
    private readonly subscription: LogSubscription,
    private readonly sink: TelemetrySink<R>,
    private readonly deadLetters: DeadLetterSink,
    private readonly options: TelemetryConsumerOptions,
    private readonly log: BaseLogger,
  ) {
    this.batch = new Batch(options.maxCount, options.maxAgeMs, options.now ?? Date.now);
  }

  get state(): TelemetryConsumerState {
    return this.current;
  }

  /** Rows waiting for the next flush. */
  get buffered(): number {
    return this.batch.size;
  }

  async run(signal: AbortSignal): Promise<void> {
    this.log.info(
      { topic: this.subscription.topic, table: this.options.table, maxCount: this.options.maxCount, maxAgeMs: this.options.maxAgeMs },
      'Telemetry consumer started',
    );

    while (!signal.aborted) {
      const untilDue = this.batch.msUntilDue();
      const blockMs = Math.max(
        1,
        untilDue === null ? this.options.checkIntervalMs : Math.min(untilDue, this.options.checkIntervalMs),
      );

      let records: LogRecord[] = [];
      try {
        records = await this.subscription.poll({ max: this.batch.remaining, blockMs, signal });
      } catch (err: unknown) {
        if (signal.aborted) break;
        this.log.error({ err, topic: this.subscription.topic }, 'Telemetry poll failed, retrying');
        await sleep(this.options.errorBackoffMs ?? 1000);
      }

      for (const record of records) {
        await this.accept(record);
      }

      if (this.batch.isFull()) {
        await this.flush('count');
      } else if (this.batch.isDue()) {
        await this.flush('age');
      }
    }

    await this.flush('shutdown');
    this.current = 'stopped';
    this.log.info({ topic: this.subscription.topic }, 'Telemetry consumer stopped');
  }

  /** Writes the current batch (if any) and commits its offsets. */
  async flush(trigger: FlushTrigger): Promise<void> {
    if (this.batch.size === 0) return;

    this.current = 'flushing';
    const items = this.batch.drain();
    const rows = items.map((item) => item.row);
    const records = items.map((item) => item.record);

    const outcome = await retryWithBackoff(
      (signal) => this.sink.write(rows, signal),
      this.options.write,
      {
        onRetry: (err, attempt, delayMs) => {
          this.log.warn(
            { err, table: this.options.table, rows: rows.length, attempt, delayMs },
            'Bulk write failed, retrying',
          );
        },
      },
    );

    if (outcome.ok) {
      this.log.info(
        { table: this.options.table, rows: rows.length, trigger, attempts: outcome.attempts },
        'Telemetry batch flushed',
      );
    } else {
      this.log.error(
        { err: outcome.error, table: this.options.table, rows: rows.length, trigger, attempts: outcome.attempts },
        'Bulk write exhausted, dead-lettering batch',
      );
      const reason = describeError(outcome.error);
      for (const record of records) {
        await this.deadLetter(record, reason, outcome.attempts);
      }
    }

    await this.commit(records);
    this.current = 'accumulating';
  }

  private async accept(record: LogRecord): Promise<void> {
    const decoded = decodeEnvelope(record.fields);
    const row = decoded.ok
      ? this.sink.decode(decoded.envelope.payload_bytes, decoded.envelope.tenant_namespace)
      : decoded;

    if (!row.ok) {
      this.log.warn({ stream: record.stream, stream_id: record.id, reason: row.reason }, 'Undecodable telemetry record');
      await this.deadLetter(record, row.reason, 0);
      await this.commit([record]);
      return;
    }

    this.batch.add({ record, row: row.row });
    this.current = 'accumulating';
  }

  private async commit(records: readonly LogRecord[]): Promise<void> {
    try {
      await this.subscription.commit(records);
    } catch (err: unknown) {
      this.log.error({ err, topic: this.subscription.topic, count: records.length }, 'Telemetry offset commit failed');
    }
  }

  private async deadLetter(record: LogRecord, reason: string, attempts: number): Promise<void> {
    try {
      await this.deadLetters.append({
        original_envelope: JSON.stringify(record.fields),
        failure_reason: reason,
        attempt_count: attempts,
        topic: this.subscription.topic,
        stream_id: record.id,
        tenant_namespace: record.fields['tenant_namespace'] ?? 'unknown',
        failed_at: new Date().toISOString(),
      });
    } catch (err: unknown) {
      this.log.error({ err, stream: record.stream, stream_id: record.id }, 'Dead-letter append failed');
    }
  }
}
