import type { BaseLogger } from 'pino';
import { describeError, PipelineError } from '../../domain/index.js';
import { decodeEnvelope } from '../../application/envelope-codec.js';
import { retryWithBackoff, sleep } from '../../application/retry.js';
import type { RetryPolicy } from '../../application/retry.js';
import type {
  DeadLetterSink,
  LineageStore,
  LogRecord,
  LogSubscription,
} from '../../application/ports.js';

export type LineageConsumerState =
  | 'idle'
  | 'polling'
  | 'processing'
  | 'committing'
  | 'shutting_down'
  | 'terminal';

export interface LineageConsumerOptions {
  /** Records fetched per poll. */
  pollBatchSize: number;
  pollBlockMs: number;
  forward: RetryPolicy;
  /** Pause after an unexpected poll failure. */
  errorBackoffMs?: number | undefined;
}

/**
 * Forwards lineage events one at a time, in log order, to the lineage store.
 *
 * Idle → Polling → Processing → Committing → Polling …; on abort the
 * current record is finished and the loop ends in Terminal.
 *
 * A record's offset is committed only after the store accepted it, or
 * after it was dead-lettered once its retry budget ran out. The second
 * case keeps the partition moving at the cost of completeness.
 */
export class LineageConsumer {
  private current: LineageConsumerState = 'idle';

  constructor(
    private readonly subscription: LogSubscription,
    private readonly store: LineageStore,
    private readonly deadLetters: DeadLetterSink,
    private readonly options: LineageConsumerOptions,
    private readonly log: BaseLogger,
  ) {}

  get state(): LineageConsumerState {
    return this.current;
  }

  async run(signal: AbortSignal): Promise<void> {
    this.log.info({ topic: this.subscription.topic }, 'Lineage consumer started');

    while (!signal.aborted) {
      this.transition('polling');

      let records: LogRecord[];
      try {
        records = await this.subscription.poll({
          max: this.options.pollBatchSize,
          blockMs: this.options.pollBlockMs,
          signal,
        });
      } catch (err: unknown) {
        if (signal.aborted) break;
        this.log.error({ err, topic: this.subscription.topic }, 'Lineage poll failed, retrying');
        await sleep(this.options.errorBackoffMs ?? 1000);
        continue;
      }

      for (const record of records) {
        // Records left unprocessed stay pending and are redelivered.
        if (signal.aborted) break;
        await this.process(record);
      }
    }

    this.transition('shutting_down');
    this.transition('terminal');
    this.log.info({ topic: this.subscription.topic }, 'Lineage consumer stopped');
  }

  /** Forwards, dead-letters if needed, then commits one record. */
  async process(record: LogRecord): Promise<void> {
    this.transition('processing');

    const decoded = decodeEnvelope(record.fields);
    if (!decoded.ok) {
      this.log.warn({ stream: record.stream, stream_id: record.id, reason: decoded.reason }, 'Undecodable lineage record');
      await this.deadLetter(record, decoded.reason, 0);
      await this.commit(record);
      return;
    }

    const { envelope } = decoded;
    const outcome = await retryWithBackoff(
      (signal) => this.store.accept(envelope.payload_bytes, signal),
      this.options.forward,
      {
        isRetryable: (err) => !(err instanceof PipelineError) || err.retryable,
        onRetry: (err, attempt, delayMs) => {
          this.log.warn(
            { err, event_id: envelope.event_id, run_id: envelope.partition_key, attempt, delayMs },
            'Lineage forward failed, retrying',
          );
        },
      },
    );

    if (outcome.ok) {
      this.log.debug(
        { event_id: envelope.event_id, run_id: envelope.partition_key, attempts: outcome.attempts },
        'Lineage event forwarded',
      );
    } else {
      this.log.error(
        {
          err: outcome.error,
          event_id: envelope.event_id,
          tenant_namespace: envelope.tenant_namespace,
          run_id: envelope.partition_key,
          stream: record.stream,
          stream_id: record.id,
          attempts: outcome.attempts,
        },
        'Lineage forward exhausted, dead-lettering',
      );
      await this.deadLetter(record, describeError(outcome.error), outcome.attempts);
    }

    await this.commit(record);
  }

  private async commit(record: LogRecord): Promise<void> {
    this.transition('committing');
    try {
      await this.subscription.commit([record]);
    } catch (err: unknown) {
      // Uncommitted records are redelivered after restart.
      this.log.error({ err, stream: record.stream, stream_id: record.id }, 'Lineage offset commit failed');
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
      this.log.error(
        { err, stream: record.stream, stream_id: record.id, failure_reason: reason },
        'Dead-letter append failed',
      );
    }
  }

  private transition(next: LineageConsumerState): void {
    this.current = next;
  }
}
