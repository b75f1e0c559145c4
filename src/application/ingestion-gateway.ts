import { randomUUID } from 'node:crypto';
import type { BaseLogger } from 'pino';
import { describeError, PublishError } from '../domain/index.js';
import type { Envelope, ErrorCode, EventKind, ValidatedEvent } from '../domain/index.js';
import { canonicalStringify } from './canonical-json.js';
import { validateEvent } from './validator.js';
import type { NamespaceRouter, RoutingDecision } from './namespace-router.js';
import type { Publisher, Submission } from './publisher.js';

export interface AcceptedEvent {
  readonly index: number;
  readonly event_id: string;
  readonly partition_key: string;
}

export interface RejectedEvent {
  readonly index: number;
  readonly code: ErrorCode;
  readonly reason: string;
  readonly field?: string | undefined;
}

/** Per-event outcome of one submission request. */
export interface IngestResult {
  readonly tenant_namespace: string;
  readonly event_kind: EventKind;
  readonly accepted: AcceptedEvent[];
  readonly rejected: RejectedEvent[];
}

export interface IngestionGatewayOptions {
  maxEventBytes: number;
  /**
   * Wait for log acknowledgments before answering. Off by default: the
   * response only confirms the events were handed to the publisher.
   */
  awaitAcks?: boolean | undefined;
  now?: (() => Date) | undefined;
}

/**
 * Boundary between producing teams and the pipeline.
 *
 * Each payload is validated, routed and submitted on its own, so one
 * malformed or over-quota event never costs the producer the rest of
 * the request. Events are submitted in request order.
 */
export class IngestionGateway {
  private readonly now: () => Date;

  constructor(
    private readonly router: NamespaceRouter,
    private readonly publisher: Publisher,
    private readonly options: IngestionGatewayOptions,
    private readonly log: BaseLogger,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async ingest(
    tenantNamespace: string,
    kind: EventKind,
    payloads: readonly unknown[],
  ): Promise<IngestResult> {
    const accepted: AcceptedEvent[] = [];
    const rejected: RejectedEvent[] = [];
    const pending: Array<{ accepted: AcceptedEvent; submission: Submission }> = [];

    for (const [index, raw] of payloads.entries()) {
      const validation = validateEvent(kind, raw, { maxEventBytes: this.options.maxEventBytes });
      if (!validation.ok) {
        rejected.push({
          index,
          code: validation.error.code,
          reason: validation.error.message,
          field: validation.error.field,
        });
        continue;
      }

      const routing = await this.router.route(tenantNamespace, validation.value);
      if (!routing.ok) {
        rejected.push({ index, code: routing.error.code, reason: routing.error.message });
        continue;
      }

      const envelope = this.buildEnvelope(routing.decision, validation.value);

      let submission: Submission;
      try {
        submission = this.publisher.submit(routing.decision.topic, routing.decision.partition_key, envelope);
      } catch (err: unknown) {
        if (!(err instanceof PublishError)) throw err;
        rejected.push({ index, code: err.code, reason: err.message });
        continue;
      }

      const entry: AcceptedEvent = {
        index,
        event_id: envelope.event_id,
        partition_key: envelope.partition_key,
      };

      if (this.options.awaitAcks) {
        pending.push({ accepted: entry, submission });
      } else {
        accepted.push(entry);
        this.observe(submission, entry.event_id);
      }
    }

    if (pending.length > 0) {
      const settled = await Promise.allSettled(pending.map((p) => p.submission.ack));
      settled.forEach((result, i) => {
        const item = pending[i];
        if (item === undefined) return;
        if (result.status === 'fulfilled') {
          accepted.push(item.accepted);
        } else {
          rejected.push({
            index: item.accepted.index,
            code: 'PUBLISH_FAILED',
            reason: describeError(result.reason),
          });
        }
      });
      accepted.sort((a, b) => a.index - b.index);
      rejected.sort((a, b) => a.index - b.index);
    }

    this.log.info(
      {
        namespace: tenantNamespace,
        kind,
        submitted: payloads.length,
        accepted: accepted.length,
        rejected: rejected.length,
      },
      'Ingest request completed',
    );

    return { tenant_namespace: tenantNamespace, event_kind: kind, accepted, rejected };
  }

  private buildEnvelope(decision: RoutingDecision, validated: ValidatedEvent): Envelope {
    return {
      event_id: randomUUID(),
      tenant_namespace: decision.tenant_namespace,
      partition_key: decision.partition_key,
      payload_kind: validated.kind,
      payload_bytes: canonicalStringify(validated.event),
      ingested_at: this.now().toISOString(),
    };
  }

  /** Fire-and-forget: delivery failures are logged, never reported to the producer. */
  private observe(submission: Submission, eventId: string): void {
    void submission.ack.then(
      (ack) => {
        this.log.debug({ event_id: eventId, stream: ack.stream, entry_id: ack.entry_id }, 'Event delivered to log');
      },
      (err: unknown) => {
        this.log.error({ err, event_id: eventId, stream: submission.stream }, 'Event could not be delivered to log');
      },
    );
  }
}
