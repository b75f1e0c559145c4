import type { LineageEvent } from './lineage.js';
import type { Metric, Span } from './telemetry.js';

/** The three payload kinds the pipeline accepts. */
export const EVENT_KINDS = ['lineage', 'span', 'metric'] as const;
export type EventKind = (typeof EVENT_KINDS)[number];

/** Validated payload, discriminated by kind. */
export type ValidatedEvent =
  | { readonly kind: 'lineage'; readonly event: LineageEvent }
  | { readonly kind: 'span'; readonly event: Span }
  | { readonly kind: 'metric'; readonly event: Metric };

/** Payload type for a given kind. */
export type PayloadOf<K extends EventKind> = Extract<ValidatedEvent, { kind: K }>['event'];

/**
 * Routable wrapper around a validated event, as appended to the log.
 *
 * `payload_bytes` holds the canonical JSON text of the payload.
 * `event_id` is assigned by the gateway and identifies the submission.
 */
export interface Envelope {
  readonly event_id: string;
  readonly tenant_namespace: string;
  readonly partition_key: string;
  readonly payload_kind: EventKind;
  readonly payload_bytes: string;
  readonly ingested_at: string; // ISO-8601
}

/** Logical topic names, resolved to stream names by configuration. */
export type TopicRole = 'lineage' | 'spans' | 'metrics';

export const TOPIC_BY_KIND: Readonly<Record<EventKind, TopicRole>> = {
  lineage: 'lineage',
  span: 'spans',
  metric: 'metrics',
};
