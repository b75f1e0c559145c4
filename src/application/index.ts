export { datasetRefSchema, lineageEventSchema, spanSchema, metricSchema } from './event-schema.js';
export type { LineageEventInput, SpanInput, MetricInput } from './event-schema.js';
export { validateEvent, estimateSerializedSize } from './validator.js';
export type { ValidatorOptions, ValidationResult } from './validator.js';
export { canonicalStringify } from './canonical-json.js';
export { fnv1a32, partitionFor, streamName, partitionStreams } from './partitioning.js';
export { retryWithBackoff, computeBackoff, executeWithTimeout, sleep } from './retry.js';
export type { RetryPolicy, RetryOutcome, RetryHooks } from './retry.js';
export { Batch } from './batch.js';
export { ENVELOPE_FIELD, encodeEnvelope, decodeEnvelope } from './envelope-codec.js';
export type { DecodeResult } from './envelope-codec.js';
export {
  toTraceRow,
  toMetricRow,
  flattenAttributes,
  decodeTraceRow,
  decodeMetricRow,
} from './telemetry-rows.js';
export type { TraceRow, MetricRow, RowDecodeResult } from './telemetry-rows.js';
export { NamespaceAdmin, newNamespace, autoCreatedNamespace } from './namespace-admin.js';
export type { NamespaceDefaults, CreateNamespaceInput, CreateNamespaceResult } from './namespace-admin.js';
export { NamespaceRouter, utcDayKey, partitionKeyOf } from './namespace-router.js';
export type { RoutingDecision, RoutingOutcome, NamespaceRouterOptions } from './namespace-router.js';
export { Publisher } from './publisher.js';
export type { PublisherOptions, Ack, Submission } from './publisher.js';
export { IngestionGateway } from './ingestion-gateway.js';
export type {
  IngestionGatewayOptions,
  IngestResult,
  AcceptedEvent,
  RejectedEvent,
} from './ingestion-gateway.js';
export type * from './ports.js';
