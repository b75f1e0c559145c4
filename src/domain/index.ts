export { LINEAGE_EVENT_TYPES } from './lineage.js';
export type { LineageEvent, LineageEventType, LineageJob, LineageRun, DatasetRef, Facets } from './lineage.js';
export { SPAN_STATUSES, METRIC_TYPES } from './telemetry.js';
export type { Span, Metric, SpanStatus, MetricType, TelemetryDatum, Attributes } from './telemetry.js';
export { EVENT_KINDS, TOPIC_BY_KIND } from './envelope.js';
export type { EventKind, ValidatedEvent, PayloadOf, Envelope, TopicRole } from './envelope.js';
export { NAMESPACE_NAME_RE, isValidNamespaceName } from './namespace.js';
export type { TenantNamespace } from './namespace.js';
export {
  PipelineError,
  ValidationError,
  UnknownNamespaceError,
  QuotaExceededError,
  PublishError,
  ForwardError,
  BulkWriteError,
  AttemptTimeoutError,
  describeError,
} from './errors.js';
export type { ErrorCode, PublishFailureKind } from './errors.js';
