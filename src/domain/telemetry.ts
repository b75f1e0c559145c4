/** Attribute maps as submitted by producers (values of any JSON type). */
export type Attributes = Record<string, unknown>;

export const SPAN_STATUSES = ['OK', 'ERROR', 'UNSET'] as const;
export type SpanStatus = (typeof SPAN_STATUSES)[number];

export const METRIC_TYPES = ['counter', 'gauge', 'histogram'] as const;
export type MetricType = (typeof METRIC_TYPES)[number];

export interface Span {
  readonly trace_id: string;
  readonly span_id: string;
  readonly parent_span_id?: string | undefined;
  readonly service_name: string;
  readonly operation_name: string;
  readonly start_time: string; // ISO-8601
  readonly duration: number; // nanoseconds
  readonly status: SpanStatus;
  readonly kind: string;
  readonly attributes: Attributes;
  readonly resource_attributes: Attributes;
}

export interface Metric {
  readonly metric_name: string;
  readonly metric_type: MetricType;
  readonly value: number;
  readonly unit: string;
  readonly timestamp: string; // ISO-8601
  readonly service_name: string;
  readonly attributes: Attributes;
  readonly resource_attributes: Attributes;
}

export type TelemetryDatum = Span | Metric;
