import type { Attributes, Metric, Span } from '../domain/index.js';
import { spanSchema, metricSchema } from './event-schema.js';

/** Row of the traces table. Attribute maps are flattened to string values. */
export interface TraceRow {
  timestamp: Date;
  trace_id: string;
  span_id: string;
  parent_span_id: string;
  operation_name: string;
  service_name: string;
  duration_ns: number;
  status_code: string;
  span_kind: string;
  namespace: string;
  attributes: Record<string, string>;
  resource_attributes: Record<string, string>;
}

/** Row of the metrics table. */
export interface MetricRow {
  timestamp: Date;
  metric_name: string;
  metric_type: string;
  value: number;
  unit: string;
  service_name: string;
  namespace: string;
  attributes: Record<string, string>;
  resource_attributes: Record<string, string>;
}

export function toTraceRow(span: Span, namespace: string): TraceRow {
  return {
    timestamp: new Date(span.start_time),
    trace_id: span.trace_id.toLowerCase(),
    span_id: span.span_id.toLowerCase(),
    parent_span_id: span.parent_span_id?.toLowerCase() ?? '',
    operation_name: span.operation_name,
    service_name: span.service_name,
    duration_ns: span.duration,
    status_code: span.status,
    span_kind: span.kind,
    namespace,
    attributes: flattenAttributes(span.attributes),
    resource_attributes: flattenAttributes(span.resource_attributes),
  };
}

export function toMetricRow(metric: Metric, namespace: string): MetricRow {
  return {
    timestamp: new Date(metric.timestamp),
    metric_name: metric.metric_name,
    metric_type: metric.metric_type,
    value: metric.value,
    unit: metric.unit,
    service_name: metric.service_name,
    namespace,
    attributes: flattenAttributes(metric.attributes),
    resource_attributes: flattenAttributes(metric.resource_attributes),
  };
}

/**
 * Flattens an attribute map into string→string form.
 *
 * Nested objects become dotted keys (`{ http: { method: 'GET' } }` →
 * `http.method = "GET"`), arrays are JSON-encoded, other scalars are
 * stringified, `undefined` entries are dropped.
 */
export function flattenAttributes(attributes: Attributes, prefix = ''): Record<string, string> {
  const flat: Record<string, string> = {};

  for (const [key, value] of Object.entries(attributes)) {
    const name = `${prefix}${key}`;
    if (value === undefined) continue;

    if (value === null) {
      flat[name] = 'null';
    } else if (typeof value === 'string') {
      flat[name] = value;
    } else if (Array.isArray(value)) {
      flat[name] = JSON.stringify(value);
    } else if (isPlainObject(value)) {
      Object.assign(flat, flattenAttributes(value, `${name}.`));
    } else {
      flat[name] = String(value);
    }
  }

  return flat;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export type RowDecodeResult<R> =
  | { readonly ok: true; readonly row: R }
  | { readonly ok: false; readonly reason: string };

/** Decodes a span payload read from the log into a trace row. */
export function decodeTraceRow(payloadJson: string, namespace: string): RowDecodeResult<TraceRow> {
  const parsed = spanSchema.safeParse(parseJson(payloadJson));
  if (!parsed.success) return { ok: false, reason: `Invalid span payload: ${parsed.error.issues[0]?.message ?? 'unknown issue'}` };
  return { ok: true, row: toTraceRow(parsed.data, namespace) };
}

/** Decodes a metric payload read from the log into a metric row. */
export function decodeMetricRow(payloadJson: string, namespace: string): RowDecodeResult<MetricRow> {
  const parsed = metricSchema.safeParse(parseJson(payloadJson));
  if (!parsed.success) return { ok: false, reason: `Invalid metric payload: ${parsed.error.issues[0]?.message ?? 'unknown issue'}` };
  return { ok: true, row: toMetricRow(parsed.data, namespace) };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
