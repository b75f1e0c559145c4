import { z } from 'zod';
import { LINEAGE_EVENT_TYPES, SPAN_STATUSES, METRIC_TYPES } from '../domain/index.js';

const facetsSchema = z.record(z.string(), z.unknown());
const attributesSchema = z.record(z.string(), z.unknown()).default({});

const isoDatetime = z.string().datetime({
  offset: true,
  message: 'Must be a valid ISO-8601 datetime',
});

/**
 * Dataset reference. The namespace is the dataset's own and may name
 * another tenant; cross-tenant references are allowed.
 */
export const datasetRefSchema = z.object({
  namespace: z.string().min(1).max(255),
  name: z.string().min(1).max(1024),
  type: z.string().min(1).max(255).optional(),
  format: z.string().min(1).max(255).optional(),
  facets: facetsSchema.optional(),
});

/**
 * OpenLineage run event, as accepted by the lineage store.
 *
 * Unknown top-level keys are kept so the forwarded payload stays
 * identical to what the producer sent.
 */
export const lineageEventSchema = z.object({
  eventType: z.enum(LINEAGE_EVENT_TYPES),
  eventTime: isoDatetime,
  run: z.object({
    runId: z.string().uuid({ message: 'Must be a UUID' }),
    facets: facetsSchema.optional(),
  }),
  job: z.object({
    namespace: z.string().min(1).max(255),
    name: z.string().min(1).max(1024),
    facets: facetsSchema.optional(),
  }),
  inputs: z.array(datasetRefSchema).default([]),
  outputs: z.array(datasetRefSchema).default([]),
  producer: z.string().min(1).optional(),
  schemaURL: z.string().min(1).optional(),
}).passthrough();

// Bounds follow the otel_traces / otel_metrics column widths.
export const spanSchema = z.object({
  trace_id: z.string().regex(/^[0-9a-f]{32}$/i, 'Must be 32 hex characters'),
  span_id: z.string().regex(/^[0-9a-f]{16}$/i, 'Must be 16 hex characters'),
  parent_span_id: z.string().regex(/^[0-9a-f]{16}$/i, 'Must be 16 hex characters').optional(),
  service_name: z.string().min(1).max(255),
  operation_name: z.string().min(1).max(255),
  start_time: isoDatetime,
  duration: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  status: z.enum(SPAN_STATUSES).default('UNSET'),
  kind: z.string().min(1).max(20).default('INTERNAL'),
  attributes: attributesSchema,
  resource_attributes: attributesSchema,
});

export const metricSchema = z.object({
  metric_name: z.string().min(1).max(255),
  metric_type: z.enum(METRIC_TYPES),
  value: z.number().finite(),
  unit: z.string().max(64).default(''),
  timestamp: isoDatetime,
  service_name: z.string().min(1).max(255),
  attributes: attributesSchema,
  resource_attributes: attributesSchema,
});

export type LineageEventInput = z.infer<typeof lineageEventSchema>;
export type SpanInput = z.infer<typeof spanSchema>;
export type MetricInput = z.infer<typeof metricSchema>;
