import fp from 'fastify-plugin';
import { z } from 'zod';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { EVENT_KINDS } from '../../domain/index.js';
import type { EventKind } from '../../domain/index.js';

const eventKindSchema = z.enum(EVENT_KINDS);

function batchBodySchema(maxEvents: number) {
  return z.object({
    tenant_namespace: z.string().min(1),
    events: z.array(z.unknown()).min(1).max(maxEvents),
  });
}

function telemetryBodySchema(maxEvents: number) {
  return z
    .object({
      tenant_namespace: z.string().min(1),
      traces: z.array(z.unknown()).default([]),
      metrics: z.array(z.unknown()).default([]),
    })
    .refine((body) => body.traces.length + body.metrics.length > 0, {
      message: 'At least one trace or metric is required',
      path: ['traces'],
    })
    .refine((body) => body.traces.length + body.metrics.length <= maxEvents, {
      message: `At most ${maxEvents} traces and metrics per request`,
      path: ['traces'],
    });
}

/**
 * Ingestion routes. A well-formed request always answers 202 with a
 * per-event result, even when every event was rejected.
 *
 * POST /api/v1/ingest/:event_kind  - lineage | span | metric batch
 * POST /api/v1/lineage/ingest      - lineage batch
 * POST /api/v1/telemetry/ingest    - spans and metrics in one request
 */
async function ingestRoutes(fastify: FastifyInstance): Promise<void> {
  const { gateway, limits } = fastify.services;
  const batchSchema = batchBodySchema(limits.maxEventsPerRequest);
  const telemetrySchema = telemetryBodySchema(limits.maxEventsPerRequest);

  async function ingestBatch(kind: EventKind, body: unknown, reply: FastifyReply) {
    const parsed = batchSchema.safeParse(body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
    }

    const result = await gateway.ingest(parsed.data.tenant_namespace, kind, parsed.data.events);
    return reply.status(202).send(result);
  }

  fastify.post(
    '/api/v1/ingest/:event_kind',
    async (
      request: FastifyRequest<{ Params: { event_kind: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const kind = eventKindSchema.safeParse(request.params.event_kind);
      if (!kind.success) {
        return reply.status(400).send({
          error: `Unknown event kind '${request.params.event_kind}'; expected one of ${EVENT_KINDS.join(', ')}`,
        });
      }
      return ingestBatch(kind.data, request.body, reply);
    },
  );

  fastify.post(
    '/api/v1/lineage/ingest',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) =>
      ingestBatch('lineage', request.body, reply),
  );

  fastify.post(
    '/api/v1/telemetry/ingest',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = telemetrySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const { tenant_namespace, traces, metrics } = parsed.data;
      const spanResult = await gateway.ingest(tenant_namespace, 'span', traces);
      const metricResult = await gateway.ingest(tenant_namespace, 'metric', metrics);

      return reply.status(202).send({
        tenant_namespace,
        traces: spanResult,
        metrics: metricResult,
      });
    },
  );
}

export default fp(ingestRoutes, {
  name: 'ingest-routes',
  dependencies: ['services'],
  fastify: '5.x',
});
