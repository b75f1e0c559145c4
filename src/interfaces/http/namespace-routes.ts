import fp from 'fastify-plugin';
import { z } from 'zod';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { NAMESPACE_NAME_RE } from '../../domain/index.js';

const limitsShape = {
  display_name: z.string().min(1).max(255).optional(),
  description: z.string().max(2000).optional(),
  owners: z.array(z.string().min(1)).optional(),
  daily_event_quota: z.number().int().positive().optional(),
  storage_retention_days: z.number().int().positive().optional(),
  tags: z.record(z.string()).optional(),
};

const createNamespaceSchema = z.object({
  name: z.string().regex(
    NAMESPACE_NAME_RE,
    'Must be 3-50 lowercase letters, digits or dashes, starting and ending with a letter or digit',
  ),
  ...limitsShape,
});

const patchNamespaceSchema = z
  .object(limitsShape)
  .strict()
  .refine((patch) => Object.values(patch).some((v) => v !== undefined), {
    message: 'At least one field is required',
  });

/**
 * Namespace administration.
 *
 * POST  /api/v1/namespaces        - register a namespace
 * GET   /api/v1/namespaces        - list namespaces
 * GET   /api/v1/namespaces/:name  - get one namespace
 * PATCH /api/v1/namespaces/:name  - update mutable fields
 */
async function namespaceRoutes(fastify: FastifyInstance): Promise<void> {
  const admin = fastify.services.namespaces;

  fastify.post(
    '/api/v1/namespaces',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = createNamespaceSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const result = await admin.create(parsed.data);
      if (!result.ok) {
        return result.reason === 'already_exists'
          ? reply.status(409).send({ error: `Namespace '${parsed.data.name}' already exists` })
          : reply.status(400).send({ error: `Invalid namespace name '${parsed.data.name}'` });
      }

      return reply.status(201).send(result.namespace);
    },
  );

  fastify.get(
    '/api/v1/namespaces',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const items = await admin.list();
      return reply.status(200).send({ namespaces: items, total: items.length });
    },
  );

  fastify.get(
    '/api/v1/namespaces/:name',
    async (request: FastifyRequest<{ Params: { name: string } }>, reply: FastifyReply) => {
      const ns = await admin.get(request.params.name);
      if (ns === null) {
        return reply.status(404).send({ error: 'Namespace not found' });
      }
      return reply.status(200).send(ns);
    },
  );

  fastify.patch(
    '/api/v1/namespaces/:name',
    async (
      request: FastifyRequest<{ Params: { name: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = patchNamespaceSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const ns = await admin.update(request.params.name, parsed.data);
      if (ns === null) {
        return reply.status(404).send({ error: 'Namespace not found' });
      }
      return reply.status(200).send(ns);
    },
  );
}

export default fp(namespaceRoutes, {
  name: 'namespace-routes',
  dependencies: ['services'],
  fastify: '5.x',
});
