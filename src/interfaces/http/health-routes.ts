import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

type ProbeStatus = 'healthy' | 'unhealthy';

/**
 * GET /api/v1/health - 200 when every dependency answers, 503 otherwise.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  const { probes, info } = fastify.services;

  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const results = await Promise.all(
        probes.map(async (probe): Promise<[string, ProbeStatus]> => {
          try {
            return [probe.name, (await probe.check()) ? 'healthy' : 'unhealthy'];
          } catch (err: unknown) {
            fastify.log.warn({ err, probe: probe.name }, 'Health probe failed');
            return [probe.name, 'unhealthy'];
          }
        }),
      );

      const healthy = results.every(([, status]) => status === 'healthy');
      return reply.status(healthy ? 200 : 503).send({
        status: healthy ? 'healthy' : 'degraded',
        service: info.service,
        version: info.version,
        checks: Object.fromEntries(results),
      });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['services'],
  fastify: '5.x',
});
