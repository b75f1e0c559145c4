import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { IngestionGateway } from '../../application/ingestion-gateway.js';
import type { NamespaceAdmin } from '../../application/namespace-admin.js';
import type { HealthProbe } from '../../application/ports.js';

/** Use cases the HTTP routes delegate to. */
export interface PipelineServices {
  gateway: IngestionGateway;
  namespaces: NamespaceAdmin;
  probes: readonly HealthProbe[];
  limits: { maxEventsPerRequest: number };
  info: { service: string; version: string };
}

export interface ServicesPluginOptions {
  services: PipelineServices;
}

/**
 * Decorates `fastify.services`. Wiring happens in the entry point, so
 * tests can register the routes against in-process services.
 */
async function servicesPlugin(fastify: FastifyInstance, options: ServicesPluginOptions): Promise<void> {
  fastify.decorate('services', options.services);
}

export default fp(servicesPlugin, {
  name: 'services',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    services: PipelineServices;
  }
}
