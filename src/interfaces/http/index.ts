export { default as servicesPlugin } from './services-plugin.js';
export type { PipelineServices, ServicesPluginOptions } from './services-plugin.js';
export { default as ingestRoutes } from './ingest-routes.js';
export { default as namespaceRoutes } from './namespace-routes.js';
export { default as healthRoutes } from './health-routes.js';
