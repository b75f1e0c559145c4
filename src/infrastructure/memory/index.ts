export { InMemoryQuotaCounter } from './in-memory-quota-counter.js';
export { InMemoryNamespaceRepository } from './in-memory-namespace-repo.js';
