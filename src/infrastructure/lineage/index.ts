export { HttpLineageStore } from './http-lineage-store.js';
