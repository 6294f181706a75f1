export * from './lease_registry.js';
