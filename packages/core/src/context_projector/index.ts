export * from './context_projector.js';
export type * from './context_projector.types.js';
