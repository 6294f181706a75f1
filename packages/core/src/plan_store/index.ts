export * from './plan_store.js';
export * from './example_plan.js';
export type * from './plan_store.types.js';
