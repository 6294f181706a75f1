export * from './plan.js';
export type * from './plan_tree.types.js';
