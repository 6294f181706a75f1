export * from './config_manager.js';
export type * from './config_manager.types.js';
