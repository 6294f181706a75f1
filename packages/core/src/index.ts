export * from './errors/index.js';
export * from './levels/index.js';
export * from './index_path/index.js';
export * from './plan_tree/index.js';
export * from './rw_lock/index.js';
export * from './lease_registry/index.js';
export * from './change_notifier/index.js';
export * from './context_projector/index.js';
export * from './plan_store/index.js';
export * from './logger/index.js';
export * from './config_manager/index.js';
export * from './validation/index.js';
export * from './guide/index.js';
