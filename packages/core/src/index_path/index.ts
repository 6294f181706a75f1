export * from './index_path.js';
