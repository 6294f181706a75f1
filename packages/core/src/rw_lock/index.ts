export * from './rw_lock.js';
