export * from './plan_errors.js';
