export * from './change_notifier.js';
export type * from './change_notifier.types.js';
