export * from './api_server.js';
export type * from './api_server.types.js';
