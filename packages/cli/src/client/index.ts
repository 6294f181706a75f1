export { ArborHttpClient, ArborConnectionError } from './arbor_client.js';
export type * from './arbor_client.types.js';
