export { createResourceHandler, parseResourceUri, planResourceUri, GUIDE_URI } from './mcp_resources.js';
export type * from './mcp_resources.types.js';
