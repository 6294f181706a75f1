export * from './server/index.js';
export { McpDependencyInjectionService } from './di/mcp_di.js';
export type * from './di/mcp_di.types.js';
export { registerAllTools } from './tools/index.js';
export { successResult, errorResult, toolErrorResult } from './tools/helpers.js';
export { createResourceHandler, parseResourceUri } from './resources/index.js';
export { getAllPrompts } from './prompts/index.js';
