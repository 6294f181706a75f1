export { McpServer } from './mcp_server.js';
export type {
  McpServerConfig,
  ToolResult,
  ToolHandler,
  ToolInputSchema,
  McpToolDefinition,
  RegisteredTool,
  McpResourceEntry,
  McpResourceContent,
  McpResourceHandler,
  McpPromptArgument,
  McpPromptResult,
  McpPromptDefinition,
} from './mcp_server.types.js';
export * from './bootstrap.js';
export { parseMcpArgs } from './args.js';
