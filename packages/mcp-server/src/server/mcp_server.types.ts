import type { McpDependencyInjectionService } from '../di/mcp_di.js';

/**
 * MCP server configuration
 */
export interface McpServerConfig {
  /** Name announced during MCP negotiation */
  name: string;
  /** Server version (semver) */
  version: string;
  description?: string;
}

/**
 * Structured result returned by every tool handler.
 * Always JSON serializable, never free text.
 */
export type ToolResult = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  /** true when the tool hit a business or validation error */
  isError?: boolean;
};

/**
 * JSON Schema (draft-07) describing a tool's arguments.
 * The root is always an object so MCP clients can render it.
 */
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, object>;
  required?: string[];
  additionalProperties?: boolean;
};

/**
 * Handler for a single tool.
 * Receives input already validated against the tool's schema, plus the DI container.
 */
export type ToolHandler<TInput> = (
  input: TInput,
  di: McpDependencyInjectionService,
) => Promise<ToolResult>;

/**
 * Complete MCP tool definition ready to register.
 */
export interface McpToolDefinition<TInput> {
  /** Tool name in snake_case (e.g. arbor_task_add) */
  name: string;
  /** Human readable description for the AI client */
  description: string;
  inputSchema: ToolInputSchema;
  handler: ToolHandler<TInput>;
}

/**
 * Registered form of a tool: the input type is erased behind validation.
 */
export interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  run: (args: unknown, di: McpDependencyInjectionService) => Promise<ToolResult>;
}

// --- Resources ---

/** MCP Resource descriptor returned by resources/list */
export interface McpResourceEntry {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

/** MCP Resource content returned by resources/read */
export interface McpResourceContent {
  uri: string;
  mimeType?: string;
  text: string;
}

/** Handler pair for resource list + read operations */
export interface McpResourceHandler {
  list: (di: McpDependencyInjectionService) => Promise<{ resources: McpResourceEntry[] }>;
  read: (uri: string, di: McpDependencyInjectionService) => Promise<{ contents: McpResourceContent[] }>;
}

// --- Prompts ---

/** MCP Prompt argument definition */
export interface McpPromptArgument {
  name: string;
  description?: string;
  required?: boolean;
}

/** Result returned by prompts/get */
export type McpPromptResult = {
  description?: string;
  messages: Array<{
    role: 'user' | 'assistant';
    content: { type: 'text'; text: string };
  }>;
};

export interface McpPromptDefinition {
  name: string;
  description?: string;
  arguments?: McpPromptArgument[];
  handler: (args: Record<string, string>, di: McpDependencyInjectionService) => Promise<McpPromptResult>;
}
