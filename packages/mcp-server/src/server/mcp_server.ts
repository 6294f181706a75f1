import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { createLogger, validateInput, type Logger } from '@arbor/core';
import type {
  McpServerConfig,
  McpToolDefinition,
  RegisteredTool,
  McpResourceHandler,
  McpPromptDefinition,
} from './mcp_server.types.js';
import type { McpDependencyInjectionService } from '../di/mcp_di.js';
import { errorResult, toolErrorResult } from '../tools/helpers.js';

export class McpServer {
  private server: Server;
  private tools: Map<string, RegisteredTool> = new Map();
  private resourceHandler: McpResourceHandler | null = null;
  private prompts: Map<string, McpPromptDefinition> = new Map();
  private di: McpDependencyInjectionService | null = null;
  private readonly logger: Logger;
  private handlersInstalled = false;

  constructor(private config: McpServerConfig, logger?: Logger) {
    this.logger = logger ?? createLogger('[mcp] ', undefined, 'stderr');
    this.server = new Server(
      { name: config.name, version: config.version },
      { capabilities: { tools: {}, resources: {}, prompts: {} } },
    );
  }

  /** Registers the DI container the handlers resolve their services from */
  setDI(di: McpDependencyInjectionService): void {
    this.di = di;
  }

  /**
   * Registers a tool. Arguments are validated against its input schema
   * before the handler sees them.
   */
  registerTool<TInput>(definition: McpToolDefinition<TInput>): void {
    const label = `arguments for ${definition.name}`;
    this.tools.set(definition.name, {
      name: definition.name,
      description: definition.description,
      inputSchema: definition.inputSchema,
      run: async (args, di) => definition.handler(validateInput<TInput>(definition.inputSchema, args, label), di),
    });
  }

  registerResourceHandler(handler: McpResourceHandler): void {
    this.resourceHandler = handler;
  }

  registerPrompt(definition: McpPromptDefinition): void {
    this.prompts.set(definition.name, definition);
  }

  getToolCount(): number {
    return this.tools.size;
  }

  getToolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  getPromptCount(): number {
    return this.prompts.size;
  }

  hasResources(): boolean {
    return this.resourceHandler !== null;
  }

  getName(): string {
    return this.config.name;
  }

  /** Connects the stdio transport and starts listening */
  async connectStdio(): Promise<void> {
    await this.connectTransport(new StdioServerTransport());
  }

  /** Connects any SDK transport (streamable HTTP, in-memory) */
  async connectTransport(transport: Transport): Promise<void> {
    this.setupHandlers();
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  /** Exposes the underlying Server for advanced use */
  getInternalServer(): Server {
    return this.server;
  }

  private setupHandlers(): void {
    if (this.handlersInstalled) return;
    this.handlersInstalled = true;

    // --- Tools ---
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: Array.from(this.tools.values()).map((t) => ({
        name: t.name,
        description: t.description,
        inputSchema: t.inputSchema,
      })),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const tool = this.tools.get(request.params.name);

      if (!tool) {
        return errorResult(`Unknown tool: ${request.params.name}`, 'NOT_FOUND');
      }

      if (!this.di) {
        return errorResult('DI container not initialized', 'INTERNAL_ERROR');
      }

      try {
        const result = await tool.run(request.params.arguments ?? {}, this.di);
        return {
          content: result.content,
          isError: result.isError,
        };
      } catch (error) {
        this.logger.debug(`Tool ${tool.name} failed:`, error);
        return toolErrorResult(error);
      }
    });

    // --- Resources ---
    this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
      if (!this.resourceHandler || !this.di) {
        return { resources: [] };
      }
      try {
        return await this.resourceHandler.list(this.di);
      } catch (error) {
        this.logger.warn('Listing resources failed:', error);
        return { resources: [] };
      }
    });

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      if (!this.resourceHandler || !this.di) {
        throw new Error('Resources not available');
      }
      return await this.resourceHandler.read(request.params.uri, this.di);
    });

    // --- Prompts ---
    this.server.setRequestHandler(ListPromptsRequestSchema, async () => ({
      prompts: Array.from(this.prompts.values()).map((p) => ({
        name: p.name,
        description: p.description,
        arguments: p.arguments,
      })),
    }));

    this.server.setRequestHandler(GetPromptRequestSchema, async (request) => {
      const prompt = this.prompts.get(request.params.name);
      if (!prompt) {
        throw new Error(`Unknown prompt: ${request.params.name}`);
      }
      if (!this.di) {
        throw new Error('DI container not initialized');
      }
      return await prompt.handler(request.params.arguments ?? {}, this.di);
    });
  }
}
