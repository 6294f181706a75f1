import { PlanStore, createConfigManager, createLogger } from '@arbor/core';
import type { McpDiConfig, McpDiContainer } from './mcp_di.types.js';

/**
 * McpDependencyInjectionService - singleton DI container for the MCP server.
 *
 * Builds the plan store, configuration and logger lazily. Several adapters
 * (MCP tools and the exposed REST server) can share one store by passing it in.
 */
export class McpDependencyInjectionService {
  private config: McpDiConfig;
  private container: McpDiContainer | null = null;

  constructor(config: McpDiConfig = {}) {
    this.config = config;
  }

  /**
   * Returns the same instance on subsequent calls.
   */
  async getContainer(): Promise<McpDiContainer> {
    if (!this.container) {
      this.container = this.initialize();
    }
    return this.container;
  }

  private initialize(): McpDiContainer {
    const config = this.config.config ?? createConfigManager(this.config.env);
    // stdout carries the stdio transport, so logs go to stderr
    const logger = this.config.logger ?? createLogger('[mcp] ', config.getConfig().logLevel ?? undefined, 'stderr');
    const store = this.config.store ?? new PlanStore({ logger });
    return { store, config, logger };
  }
}
