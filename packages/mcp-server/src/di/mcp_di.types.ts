import type { ConfigManager, Logger, PlanStore } from '@arbor/core';

/**
 * Initialization options for the MCP server DI container.
 * Anything left out is built from the environment.
 */
export interface McpDiConfig {
  store?: PlanStore;
  config?: ConfigManager;
  logger?: Logger;
  /** Environment used to build the ConfigManager when none is given. */
  env?: NodeJS.ProcessEnv;
}

/**
 * Container with every service instantiated and ready.
 */
export interface McpDiContainer {
  store: PlanStore;
  config: ConfigManager;
  logger: Logger;
}
