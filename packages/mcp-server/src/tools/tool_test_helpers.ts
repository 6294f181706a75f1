import {
  ConfigManager,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_SERVER_URL,
  PlanStore,
  createLogger,
} from '@arbor/core';
import { McpDependencyInjectionService } from '../di/mcp_di.js';
import type { ToolResult } from '../server/mcp_server.types.js';

/**
 * Real plan store behind a DI container, with sequential task ids and
 * silent logging, for exercising tool handlers in process.
 */
export function createTestDi(defaultPlanId: number | null = null) {
  let nextId = 0;
  const logger = createLogger('', 'silent');
  const store = new PlanStore({ logger, createTaskId: () => `t${++nextId}` });
  const config = new ConfigManager({
    defaultPlanId,
    serverUrl: DEFAULT_SERVER_URL,
    host: DEFAULT_HOST,
    port: DEFAULT_PORT,
    logLevel: null,
  });
  const di = new McpDependencyInjectionService({ store, config, logger });
  return { di, store, config };
}

export function parseResult(result: ToolResult): unknown {
  return JSON.parse(result.content[0].text);
}
