import type { McpServer } from '../server/mcp_server.js';
import { planCreateTool, planGetTool, planListTool, planDeleteTool } from './plan/index.js';
import {
  taskAddTool,
  taskCompleteTool,
  taskUncompleteTool,
  taskRemoveTool,
  taskChangeLevelTool,
} from './task/index.js';
import { moveToTool, getCurrentTool, distilledContextTool } from './navigation/index.js';
import { notesGetTool, notesSetTool, notesDeleteTool } from './notes/index.js';
import { leaseGenerateTool } from './lease/index.js';
import { guideTool } from './help/index.js';

/**
 * Registers all MCP tools on the server.
 * Called during bootstrap, before connecting transport.
 */
export function registerAllTools(server: McpServer): void {
  // Plans
  server.registerTool(planCreateTool);
  server.registerTool(planGetTool);
  server.registerTool(planListTool);
  server.registerTool(planDeleteTool);

  // Tasks
  server.registerTool(taskAddTool);
  server.registerTool(taskCompleteTool);
  server.registerTool(taskUncompleteTool);
  server.registerTool(taskRemoveTool);
  server.registerTool(taskChangeLevelTool);

  // Navigation
  server.registerTool(moveToTool);
  server.registerTool(getCurrentTool);
  server.registerTool(distilledContextTool);

  // Notes
  server.registerTool(notesGetTool);
  server.registerTool(notesSetTool);
  server.registerTool(notesDeleteTool);

  // Leases and help
  server.registerTool(leaseGenerateTool);
  server.registerTool(guideTool);
}
