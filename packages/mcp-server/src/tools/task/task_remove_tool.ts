import { parseIndexPath } from '@arbor/core';
import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { TaskPathInput } from './task_tools.types.js';
import { describePath, pathProperty, planIdProperty, resolvePlanId, runTool } from '../helpers.js';

/**
 * arbor_task_remove - Removes a task and its subtree.
 */
export const taskRemoveTool: McpToolDefinition<TaskPathInput> = {
  name: 'arbor_task_remove',
  description:
    'Remove a task with all of its subtasks. Later siblings shift down by one, ' +
    'so re-read paths before the next call.',
  inputSchema: {
    type: 'object',
    properties: {
      plan_id: planIdProperty,
      path: pathProperty('Task to remove.'),
    },
    required: ['path'],
    additionalProperties: false,
  },
  handler: async (input: TaskPathInput, di: McpDependencyInjectionService) =>
    runTool(async () => {
      const container = await di.getContainer();
      const planId = resolvePlanId(container, input.plan_id);
      const path = parseIndexPath(input.path);
      const removed = await container.store.removeTask(planId, path);
      return { planId, ...describePath(path), removed };
    }),
};
