import { parseIndexPath } from '@arbor/core';
import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { TaskPathInput } from './task_tools.types.js';
import { describePath, pathProperty, planIdProperty, resolvePlanId, runTool } from '../helpers.js';

/**
 * arbor_task_uncomplete - Reopens a completed task.
 */
export const taskUncompleteTool: McpToolDefinition<TaskPathInput> = {
  name: 'arbor_task_uncomplete',
  description: 'Reopen a completed task. Its subtasks keep their state.',
  inputSchema: {
    type: 'object',
    properties: {
      plan_id: planIdProperty,
      path: pathProperty('Task to reopen.'),
    },
    required: ['path'],
    additionalProperties: false,
  },
  handler: async (input: TaskPathInput, di: McpDependencyInjectionService) =>
    runTool(async () => {
      const container = await di.getContainer();
      const planId = resolvePlanId(container, input.plan_id);
      const path = parseIndexPath(input.path);
      await container.store.uncompleteTask(planId, path);
      return { planId, ...describePath(path), completed: false };
    }),
};
