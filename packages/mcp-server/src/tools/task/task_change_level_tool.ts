import { parseIndexPath, parseLevel } from '@arbor/core';
import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { TaskChangeLevelInput } from './task_tools.types.js';
import { describePath, levelProperty, pathProperty, planIdProperty, resolvePlanId, runTool } from '../helpers.js';

/**
 * arbor_task_change_level - Relabels a task's abstraction level.
 */
export const taskChangeLevelTool: McpToolDefinition<TaskChangeLevelInput> = {
  name: 'arbor_task_change_level',
  description: 'Change the abstraction level of a task. Any outstanding lease on it is revoked.',
  inputSchema: {
    type: 'object',
    properties: {
      plan_id: planIdProperty,
      path: pathProperty('Task to relabel.'),
      level: levelProperty,
    },
    required: ['path', 'level'],
    additionalProperties: false,
  },
  handler: async (input: TaskChangeLevelInput, di: McpDependencyInjectionService) =>
    runTool(async () => {
      const container = await di.getContainer();
      const planId = resolvePlanId(container, input.plan_id);
      const path = parseIndexPath(input.path);
      const level = parseLevel(input.level);
      await container.store.changeLevel(planId, path, level);
      return { planId, ...describePath(path), level };
    }),
};
