import { parseIndexPath } from '@arbor/core';
import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { MoveToInput } from './navigation_tools.types.js';
import { describePath, pathProperty, planIdProperty, resolvePlanId, runTool } from '../helpers.js';

/**
 * arbor_move_to - Moves the plan's focus.
 */
export const moveToTool: McpToolDefinition<MoveToInput> = {
  name: 'arbor_move_to',
  description: 'Move the current focus to a task. Use "root" or [] to focus the plan root.',
  inputSchema: {
    type: 'object',
    properties: {
      plan_id: planIdProperty,
      path: pathProperty('Task to focus.'),
    },
    required: ['path'],
    additionalProperties: false,
  },
  handler: async (input: MoveToInput, di: McpDependencyInjectionService) =>
    runTool(async () => {
      const container = await di.getContainer();
      const planId = resolvePlanId(container, input.plan_id);
      const current = await container.store.moveTo(planId, parseIndexPath(input.path));
      return { planId, ...describePath(current.path), task: current.task };
    }),
};
