import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { PlanScopedInput } from './navigation_tools.types.js';
import { describePath, planIdProperty, resolvePlanId, runTool } from '../helpers.js';

/**
 * arbor_get_current - Path and task under the focus.
 */
export const getCurrentTool: McpToolDefinition<PlanScopedInput> = {
  name: 'arbor_get_current',
  description: 'Get the current focus: its index path and task (null when the focus is the plan root).',
  inputSchema: {
    type: 'object',
    properties: {
      plan_id: planIdProperty,
    },
    additionalProperties: false,
  },
  handler: async (input: PlanScopedInput, di: McpDependencyInjectionService) =>
    runTool(async () => {
      const container = await di.getContainer();
      const planId = resolvePlanId(container, input.plan_id);
      const current = await container.store.getCurrent(planId);
      return { planId, ...describePath(current.path), task: current.task };
    }),
};
