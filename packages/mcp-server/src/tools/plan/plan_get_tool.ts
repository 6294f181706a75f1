import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { PlanSelectInput } from './plan_tools.types.js';
import { planIdProperty, resolvePlanId, runTool } from '../helpers.js';

/**
 * arbor_plan_get - Full snapshot of a plan: task tree, focus and history.
 */
export const planGetTool: McpToolDefinition<PlanSelectInput> = {
  name: 'arbor_plan_get',
  description: 'Get the full plan: goal, notes, the whole task tree with leases, the current focus and recent history.',
  inputSchema: {
    type: 'object',
    properties: {
      plan_id: planIdProperty,
    },
    additionalProperties: false,
  },
  handler: async (input: PlanSelectInput, di: McpDependencyInjectionService) =>
    runTool(async () => {
      const container = await di.getContainer();
      return container.store.getPlan(resolvePlanId(container, input.plan_id));
    }),
};
