import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { PlanListInput } from './plan_tools.types.js';
import { runTool } from '../helpers.js';

/**
 * arbor_plan_list - Ids and goals of every plan.
 */
export const planListTool: McpToolDefinition<PlanListInput> = {
  name: 'arbor_plan_list',
  description: 'List every plan with its id and goal.',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false,
  },
  handler: async (_input: PlanListInput, di: McpDependencyInjectionService) =>
    runTool(async () => {
      const { store } = await di.getContainer();
      const plans = await store.listPlans();
      return { plans, total: plans.length };
    }),
};
