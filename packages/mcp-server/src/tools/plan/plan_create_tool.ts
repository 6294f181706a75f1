import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { PlanCreateInput } from './plan_tools.types.js';
import { runTool } from '../helpers.js';

/**
 * arbor_plan_create - Creates a plan and returns its id.
 */
export const planCreateTool: McpToolDefinition<PlanCreateInput> = {
  name: 'arbor_plan_create',
  description: 'Create a new plan for a goal. Returns the plan id to pass as plan_id to the other tools.',
  inputSchema: {
    type: 'object',
    properties: {
      goal: { type: 'string', minLength: 1, description: 'What the plan should achieve.' },
      notes: { type: 'string', description: 'Optional plan-level notes.' },
    },
    required: ['goal'],
    additionalProperties: false,
  },
  handler: async (input: PlanCreateInput, di: McpDependencyInjectionService) =>
    runTool(async () => {
      const { store } = await di.getContainer();
      const planId = await store.createPlan(input.goal, input.notes ?? null);
      return { planId, goal: input.goal };
    }),
};
