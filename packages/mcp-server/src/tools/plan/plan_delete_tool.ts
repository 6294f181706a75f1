import { parsePlanId } from '@arbor/core';
import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { PlanDeleteInput } from './plan_tools.types.js';
import { planIdProperty, runTool } from '../helpers.js';

/**
 * arbor_plan_delete - Deletes a plan. The id is required here, never defaulted.
 */
export const planDeleteTool: McpToolDefinition<PlanDeleteInput> = {
  name: 'arbor_plan_delete',
  description: 'Delete a plan and all of its tasks. Outstanding leases on it become invalid.',
  inputSchema: {
    type: 'object',
    properties: {
      plan_id: { ...planIdProperty, description: 'Plan id to delete.' },
    },
    required: ['plan_id'],
    additionalProperties: false,
  },
  handler: async (input: PlanDeleteInput, di: McpDependencyInjectionService) =>
    runTool(async () => {
      const { store } = await di.getContainer();
      const planId = parsePlanId(input.plan_id);
      await store.deletePlan(planId);
      return { planId, deleted: true };
    }),
};
