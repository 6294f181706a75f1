import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { PathArgument, PlanIdArgument } from '../helpers.js';
import { describePath, optionalPath, pathProperty, planIdProperty, runTool } from '../helpers.js';

export interface LeaseGenerateInput {
  plan_id?: PlanIdArgument;
  /** Defaults to the current focus. */
  path?: PathArgument;
}

/**
 * arbor_lease_generate - Claims a task for completion.
 */
export const leaseGenerateTool: McpToolDefinition<LeaseGenerateInput> = {
  name: 'arbor_lease_generate',
  description:
    'Generate a lease for a task before completing it. Any earlier lease on the task stops working. ' +
    'Returns the lease token and verification suggestions for the task level.',
  inputSchema: {
    type: 'object',
    properties: {
      plan_id: planIdProperty,
      path: pathProperty('Task to lease. Defaults to the current focus.'),
    },
    additionalProperties: false,
  },
  handler: async (input: LeaseGenerateInput, di: McpDependencyInjectionService) =>
    runTool(async () => {
      const { store, config } = await di.getContainer();
      const planId = config.resolvePlanId(input.plan_id);
      const grant = await store.generateLease(planId, optionalPath(input.path));
      return { ...grant, ...describePath(grant.path) };
    }),
};
