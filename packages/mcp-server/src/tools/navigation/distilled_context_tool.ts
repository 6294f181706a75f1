import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { PlanScopedInput } from './navigation_tools.types.js';
import { planIdProperty, resolvePlanId, runTool } from '../helpers.js';

/**
 * arbor_get_distilled_context - The focused projection agents should work from.
 */
export const distilledContextTool: McpToolDefinition<PlanScopedInput> = {
  name: 'arbor_get_distilled_context',
  description:
    'Get a compact view of the plan around the current focus: goal, progress, the focused task ' +
    'with its ancestors and children, a task tree expanded along the focus, level guidance and recent history.',
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
      return container.store.getDistilledContext(resolvePlanId(container, input.plan_id));
    }),
};
