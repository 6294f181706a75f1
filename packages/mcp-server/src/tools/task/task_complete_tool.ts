import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { TaskCompleteInput } from './task_tools.types.js';
import { describePath, optionalPath, pathProperty, planIdProperty, runTool } from '../helpers.js';

/**
 * arbor_task_complete - Completes a task with the lease from arbor_lease_generate.
 */
export const taskCompleteTool: McpToolDefinition<TaskCompleteInput> = {
  name: 'arbor_task_complete',
  description:
    'Mark a task and its subtasks completed. Requires the lease returned by arbor_lease_generate ' +
    'unless force is true. Fails with LEASE_REQUIRED, LEASE_INVALID or ALREADY_COMPLETED otherwise.',
  inputSchema: {
    type: 'object',
    properties: {
      plan_id: planIdProperty,
      path: pathProperty('Task to complete. Defaults to the current focus.'),
      lease: { type: 'integer', minimum: 0, description: 'Lease token for the task.' },
      force: { type: 'boolean', description: 'Complete without a lease.' },
      summary: { type: 'string', description: 'What was done; kept on the task.' },
    },
    additionalProperties: false,
  },
  handler: async (input: TaskCompleteInput, di: McpDependencyInjectionService) =>
    runTool(async () => {
      const { store, config } = await di.getContainer();
      const planId = config.resolvePlanId(input.plan_id);
      const { path, task } = await store.completeTask(planId, optionalPath(input.path), {
        lease: input.lease,
        force: input.force ?? false,
        summary: input.summary ?? null,
      });
      return { planId, ...describePath(path), task };
    }),
};
