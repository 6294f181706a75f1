import { parseIndexPath, parseLevel } from '@arbor/core';
import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { TaskAddInput } from './task_tools.types.js';
import { describePath, levelProperty, pathProperty, planIdProperty, resolvePlanId, runTool } from '../helpers.js';

/**
 * arbor_task_add - Appends a task under the current focus (or an explicit parent).
 */
export const taskAddTool: McpToolDefinition<TaskAddInput> = {
  name: 'arbor_task_add',
  description:
    'Add a task as the last child of the current task, or of `parent` when given. ' +
    'Adding under a completed task reopens it. Returns the new task and its index path.',
  inputSchema: {
    type: 'object',
    properties: {
      plan_id: planIdProperty,
      description: { type: 'string', minLength: 1, description: 'What the task is.' },
      level: levelProperty,
      notes: { type: 'string', description: 'Optional notes attached to the task.' },
      parent: pathProperty('Parent task path. Omit to add under the current focus.'),
    },
    required: ['description', 'level'],
    additionalProperties: false,
  },
  handler: async (input: TaskAddInput, di: McpDependencyInjectionService) =>
    runTool(async () => {
      const container = await di.getContainer();
      const planId = resolvePlanId(container, input.plan_id);
      const parent = input.parent === undefined ? null : parseIndexPath(input.parent);
      const result = await container.store.addTask(planId, parent, {
        description: input.description,
        level: parseLevel(input.level),
        notes: input.notes ?? null,
      });
      return { planId, ...describePath(result.path), task: result.task };
    }),
};
