import { parseIndexPath } from '@arbor/core';
import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { NotesPathInput } from './notes_tools.types.js';
import { describePath, pathProperty, planIdProperty, resolvePlanId, runTool } from '../helpers.js';

/**
 * arbor_notes_delete - Clears a task's notes.
 */
export const notesDeleteTool: McpToolDefinition<NotesPathInput> = {
  name: 'arbor_notes_delete',
  description: 'Remove the notes attached to a task. Any outstanding lease on it is revoked.',
  inputSchema: {
    type: 'object',
    properties: {
      plan_id: planIdProperty,
      path: pathProperty('Task whose notes to delete.'),
    },
    required: ['path'],
    additionalProperties: false,
  },
  handler: async (input: NotesPathInput, di: McpDependencyInjectionService) =>
    runTool(async () => {
      const container = await di.getContainer();
      const planId = resolvePlanId(container, input.plan_id);
      const path = parseIndexPath(input.path);
      await container.store.deleteNotes(planId, path);
      return { planId, ...describePath(path), notes: null };
    }),
};
