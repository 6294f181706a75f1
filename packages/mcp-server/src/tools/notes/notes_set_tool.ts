import { parseIndexPath } from '@arbor/core';
import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { NotesSetInput } from './notes_tools.types.js';
import { describePath, pathProperty, planIdProperty, resolvePlanId, runTool } from '../helpers.js';

/**
 * arbor_notes_set - Replaces a task's notes.
 */
export const notesSetTool: McpToolDefinition<NotesSetInput> = {
  name: 'arbor_notes_set',
  description: 'Replace the notes attached to a task. Any outstanding lease on it is revoked.',
  inputSchema: {
    type: 'object',
    properties: {
      plan_id: planIdProperty,
      path: pathProperty('Task whose notes to set.'),
      notes: { type: 'string', description: 'New notes.' },
    },
    required: ['path', 'notes'],
    additionalProperties: false,
  },
  handler: async (input: NotesSetInput, di: McpDependencyInjectionService) =>
    runTool(async () => {
      const container = await di.getContainer();
      const planId = resolvePlanId(container, input.plan_id);
      const path = parseIndexPath(input.path);
      await container.store.setNotes(planId, path, input.notes);
      return { planId, ...describePath(path), notes: input.notes };
    }),
};
