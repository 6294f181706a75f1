import { getGuide } from '@arbor/core';
import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import { successResult } from '../helpers.js';

export type GuideInput = Record<string, never>;

/**
 * arbor_guide - Static usage guide for agents.
 */
export const guideTool: McpToolDefinition<GuideInput> = {
  name: 'arbor_guide',
  description: 'Explain how to work with arbor plans: levels, index paths, leases and the recommended workflow.',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false,
  },
  handler: async () => successResult({ guide: getGuide('mcp') }),
};
