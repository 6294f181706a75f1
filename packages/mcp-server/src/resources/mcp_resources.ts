import { PlanNotFoundError, getGuide } from '@arbor/core';
import type { McpResourceHandler, McpResourceEntry, McpResourceContent } from '../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../di/mcp_di.js';
import type { ParsedResourceUri } from './mcp_resources.types.js';

const ARBOR_URI_PREFIX = 'arbor://';
export const GUIDE_URI = `${ARBOR_URI_PREFIX}guide`;

/** Parse an arbor:// URI into the resource it names */
export function parseResourceUri(uri: string): ParsedResourceUri | null {
  if (!uri.startsWith(ARBOR_URI_PREFIX)) return null;
  const rest = uri.slice(ARBOR_URI_PREFIX.length);
  if (rest === 'guide') return { kind: 'guide' };

  const match = /^plans\/(\d+)$/.exec(rest);
  if (!match) return null;
  const planId = Number(match[1]);
  if (!Number.isSafeInteger(planId) || planId < 1) return null;
  return { kind: 'plan', planId };
}

export function planResourceUri(planId: number): string {
  return `${ARBOR_URI_PREFIX}plans/${planId}`;
}

/** Create the resource handler exposing the guide and every plan */
export function createResourceHandler(): McpResourceHandler {
  return { list: listResources, read: readResource };
}

async function listResources(di: McpDependencyInjectionService): Promise<{ resources: McpResourceEntry[] }> {
  const { store } = await di.getContainer();
  const resources: McpResourceEntry[] = [
    {
      uri: GUIDE_URI,
      name: 'Arbor guide',
      description: 'How to work with arbor plans',
      mimeType: 'text/plain',
    },
  ];

  for (const plan of await store.listPlans()) {
    resources.push({
      uri: planResourceUri(plan.id),
      name: `Plan ${plan.id}: ${plan.goal}`,
      description: 'Full plan snapshot',
      mimeType: 'application/json',
    });
  }

  return { resources };
}

async function readResource(uri: string, di: McpDependencyInjectionService): Promise<{ contents: McpResourceContent[] }> {
  const parsed = parseResourceUri(uri);
  if (!parsed) {
    throw new Error(`Invalid resource URI: ${uri}. Expected ${GUIDE_URI} or ${ARBOR_URI_PREFIX}plans/{id}`);
  }

  if (parsed.kind === 'guide') {
    return { contents: [{ uri, mimeType: 'text/plain', text: getGuide('mcp') }] };
  }

  const { store } = await di.getContainer();
  try {
    const plan = await store.getPlan(parsed.planId);
    return {
      contents: [{
        uri,
        mimeType: 'application/json',
        text: JSON.stringify(plan, null, 2),
      }],
    };
  } catch (error) {
    if (error instanceof PlanNotFoundError) {
      throw new Error(`Resource not found: ${uri}`);
    }
    throw error;
  }
}
