import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { McpServer } from './mcp_server.js';

/**
 * Connects a real MCP client to the server through an in-memory transport pair.
 */
export async function connectClient(server: McpServer): Promise<Client> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connectTransport(serverTransport);
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  await client.connect(clientTransport);
  return client;
}

/** Calls a tool and decodes the JSON carried by its single text block. */
export async function callJson(
  client: Client,
  name: string,
  args: Record<string, unknown> = {},
): Promise<{ isError: boolean; data: unknown }> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (!first || first.type !== 'text') {
    throw new Error(`Tool ${name} returned no text content`);
  }
  const data: unknown = JSON.parse(first.text);
  return { isError: result.isError ?? false, data };
}
