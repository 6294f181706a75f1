import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import type { AddressInfo } from 'net';
import { randomUUID } from 'crypto';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { readJsonBody, startApiServer, type ApiServerHandle } from '@arbor/api-server';
import { isPlanError, seedExamplePlan, type Logger, type PlanStore } from '@arbor/core';
import { McpServer } from './mcp_server.js';
import { McpDependencyInjectionService } from '../di/mcp_di.js';
import { registerAllTools } from '../tools/index.js';
import { createResourceHandler } from '../resources/index.js';
import { getAllPrompts } from '../prompts/index.js';

export const MCP_SERVER_NAME = 'arbor-mcp';
export const MCP_SERVER_VERSION = '0.1.0';
export const MCP_ENDPOINT = '/mcp';

export interface McpStartOptions {
  /** Serve MCP over streamable HTTP on this port instead of stdio. */
  port?: number;
  /** Also start the REST api-server on this port, sharing the plan store. */
  expose?: number;
  host?: string;
  /** Seed the example plan before accepting calls. */
  example?: boolean;
  store?: PlanStore;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export interface McpServerHandle {
  /** The stdio server, or null under HTTP where every session gets its own. */
  server: McpServer | null;
  di: McpDependencyInjectionService;
  /** Streamable HTTP endpoint, or null under stdio. */
  mcpUrl: string | null;
  /** REST base url when exposed. */
  apiUrl: string | null;
  /** Open streamable HTTP sessions; always 0 under stdio. */
  sessionCount(): number;
  close(): Promise<void>;
}

interface McpSession {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

interface HttpTransportHost {
  url: string;
  sessionCount(): number;
  close(): Promise<void>;
}

/**
 * Builds a server with every tool, resource and prompt registered and the DI wired.
 */
export function createArborMcpServer(di: McpDependencyInjectionService, logger?: Logger): McpServer {
  const server = new McpServer(
    {
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      description: 'Arbor MCP Server - hierarchical plans with lease-coordinated completion.',
    },
    logger,
  );

  registerAllTools(server);
  server.registerResourceHandler(createResourceHandler());
  for (const prompt of getAllPrompts()) {
    server.registerPrompt(prompt);
  }
  server.setDI(di);
  return server;
}

export async function startMcpServer(options: McpStartOptions = {}): Promise<McpServerHandle> {
  const di = new McpDependencyInjectionService({ store: options.store, logger: options.logger, env: options.env });
  const { store, config, logger } = await di.getContainer();
  const host = options.host ?? config.getConfig().host;

  if (options.example) {
    const planId = await seedExamplePlan(store);
    logger.info(`Seeded example plan ${planId}`);
  }

  let api: ApiServerHandle | null = null;
  if (options.expose !== undefined) {
    api = await startApiServer({ store, logger, host, port: options.expose });
  }

  let server: McpServer | null = null;
  let http: HttpTransportHost | null = null;
  if (options.port !== undefined) {
    http = await startHttpTransport(() => createArborMcpServer(di, logger), host, options.port, logger);
  } else {
    server = createArborMcpServer(di, logger);
    await server.connectStdio();
  }

  return {
    server,
    di,
    mcpUrl: http ? http.url : null,
    apiUrl: api ? api.url : null,
    sessionCount: () => (http ? http.sessionCount() : 0),
    close: async () => {
      if (server) await server.close();
      if (http) await http.close();
      if (api) await api.close();
    },
  };
}

/**
 * Streamable HTTP with one transport and one server per MCP session. An
 * initialize request without a session id opens a session; later requests
 * are routed by their `mcp-session-id` header.
 */
async function startHttpTransport(
  createSessionServer: () => McpServer,
  host: string,
  port: number,
  logger: Logger,
): Promise<HttpTransportHost> {
  const sessions = new Map<string, McpSession>();

  const openSession = async (): Promise<StreamableHTTPServerTransport> => {
    const server = createSessionServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sessionId) => {
        sessions.set(sessionId, { server, transport });
        logger.debug('MCP session opened', { sessionId });
      },
    });
    transport.onclose = () => {
      const sessionId = transport.sessionId;
      if (sessionId !== undefined && sessions.delete(sessionId)) {
        logger.debug('MCP session closed', { sessionId });
      }
    };
    await server.connectTransport(transport);
    return transport;
  };

  const handleMcpRequest = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (pathname !== MCP_ENDPOINT) {
      sendJsonRpcError(res, 404, -32601, 'Not found');
      return;
    }

    let body: unknown;
    try {
      body = req.method === 'POST' ? await readJsonBody(req) : undefined;
    } catch (error) {
      if (!isPlanError(error)) throw error;
      sendJsonRpcError(res, 400, -32700, error.message);
      return;
    }

    const sessionId = sessionIdOf(req);
    if (sessionId !== undefined) {
      const session = sessions.get(sessionId);
      if (!session) {
        sendJsonRpcError(res, 404, -32001, `Session ${sessionId} not found`);
        return;
      }
      await session.transport.handleRequest(req, res, body);
      return;
    }

    if (req.method === 'POST' && isInitializeRequest(body)) {
      const transport = await openSession();
      await transport.handleRequest(req, res, body);
      return;
    }

    sendJsonRpcError(res, 400, -32000, 'No valid session id; start with an initialize request');
  };

  const httpServer = createServer((req, res) => {
    handleMcpRequest(req, res).catch((error: unknown) => {
      logger.error('MCP request failed:', error);
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    });
  });

  const url = await new Promise<string>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(port, host, () => {
      httpServer.off('error', reject);
      const address = httpServer.address();
      const boundPort = isAddressInfo(address) ? address.port : port;
      resolve(`http://${host}:${boundPort}${MCP_ENDPOINT}`);
    });
  });
  logger.info(`MCP server listening on ${url}`);

  return {
    url,
    sessionCount: () => sessions.size,
    close: async () => {
      for (const session of [...sessions.values()]) {
        await session.server.close();
      }
      sessions.clear();
      await closeHttpServer(httpServer);
    },
  };
}

function sessionIdOf(req: IncomingMessage): string | undefined {
  const header = req.headers['mcp-session-id'];
  return typeof header === 'string' && header.length > 0 ? header : undefined;
}

function sendJsonRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify({ jsonrpc: '2.0', error: { code, message }, id: null }));
}

function closeHttpServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.closeAllConnections();
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}
