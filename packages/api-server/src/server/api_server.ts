import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import type { AddressInfo } from 'net';
import { createLogger, isPlanError, parsePlanId } from '@arbor/core';
import { readJsonBody, sendJson, toErrorResponse } from '../http/http_helpers.js';
import { createApiRouter } from '../routes/index.js';
import { SSE_HEADERS, openPlanEvents, pipePlanEvents } from '../events/sse.js';
import type { ApiServerOptions, RouteContext } from './api_server.types.js';

const EVENTS_ROUTE = /^\/api\/plans\/([^/]+)\/events\/?$/;

export interface ApiServerHandle {
  server: Server;
  url: string;
  close(): Promise<void>;
}

/**
 * Builds the HTTP server: JSON routes through the router, plus a
 * Server-Sent Events stream per plan at /api/plans/:id/events.
 */
export function createApiServer(options: ApiServerOptions): Server {
  const logger = options.logger ?? createLogger('[api] ');
  const context: RouteContext = { store: options.store, logger };
  const router = createApiRouter();

  const handleEvents = async (req: IncomingMessage, res: ServerResponse, rawId: string): Promise<void> => {
    const planId = parsePlanId(rawId);
    const subscription = await openPlanEvents(options.store, planId);

    res.writeHead(200, SSE_HEADERS);
    logger.debug('SSE client connected', { planId });

    await pipePlanEvents(
      subscription,
      {
        write: (chunk) => {
          res.write(chunk);
        },
        end: () => {
          if (!res.writableEnded) res.end();
        },
        onClose: (listener) => {
          req.on('close', listener);
        },
      },
      options.keepAliveMs === undefined ? {} : { keepAliveMs: options.keepAliveMs },
    );
    logger.debug('SSE client disconnected', { planId });
  };

  const handleRequest = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const startTime = Date.now();
    const url = new URL(req.url ?? '/', 'http://localhost');
    const method = req.method ?? 'GET';

    try {
      const events = method === 'GET' ? EVENTS_ROUTE.exec(url.pathname) : null;
      if (events?.[1] !== undefined) {
        await handleEvents(req, res, events[1]);
        return;
      }

      const body = method === 'GET' || method === 'DELETE' ? undefined : await readJsonBody(req);
      const response = await router.handle({ method, pathname: url.pathname, query: url.searchParams, body }, context);
      sendJson(res, response);
      logger.debug('Request handled', { method, path: url.pathname, status: response.status, duration: `${Date.now() - startTime}ms` });
    } catch (error) {
      if (!isPlanError(error)) {
        logger.error('Request handling error', { path: url.pathname, error: String(error) });
      }
      if (res.headersSent) {
        res.end();
      } else {
        sendJson(res, toErrorResponse(error));
      }
    }
  };

  return createServer((req, res) => {
    handleRequest(req, res).catch((error: unknown) => {
      logger.error('Unhandled request failure', { error: String(error) });
    });
  });
}

/**
 * Starts the server and resolves once it is listening.
 */
export function startApiServer(options: ApiServerOptions & { host: string; port: number }): Promise<ApiServerHandle> {
  const logger = options.logger ?? createLogger('[api] ');
  const server = createApiServer({ ...options, logger });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      const address = server.address();
      const port = isAddressInfo(address) ? address.port : options.port;
      const url = `http://${options.host}:${port}`;
      logger.info(`API server listening on ${url}`);
      resolve({
        server,
        url,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
  });
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}

