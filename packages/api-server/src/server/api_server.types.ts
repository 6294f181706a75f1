import type { Logger, PlanStore } from '@arbor/core';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Transport-free view of a request. The router only ever sees this, which
 * keeps route handlers testable without sockets.
 */
export interface ApiRequest {
  method: string;
  pathname: string;
  query: URLSearchParams;
  body: unknown;
}

export interface ApiResponse {
  status: number;
  body: ApiEnvelope;
}

export type ApiEnvelope =
  | { success: true; data: unknown }
  | { success: false; error: { code: string; message: string } };

/**
 * Context passed to all route handlers.
 */
export interface RouteContext {
  store: PlanStore;
  logger: Logger;
}

export interface RouteRequest extends ApiRequest {
  params: Record<string, string>;
}

export type RouteHandler = (request: RouteRequest, context: RouteContext) => Promise<ApiResponse>;

export interface ApiServerOptions {
  store: PlanStore;
  logger?: Logger;
  /** Interval of SSE keepalive comments. */
  keepAliveMs?: number;
}
