import { InvalidOperationError, NotFoundError, isPlanError } from '@arbor/core';
import { failure, toErrorResponse } from '../http/http_helpers.js';
import type {
  ApiRequest,
  ApiResponse,
  HttpMethod,
  RouteContext,
  RouteHandler,
} from '../server/api_server.types.js';

interface Route {
  method: HttpMethod;
  segments: string[];
  handler: RouteHandler;
}

function split(pathname: string): string[] {
  return pathname.split('/').filter((segment) => segment.length > 0);
}

/**
 * Minimal method + pattern router. Patterns use `:name` segments, e.g.
 * `/api/plans/:id/tasks/:path`.
 */
export class Router {
  private readonly routes: Route[] = [];

  add(method: HttpMethod, pattern: string, handler: RouteHandler): this {
    this.routes.push({ method, segments: split(pattern), handler });
    return this;
  }

  get(pattern: string, handler: RouteHandler): this {
    return this.add('GET', pattern, handler);
  }

  post(pattern: string, handler: RouteHandler): this {
    return this.add('POST', pattern, handler);
  }

  put(pattern: string, handler: RouteHandler): this {
    return this.add('PUT', pattern, handler);
  }

  delete(pattern: string, handler: RouteHandler): this {
    return this.add('DELETE', pattern, handler);
  }

  async handle(request: ApiRequest, context: RouteContext): Promise<ApiResponse> {
    try {
      return await this.dispatch(request, context);
    } catch (error) {
      if (!isPlanError(error)) {
        context.logger.error('Route handler failed', { path: request.pathname, error: String(error) });
      }
      return toErrorResponse(error);
    }
  }

  private async dispatch(request: ApiRequest, context: RouteContext): Promise<ApiResponse> {
    const segments = split(request.pathname);
    const allowed: HttpMethod[] = [];

    for (const route of this.routes) {
      const params = matchSegments(route.segments, segments);
      if (!params) continue;
      if (route.method !== request.method) {
        allowed.push(route.method);
        continue;
      }
      return route.handler({ ...request, params }, context);
    }

    if (allowed.length > 0) {
      return failure(
        405,
        'METHOD_NOT_ALLOWED',
        `${request.method} is not allowed on ${request.pathname}; use ${allowed.join(', ')}`,
      );
    }
    throw new NotFoundError(`No route for ${request.method} ${request.pathname}`);
  }
}

function decodeSegment(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    throw new InvalidOperationError(`Malformed path segment "${value}"`);
  }
}

export function matchSegments(pattern: string[], actual: string[]): Record<string, string> | null {
  if (pattern.length !== actual.length) return null;
  const params: Record<string, string> = {};
  for (let i = 0; i < pattern.length; i++) {
    const expected = pattern[i];
    const value = actual[i];
    if (expected === undefined || value === undefined) return null;
    if (expected.startsWith(':')) {
      params[expected.slice(1)] = decodeSegment(value);
    } else if (expected !== value) {
      return null;
    }
  }
  return params;
}
