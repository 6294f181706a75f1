import { parseIndexPath, parsePlanId, validateInput, type IndexPath, type SchemaObject } from '@arbor/core';
import type { RouteRequest } from '../server/api_server.types.js';

export function planIdParam(request: RouteRequest): number {
  return parsePlanId(request.params['id'] ?? '');
}

export function pathParam(request: RouteRequest): IndexPath {
  return parseIndexPath(request.params['path'] ?? '');
}

/** Like `pathParam`, but "current" selects the plan's focus (`null`). */
export function targetParam(request: RouteRequest): IndexPath | null {
  const raw = request.params['path'] ?? '';
  return raw.trim().toLowerCase() === 'current' ? null : parseIndexPath(raw);
}

/** Validates the body; a missing body is checked as `{}`. */
export function body<T>(request: RouteRequest, schema: SchemaObject): T {
  return validateInput<T>(schema, request.body ?? {}, 'request body');
}
