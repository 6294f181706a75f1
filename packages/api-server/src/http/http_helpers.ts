import type { IncomingMessage, ServerResponse } from 'http';
import { InvalidOperationError, isPlanError, type PlanErrorCode } from '@arbor/core';
import type { ApiResponse } from '../server/api_server.types.js';

const STATUS_BY_CODE: Record<PlanErrorCode, number> = {
  NOT_FOUND: 404,
  INVALID_OPERATION: 400,
  LEASE_REQUIRED: 428,
  LEASE_INVALID: 409,
  ALREADY_COMPLETED: 409,
  LOCK_FAILURE: 500,
};

export function statusForCode(code: PlanErrorCode): number {
  return STATUS_BY_CODE[code];
}

export function ok(data: unknown, status = 200): ApiResponse {
  return { status, body: { success: true, data } };
}

export function failure(status: number, code: string, message: string): ApiResponse {
  return { status, body: { success: false, error: { code, message } } };
}

/** Typed engine errors keep their kind; anything else is a 500. */
export function toErrorResponse(error: unknown): ApiResponse {
  if (isPlanError(error)) {
    return failure(statusForCode(error.code), error.code, error.message);
  }
  const message = error instanceof Error ? error.message : String(error);
  return failure(500, 'INTERNAL_ERROR', message);
}

/**
 * Helper to read and parse a JSON request body. An empty body is undefined.
 */
export async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const text = Buffer.concat(chunks).toString('utf-8').trim();
  if (text.length === 0) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new InvalidOperationError('Request body is not valid JSON');
  }
}

/**
 * Helper to send a JSON response.
 * Explicitly sets Content-Length so clients know the response is complete.
 */
export function sendJson(res: ServerResponse, response: ApiResponse): void {
  const body = JSON.stringify(response.body);
  res.statusCode = response.status;
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  res.setHeader('Content-Length', Buffer.byteLength(body, 'utf-8'));
  res.end(body);
}
