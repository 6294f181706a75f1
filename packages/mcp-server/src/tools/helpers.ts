import {
  formatIndexPath,
  isPlanError,
  parseIndexPath,
  type IndexPath,
} from '@arbor/core';
import type { ToolResult } from '../server/mcp_server.types.js';
import type { McpDiContainer } from '../di/mcp_di.types.js';

/** Path argument as accepted by the tools: [0, 1] or "0.1" / "0,1". */
export type PathArgument = number[] | string;

/** Optional plan selector; falls back to ARBOR_PLAN_ID. */
export type PlanIdArgument = number | string;

export const planIdProperty = {
  type: ['integer', 'string'],
  description: 'Plan id. Defaults to ARBOR_PLAN_ID when omitted.',
};

export function pathProperty(description: string) {
  return {
    type: ['array', 'string'],
    items: { type: 'integer', minimum: 0 },
    description: `${description} Either an array of child offsets ([0, 1]) or a dotted string ("0.1").`,
  };
}

export const levelProperty = {
  type: ['string', 'integer'],
  description: 'Abstraction level: planning, isolation, ordering or implementation (or 0-3).',
};

/**
 * Helper to build a successful ToolResult carrying JSON data.
 */
export function successResult<T>(data: T): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(data) }],
  };
}

/**
 * Helper to build a standard error ToolResult.
 */
export function errorResult(
  message: string,
  code?: string,
  details?: Record<string, unknown>,
): ToolResult {
  const payload: { error: string; code?: string; details?: Record<string, unknown> } = {
    error: message,
  };
  if (code) payload.code = code;
  if (details) payload.details = details;

  return {
    content: [{ type: 'text', text: JSON.stringify(payload) }],
    isError: true,
  };
}

/**
 * Maps a thrown error onto an error result, keeping the engine's error code.
 */
export function toolErrorResult(error: unknown): ToolResult {
  if (isPlanError(error)) {
    return errorResult(error.message, error.code);
  }
  const message = error instanceof Error ? error.message : String(error);
  return errorResult(`Tool execution failed: ${message}`, 'INTERNAL_ERROR');
}

/**
 * Runs a tool body and wraps its value (or its error) as a ToolResult.
 */
export async function runTool<T>(action: () => Promise<T>): Promise<ToolResult> {
  try {
    return successResult(await action());
  } catch (error) {
    return toolErrorResult(error);
  }
}

/** Path plus its dotted display form, as echoed back by the tools. */
export function describePath(path: IndexPath): { path: number[]; index: string } {
  return { path: [...path], index: formatIndexPath(path) };
}

/** Optional path argument; `null` lets the store resolve the current focus under its lock. */
export function optionalPath(path: PathArgument | undefined): IndexPath | null {
  return path === undefined ? null : parseIndexPath(path);
}

export function resolvePlanId(container: McpDiContainer, planId: PlanIdArgument | undefined): number {
  return container.config.resolvePlanId(planId);
}
