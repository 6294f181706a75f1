import type { PathArgument, PlanIdArgument } from '../helpers.js';

/**
 * Input types for the task lifecycle MCP tools.
 */

export interface TaskAddInput {
  plan_id?: PlanIdArgument;
  description: string;
  level: string | number;
  notes?: string;
  /** Parent task; the current focus when omitted. */
  parent?: PathArgument;
}

export interface TaskCompleteInput {
  plan_id?: PlanIdArgument;
  /** Defaults to the current focus. */
  path?: PathArgument;
  lease?: number;
  force?: boolean;
  summary?: string;
}

export interface TaskPathInput {
  plan_id?: PlanIdArgument;
  path: PathArgument;
}

export interface TaskChangeLevelInput extends TaskPathInput {
  level: string | number;
}
