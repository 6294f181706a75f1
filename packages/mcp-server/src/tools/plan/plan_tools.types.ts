import type { PlanIdArgument } from '../helpers.js';

/**
 * Input types for the plan MCP tools.
 */

export interface PlanCreateInput {
  goal: string;
  notes?: string;
}

export interface PlanSelectInput {
  plan_id?: PlanIdArgument;
}

export interface PlanDeleteInput {
  plan_id: PlanIdArgument;
}

export type PlanListInput = Record<string, never>;
