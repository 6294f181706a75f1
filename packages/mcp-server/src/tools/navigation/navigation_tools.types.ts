import type { PathArgument, PlanIdArgument } from '../helpers.js';

export interface MoveToInput {
  plan_id?: PlanIdArgument;
  path: PathArgument;
}

export interface PlanScopedInput {
  plan_id?: PlanIdArgument;
}
