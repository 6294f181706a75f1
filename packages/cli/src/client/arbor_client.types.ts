import type {
  AddTaskResult,
  CompleteTaskResult,
  CurrentView,
  DistilledContext,
  IndexPath,
  LeaseGrant,
  LeaseToken,
  Level,
  PlanId,
  PlanSnapshot,
  PlanSummary,
  TaskSnapshot,
} from '@arbor/core';

/** Subset of fetch the client needs; global fetch satisfies it. */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface AddTaskRequest {
  description: string;
  level: Level;
  notes?: string | null;
  /** Parent path; the plan's current focus when omitted. */
  parent?: IndexPath;
}

export interface CompleteTaskRequest {
  lease?: LeaseToken;
  force?: boolean;
  summary?: string;
}

/**
 * Remote view of the plan engine, as served by the api-server.
 */
export interface IArborClient {
  readonly baseUrl: string;
  health(): Promise<{ status: string }>;
  listPlans(): Promise<PlanSummary[]>;
  createPlan(goal: string, notes?: string | null): Promise<PlanId>;
  getPlan(planId: PlanId): Promise<PlanSnapshot>;
  deletePlan(planId: PlanId): Promise<void>;
  updatePlanNotes(planId: PlanId, notes: string | null): Promise<void>;
  getCurrent(planId: PlanId): Promise<CurrentView>;
  getDistilledContext(planId: PlanId): Promise<DistilledContext>;
  moveTo(planId: PlanId, path: IndexPath): Promise<CurrentView>;
  addTask(planId: PlanId, request: AddTaskRequest): Promise<AddTaskResult>;
  removeTask(planId: PlanId, path: IndexPath): Promise<TaskSnapshot>;
  changeLevel(planId: PlanId, path: IndexPath, level: Level): Promise<void>;
  generateLease(planId: PlanId, path: IndexPath | null): Promise<LeaseGrant>;
  completeTask(planId: PlanId, path: IndexPath | null, request: CompleteTaskRequest): Promise<CompleteTaskResult>;
  uncompleteTask(planId: PlanId, path: IndexPath): Promise<void>;
  getNotes(planId: PlanId, path: IndexPath): Promise<string | null>;
  setNotes(planId: PlanId, path: IndexPath, notes: string): Promise<void>;
  deleteNotes(planId: PlanId, path: IndexPath): Promise<void>;
}
