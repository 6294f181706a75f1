import type { IndexPath } from '../index_path/index.js';
import type { Level } from '../levels/index.js';
import type { LeaseToken } from '../lease_registry/index.js';
import type { PlanId, TaskSnapshot } from '../plan_tree/index.js';

export interface AddTaskInput {
  description: string;
  level: Level;
  notes?: string | null;
}

export interface AddTaskResult {
  path: IndexPath;
  task: TaskSnapshot;
}

export interface CurrentView {
  planId: PlanId;
  /** Empty when focus is on the root. */
  path: IndexPath;
  task: TaskSnapshot | null;
}

export interface CompleteTaskResult {
  /** Path the task had when it was completed. */
  path: IndexPath;
  task: TaskSnapshot;
}

export interface CompleteTaskOptions {
  lease?: LeaseToken;
  force?: boolean;
  summary?: string | null;
}

export interface LeaseGrant {
  planId: PlanId;
  path: IndexPath;
  lease: LeaseToken;
  /** Checks to run before completing, taken from the task's level. */
  suggestions: string[];
}
