import type { Level } from '../levels/index.js';
import type { IndexPath } from '../index_path/index.js';
import type { LeaseToken } from '../lease_registry/index.js';

export type PlanId = number;

/** Live tree node. Owned by exactly one Plan; never handed out directly. */
export interface TaskNode {
  readonly id: string;
  description: string;
  level: Level;
  notes: string | null;
  completed: boolean;
  summary: string | null;
  children: TaskNode[];
}

export interface NewTaskInput {
  description: string;
  level: Level;
  notes?: string | null;
}

/** Detached copy of a task and its subtree. */
export interface TaskSnapshot {
  description: string;
  level: Level;
  notes: string | null;
  completed: boolean;
  summary: string | null;
  lease: LeaseToken | null;
  children: TaskSnapshot[];
}

export interface TransitionEntry {
  timestamp: string;
  action: string;
  details: string;
}

export interface PlanSnapshot {
  id: PlanId;
  goal: string;
  notes: string | null;
  createdAt: string;
  root: TaskSnapshot[];
  current: IndexPath;
  history: TransitionEntry[];
}

export interface PlanSummary {
  id: PlanId;
  goal: string;
}

export type LeaseLookup = (taskId: string) => LeaseToken | null;
