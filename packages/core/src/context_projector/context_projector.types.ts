import type { IndexPath } from '../index_path/index.js';
import type { Level, LevelInfo } from '../levels/index.js';
import type { PlanId, TransitionEntry } from '../plan_tree/index.js';

export interface TaskBrief {
  path: IndexPath;
  description: string;
  level: Level;
  completed: boolean;
  summary: string | null;
  notes: string | null;
  childCount: number;
}

/**
 * Node of the path-focused tree: nodes on the way to the current task list
 * their children, every other node only reports how many it has.
 */
export interface FocusedTreeNode {
  path: IndexPath;
  description: string;
  level: Level;
  completed: boolean;
  isCurrent: boolean;
  childCount: number;
  children?: FocusedTreeNode[];
}

export interface DistilledContext {
  planId: PlanId;
  goal: string;
  planNotes: string | null;
  usage: {
    totalTasks: number;
    completedTasks: number;
    summary: string;
  };
  current: {
    path: IndexPath;
    task: TaskBrief | null;
    level: LevelInfo | null;
  };
  ancestors: TaskBrief[];
  children: TaskBrief[];
  taskTree: FocusedTreeNode[];
  levels: LevelInfo[];
  history: TransitionEntry[];
}
