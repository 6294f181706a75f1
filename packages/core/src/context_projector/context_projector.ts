import { ROOT_PATH, isPathPrefix, pathsEqual, type IndexPath } from '../index_path/index.js';
import { getAllLevels, getLevelInfo } from '../levels/index.js';
import type { PlanSnapshot, TaskSnapshot } from '../plan_tree/index.js';
import type { DistilledContext, FocusedTreeNode, TaskBrief } from './context_projector.types.js';

function brief(task: TaskSnapshot, path: IndexPath): TaskBrief {
  return {
    path,
    description: task.description,
    level: task.level,
    completed: task.completed,
    summary: task.summary,
    notes: task.notes,
    childCount: task.children.length,
  };
}

function count(tasks: readonly TaskSnapshot[]): { total: number; completed: number } {
  let total = 0;
  let completed = 0;
  for (const task of tasks) {
    const sub = count(task.children);
    total += 1 + sub.total;
    completed += (task.completed ? 1 : 0) + sub.completed;
  }
  return { total, completed };
}

/** Lineage of tasks from the top level down to `path`, or null if it does not resolve. */
function lineage(root: readonly TaskSnapshot[], path: IndexPath): TaskSnapshot[] | null {
  const tasks: TaskSnapshot[] = [];
  let nodes = root;
  for (const index of path) {
    const task = nodes[index];
    if (!task) return null;
    tasks.push(task);
    nodes = task.children;
  }
  return tasks;
}

function focusTree(tasks: readonly TaskSnapshot[], prefix: IndexPath, current: IndexPath): FocusedTreeNode[] {
  return tasks.map((task, index) => {
    const path = [...prefix, index];
    const node: FocusedTreeNode = {
      path,
      description: task.description,
      level: task.level,
      completed: task.completed,
      isCurrent: pathsEqual(path, current),
      childCount: task.children.length,
    };
    if (isPathPrefix(path, current)) {
      node.children = focusTree(task.children, path, current);
    }
    return node;
  });
}

/**
 * Projects a plan snapshot onto a bounded view centered on its current task:
 * the task itself, its ancestors, its immediate children, and a tree that is
 * only expanded along the path leading to it. An unresolvable current path
 * falls back to the root.
 */
export function projectDistilledContext(plan: PlanSnapshot): DistilledContext {
  let currentPath = plan.current;
  let chain = lineage(plan.root, currentPath);
  if (chain === null) {
    currentPath = ROOT_PATH;
    chain = [];
  }

  const currentTask = chain.length > 0 ? chain[chain.length - 1] : undefined;
  const ancestors = chain.slice(0, -1).map((task, depth) => brief(task, currentPath.slice(0, depth + 1)));
  const childTasks = currentTask ? currentTask.children : plan.root;
  const totals = count(plan.root);

  return {
    planId: plan.id,
    goal: plan.goal,
    planNotes: plan.notes,
    usage: {
      totalTasks: totals.total,
      completedTasks: totals.completed,
      summary: `${totals.completed} of ${totals.total} tasks completed`,
    },
    current: {
      path: currentPath,
      task: currentTask ? brief(currentTask, currentPath) : null,
      level: currentTask ? getLevelInfo(currentTask.level) : null,
    },
    ancestors,
    children: childTasks.map((task, index) => brief(task, [...currentPath, index])),
    taskTree: focusTree(plan.root, ROOT_PATH, currentPath),
    levels: getAllLevels(),
    history: plan.history.map((entry) => ({ ...entry })),
  };
}
