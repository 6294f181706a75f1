import { randomUUID } from 'crypto';
import { InvalidOperationError, TaskNotFoundError } from '../errors/index.js';
import { ROOT_PATH, type IndexPath } from '../index_path/index.js';
import type { Level } from '../levels/index.js';
import type {
  LeaseLookup,
  NewTaskInput,
  PlanId,
  PlanSnapshot,
  TaskNode,
  TaskSnapshot,
  TransitionEntry,
} from './plan_tree.types.js';

export const DEFAULT_HISTORY_LIMIT = 20;

export interface PlanOptions {
  historyLimit?: number;
  createTaskId?: () => string;
  now?: () => Date;
}

export function requireText(value: string, field: string): string {
  if (value.trim().length === 0) {
    throw new InvalidOperationError(`${field} must not be empty`);
  }
  return value;
}

function walk(nodes: readonly TaskNode[], visit: (node: TaskNode) => void): void {
  for (const node of nodes) {
    visit(node);
    walk(node.children, visit);
  }
}

export function subtreeIds(node: TaskNode): string[] {
  const ids: string[] = [];
  walk([node], (n) => ids.push(n.id));
  return ids;
}

export function snapshotTask(node: TaskNode, leaseOf: LeaseLookup): TaskSnapshot {
  return {
    description: node.description,
    level: node.level,
    notes: node.notes,
    completed: node.completed,
    summary: node.summary,
    lease: leaseOf(node.id),
    children: node.children.map((child) => snapshotTask(child, leaseOf)),
  };
}

/**
 * A plan's task forest plus its focus pointer.
 *
 * Tasks are addressed by index path at the API, but the focus is held by
 * task identity so that removing an earlier sibling does not shift it onto
 * a different task. Paths are always recomputed from the live tree.
 */
export class Plan {
  readonly createdAt: string;
  notes: string | null;

  private readonly root: TaskNode[] = [];
  private currentId: string | null = null;
  private readonly history: TransitionEntry[] = [];
  private readonly historyLimit: number;
  private readonly createTaskId: () => string;
  private readonly now: () => Date;

  constructor(
    readonly id: PlanId,
    readonly goal: string,
    notes: string | null = null,
    options: PlanOptions = {},
  ) {
    requireText(goal, 'Plan goal');
    this.notes = notes;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.createTaskId = options.createTaskId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
    this.createdAt = this.now().toISOString();
  }

  /** Resolves a non-empty path to its task. */
  resolve(path: IndexPath): TaskNode {
    if (path.length === 0) {
      throw new InvalidOperationError('The root is not a task; pass a non-empty index path');
    }
    let nodes: readonly TaskNode[] = this.root;
    let node: TaskNode | undefined;
    for (const index of path) {
      node = nodes[index];
      if (!node) {
        throw new TaskNotFoundError(this.id, path);
      }
      nodes = node.children;
    }
    if (!node) {
      throw new TaskNotFoundError(this.id, path);
    }
    return node;
  }

  /** Children of the node at `path`; the root forest for the empty path. */
  childrenAt(path: IndexPath): TaskNode[] {
    return path.length === 0 ? this.root : this.resolve(path).children;
  }

  /** Nodes from the top level down to the node at `path`, inclusive. */
  lineage(path: IndexPath): TaskNode[] {
    const nodes: TaskNode[] = [];
    for (let depth = 1; depth <= path.length; depth++) {
      nodes.push(this.resolve(path.slice(0, depth)));
    }
    return nodes;
  }

  pathOf(taskId: string): IndexPath | null {
    const search = (nodes: readonly TaskNode[], prefix: number[]): number[] | null => {
      for (let i = 0; i < nodes.length; i++) {
        const node = nodes[i];
        if (!node) continue;
        const path = [...prefix, i];
        if (node.id === taskId) return path;
        const found = search(node.children, path);
        if (found) return found;
      }
      return null;
    };
    return search(this.root, []);
  }

  addTask(parent: IndexPath, input: NewTaskInput): { path: IndexPath; node: TaskNode } {
    requireText(input.description, 'Task description');
    const siblings = this.childrenAt(parent);
    const node: TaskNode = {
      id: this.createTaskId(),
      description: input.description,
      level: input.level,
      notes: input.notes ?? null,
      completed: false,
      summary: null,
      children: [],
    };
    siblings.push(node);

    // A new open child reopens every completed ancestor.
    for (const ancestor of this.lineage(parent)) {
      if (ancestor.completed) {
        ancestor.completed = false;
        ancestor.summary = null;
      }
    }

    return { path: [...parent, siblings.length - 1], node };
  }

  /** Detaches the task at `path`; focus inside it moves to its parent. */
  removeTask(path: IndexPath): TaskNode {
    const node = this.resolve(path);
    const siblings = this.childrenAt(path.slice(0, -1));
    const removedIds = new Set(subtreeIds(node));
    const parentId = path.length > 1 ? this.resolve(path.slice(0, -1)).id : null;

    siblings.splice(siblings.indexOf(node), 1);

    if (this.currentId !== null && removedIds.has(this.currentId)) {
      this.currentId = parentId;
    }
    return node;
  }

  moveTo(path: IndexPath): void {
    this.currentId = path.length === 0 ? null : this.resolve(path).id;
  }

  /** Current focus path; falls back to the root when focus no longer resolves. */
  currentPath(): IndexPath {
    if (this.currentId === null) return ROOT_PATH;
    return this.pathOf(this.currentId) ?? ROOT_PATH;
  }

  currentTask(): TaskNode | null {
    const path = this.currentPath();
    return path.length === 0 ? null : this.resolve(path);
  }

  /** Marks the task and its whole subtree completed; returns the affected ids. */
  complete(path: IndexPath, summary: string | null): string[] {
    const node = this.resolve(path);
    const ids: string[] = [];
    walk([node], (n) => {
      n.completed = true;
      ids.push(n.id);
    });
    node.summary = summary;
    return ids;
  }

  uncomplete(path: IndexPath): TaskNode {
    const node = this.resolve(path);
    if (!node.completed) {
      throw new InvalidOperationError(`Task [${path.join(',')}] is not completed`);
    }
    node.completed = false;
    node.summary = null;
    return node;
  }

  setLevel(path: IndexPath, level: Level): TaskNode {
    const node = this.resolve(path);
    node.level = level;
    return node;
  }

  setNotes(path: IndexPath, notes: string | null): TaskNode {
    const node = this.resolve(path);
    node.notes = notes;
    return node;
  }

  countTasks(): { total: number; completed: number } {
    let total = 0;
    let completed = 0;
    walk(this.root, (node) => {
      total++;
      if (node.completed) completed++;
    });
    return { total, completed };
  }

  record(action: string, details: string): void {
    this.history.push({ timestamp: this.now().toISOString(), action, details });
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
  }

  snapshot(leaseOf: LeaseLookup): PlanSnapshot {
    return {
      id: this.id,
      goal: this.goal,
      notes: this.notes,
      createdAt: this.createdAt,
      root: this.root.map((node) => snapshotTask(node, leaseOf)),
      current: this.currentPath(),
      history: this.history.map((entry) => ({ ...entry })),
    };
  }
}
