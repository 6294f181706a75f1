import { ChangeNotifier } from '../change_notifier/index.js';
import type { IChangeNotifier } from '../change_notifier/index.js';
import { projectDistilledContext, type DistilledContext } from '../context_projector/index.js';
import {
  AlreadyCompletedError,
  LeaseInvalidError,
  LeaseRequiredError,
  LockFailureError,
  NotFoundError,
  PlanNotFoundError,
  isPlanError,
} from '../errors/index.js';
import { formatIndexPath, type IndexPath } from '../index_path/index.js';
import { LeaseRegistry } from '../lease_registry/index.js';
import { getLevelInfo, type Level } from '../levels/index.js';
import { createLogger, type Logger } from '../logger/index.js';
import {
  Plan,
  requireText,
  snapshotTask,
  subtreeIds,
  type LeaseLookup,
  type PlanId,
  type PlanSnapshot,
  type PlanSummary,
  type TaskSnapshot,
} from '../plan_tree/index.js';
import { LockPoisonedError, ReadWriteLock, type Release } from '../rw_lock/index.js';
import type {
  AddTaskInput,
  AddTaskResult,
  CompleteTaskOptions,
  CompleteTaskResult,
  CurrentView,
  LeaseGrant,
} from './plan_store.types.js';

export interface PlanStoreOptions {
  notifier?: IChangeNotifier;
  leases?: LeaseRegistry;
  logger?: Logger;
  historyLimit?: number;
  createTaskId?: () => string;
}

interface PlanEntry {
  plan: Plan;
  lock: ReadWriteLock;
}

interface Mutation<T> {
  result: T;
  action: string;
  details: string;
}

/**
 * PlanStore - owner of every plan in the process.
 *
 * Each plan sits behind its own reader-writer lock: reads share it, every
 * mutation holds it exclusively for the tree edit. Change events go out
 * after the lock is released, in commit order. An unexpected error inside
 * a mutation poisons that plan's lock; later calls fail with LockFailure.
 */
export class PlanStore {
  readonly notifier: IChangeNotifier;
  readonly leases: LeaseRegistry;

  private readonly plans = new Map<PlanId, PlanEntry>();
  private readonly logger: Logger;
  private readonly historyLimit: number | undefined;
  private readonly createTaskId: (() => string) | undefined;
  private nextPlanId = 1;

  constructor(options: PlanStoreOptions = {}) {
    this.notifier = options.notifier ?? new ChangeNotifier();
    this.leases = options.leases ?? new LeaseRegistry();
    this.logger = options.logger ?? createLogger('[PlanStore] ');
    this.historyLimit = options.historyLimit;
    this.createTaskId = options.createTaskId;
  }

  // ===== Plans =====

  async createPlan(goal: string, notes?: string | null): Promise<PlanId> {
    requireText(goal, 'Plan goal');
    const id = this.nextPlanId++;
    const plan = new Plan(id, goal, notes ?? null, {
      historyLimit: this.historyLimit,
      createTaskId: this.createTaskId,
    });
    plan.record('create_plan', `Created plan with goal "${goal}"`);
    this.plans.set(id, { plan, lock: new ReadWriteLock() });

    this.logger.debug('Plan created', { planId: id });
    this.notifier.publish(id);
    return id;
  }

  async getPlan(planId: PlanId): Promise<PlanSnapshot> {
    return this.read(planId, (plan) => plan.snapshot(this.leaseLookup(planId)));
  }

  /** Goals are immutable, so listing needs no per-plan lock. */
  async listPlans(): Promise<PlanSummary[]> {
    return [...this.plans.values()]
      .map(({ plan }) => ({ id: plan.id, goal: plan.goal }))
      .sort((a, b) => a.id - b.id);
  }

  async deletePlan(planId: PlanId): Promise<void> {
    const entry = this.entry(planId);
    const release = await this.acquire(planId, entry, 'write');
    try {
      this.ensureLive(planId, entry);
      this.plans.delete(planId);
      this.leases.revokePlan(planId);
    } finally {
      release();
    }
    this.logger.debug('Plan deleted', { planId });
    this.notifier.publish(planId);
    this.notifier.closeTopic(planId);
  }

  async updatePlanNotes(planId: PlanId, notes: string | null): Promise<void> {
    return this.write(planId, (plan) => {
      plan.notes = notes;
      return {
        result: undefined,
        action: 'update_plan_notes',
        details: notes === null ? 'Cleared plan notes' : 'Updated plan notes',
      };
    });
  }

  // ===== Tasks =====

  /**
   * Appends a task as the last child of `parent`; `null` means the current
   * focus, the empty path the root.
   */
  async addTask(planId: PlanId, parent: IndexPath | null, input: AddTaskInput): Promise<AddTaskResult> {
    return this.write(planId, (plan) => {
      const parentPath = parent ?? plan.currentPath();
      const { path, node } = plan.addTask(parentPath, input);
      return {
        result: { path, task: snapshotTask(node, this.leaseLookup(planId)) },
        action: 'add_task',
        details: `Added "${input.description}" (${input.level}) at ${formatIndexPath(path)}`,
      };
    });
  }

  async removeTask(planId: PlanId, path: IndexPath): Promise<TaskSnapshot> {
    return this.write(planId, (plan) => {
      const node = plan.removeTask(path);
      this.leases.revokeTasks(planId, subtreeIds(node));
      return {
        result: snapshotTask(node, this.leaseLookup(planId)),
        action: 'remove_task',
        details: `Removed "${node.description}" from ${formatIndexPath(path)}`,
      };
    });
  }

  async changeLevel(planId: PlanId, path: IndexPath, level: Level): Promise<void> {
    return this.write(planId, (plan) => {
      const node = plan.setLevel(path, level);
      this.leases.revoke(planId, node.id);
      return {
        result: undefined,
        action: 'change_level',
        details: `Changed level of ${formatIndexPath(path)} to ${level}`,
      };
    });
  }

  async getNotes(planId: PlanId, path: IndexPath): Promise<string | null> {
    return this.read(planId, (plan) => plan.resolve(path).notes);
  }

  async setNotes(planId: PlanId, path: IndexPath, notes: string): Promise<void> {
    return this.write(planId, (plan) => {
      const node = plan.setNotes(path, notes);
      this.leases.revoke(planId, node.id);
      return { result: undefined, action: 'set_notes', details: `Set notes on ${formatIndexPath(path)}` };
    });
  }

  async deleteNotes(planId: PlanId, path: IndexPath): Promise<void> {
    return this.write(planId, (plan) => {
      const node = plan.setNotes(path, null);
      this.leases.revoke(planId, node.id);
      return { result: undefined, action: 'delete_notes', details: `Deleted notes on ${formatIndexPath(path)}` };
    });
  }

  // ===== Focus =====

  async moveTo(planId: PlanId, path: IndexPath): Promise<CurrentView> {
    return this.write(planId, (plan) => {
      plan.moveTo(path);
      return {
        result: this.currentView(plan),
        action: 'move_to',
        details: `Moved focus to ${formatIndexPath(path)}`,
      };
    });
  }

  async getCurrent(planId: PlanId): Promise<CurrentView> {
    return this.read(planId, (plan) => this.currentView(plan));
  }

  async getDistilledContext(planId: PlanId): Promise<DistilledContext> {
    return this.read(planId, (plan) => projectDistilledContext(plan.snapshot(this.leaseLookup(planId))));
  }

  // ===== Completion =====

  /**
   * Issues a lease for an open task, superseding any earlier one. Only the
   * registry changes, so no change event is published. A `null` path leases
   * the current focus, resolved under the same lock.
   */
  async generateLease(planId: PlanId, target: IndexPath | null): Promise<LeaseGrant> {
    const entry = this.entry(planId);
    const release = await this.acquire(planId, entry, 'write');
    try {
      this.ensureLive(planId, entry);
      const path = target ?? entry.plan.currentPath();
      const node = entry.plan.resolve(path);
      if (node.completed) {
        throw new NotFoundError(`Task [${path.join(',')}] is already completed; there is nothing to lease`);
      }
      const lease = this.leases.issue(planId, node.id);
      this.logger.debug('Lease issued', { planId, path, lease });
      return { planId, path, lease, suggestions: getLevelInfo(node.level).questions };
    } finally {
      release();
    }
  }

  /** A `null` path completes the current focus, resolved under the write lock. */
  async completeTask(
    planId: PlanId,
    target: IndexPath | null,
    options: CompleteTaskOptions = {},
  ): Promise<CompleteTaskResult> {
    return this.write(planId, (plan) => {
      const path = target ?? plan.currentPath();
      const node = plan.resolve(path);
      if (node.completed) {
        throw AlreadyCompletedError.forTask(path);
      }

      if (!options.force) {
        if (options.lease === undefined) {
          throw LeaseRequiredError.forTask(path);
        }
        if (this.leases.consume(planId, node.id, options.lease) !== 'valid') {
          throw LeaseInvalidError.forTask(path, options.lease);
        }
      }

      const completedIds = plan.complete(path, options.summary ?? null);
      this.leases.revokeTasks(planId, completedIds);
      return {
        result: { path, task: snapshotTask(node, this.leaseLookup(planId)) },
        action: 'complete_task',
        details: `Completed ${formatIndexPath(path)}${options.force ? ' (forced)' : ''}`,
      };
    });
  }

  async uncompleteTask(planId: PlanId, path: IndexPath): Promise<void> {
    return this.write(planId, (plan) => {
      plan.uncomplete(path);
      return { result: undefined, action: 'uncomplete_task', details: `Reopened ${formatIndexPath(path)}` };
    });
  }

  // ===== Internals =====

  private leaseLookup(planId: PlanId): LeaseLookup {
    return (taskId) => this.leases.outstandingFor(planId, taskId);
  }

  private currentView(plan: Plan): CurrentView {
    const task = plan.currentTask();
    return {
      planId: plan.id,
      path: plan.currentPath(),
      task: task ? snapshotTask(task, this.leaseLookup(plan.id)) : null,
    };
  }

  private entry(planId: PlanId): PlanEntry {
    const entry = this.plans.get(planId);
    if (!entry) {
      throw new PlanNotFoundError(planId);
    }
    return entry;
  }

  /** A plan deleted while the caller waited for its lock is gone. */
  private ensureLive(planId: PlanId, entry: PlanEntry): void {
    if (this.plans.get(planId) !== entry) {
      throw new PlanNotFoundError(planId);
    }
  }

  private async acquire(planId: PlanId, entry: PlanEntry, mode: 'read' | 'write'): Promise<Release> {
    try {
      return mode === 'read' ? await entry.lock.acquireRead() : await entry.lock.acquireWrite();
    } catch (error) {
      if (error instanceof LockPoisonedError) {
        throw LockFailureError.forPlan(planId, error.reason);
      }
      throw error;
    }
  }

  private async read<T>(planId: PlanId, fn: (plan: Plan) => T): Promise<T> {
    const entry = this.entry(planId);
    const release = await this.acquire(planId, entry, 'read');
    try {
      this.ensureLive(planId, entry);
      return fn(entry.plan);
    } finally {
      release();
    }
  }

  private async write<T>(planId: PlanId, fn: (plan: Plan) => Mutation<T>): Promise<T> {
    const mutation = await this.mutate(planId, fn);
    this.logger.debug('Plan mutated', { planId, action: mutation.action });
    this.notifier.publish(planId);
    return mutation.result;
  }

  private async mutate<T>(planId: PlanId, fn: (plan: Plan) => Mutation<T>): Promise<Mutation<T>> {
    const entry = this.entry(planId);
    const release = await this.acquire(planId, entry, 'write');
    try {
      this.ensureLive(planId, entry);
      const mutation = fn(entry.plan);
      entry.plan.record(mutation.action, mutation.details);
      return mutation;
    } catch (error) {
      if (!isPlanError(error)) {
        const reason = error instanceof Error ? error.message : String(error);
        entry.lock.poison(reason);
        this.logger.error('Plan lock poisoned', { planId, reason });
      }
      throw error;
    } finally {
      release();
    }
  }
}
