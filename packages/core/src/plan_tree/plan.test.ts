import { describe, it, expect, beforeEach } from 'vitest';
import { Plan } from './plan.js';
import { InvalidOperationError, TaskNotFoundError } from '../errors/index.js';

function sequentialIds(): () => string {
  let next = 0;
  return () => `t${++next}`;
}

const noLeases = () => null;

describe('Plan', () => {
  let plan: Plan;

  beforeEach(() => {
    plan = new Plan(1, 'Build an API', null, { createTaskId: sequentialIds() });
  });

  it('should start with an empty forest focused on the root', () => {
    const snapshot = plan.snapshot(noLeases);
    expect(snapshot.root).toEqual([]);
    expect(snapshot.current).toEqual([]);
    expect(plan.currentTask()).toBeNull();
  });

  it('should reject an empty goal', () => {
    expect(() => new Plan(2, '   ')).toThrow(InvalidOperationError);
  });

  it('should append tasks and return their paths', () => {
    expect(plan.addTask([], { description: 'Design schema', level: 'planning' }).path).toEqual([0]);
    expect(plan.addTask([0], { description: 'Define endpoints', level: 'isolation', notes: 'REST' }).path).toEqual([0, 0]);
    expect(plan.addTask([], { description: 'Deploy', level: 'implementation' }).path).toEqual([1]);

    const task = plan.resolve([0, 0]);
    expect(task.description).toBe('Define endpoints');
    expect(task.level).toBe('isolation');
    expect(task.notes).toBe('REST');
  });

  it('should fail to resolve unknown or empty paths', () => {
    plan.addTask([], { description: 'Only', level: 'planning' });
    expect(() => plan.resolve([1])).toThrow(TaskNotFoundError);
    expect(() => plan.resolve([0, 0])).toThrow(TaskNotFoundError);
    expect(() => plan.resolve([])).toThrow(InvalidOperationError);
    expect(() => plan.addTask([3], { description: 'Orphan', level: 'planning' })).toThrow(TaskNotFoundError);
  });

  it('should reject empty descriptions', () => {
    expect(() => plan.addTask([], { description: '', level: 'planning' })).toThrow(InvalidOperationError);
  });

  it('should shift later siblings down on removal', () => {
    plan.addTask([], { description: 'A', level: 'planning' });
    plan.addTask([], { description: 'B', level: 'planning' });
    plan.addTask([], { description: 'C', level: 'planning' });

    const removed = plan.removeTask([0]);

    expect(removed.description).toBe('A');
    expect(plan.resolve([0]).description).toBe('B');
    expect(plan.resolve([1]).description).toBe('C');
  });

  it('should keep focus on the same task when an earlier sibling is removed', () => {
    plan.addTask([], { description: 'A', level: 'planning' });
    plan.addTask([], { description: 'B', level: 'planning' });
    plan.moveTo([1]);

    plan.removeTask([0]);

    expect(plan.currentPath()).toEqual([0]);
    expect(plan.currentTask()?.description).toBe('B');
  });

  it('should move focus to the parent when the focused subtree is removed', () => {
    plan.addTask([], { description: 'A', level: 'planning' });
    plan.addTask([0], { description: 'A1', level: 'isolation' });
    plan.addTask([0, 0], { description: 'A1a', level: 'ordering' });
    plan.moveTo([0, 0, 0]);

    plan.removeTask([0, 0]);
    expect(plan.currentPath()).toEqual([0]);

    plan.removeTask([0]);
    expect(plan.currentPath()).toEqual([]);
  });

  it('should complete a whole subtree and keep the summary on the target', () => {
    plan.addTask([], { description: 'A', level: 'planning' });
    plan.addTask([0], { description: 'A1', level: 'isolation' });

    const ids = plan.complete([0], 'all done');

    expect(ids).toEqual(['t1', 't2']);
    expect(plan.resolve([0]).summary).toBe('all done');
    expect(plan.resolve([0, 0]).completed).toBe(true);
    expect(plan.countTasks()).toEqual({ total: 2, completed: 2 });
  });

  it('should reopen completed ancestors when a child is added', () => {
    plan.addTask([], { description: 'A', level: 'planning' });
    plan.addTask([0], { description: 'A1', level: 'isolation' });
    plan.complete([0], 'done');

    plan.addTask([0, 0], { description: 'A1a', level: 'implementation' });

    expect(plan.resolve([0]).completed).toBe(false);
    expect(plan.resolve([0]).summary).toBeNull();
    expect(plan.resolve([0, 0]).completed).toBe(false);
  });

  it('should refuse to uncomplete an open task', () => {
    plan.addTask([], { description: 'A', level: 'planning' });
    expect(() => plan.uncomplete([0])).toThrow(InvalidOperationError);
    plan.complete([0], 'done');
    expect(plan.uncomplete([0]).summary).toBeNull();
  });

  it('should keep only the most recent history entries', () => {
    const small = new Plan(3, 'Goal', null, { historyLimit: 2 });
    small.record('a', '1');
    small.record('b', '2');
    small.record('c', '3');
    expect(small.snapshot(noLeases).history.map((entry) => entry.action)).toEqual(['b', 'c']);
  });

  it('should include outstanding leases in snapshots', () => {
    plan.addTask([], { description: 'A', level: 'planning' });
    const snapshot = plan.snapshot((id) => (id === 't1' ? 7 : null));
    expect(snapshot.root[0]?.lease).toBe(7);
  });
});
