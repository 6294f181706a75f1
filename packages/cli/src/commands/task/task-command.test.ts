import { describe, it, expect, beforeEach } from 'vitest';
import { createCliHarness, type CliHarness } from '../../cli_test_helpers.js';

describe('TaskCommand', () => {
  let cli: CliHarness;

  beforeEach(async () => {
    cli = createCliHarness({ ARBOR_PLAN_ID: '1' });
    await cli.store.createPlan('Build an API');
  });

  describe('add', () => {
    it('should add under the current task by default', async () => {
      await cli.run(['task', 'add', 'Design schema']);
      await cli.store.moveTo(1, [0]);
      cli.reset();

      await cli.run(['task', 'add', 'Write migrations', '--level', 'Implementation', '--notes', 'Postgres']);

      expect(cli.lines()).toEqual(['✅ Added task 0.0: Write migrations (implementation)']);
      const plan = await cli.store.getPlan(1);
      expect(plan.root[0]?.children[0]).toMatchObject({
        description: 'Write migrations',
        level: 'implementation',
        notes: 'Postgres',
      });
    });

    it('should add under an explicit parent and accept level ordinals', async () => {
      await cli.store.addTask(1, null, { description: 'Design schema', level: 'planning' });
      await cli.store.addTask(1, null, { description: 'Write handlers', level: 'planning' });

      await cli.run(['task', 'add', 'Route table', '-l', '2', '--parent', '1']);

      expect(cli.lines()).toEqual(['✅ Added task 1.0: Route table (ordering)']);
    });

    it('should reject an unknown level without calling the server', async () => {
      await cli.run(['task', 'add', 'Design schema', '--level', 'strategy']);

      expect(cli.exitCodes).toEqual([1]);
      expect(cli.requests).toEqual([]);
      expect(cli.stderr[0]?.startsWith('❌ ')).toBe(true);
    });
  });

  describe('complete', () => {
    beforeEach(async () => {
      await cli.store.addTask(1, null, { description: 'Design schema', level: 'planning' });
      cli.reset();
    });

    it('should refuse to complete without a lease', async () => {
      await cli.run(['task', 'complete', '--index', '0']);

      expect(cli.stderr).toEqual([
        '❌ Completing task [0] requires a lease. Generate one first, or pass force to override.',
      ]);
      expect(cli.exitCodes).toEqual([1]);
      expect((await cli.store.getPlan(1)).root[0]?.completed).toBe(false);
    });

    it('should complete with the lease it was granted', async () => {
      await cli.run(['task', 'lease', '0']);
      expect(cli.lines()).toEqual([
        'Lease 1 for task 0 in plan 1',
        '',
        'Verification suggestions:',
        '  - What is the ultimate goal?',
        '  - What are the major components needed?',
        '  - What constraints exist?',
        '',
        'Complete with: arbor task complete --index 0 --lease 1',
      ]);

      cli.reset();
      await cli.run(['task', 'complete', '--index', '0', '--lease', '1', '--summary', 'Schema agreed']);

      expect(cli.lines()).toEqual(['✅ Completed task 0: Design schema', '  Summary: Schema agreed']);
      expect(cli.exitCodes).toEqual([]);
    });

    it('should reject a superseded lease', async () => {
      await cli.run(['task', 'lease', '0']);
      await cli.run(['task', 'lease', '0']);
      cli.reset();

      await cli.run(['task', 'complete', '--index', '0', '--lease', '1']);

      expect(cli.stderr).toEqual(['❌ Lease 1 is not the outstanding lease for task [0]']);
    });

    it('should default to the current task', async () => {
      await cli.store.moveTo(1, [0]);

      await cli.run(['task', 'lease']);
      expect(cli.requests).toEqual(['POST /api/plans/1/tasks/current/lease']);
      cli.reset();
      await cli.run(['task', 'complete', '--lease', '1']);

      expect(cli.lines()).toEqual(['✅ Completed task 0: Design schema']);
      expect(cli.requests).toEqual(['POST /api/plans/1/tasks/current/complete']);
    });

    it('should force completion and refuse a second one', async () => {
      await cli.run(['task', 'complete', '--index', '0', '--force']);
      expect(cli.lines()).toEqual(['✅ Completed task 0: Design schema']);

      cli.reset();
      await cli.run(['task', 'complete', '--index', '0', '--force']);
      expect(cli.stderr).toEqual(['❌ Task [0] is already completed']);
    });

    it('should report the error code in JSON mode', async () => {
      await cli.run(['--json', 'task', 'complete', '--index', '0']);

      expect(JSON.parse(cli.stdout.join('\n'))).toEqual({
        success: false,
        error: 'Completing task [0] requires a lease. Generate one first, or pass force to override.',
        code: 'LEASE_REQUIRED',
        exitCode: 1,
      });
    });

    it('should reject a non-numeric lease', async () => {
      await cli.run(['task', 'complete', '--index', '0', '--lease', 'seven']);

      expect(cli.stderr).toEqual(['❌ --lease must be a non-negative integer, got "seven"']);
      expect(cli.requests).toEqual([]);
    });
  });

  describe('structure', () => {
    beforeEach(async () => {
      await cli.store.addTask(1, null, { description: 'Design schema', level: 'planning' });
      await cli.store.addTask(1, null, { description: 'Write handlers', level: 'planning' });
      cli.reset();
    });

    it('should reopen a completed task', async () => {
      await cli.store.completeTask(1, [1], { force: true });

      await cli.run(['task', 'uncomplete', '1']);

      expect(cli.lines()).toEqual(['✅ Task 1 reopened']);
      expect((await cli.store.getPlan(1)).root[1]?.completed).toBe(false);
    });

    it('should remove a task and warn that siblings shift', async () => {
      await cli.run(['task', 'remove', '0']);

      expect(cli.lines()).toEqual([
        '✅ Removed task 0: Design schema',
        'Later siblings shifted up by one; re-read the plan before using their indices.',
      ]);
      expect((await cli.store.getPlan(1)).root.map((task) => task.description)).toEqual(['Write handlers']);
    });

    it('should change the level of a task', async () => {
      await cli.run(['task', 'change-level', '1', 'isolation']);

      expect(cli.lines()).toEqual(['✅ Task 1 is now isolation']);
      expect((await cli.store.getPlan(1)).root[1]?.level).toBe('isolation');
    });

    it('should report a path with no task', async () => {
      await cli.run(['task', 'remove', '5']);

      expect(cli.stderr).toEqual(['❌ No task at path [5] in plan 1']);
      expect(cli.exitCodes).toEqual([1]);
    });

    it('should reject a malformed path', async () => {
      await cli.run(['task', 'uncomplete', 'a.b']);

      expect(cli.stderr).toEqual(['❌ Invalid index path "a.b": "a" is not a non-negative integer']);
    });
  });

  describe('notes', () => {
    beforeEach(async () => {
      await cli.store.addTask(1, null, { description: 'Design schema', level: 'planning' });
      cli.reset();
    });

    it('should set, view and delete task notes', async () => {
      await cli.run(['task', 'notes', 'set', '0', 'Use UUID keys']);
      expect(cli.lines()).toEqual(['✅ Notes updated for task 0']);

      cli.reset();
      await cli.run(['task', 'notes', 'view', '0']);
      expect(cli.lines()).toEqual(['Use UUID keys']);

      cli.reset();
      await cli.run(['task', 'notes', 'delete', '0']);
      expect(cli.lines()).toEqual(['✅ Notes deleted for task 0']);

      cli.reset();
      await cli.run(['task', 'notes', 'view', '0']);
      expect(cli.lines()).toEqual(['Task 0 has no notes']);
    });

    it('should require text for set and a known action', async () => {
      await cli.run(['task', 'notes', 'set', '0']);
      expect(cli.stderr).toEqual(['❌ task notes set requires the note text']);

      cli.reset();
      await cli.run(['task', 'notes', 'append', '0', 'x']);
      expect(cli.stderr).toEqual(['❌ Unknown notes action "append"; use view, set or delete']);
    });
  });
});
