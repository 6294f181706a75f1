import { describe, it, expect, beforeEach } from 'vitest';
import { createCliHarness, type CliHarness } from '../../cli_test_helpers.js';

describe('PlanCommand', () => {
  let cli: CliHarness;

  beforeEach(() => {
    cli = createCliHarness({ ARBOR_PLAN_ID: '1' });
  });

  it('should create a plan and tell how to select it', async () => {
    await cli.run(['plan', 'create', 'Build an API', '--notes', 'v1 only']);

    expect(cli.lines()).toEqual([
      '✅ Plan 1 created: Build an API',
      '',
      'Select it with: export ARBOR_PLAN_ID=1',
    ]);
    expect(cli.requests).toEqual(['POST /api/plans']);
    expect((await cli.store.getPlan(1)).notes).toBe('v1 only');
  });

  it('should list plans', async () => {
    await cli.run(['plan', 'list']);
    expect(cli.lines()).toEqual(["No plans yet. Create one with 'arbor plan create <goal>'"]);

    await cli.store.createPlan('Build an API');
    await cli.store.createPlan('Ship the docs');
    cli.reset();

    await cli.run(['plan', 'ls']);
    expect(cli.lines()).toEqual(['  1  Build an API', '  2  Ship the docs']);
  });

  it('should show the selected plan as a tree with the focus marked', async () => {
    await cli.store.createPlan('Build an API', 'Keep it small');
    await cli.store.addTask(1, null, { description: 'Design schema', level: 'planning' });
    await cli.store.addTask(1, [0], { description: 'Write handlers', level: 'implementation' });
    await cli.store.completeTask(1, [0, 0], { force: true, summary: 'Handlers done' });
    await cli.store.moveTo(1, [0]);

    await cli.run(['plan', 'show']);

    expect(cli.lines()).toEqual([
      'Plan 1: Build an API',
      'Notes:',
      '  Keep it small',
      'Current: 0',
      '',
      'Tasks:',
      '→ [ ] 0 Design schema (planning)',
      '    [✓] 0.0 Write handlers (implementation)',
      '        Handlers done',
    ]);
  });

  it('should show a plan given by id over the default', async () => {
    await cli.store.createPlan('Build an API');
    await cli.store.createPlan('Ship the docs');

    await cli.run(['plan', 'show', '2']);

    expect(cli.lines()).toEqual([
      'Plan 2: Ship the docs',
      'Current: root',
      '',
      'Tasks:',
      "  No tasks yet. Add some with 'arbor task add'",
    ]);
  });

  it('should report a missing plan with exit code 1', async () => {
    await cli.run(['plan', 'show']);

    expect(cli.stderr).toEqual(['❌ Plan 1 not found']);
    expect(cli.exitCodes).toEqual([1]);
    expect(cli.stdout).toEqual([]);
  });

  it('should require a plan selection when none is configured', async () => {
    const bare = createCliHarness();
    await bare.run(['plan', 'show']);

    expect(bare.stderr).toEqual(['❌ No plan selected: pass a plan id or set ARBOR_PLAN_ID']);
    expect(bare.exitCodes).toEqual([1]);
  });

  it('should let --plan override ARBOR_PLAN_ID', async () => {
    await cli.store.createPlan('Build an API');
    await cli.store.createPlan('Ship the docs');

    await cli.run(['--plan', '2', 'plan', 'notes', 'Docs first']);

    expect(cli.lines()).toEqual(['✅ Notes updated for plan 2']);
    expect((await cli.store.getPlan(2)).notes).toBe('Docs first');
    expect((await cli.store.getPlan(1)).notes).toBeNull();
  });

  it('should show and clear plan notes', async () => {
    await cli.store.createPlan('Build an API', 'Keep it small');

    await cli.run(['plan', 'notes']);
    expect(cli.lines()).toEqual(['Keep it small']);

    cli.reset();
    await cli.run(['plan', 'notes', '--clear']);
    expect(cli.lines()).toEqual(['✅ Notes cleared for plan 1']);
    expect((await cli.store.getPlan(1)).notes).toBeNull();
  });

  it('should delete a plan', async () => {
    await cli.store.createPlan('Build an API');

    await cli.run(['plan', 'delete', '1']);

    expect(cli.lines()).toEqual(['✅ Plan 1 deleted']);
    expect(await cli.store.listPlans()).toEqual([]);
  });

  it('should reject a malformed plan id before calling the server', async () => {
    await cli.run(['plan', 'delete', 'abc']);

    expect(cli.stderr).toEqual(['❌ Invalid plan id "abc"']);
    expect(cli.requests).toEqual([]);
  });

  it('should print JSON envelopes with --json', async () => {
    await cli.run(['--json', 'plan', 'create', 'Build an API']);
    expect(JSON.parse(cli.stdout.join('\n'))).toEqual({ success: true, data: { id: 1, goal: 'Build an API' } });

    cli.reset();
    await cli.run(['plan', 'show', '9', '--json']);
    expect(JSON.parse(cli.stdout.join('\n'))).toEqual({
      success: false,
      error: 'Plan 9 not found',
      code: 'NOT_FOUND',
      exitCode: 1,
    });
  });

  it('should stay silent with --quiet', async () => {
    await cli.run(['--quiet', 'plan', 'create', 'Build an API']);
    expect(cli.stdout).toEqual([]);
    expect(await cli.store.listPlans()).toEqual([{ id: 1, goal: 'Build an API' }]);
  });
});
