import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { createLogger, EXAMPLE_GOAL, seedExamplePlan, type PlanStore } from '@arbor/core';
import { createArborMcpServer } from '../server/bootstrap.js';
import { callJson, connectClient } from '../server/protocol_test_helpers.js';
import { createTestDi } from '../tools/tool_test_helpers.js';

/**
 * Every tool, resource and prompt through the real MCP protocol over an
 * in-memory transport, backed by a real plan store.
 */
describe('MCP protocol integration', () => {
  let client: Client;
  let store: PlanStore;

  beforeEach(async () => {
    const test = createTestDi(1);
    store = test.store;
    client = await connectClient(createArborMcpServer(test.di, createLogger('', 'silent')));
  });

  afterEach(async () => {
    await client.close();
  });

  it('should list the full tool catalog', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'arbor_get_current',
      'arbor_get_distilled_context',
      'arbor_guide',
      'arbor_lease_generate',
      'arbor_move_to',
      'arbor_notes_delete',
      'arbor_notes_get',
      'arbor_notes_set',
      'arbor_plan_create',
      'arbor_plan_delete',
      'arbor_plan_get',
      'arbor_plan_list',
      'arbor_task_add',
      'arbor_task_change_level',
      'arbor_task_complete',
      'arbor_task_remove',
      'arbor_task_uncomplete',
    ]);
  });

  it('should run the add, lease and complete workflow', async () => {
    await callJson(client, 'arbor_plan_create', { goal: 'Ship it' });
    const added = await callJson(client, 'arbor_task_add', { description: 'Write tests', level: 'implementation' });
    expect(added.data).toMatchObject({ path: [0], index: '0' });

    const grant = await callJson(client, 'arbor_lease_generate', { path: '0' });
    expect(grant.data).toMatchObject({ lease: 1 });

    const done = await callJson(client, 'arbor_task_complete', { path: [0], lease: 1, summary: 'All green' });

    expect(done).toMatchObject({ isError: false, data: { task: { completed: true, summary: 'All green' } } });
    expect((await store.getPlan(1)).root[0].completed).toBe(true);
  });

  it('should reject invalid arguments with INVALID_OPERATION', async () => {
    const result = await callJson(client, 'arbor_plan_create', {});

    expect(result.isError).toBe(true);
    expect(result.data).toMatchObject({ code: 'INVALID_OPERATION' });
  });

  it('should reject a malformed path', async () => {
    await store.createPlan('Ship it');

    const result = await callJson(client, 'arbor_move_to', { path: 'a.b' });

    expect(result).toEqual({
      isError: true,
      data: { error: 'Invalid index path "a.b": "a" is not a non-negative integer', code: 'INVALID_OPERATION' },
    });
  });

  it('should list the guide and one resource per plan', async () => {
    await store.createPlan('Ship it');

    const { resources } = await client.listResources();

    expect(resources.map((resource) => resource.uri)).toEqual(['arbor://guide', 'arbor://plans/1']);
  });

  it('should read a plan resource as JSON', async () => {
    await seedExamplePlan(store);

    const { contents } = await client.readResource({ uri: 'arbor://plans/1' });
    const first = contents[0];

    expect(first.mimeType).toBe('application/json');
    expect('text' in first && typeof first.text === 'string' ? JSON.parse(first.text) : null).toMatchObject({
      id: 1,
      goal: EXAMPLE_GOAL,
      current: [1, 1],
    });
  });

  it('should render the next-step prompt for the focused task', async () => {
    await seedExamplePlan(store);

    const result = await client.getPrompt({ name: 'next-step', arguments: {} });
    const message = result.messages[0];

    expect(result.description).toBe('Next step for plan 1');
    expect(message.role).toBe('user');
    expect(message.content.type === 'text' ? message.content.text.split('\n').slice(0, 5) : []).toEqual([
      `# Plan 1: ${EXAMPLE_GOAL}`,
      '',
      'Progress: 4 of 13 tasks completed',
      '',
      'Current task: 1.1 Create API endpoints (ordering)',
    ]);
  });
});
