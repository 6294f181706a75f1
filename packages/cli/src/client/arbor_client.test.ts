import { describe, it, expect, beforeEach } from 'vitest';
import { LeaseRequiredError, NotFoundError, PlanStore, createLogger, isPlanError } from '@arbor/core';
import { ArborConnectionError, ArborHttpClient } from './arbor_client.js';
import { createRouterFetch } from '../cli_test_helpers.js';

describe('ArborHttpClient', () => {
  let store: PlanStore;
  let requests: string[];
  let client: ArborHttpClient;

  beforeEach(() => {
    store = new PlanStore({ logger: createLogger('[test] ', 'silent') });
    requests = [];
    client = new ArborHttpClient('http://localhost:3000/', createRouterFetch(store, requests));
  });

  it('should strip trailing slashes from the base url', () => {
    expect(client.baseUrl).toBe('http://localhost:3000');
  });

  it('should round-trip plans through the envelope', async () => {
    expect(await client.health()).toEqual({ status: 'ok' });
    const id = await client.createPlan('Build an API', 'v1');
    expect(id).toBe(1);
    expect(await client.listPlans()).toEqual([{ id: 1, goal: 'Build an API' }]);
    expect(await client.getPlan(1)).toMatchObject({ id: 1, goal: 'Build an API', notes: 'v1', root: [], current: [] });
  });

  it('should address tasks by their comma path', async () => {
    await client.createPlan('Build an API');
    await client.addTask(1, { description: 'Design schema', level: 'planning' });
    await client.addTask(1, { description: 'Write migrations', level: 'implementation', parent: [0] });
    requests.length = 0;

    const grant = await client.generateLease(1, [0, 0]);
    const { path, task } = await client.completeTask(1, [0, 0], { lease: grant.lease, summary: 'Migrated' });

    expect(requests).toEqual([
      'POST /api/plans/1/tasks/0%2C0/lease',
      'POST /api/plans/1/tasks/0%2C0/complete',
    ]);
    expect(path).toEqual([0, 0]);
    expect(task).toMatchObject({ description: 'Write migrations', completed: true, summary: 'Migrated', lease: null });
  });

  it('should spell the root path as "root"', async () => {
    await client.createPlan('Build an API');
    requests.length = 0;

    await expect(client.getNotes(1, [])).rejects.toThrow();
    expect(requests).toEqual(['GET /api/plans/1/tasks/root/notes']);
  });

  it('should rebuild engine errors from their code', async () => {
    const error = await client.getPlan(7).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(isPlanError(error) ? error.code : null).toBe('NOT_FOUND');
    expect(error).toHaveProperty('message', 'Plan 7 not found');
  });

  it('should keep lease error codes', async () => {
    await client.createPlan('Build an API');
    await client.addTask(1, { description: 'Design schema', level: 'planning' });

    const error = await client.completeTask(1, [0], {}).catch((caught: unknown) => caught);

    expect(isPlanError(error) ? error.code : null).toBe('LEASE_REQUIRED');
    expect(error).toBeInstanceOf(LeaseRequiredError);
  });

  it('should report an unreachable server', async () => {
    const offline = new ArborHttpClient('http://localhost:3999', async () => {
      throw new Error('connect ECONNREFUSED');
    });

    const error = await offline.listPlans().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ArborConnectionError);
    expect(error).toHaveProperty('message', 'Cannot reach arbor server at http://localhost:3999: connect ECONNREFUSED');
  });

  it('should report a response that is not JSON', async () => {
    const proxy = new ArborHttpClient('http://localhost:3000', async () => new Response('Bad gateway', { status: 502 }));

    await expect(proxy.listPlans()).rejects.toThrow('Server answered 502 without a JSON body');
  });

  it('should reject a response of the wrong shape', async () => {
    const odd = new ArborHttpClient(
      'http://localhost:3000',
      async () => new Response(JSON.stringify({ success: true, data: { plans: [] } }), { status: 200 }),
    );

    await expect(odd.listPlans()).rejects.toThrow(/^Invalid response from GET \/api\/plans/);
  });
});
