import { describe, it, expect } from 'vitest';
import { planCreateTool, planGetTool, planListTool, planDeleteTool } from './index.js';
import { createTestDi, parseResult } from '../tool_test_helpers.js';

describe('Plan Tools', () => {
  describe('arbor_plan_create', () => {
    it('should create a plan and return its id', async () => {
      const { di, store } = createTestDi();

      const result = await planCreateTool.handler({ goal: 'Ship the release', notes: 'by friday' }, di);

      expect(result.isError).toBeUndefined();
      expect(parseResult(result)).toEqual({ planId: 1, goal: 'Ship the release' });
      expect((await store.getPlan(1)).notes).toBe('by friday');
    });

    it('should reject an empty goal with INVALID_OPERATION', async () => {
      const { di } = createTestDi();

      const result = await planCreateTool.handler({ goal: '   ' }, di);

      expect(result.isError).toBe(true);
      expect(parseResult(result)).toEqual({ error: 'Plan goal must not be empty', code: 'INVALID_OPERATION' });
    });
  });

  describe('arbor_plan_get', () => {
    it('should fall back to the configured default plan', async () => {
      const { di, store } = createTestDi(2);
      await store.createPlan('first');
      await store.createPlan('second');

      const result = await planGetTool.handler({}, di);

      expect(parseResult(result)).toMatchObject({ id: 2, goal: 'second', current: [], root: [] });
    });

    it('should prefer an explicit plan_id given as a string', async () => {
      const { di, store } = createTestDi(2);
      await store.createPlan('first');
      await store.createPlan('second');

      const result = await planGetTool.handler({ plan_id: '1' }, di);

      expect(parseResult(result)).toMatchObject({ id: 1, goal: 'first' });
    });

    it('should fail when no plan is selected', async () => {
      const { di } = createTestDi();

      const result = await planGetTool.handler({}, di);

      expect(result.isError).toBe(true);
      expect(parseResult(result)).toEqual({
        error: 'No plan selected: pass a plan id or set ARBOR_PLAN_ID',
        code: 'INVALID_OPERATION',
      });
    });
  });

  describe('arbor_plan_list', () => {
    it('should list every plan in id order', async () => {
      const { di, store } = createTestDi();
      await store.createPlan('alpha');
      await store.createPlan('beta');

      const result = await planListTool.handler({}, di);

      expect(parseResult(result)).toEqual({
        plans: [
          { id: 1, goal: 'alpha' },
          { id: 2, goal: 'beta' },
        ],
        total: 2,
      });
    });
  });

  describe('arbor_plan_delete', () => {
    it('should delete the plan so later reads report NOT_FOUND', async () => {
      const { di, store } = createTestDi();
      await store.createPlan('doomed');

      const deleted = await planDeleteTool.handler({ plan_id: 1 }, di);
      const read = await planGetTool.handler({ plan_id: 1 }, di);

      expect(parseResult(deleted)).toEqual({ planId: 1, deleted: true });
      expect(parseResult(read)).toEqual({ error: 'Plan 1 not found', code: 'NOT_FOUND' });
    });
  });
});
