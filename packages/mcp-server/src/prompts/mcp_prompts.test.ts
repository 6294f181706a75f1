import { describe, it, expect } from 'vitest';
import { getAllPrompts, nextStepPrompt, renderFocus } from './mcp_prompts.js';
import { createTestDi } from '../tools/tool_test_helpers.js';

describe('MCP Prompts', () => {
  it('should expose the next-step prompt', () => {
    expect(getAllPrompts().map((prompt) => prompt.name)).toEqual(['next-step']);
  });

  it('should render an empty plan focused on the root', async () => {
    const { store } = createTestDi();
    await store.createPlan('Ship it');

    const text = renderFocus(await store.getDistilledContext(1));

    expect(text).toBe(
      [
        '# Plan 1: Ship it',
        '',
        'Progress: 0 of 0 tasks completed',
        '',
        'Current task: the plan root',
        '',
        'Subtasks (0):',
        '  (none)',
      ].join('\n'),
    );
  });

  it('should list ancestors, level questions and subtasks of the focused task', async () => {
    const { store } = createTestDi();
    await store.createPlan('Ship it');
    await store.addTask(1, [], { description: 'Backend', level: 'isolation' });
    await store.addTask(1, [0], { description: 'Schema', level: 'ordering' });
    await store.addTask(1, [0, 0], { description: 'Tables', level: 'implementation' });
    await store.completeTask(1, [0, 0, 0], { force: true });
    await store.moveTo(1, [0, 0]);

    const text = renderFocus(await store.getDistilledContext(1));

    expect(text).toBe(
      [
        '# Plan 1: Ship it',
        '',
        'Progress: 1 of 3 tasks completed',
        '',
        'Current task: 0.0 Schema (ordering)',
        '',
        'Questions for the Ordering level:',
        '  - What is the optimal order of implementation?',
        '  - What can be done in parallel?',
        '  - What are the critical path items?',
        '',
        'Ancestors:',
        '  - [ ] 0 Backend (isolation)',
        '',
        'Subtasks (1):',
        '  - [x] 0.0.0 Tables (implementation)',
      ].join('\n'),
    );
  });

  it('should use an explicit plan id argument', async () => {
    const { di, store } = createTestDi();
    await store.createPlan('First');
    await store.createPlan('Second');

    const result = await nextStepPrompt.handler({ plan_id: '2' }, di);

    expect(result.description).toBe('Next step for plan 2');
    expect(result.messages[0].content.text.startsWith('# Plan 2: Second\n')).toBe(true);
  });
});
