import { formatIndexPath, type DistilledContext, type TaskBrief } from '@arbor/core';
import type { McpPromptDefinition, McpPromptResult } from '../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../di/mcp_di.js';

function briefLine(task: TaskBrief): string {
  const mark = task.completed ? '[x]' : '[ ]';
  return `  - ${mark} ${formatIndexPath(task.path)} ${task.description} (${task.level})`;
}

/** Renders the focus section of a distilled context as markdown. */
export function renderFocus(context: DistilledContext): string {
  const lines: string[] = [`# Plan ${context.planId}: ${context.goal}`, '', `Progress: ${context.usage.summary}`];

  const { task, level } = context.current;
  if (task) {
    lines.push('', `Current task: ${formatIndexPath(task.path)} ${task.description} (${task.level})`);
    if (task.notes) lines.push(`Notes: ${task.notes}`);
    if (level) {
      lines.push('', `Questions for the ${level.title} level:`);
      for (const question of level.questions) lines.push(`  - ${question}`);
    }
  } else {
    lines.push('', 'Current task: the plan root');
  }

  if (context.ancestors.length > 0) {
    lines.push('', 'Ancestors:');
    for (const ancestor of context.ancestors) lines.push(briefLine(ancestor));
  }

  lines.push('', `Subtasks (${context.children.length}):`);
  if (context.children.length === 0) lines.push('  (none)');
  for (const child of context.children) lines.push(briefLine(child));

  return lines.join('\n');
}

/** next-step: distilled context plus an instruction to choose the next action */
export const nextStepPrompt: McpPromptDefinition = {
  name: 'next-step',
  description: 'Summarize the focused part of a plan and ask for the next concrete action.',
  arguments: [
    { name: 'plan_id', description: 'Optional: plan to work on. Defaults to ARBOR_PLAN_ID.', required: false },
  ],
  handler: async (args: Record<string, string>, di: McpDependencyInjectionService): Promise<McpPromptResult> => {
    const { store, config } = await di.getContainer();
    const planId = config.resolvePlanId(args.plan_id);
    const context = await store.getDistilledContext(planId);

    const text = [
      renderFocus(context),
      '',
      'Decide the single next action for this plan. Either break the current task into subtasks ' +
        'with arbor_task_add, move to the next open task with arbor_move_to, or finish it: ' +
        'call arbor_lease_generate, do the work, then arbor_task_complete with the lease and a summary.',
    ].join('\n');

    return {
      description: `Next step for plan ${planId}`,
      messages: [{ role: 'user', content: { type: 'text', text } }],
    };
  },
};

export function getAllPrompts(): McpPromptDefinition[] {
  return [nextStepPrompt];
}
