import {
  formatIndexPath,
  pathsEqual,
  type CurrentView,
  type DistilledContext,
  type FocusedTreeNode,
  type IndexPath,
  type LeaseGrant,
  type PlanSnapshot,
  type TaskSnapshot,
} from '@arbor/core';

const PLAN_NOTES_LIMIT = 400;
const HISTORY_LINES = 5;

function marker(completed: boolean): string {
  return completed ? '[✓]' : '[ ]';
}

function indentLines(text: string, indent: string): string[] {
  return text.split('\n').map((line) => `${indent}${line}`);
}

/**
 * One line per task, depth-first: the focus is flagged with "→ ",
 * completed tasks carry their summary on the following line.
 */
export function renderTaskTree(tasks: readonly TaskSnapshot[], current: IndexPath, parent: IndexPath = []): string[] {
  const lines: string[] = [];
  tasks.forEach((task, index) => {
    const path = [...parent, index];
    const indent = '  '.repeat(parent.length);
    const focus = pathsEqual(path, current) ? '→ ' : '  ';
    lines.push(`${indent}${focus}${marker(task.completed)} ${formatIndexPath(path)} ${task.description} (${task.level})`);
    if (task.completed && task.summary) {
      lines.push(...indentLines(task.summary, `${indent}      `));
    }
    lines.push(...renderTaskTree(task.children, current, path));
  });
  return lines;
}

export function renderPlan(plan: PlanSnapshot): string[] {
  const lines = [`Plan ${plan.id}: ${plan.goal}`];
  if (plan.notes) {
    lines.push('Notes:', ...indentLines(plan.notes, '  '));
  }
  lines.push(`Current: ${formatIndexPath(plan.current)}`, '', 'Tasks:');
  if (plan.root.length === 0) {
    lines.push("  No tasks yet. Add some with 'arbor task add'");
  } else {
    lines.push(...renderTaskTree(plan.root, plan.current));
  }
  return lines;
}

export function renderTask(path: IndexPath, task: TaskSnapshot): string[] {
  const lines = [`${marker(task.completed)} ${formatIndexPath(path)} ${task.description} (${task.level})`];
  if (task.summary) lines.push(`  Summary: ${task.summary}`);
  if (task.notes) lines.push('  Notes:', ...indentLines(task.notes, '    '));
  if (task.lease !== null) lines.push(`  Lease: ${task.lease}`);
  return lines;
}

export function renderCurrent(view: CurrentView): string[] {
  if (!view.task) {
    return [`Plan ${view.planId} is focused on its root. Use 'arbor move <path>' to select a task.`];
  }
  const lines = [`Current task for plan ${view.planId}:`, ...renderTask(view.path, view.task).map((line) => `  ${line}`)];
  if (view.task.children.length > 0) {
    lines.push('', 'Subtasks:', ...renderTaskTree(view.task.children, [], view.path).map((line) => `  ${line}`));
  }
  return lines;
}

export function renderLease(grant: LeaseGrant): string[] {
  const lines = [`Lease ${grant.lease} for task ${formatIndexPath(grant.path)} in plan ${grant.planId}`];
  if (grant.suggestions.length > 0) {
    lines.push('', 'Verification suggestions:', ...grant.suggestions.map((suggestion) => `  - ${suggestion}`));
  }
  lines.push('', `Complete with: arbor task complete --index ${formatIndexPath(grant.path)} --lease ${grant.lease}`);
  return lines;
}

function renderFocusedTree(nodes: readonly FocusedTreeNode[]): string[] {
  const lines: string[] = [];
  for (const node of nodes) {
    const indent = '  '.repeat(node.path.length - 1);
    const focus = node.isCurrent ? '→ ' : '  ';
    const hidden = !node.children && node.childCount > 0 ? ` +${node.childCount}` : '';
    lines.push(`${indent}${focus}${marker(node.completed)} ${formatIndexPath(node.path)} ${node.description} (${node.level})${hidden}`);
    if (node.children) lines.push(...renderFocusedTree(node.children));
  }
  return lines;
}

export function renderDistilled(context: DistilledContext): string[] {
  const lines = [`Goal: ${context.goal}`];

  if (context.planNotes) {
    const notes = context.planNotes.length > PLAN_NOTES_LIMIT
      ? `${context.planNotes.slice(0, PLAN_NOTES_LIMIT).trim()}... (use 'arbor plan show' for full notes)`
      : context.planNotes;
    lines.push(`Plan notes: ${notes}`);
  }
  lines.push(`Progress: ${context.usage.summary}`);

  const { task, level } = context.current;
  if (task) {
    lines.push(`Current task: [${formatIndexPath(task.path)}] ${task.description} (${task.level})`);
    if (task.notes) lines.push('  Notes:', ...indentLines(task.notes, '    '));
  } else {
    lines.push('Current task: none (focus is the plan root)');
  }

  if (level) {
    lines.push(
      '',
      `Level ${level.ordinal}: ${level.title} - ${level.description}`,
      `  Focus: ${level.focus}`,
      ...level.questions.map((question) => `  - ${question}`),
    );
  }

  lines.push('', 'Task tree:');
  if (context.taskTree.length === 0) {
    lines.push('  (empty)');
  } else {
    lines.push(...renderFocusedTree(context.taskTree));
  }

  const recent = context.history.slice(-HISTORY_LINES);
  if (recent.length > 0) {
    lines.push('', 'Recent history:', ...recent.map((entry) => `  ${entry.timestamp} ${entry.action}: ${entry.details}`));
  }
  return lines;
}
