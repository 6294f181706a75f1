import type { Command } from 'commander';
import type { BaseCommandOptions } from '../../interfaces/command.js';
import type { TaskAddOptions, TaskCommand, TaskCompleteOptions } from './task-command.js';

/**
 * Registers `arbor task ...`
 */
export function registerTaskCommands(program: Command, taskCommand: TaskCommand): void {
  const task = program
    .command('task')
    .alias('t')
    .description('Add, complete and annotate tasks in the selected plan')
    .addHelpText('after', `
COMPLETION WORKFLOW:
  Step 1: Check out the task   → arbor task lease 0.1
  Step 2: Complete with lease  → arbor task complete --index 0.1 --lease 7 --summary "Done"

  Completing without a lease fails; --force skips the check.

PATHS:
  "0" is the first top-level task, "0.1" (or "0,1") its second child, "root" the plan itself.
`);

  task
    .command('add <description>')
    .description('Add a subtask under the current task (or --parent)')
    .option('-l, --level <level>', 'planning, isolation, ordering or implementation (or 0-3)', 'planning')
    .option('-n, --notes <notes>', 'Notes for the new task')
    .option('-p, --parent <path>', 'Parent path instead of the current task')
    .action(async (description: string, _options: TaskAddOptions, command: Command) => {
      await taskCommand.executeAdd(description, command.optsWithGlobals<TaskAddOptions>());
    });

  task
    .command('complete')
    .description('Complete a task with its lease (defaults to the current task)')
    .option('-i, --index <path>', 'Task path; defaults to the current task')
    .option('--lease <n>', 'Lease from `arbor task lease`')
    .option('-f, --force', 'Complete without a lease')
    .option('-s, --summary <text>', 'What was done')
    .action(async (_options: TaskCompleteOptions, command: Command) => {
      await taskCommand.executeComplete(command.optsWithGlobals<TaskCompleteOptions>());
    });

  task
    .command('uncomplete <path>')
    .description('Reopen a completed task')
    .action(async (path: string, _options: BaseCommandOptions, command: Command) => {
      await taskCommand.executeUncomplete(path, command.optsWithGlobals<BaseCommandOptions>());
    });

  task
    .command('remove <path>')
    .alias('rm')
    .description('Remove a task and its subtasks')
    .action(async (path: string, _options: BaseCommandOptions, command: Command) => {
      await taskCommand.executeRemove(path, command.optsWithGlobals<BaseCommandOptions>());
    });

  task
    .command('change-level <path> <level>')
    .description('Relabel the level of a task')
    .action(async (path: string, level: string, _options: BaseCommandOptions, command: Command) => {
      await taskCommand.executeChangeLevel(path, level, command.optsWithGlobals<BaseCommandOptions>());
    });

  task
    .command('lease [path]')
    .description('Generate a completion lease (defaults to the current task)')
    .action(async (path: string | undefined, _options: BaseCommandOptions, command: Command) => {
      await taskCommand.executeLease(path, command.optsWithGlobals<BaseCommandOptions>());
    });

  task
    .command('notes <action> <path> [text]')
    .description('view, set or delete the notes of a task')
    .action(async (action: string, path: string, text: string | undefined, _options: BaseCommandOptions, command: Command) => {
      await taskCommand.executeNotes(action, path, text, command.optsWithGlobals<BaseCommandOptions>());
    });
}
