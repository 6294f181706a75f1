import type { Command } from 'commander';
import type { BaseCommandOptions } from '../../interfaces/command.js';
import type { PlanCommand, PlanCreateOptions, PlanNotesOptions } from './plan-command.js';

/**
 * Registers `arbor plan ...`
 */
export function registerPlanCommands(program: Command, planCommand: PlanCommand): void {
  const plan = program
    .command('plan')
    .description('Create, inspect and delete plans')
    .addHelpText('after', `
EXAMPLES:
  arbor plan create "Build the billing service" --notes "EU only"
  arbor plan list
  arbor --plan 2 plan show
  arbor plan notes "Deadline moved to March"
  arbor plan delete 2
`);

  plan
    .command('create <goal>')
    .description('Create a plan for a goal')
    .option('-n, --notes <notes>', 'Plan-level notes')
    .action(async (goal: string, _options: PlanCreateOptions, command: Command) => {
      await planCommand.executeCreate(goal, command.optsWithGlobals<PlanCreateOptions>());
    });

  plan
    .command('list')
    .alias('ls')
    .description('List plans')
    .action(async (_options: BaseCommandOptions, command: Command) => {
      await planCommand.executeList(command.optsWithGlobals<BaseCommandOptions>());
    });

  plan
    .command('show [id]')
    .description('Show a plan and its task tree (defaults to --plan / ARBOR_PLAN_ID)')
    .action(async (id: string | undefined, _options: BaseCommandOptions, command: Command) => {
      await planCommand.executeShow(id, command.optsWithGlobals<BaseCommandOptions>());
    });

  plan
    .command('delete <id>')
    .description('Delete a plan')
    .action(async (id: string, _options: BaseCommandOptions, command: Command) => {
      await planCommand.executeDelete(id, command.optsWithGlobals<BaseCommandOptions>());
    });

  plan
    .command('notes [text]')
    .description('Show, replace or clear the plan notes')
    .option('--clear', 'Remove the plan notes')
    .action(async (text: string | undefined, _options: PlanNotesOptions, command: Command) => {
      await planCommand.executeNotes(text, command.optsWithGlobals<PlanNotesOptions>());
    });
}
