import type { Command } from 'commander';
import type { BaseCommandOptions } from '../../interfaces/command.js';
import type { NavigationCommand } from './navigation-command.js';

export function registerNavigationCommands(program: Command, navigationCommand: NavigationCommand): void {
  program
    .command('move <path>')
    .description('Focus a task; "root" returns to the plan itself')
    .action(async (path: string, _options: BaseCommandOptions, command: Command) => {
      await navigationCommand.executeMove(path, command.optsWithGlobals<BaseCommandOptions>());
    });

  program
    .command('current')
    .description('Show the focused task and its subtasks')
    .action(async (_options: BaseCommandOptions, command: Command) => {
      await navigationCommand.executeCurrent(command.optsWithGlobals<BaseCommandOptions>());
    });

  program
    .command('distilled')
    .description('Show a compact view of the plan centered on the current task')
    .action(async (_options: BaseCommandOptions, command: Command) => {
      await navigationCommand.executeDistilled(command.optsWithGlobals<BaseCommandOptions>());
    });
}
