import { Command } from 'commander';
import { DependencyInjectionService } from './services/dependency-injection.js';
import type { ICommand } from './interfaces/command.js';
import { PlanCommand } from './commands/plan/plan-command.js';
import { TaskCommand } from './commands/task/task-command.js';
import { NavigationCommand } from './commands/navigation/navigation-command.js';
import { GuideCommand } from './commands/guide/guide-command.js';
import { ServeCommand } from './commands/serve/serve-command.js';

export const CLI_VERSION = '0.1.0';

/**
 * Builds the `arbor` program with every command registered against one
 * dependency container.
 */
export function createProgram(di: DependencyInjectionService = DependencyInjectionService.getInstance()): Command {
  const program = new Command();

  program
    .name('arbor')
    .description('Arbor CLI - hierarchical plans with lease-coordinated completion')
    .version(CLI_VERSION)
    .option('--server <url>', 'api-server base URL (default ARBOR_SERVER_URL or http://localhost:3000)')
    .option('--plan <id>', 'Plan id (default ARBOR_PLAN_ID)')
    .option('--json', 'Output in JSON format for automation')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('-v, --verbose', 'Show technical details on errors');

  const commands: ICommand[] = [
    new PlanCommand(di),
    new TaskCommand(di),
    new NavigationCommand(di),
    new GuideCommand(di),
    new ServeCommand(di),
  ];
  for (const command of commands) {
    command.register(program);
  }

  return program;
}
