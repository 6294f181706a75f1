import { getGuide } from '@arbor/core';
import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command.js';
import type { BaseCommandOptions } from '../../interfaces/command.js';

/**
 * GuideCommand - prints the usage guide. Works without a server.
 */
export class GuideCommand extends BaseCommand {
  register(program: Command): void {
    program
      .command('guide')
      .description('Explain levels, index paths and the lease workflow')
      .action((_options: BaseCommandOptions, command: Command) => {
        this.execute(command.optsWithGlobals<BaseCommandOptions>());
      });
  }

  execute(options: BaseCommandOptions): void {
    const guide = getGuide('cli');
    this.handleSuccess({ guide }, options, undefined, [guide]);
  }
}
