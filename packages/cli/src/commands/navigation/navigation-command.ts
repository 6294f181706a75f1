import { formatIndexPath } from '@arbor/core';
import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command.js';
import type { BaseCommandOptions } from '../../interfaces/command.js';
import { renderCurrent, renderDistilled } from '../../render/render.js';
import { parsePathArgument } from '../../utils/parse.js';
import { registerNavigationCommands } from './navigation.js';

/**
 * NavigationCommand - moves and reports the focus of a plan.
 */
export class NavigationCommand extends BaseCommand {
  register(program: Command): void {
    registerNavigationCommands(program, this);
  }

  async executeMove(pathText: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const view = await this.client(options).moveTo(this.planId(options), parsePathArgument(pathText));
      const target = view.task ? `${formatIndexPath(view.path)} ${view.task.description}` : 'the plan root';
      this.handleSuccess(view, options, `Moved to ${target}`);
    });
  }

  async executeCurrent(options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const view = await this.client(options).getCurrent(this.planId(options));
      this.handleSuccess(view, options, undefined, renderCurrent(view));
    });
  }

  async executeDistilled(options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const context = await this.client(options).getDistilledContext(this.planId(options));
      this.handleSuccess(context, options, undefined, renderDistilled(context));
    });
  }
}
