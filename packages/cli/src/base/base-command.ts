/**
 * Base Command Class for the arbor CLI
 *
 * Provides common functionality and enforces standards across all commands:
 * resolving the client and plan from global options, and reporting results
 * and errors the same way in text and JSON mode.
 */

import type { Command } from 'commander';
import { isPlanError } from '@arbor/core';
import { DependencyInjectionService } from '../services/dependency-injection.js';
import type { IArborClient } from '../client/index.js';
import type { BaseCommandOptions, ICommand } from '../interfaces/command.js';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> implements ICommand {
  protected readonly container: DependencyInjectionService;

  constructor(container: DependencyInjectionService = DependencyInjectionService.getInstance()) {
    this.container = container;
  }

  /**
   * Register the command with Commander.js
   * Must be implemented by each command
   */
  abstract register(program: Command): void;

  protected client(options: TOptions): IArborClient {
    return this.container.getClient(options.server);
  }

  /** `--plan` first, then ARBOR_PLAN_ID. */
  protected planId(options: TOptions): number {
    return this.container.getConfigManager().resolvePlanId(options.plan);
  }

  /**
   * Runs a command body, turning any failure into a reported error.
   */
  protected async run(options: TOptions, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.handleError(message, options, error instanceof Error ? error : undefined);
    }
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const output = this.container.getOutput();

    if (options.json) {
      output.log(JSON.stringify({
        success: false,
        error: message,
        code: isPlanError(error) ? error.code : null,
        exitCode,
      }, null, 2));
    } else {
      output.error(message.startsWith('❌') ? message : `❌ ${message}`);
      if (options.verbose && error?.stack) {
        output.error(`Technical details: ${error.stack}`);
      }
    }

    this.container.setExitCode(exitCode);
  }

  /**
   * Handle successful output consistently. `lines` is the text rendering
   * of `data`; JSON mode prints the data itself.
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string, lines: string[] = []): void {
    const output = this.container.getOutput();

    if (options.json) {
      output.log(JSON.stringify({ success: true, data }, null, 2));
      return;
    }
    if (options.quiet) return;

    if (message) {
      output.log(`✅ ${message}`);
    }
    for (const line of lines) {
      output.log(line);
    }
  }
}
