/**
 * Standard Command Interface for the arbor CLI
 *
 * All commands implement this interface so they can be registered and
 * tested the same way.
 */

import type { Command } from 'commander';

/**
 * Options every command accepts. `server` and `plan` are global options
 * read through Commander's optsWithGlobals().
 */
export interface BaseCommandOptions {
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  /** Server base URL; defaults to ARBOR_SERVER_URL. */
  server?: string;
  /** Plan id; defaults to ARBOR_PLAN_ID. */
  plan?: string;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  register(program: Command): void;
}
