import { createLogger, PlanStore, seedExamplePlan } from '@arbor/core';
import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command.js';
import type { BaseCommandOptions } from '../../interfaces/command.js';
import { parseInteger } from '../../utils/parse.js';

export interface ServeOptions extends BaseCommandOptions {
  port?: string;
  host?: string;
  example?: boolean;
}

export interface McpOptions extends BaseCommandOptions {
  port?: string;
  host?: string;
  expose?: string;
  example?: boolean;
}

/**
 * ServeCommand - starts the long-running servers in this process:
 * `serve` for the REST api-server, `mcp` for the MCP server.
 */
export class ServeCommand extends BaseCommand {
  register(program: Command): void {
    program
      .command('serve')
      .description('Start the REST api-server')
      .option('--port <port>', 'Port to listen on (default ARBOR_PORT or 3000)')
      .option('--host <host>', 'Interface to bind (default ARBOR_HOST or 127.0.0.1)')
      .option('--example', 'Seed the example plan')
      .action(async (_options: ServeOptions, command: Command) => {
        await this.executeServe(command.optsWithGlobals<ServeOptions>());
      });

    program
      .command('mcp')
      .description('Start the MCP server (stdio unless --port is given)')
      .option('--port <port>', 'Serve MCP over streamable HTTP on this port')
      .option('--host <host>', 'Interface to bind for --port and --expose')
      .option('--expose <port>', 'Also start the REST api-server on this port')
      .option('--example', 'Seed the example plan')
      .action(async (_options: McpOptions, command: Command) => {
        await this.executeMcp(command.optsWithGlobals<McpOptions>());
      });
  }

  async executeServe(options: ServeOptions): Promise<void> {
    await this.run(options, async () => {
      const config = this.container.getConfigManager().getConfig();
      const logger = createLogger('[arbor] ', config.logLevel ?? undefined);
      const store = new PlanStore({ logger });

      if (options.example) {
        const planId = await seedExamplePlan(store);
        logger.info(`Seeded example plan ${planId}`);
      }

      const handle = await this.container.getLaunchers().startApiServer({
        store,
        logger,
        host: options.host ?? config.host,
        port: options.port !== undefined ? parseInteger(options.port, '--port') : config.port,
      });
      this.handleSuccess({ url: handle.url }, options, `arbor api-server listening on ${handle.url}`);
    });
  }

  async executeMcp(options: McpOptions): Promise<void> {
    await this.run(options, async () => {
      // stdout belongs to the protocol under stdio
      const handle = await this.container.getLaunchers().startMcpServer({
        ...(options.port !== undefined ? { port: parseInteger(options.port, '--port') } : {}),
        ...(options.expose !== undefined ? { expose: parseInteger(options.expose, '--expose') } : {}),
        ...(options.host !== undefined ? { host: options.host } : {}),
        example: options.example ?? false,
      });
      const output = this.container.getOutput();
      if (handle.mcpUrl) output.error(`arbor MCP server listening on ${handle.mcpUrl}`);
      if (handle.apiUrl) output.error(`arbor api-server listening on ${handle.apiUrl}`);
    });
  }
}
