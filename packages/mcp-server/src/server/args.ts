import { InvalidOperationError } from '@arbor/core';
import type { McpStartOptions } from './bootstrap.js';

function readPort(flag: string, value: string | undefined): number {
  const port = Number(value);
  if (value === undefined || !/^\d+$/.test(value) || port > 65535) {
    throw new InvalidOperationError(`${flag} requires a numeric port`);
  }
  return port;
}

/**
 * Parses the arbor-mcp flags: --port <n>, --expose <n>, --host <h>, --example.
 * Both "--flag value" and "--flag=value" forms are accepted.
 */
export function parseMcpArgs(argv: readonly string[]): McpStartOptions {
  const options: McpStartOptions = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
    const inline = flag === arg ? undefined : arg.slice(eq + 1);
    const value = (): string | undefined => inline ?? argv[++i];

    switch (flag) {
      case '--port':
        options.port = readPort(flag, value());
        break;
      case '--expose':
        options.expose = readPort(flag, value());
        break;
      case '--host': {
        const host = value();
        if (!host) throw new InvalidOperationError('--host requires a value');
        options.host = host;
        break;
      }
      case '--example':
        options.example = true;
        break;
      default:
        throw new InvalidOperationError(`Unknown option: ${arg}`);
    }
  }

  return options;
}
