#!/usr/bin/env node

import { parseMcpArgs } from './server/args.js';
import { startMcpServer } from './server/bootstrap.js';

async function main(): Promise<void> {
  const handle = await startMcpServer(parseMcpArgs(process.argv.slice(2)));

  const shutdown = (): void => {
    handle.close().then(
      () => process.exit(0),
      (error: unknown) => {
        process.stderr.write(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}\n`);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  process.stderr.write(`Fatal: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
