import { vi } from 'vitest';
import { createApiRouter } from '@arbor/api-server';
import { createLogger, PlanStore } from '@arbor/core';
import type { McpStartOptions } from '@arbor/mcp-server';
import {
  DependencyInjectionService,
  type ApiLaunchOptions,
  type CliLaunchers,
} from './services/dependency-injection.js';
import type { FetchFn } from './client/index.js';
import { createProgram } from './program.js';

export interface CliHarness {
  store: PlanStore;
  di: DependencyInjectionService;
  stdout: string[];
  stderr: string[];
  exitCodes: number[];
  requests: string[];
  launchers: CliLaunchers;
  /** Runs `arbor <args>` against the in-process api router. */
  run(args: string[]): Promise<void>;
  /** Everything printed to stdout since the last reset, one entry per line. */
  lines(): string[];
  reset(): void;
}

/**
 * Fetch stand-in that hands requests straight to the api-server router,
 * so commands run end to end without a socket.
 */
export function createRouterFetch(store: PlanStore, requests: string[] = []): FetchFn {
  const router = createApiRouter();
  const logger = createLogger('[test] ', 'silent');

  return async (url, init) => {
    const parsed = new URL(url);
    const method = init?.method ?? 'GET';
    requests.push(`${method} ${parsed.pathname}`);
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
    const response = await router.handle(
      { method, pathname: parsed.pathname, query: parsed.searchParams, body },
      { store, logger },
    );
    return new Response(JSON.stringify(response.body), {
      status: response.status,
      headers: { 'Content-Type': 'application/json' },
    });
  };
}

export function createCliHarness(env: NodeJS.ProcessEnv = {}): CliHarness {
  const store = new PlanStore({ logger: createLogger('[test] ', 'silent') });
  const stdout: string[] = [];
  const stderr: string[] = [];
  const exitCodes: number[] = [];
  const requests: string[] = [];

  const launchers: CliLaunchers = {
    startApiServer: vi.fn(async (options: ApiLaunchOptions) => ({
      url: `http://${options.host}:${options.port}`,
      close: async () => undefined,
    })),
    startMcpServer: vi.fn(async (options: McpStartOptions) => ({
      mcpUrl: options.port === undefined ? null : `http://127.0.0.1:${options.port}/mcp`,
      apiUrl: options.expose === undefined ? null : `http://127.0.0.1:${options.expose}`,
      close: async () => undefined,
    })),
  };

  const di = new DependencyInjectionService({
    env,
    fetch: createRouterFetch(store, requests),
    output: {
      log: (text) => stdout.push(...text.split('\n')),
      error: (text) => stderr.push(...text.split('\n')),
    },
    launchers,
    setExitCode: (code) => exitCodes.push(code),
  });

  return {
    store,
    di,
    stdout,
    stderr,
    exitCodes,
    requests,
    launchers,
    run: async (args) => {
      await createProgram(di).parseAsync(args, { from: 'user' });
    },
    lines: () => [...stdout],
    reset: () => {
      stdout.length = 0;
      stderr.length = 0;
      exitCodes.length = 0;
      requests.length = 0;
    },
  };
}
