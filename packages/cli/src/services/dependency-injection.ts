import { startApiServer } from '@arbor/api-server';
import { createConfigManager, type ConfigManager } from '@arbor/core';
import { startMcpServer, type McpStartOptions } from '@arbor/mcp-server';
import { ArborHttpClient } from '../client/index.js';
import type { FetchFn, IArborClient } from '../client/index.js';

/** Where command output goes; the console by default. */
export interface CliOutput {
  log(text: string): void;
  error(text: string): void;
}

export type ApiLaunchOptions = Parameters<typeof startApiServer>[0];

/** What the CLI keeps of a started server. */
export interface LaunchedApiServer {
  url: string;
  close(): Promise<void>;
}

export interface LaunchedMcpServer {
  mcpUrl: string | null;
  apiUrl: string | null;
  close(): Promise<void>;
}

/** Long-running servers started by `serve` and `mcp`. */
export interface CliLaunchers {
  startApiServer(options: ApiLaunchOptions): Promise<LaunchedApiServer>;
  startMcpServer(options: McpStartOptions): Promise<LaunchedMcpServer>;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  fetch?: FetchFn;
  output?: CliOutput;
  launchers?: CliLaunchers;
  setExitCode?: (code: number) => void;
}

const consoleOutput: CliOutput = {
  log: (text) => console.log(text),
  error: (text) => console.error(text),
};

/**
 * Dependency Injection Service for the arbor CLI
 *
 * Holds configuration, the HTTP client factory and the output sinks so
 * commands can be exercised in tests without a network or a terminal.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private configManager: ConfigManager | null = null;
  private readonly deps: CliDependencies;

  constructor(deps: CliDependencies = {}) {
    this.deps = deps;
  }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  getConfigManager(): ConfigManager {
    if (!this.configManager) {
      this.configManager = createConfigManager(this.deps.env ?? process.env);
    }
    return this.configManager;
  }

  /** Client for `--server`, falling back to ARBOR_SERVER_URL. */
  getClient(serverUrl?: string): IArborClient {
    return new ArborHttpClient(serverUrl ?? this.getConfigManager().getConfig().serverUrl, this.deps.fetch ?? fetch);
  }

  getOutput(): CliOutput {
    return this.deps.output ?? consoleOutput;
  }

  getLaunchers(): CliLaunchers {
    return this.deps.launchers ?? { startApiServer, startMcpServer };
  }

  setExitCode(code: number): void {
    if (this.deps.setExitCode) {
      this.deps.setExitCode(code);
    } else {
      process.exitCode = code;
    }
  }
}
