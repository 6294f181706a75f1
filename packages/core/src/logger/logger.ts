export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogSink = "stdout" | "stderr";

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private prefix: string;
  private sink: LogSink;

  constructor(prefix: string = "", level: LogLevel = "info", sink: LogSink = "stdout") {
    this.prefix = prefix;
    this.level = level;
    this.sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    const currentLevelIndex = LOG_LEVELS.indexOf(this.level);
    const messageLevelIndex = LOG_LEVELS.indexOf(level);

    return currentLevelIndex <= messageLevelIndex && this.level !== "silent";
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      this.write(console.log, message, args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      this.write(console.log, message, args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  // stdout is the protocol channel of a stdio MCP server
  private write(fn: (...data: unknown[]) => void, message: string, args: unknown[]): void {
    if (this.sink === "stderr") {
      console.error(`${this.prefix}${message}`, ...args);
    } else {
      fn(`${this.prefix}${message}`, ...args);
    }
  }
}

/**
 * Level resolution: explicit argument, then LOG_LEVEL, then "silent" under
 * NODE_ENV=test and "info" otherwise.
 */
export function resolveLogLevel(level?: LogLevel, env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (level) return level;
  const fromEnv = env['LOG_LEVEL']?.toLowerCase();
  if (isLogLevel(fromEnv)) return fromEnv;
  return env['NODE_ENV'] === "test" ? "silent" : "info";
}

export function createLogger(prefix: string = "", level?: LogLevel, sink: LogSink = "stdout"): ConsoleLogger {
  return new ConsoleLogger(prefix, resolveLogLevel(level), sink);
}

export const logger = createLogger("[arbor] ");
