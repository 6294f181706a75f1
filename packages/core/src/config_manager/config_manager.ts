/**
 * ConfigManager - runtime configuration from environment variables.
 *
 * Values are validated and coerced through a JSON schema so that
 * ARBOR_PORT=abc fails at startup rather than at bind time.
 */

import { InvalidOperationError } from '../errors/index.js';
import { LOG_LEVELS } from '../logger/index.js';
import { validateInput, type SchemaObject } from '../validation/index.js';
import type { IConfigManager, RuntimeConfig } from './config_manager.types.js';

export const DEFAULT_SERVER_URL = 'http://localhost:3000';
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 3000;

export const PLAN_ID_ENV = 'ARBOR_PLAN_ID';

type EnvShape = {
  ARBOR_PLAN_ID?: number;
  ARBOR_SERVER_URL: string;
  ARBOR_HOST: string;
  ARBOR_PORT: number;
  LOG_LEVEL?: string;
};

const envSchema: SchemaObject = {
  type: 'object',
  properties: {
    ARBOR_PLAN_ID: { type: 'integer', minimum: 1 },
    ARBOR_SERVER_URL: { type: 'string', minLength: 1, default: DEFAULT_SERVER_URL },
    ARBOR_HOST: { type: 'string', minLength: 1, default: DEFAULT_HOST },
    ARBOR_PORT: { type: 'integer', minimum: 0, maximum: 65535, default: DEFAULT_PORT },
    LOG_LEVEL: { type: 'string', enum: [...LOG_LEVELS] },
  },
};

const ENV_KEYS = ['ARBOR_PLAN_ID', 'ARBOR_SERVER_URL', 'ARBOR_HOST', 'ARBOR_PORT', 'LOG_LEVEL'] as const;

export function parsePlanId(value: number | string): number {
  if (typeof value === 'string' && !/^\s*\d+\s*$/.test(value)) {
    throw new InvalidOperationError(`Invalid plan id ${JSON.stringify(value)}`);
  }
  const id = Number(value);
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new InvalidOperationError(`Invalid plan id ${JSON.stringify(value)}`);
  }
  return id;
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const input: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const value = env[key]?.trim();
    if (value) input[key] = key === 'LOG_LEVEL' ? value.toLowerCase() : value;
  }

  const parsed = validateInput<EnvShape>(envSchema, input, 'environment', { coerceTypes: true });
  const logLevel = LOG_LEVELS.find((level) => level === parsed.LOG_LEVEL) ?? null;

  return {
    defaultPlanId: parsed.ARBOR_PLAN_ID ?? null,
    serverUrl: parsed.ARBOR_SERVER_URL.replace(/\/+$/, ''),
    host: parsed.ARBOR_HOST,
    port: parsed.ARBOR_PORT,
    logLevel,
  };
}

/**
 * Configuration Manager Class
 *
 * Provides typed access to the runtime configuration and resolves which
 * plan a stateless call targets.
 *
 * @example
 * ```typescript
 * const config = createConfigManager();
 * const planId = config.resolvePlanId(options.plan);
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly config: RuntimeConfig;

  constructor(config: RuntimeConfig) {
    this.config = config;
  }

  getConfig(): RuntimeConfig {
    return { ...this.config };
  }

  getDefaultPlanId(): number | null {
    return this.config.defaultPlanId;
  }

  /**
   * Explicit id first, then ARBOR_PLAN_ID.
   */
  resolvePlanId(explicit?: number | string | null): number {
    if (explicit !== undefined && explicit !== null && explicit !== '') {
      return parsePlanId(explicit);
    }
    if (this.config.defaultPlanId !== null) {
      return this.config.defaultPlanId;
    }
    throw new InvalidOperationError(`No plan selected: pass a plan id or set ${PLAN_ID_ENV}`);
  }
}

export function createConfigManager(env: NodeJS.ProcessEnv = process.env): ConfigManager {
  return new ConfigManager(loadRuntimeConfig(env));
}
