/**
 * ConfigManager Types
 */

import type { LogLevel } from '../logger/index.js';

/**
 * Runtime configuration read from the environment.
 *
 * `defaultPlanId` is the only setting the engine itself honours; the rest
 * belongs to the adapters.
 */
export type RuntimeConfig = {
  /** ARBOR_PLAN_ID: plan used when a call names none. */
  defaultPlanId: number | null;
  /** ARBOR_SERVER_URL: REST server the CLI talks to. */
  serverUrl: string;
  /** ARBOR_HOST / ARBOR_PORT: where `serve` listens. */
  host: string;
  port: number;
  /** LOG_LEVEL */
  logLevel: LogLevel | null;
};

export interface IConfigManager {
  getConfig(): RuntimeConfig;
  getDefaultPlanId(): number | null;
  resolvePlanId(explicit?: number | string | null): number;
}
