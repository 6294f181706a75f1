import { describe, it, expect } from 'vitest';
import { ConfigManager, createConfigManager, loadRuntimeConfig, parsePlanId } from './config_manager.js';
import { InvalidOperationError } from '../errors/index.js';

describe('loadRuntimeConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadRuntimeConfig({})).toEqual({
      defaultPlanId: null,
      serverUrl: 'http://localhost:3000',
      host: '127.0.0.1',
      port: 3000,
      logLevel: null,
    });
  });

  it('should coerce numeric variables and trim the server url', () => {
    const config = loadRuntimeConfig({
      ARBOR_PLAN_ID: '4',
      ARBOR_PORT: '8080',
      ARBOR_SERVER_URL: 'http://planner:9000/',
      LOG_LEVEL: 'Debug',
    });
    expect(config.defaultPlanId).toBe(4);
    expect(config.port).toBe(8080);
    expect(config.serverUrl).toBe('http://planner:9000');
    expect(config.logLevel).toBe('debug');
  });

  it('should reject malformed values', () => {
    expect(() => loadRuntimeConfig({ ARBOR_PORT: 'abc' })).toThrow(InvalidOperationError);
    expect(() => loadRuntimeConfig({ ARBOR_PLAN_ID: '0' })).toThrow(InvalidOperationError);
    expect(() => loadRuntimeConfig({ LOG_LEVEL: 'verbose' })).toThrow(InvalidOperationError);
  });
});

describe('ConfigManager.resolvePlanId', () => {
  it('should prefer the explicit id over the environment', () => {
    const manager = createConfigManager({ ARBOR_PLAN_ID: '2' });
    expect(manager.resolvePlanId('9')).toBe(9);
    expect(manager.resolvePlanId(3)).toBe(3);
    expect(manager.resolvePlanId()).toBe(2);
  });

  it('should fail when neither is available', () => {
    const manager = new ConfigManager(loadRuntimeConfig({}));
    expect(() => manager.resolvePlanId(undefined)).toThrow('No plan selected: pass a plan id or set ARBOR_PLAN_ID');
  });

  it('should reject non-numeric ids', () => {
    expect(() => parsePlanId('abc')).toThrow(InvalidOperationError);
    expect(() => parsePlanId('1.5')).toThrow(InvalidOperationError);
    expect(parsePlanId(' 12 ')).toBe(12);
  });
});
