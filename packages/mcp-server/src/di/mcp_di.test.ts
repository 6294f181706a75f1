import { describe, it, expect } from 'vitest';
import { ConfigManager, PlanStore, createLogger } from '@arbor/core';
import { McpDependencyInjectionService } from './mcp_di.js';

describe('McpDependencyInjectionService', () => {
  it('should return the same container on subsequent calls', async () => {
    const di = new McpDependencyInjectionService({ env: {} });

    const first = await di.getContainer();
    const second = await di.getContainer();

    expect(second).toBe(first);
    expect(second.store).toBe(first.store);
  });

  it('should use the services it is given', async () => {
    const store = new PlanStore();
    const logger = createLogger('', 'silent');
    const config = new ConfigManager({
      defaultPlanId: 7,
      serverUrl: 'http://localhost:3000',
      host: '127.0.0.1',
      port: 3000,
      logLevel: null,
    });
    const di = new McpDependencyInjectionService({ store, config, logger });

    const container = await di.getContainer();

    expect(container.store).toBe(store);
    expect(container.config).toBe(config);
    expect(container.logger).toBe(logger);
  });

  it('should read the default plan from the environment', async () => {
    const di = new McpDependencyInjectionService({ env: { ARBOR_PLAN_ID: '3' } });

    const { config } = await di.getContainer();

    expect(config.resolvePlanId()).toBe(3);
    expect(config.resolvePlanId(5)).toBe(5);
  });
});
