import { describe, it, expect, beforeEach } from 'vitest';
import { LeaseRegistry } from './lease_registry.js';

describe('LeaseRegistry', () => {
  let registry: LeaseRegistry;

  beforeEach(() => {
    registry = new LeaseRegistry();
  });

  it('should issue distinct increasing tokens', () => {
    const first = registry.issue(1, 'a');
    const second = registry.issue(1, 'b');
    expect(first).toBe(1);
    expect(second).toBe(2);
  });

  it('should keep only the newest token of a task valid', () => {
    const older = registry.issue(1, 'a');
    const newer = registry.issue(1, 'a');
    expect(registry.check(1, 'a', older)).toBe('mismatch');
    expect(registry.check(1, 'a', newer)).toBe('valid');
    expect(registry.outstandingFor(1, 'a')).toBe(newer);
  });

  it('should consume a valid token exactly once', () => {
    const token = registry.issue(1, 'a');
    expect(registry.consume(1, 'a', token)).toBe('valid');
    expect(registry.consume(1, 'a', token)).toBe('missing');
    expect(registry.outstandingFor(1, 'a')).toBeNull();
  });

  it('should not consume on mismatch', () => {
    const token = registry.issue(1, 'a');
    expect(registry.consume(1, 'a', token + 100)).toBe('mismatch');
    expect(registry.check(1, 'a', token)).toBe('valid');
  });

  it('should scope tokens by plan', () => {
    const token = registry.issue(1, 'a');
    expect(registry.check(2, 'a', token)).toBe('missing');
  });

  it('should revoke tasks and whole plans', () => {
    registry.issue(1, 'a');
    registry.issue(1, 'b');
    registry.issue(2, 'a');
    expect(registry.revokeTasks(1, ['a', 'missing'])).toBe(1);
    expect(registry.revokePlan(1)).toBe(1);
    expect(registry.outstandingFor(1, 'a')).toBeNull();
    expect(registry.outstandingFor(2, 'a')).not.toBeNull();
  });
});
