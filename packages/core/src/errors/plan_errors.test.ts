import { describe, it, expect } from 'vitest';
import {
  AlreadyCompletedError,
  InvalidOperationError,
  LeaseInvalidError,
  LeaseRequiredError,
  LockFailureError,
  NotFoundError,
  PLAN_ERROR_CODES,
  PlanError,
  planErrorFromCode,
} from './plan_errors.js';

describe('planErrorFromCode', () => {
  it.each([
    ['NOT_FOUND', NotFoundError],
    ['INVALID_OPERATION', InvalidOperationError],
    ['LEASE_REQUIRED', LeaseRequiredError],
    ['LEASE_INVALID', LeaseInvalidError],
    ['ALREADY_COMPLETED', AlreadyCompletedError],
    ['LOCK_FAILURE', LockFailureError],
  ] as const)('should rebuild %s as its typed error', (code, type) => {
    const error = planErrorFromCode(code, 'from the wire');

    expect(error).toBeInstanceOf(type);
    expect(error.code).toBe(code);
    expect(error.message).toBe('from the wire');
  });

  it('should cover every code', () => {
    const rebuilt = PLAN_ERROR_CODES.map((code) => planErrorFromCode(code, code));
    expect(rebuilt.every((error) => error.constructor !== PlanError)).toBe(true);
  });
});

describe('engine factories', () => {
  it('should phrase lease and completion errors by path', () => {
    expect(LeaseRequiredError.forTask([0, 1]).message).toBe(
      'Completing task [0,1] requires a lease. Generate one first, or pass force to override.',
    );
    expect(LeaseInvalidError.forTask([2], 7).message).toBe('Lease 7 is not the outstanding lease for task [2]');
    expect(AlreadyCompletedError.forTask([3]).message).toBe('Task [3] is already completed');
  });

  it('should mention the poisoning reason when there is one', () => {
    expect(LockFailureError.forPlan(4, 'boom').message).toBe('Lock for plan 4 is unusable: boom');
    expect(LockFailureError.forPlan(4).message).toBe('Lock for plan 4 is unusable');
  });

  it('should name errors after their class', () => {
    expect(LeaseInvalidError.forTask([0], 1).name).toBe('LeaseInvalidError');
  });
});
