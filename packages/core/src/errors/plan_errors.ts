/**
 * Typed errors raised by the plan engine.
 *
 * Every adapter (HTTP, MCP, CLI) maps these by `code`, never by message.
 */

export type PlanErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_OPERATION'
  | 'LEASE_REQUIRED'
  | 'LEASE_INVALID'
  | 'ALREADY_COMPLETED'
  | 'LOCK_FAILURE';

export const PLAN_ERROR_CODES: readonly PlanErrorCode[] = [
  'NOT_FOUND',
  'INVALID_OPERATION',
  'LEASE_REQUIRED',
  'LEASE_INVALID',
  'ALREADY_COMPLETED',
  'LOCK_FAILURE',
];

export class PlanError extends Error {
  constructor(message: string, public readonly code: PlanErrorCode) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends PlanError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
  }
}

export class PlanNotFoundError extends NotFoundError {
  constructor(public readonly planId: number) {
    super(`Plan ${planId} not found`);
  }
}

export class TaskNotFoundError extends NotFoundError {
  constructor(public readonly planId: number, public readonly path: readonly number[]) {
    super(`No task at path [${path.join(',')}] in plan ${planId}`);
  }
}

export class InvalidOperationError extends PlanError {
  constructor(message: string) {
    super(message, 'INVALID_OPERATION');
  }
}

/*
 * The completion and locking errors take their final message so that a
 * client can rebuild them from the wire; the engine uses the factories.
 */

export class LeaseRequiredError extends PlanError {
  constructor(message: string) {
    super(message, 'LEASE_REQUIRED');
  }

  static forTask(path: readonly number[]): LeaseRequiredError {
    return new LeaseRequiredError(
      `Completing task [${path.join(',')}] requires a lease. Generate one first, or pass force to override.`,
    );
  }
}

export class LeaseInvalidError extends PlanError {
  constructor(message: string) {
    super(message, 'LEASE_INVALID');
  }

  static forTask(path: readonly number[], lease: number): LeaseInvalidError {
    return new LeaseInvalidError(`Lease ${lease} is not the outstanding lease for task [${path.join(',')}]`);
  }
}

export class AlreadyCompletedError extends PlanError {
  constructor(message: string) {
    super(message, 'ALREADY_COMPLETED');
  }

  static forTask(path: readonly number[]): AlreadyCompletedError {
    return new AlreadyCompletedError(`Task [${path.join(',')}] is already completed`);
  }
}

export class LockFailureError extends PlanError {
  constructor(message: string) {
    super(message, 'LOCK_FAILURE');
  }

  static forPlan(planId: number, reason?: string): LockFailureError {
    return new LockFailureError(
      reason ? `Lock for plan ${planId} is unusable: ${reason}` : `Lock for plan ${planId} is unusable`,
    );
  }
}

export function isPlanError(error: unknown): error is PlanError {
  return error instanceof PlanError;
}

export function isPlanErrorCode(value: unknown): value is PlanErrorCode {
  return typeof value === 'string' && PLAN_ERROR_CODES.some((code) => code === value);
}

/**
 * Rebuilds a typed error from its wire form, for clients that receive
 * `{ code, message }` over HTTP or MCP.
 */
export function planErrorFromCode(code: PlanErrorCode, message: string): PlanError {
  switch (code) {
    case 'NOT_FOUND':
      return new NotFoundError(message);
    case 'INVALID_OPERATION':
      return new InvalidOperationError(message);
    case 'LEASE_REQUIRED':
      return new LeaseRequiredError(message);
    case 'LEASE_INVALID':
      return new LeaseInvalidError(message);
    case 'ALREADY_COMPLETED':
      return new AlreadyCompletedError(message);
    case 'LOCK_FAILURE':
      return new LockFailureError(message);
  }
}
