/**
 * LeaseRegistry - completion tokens keyed by task identity.
 *
 * Tokens come from a single monotonic counter, so a token is never issued
 * twice. Only the most recently issued, unconsumed token of a task is valid.
 */

export type LeaseToken = number;

export type LeaseCheck = 'valid' | 'missing' | 'mismatch';

export class LeaseRegistry {
  private counter = 0;
  private readonly outstanding = new Map<string, LeaseToken>();

  private static key(planId: number, taskId: string): string {
    return `${planId}:${taskId}`;
  }

  /** Issues a new token for the task, superseding any outstanding one. */
  issue(planId: number, taskId: string): LeaseToken {
    this.counter += 1;
    this.outstanding.set(LeaseRegistry.key(planId, taskId), this.counter);
    return this.counter;
  }

  outstandingFor(planId: number, taskId: string): LeaseToken | null {
    return this.outstanding.get(LeaseRegistry.key(planId, taskId)) ?? null;
  }

  check(planId: number, taskId: string, token: LeaseToken): LeaseCheck {
    const current = this.outstanding.get(LeaseRegistry.key(planId, taskId));
    if (current === undefined) return 'missing';
    return current === token ? 'valid' : 'mismatch';
  }

  /** Consumes the token when it is the valid one; otherwise leaves state untouched. */
  consume(planId: number, taskId: string, token: LeaseToken): LeaseCheck {
    const result = this.check(planId, taskId, token);
    if (result === 'valid') {
      this.outstanding.delete(LeaseRegistry.key(planId, taskId));
    }
    return result;
  }

  revoke(planId: number, taskId: string): boolean {
    return this.outstanding.delete(LeaseRegistry.key(planId, taskId));
  }

  revokeTasks(planId: number, taskIds: Iterable<string>): number {
    let revoked = 0;
    for (const taskId of taskIds) {
      if (this.revoke(planId, taskId)) revoked++;
    }
    return revoked;
  }

  revokePlan(planId: number): number {
    const prefix = `${planId}:`;
    let revoked = 0;
    for (const key of [...this.outstanding.keys()]) {
      if (key.startsWith(prefix)) {
        this.outstanding.delete(key);
        revoked++;
      }
    }
    return revoked;
  }
}
