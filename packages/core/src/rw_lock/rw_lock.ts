/**
 * Async reader-writer lock with FIFO hand-off.
 *
 * Waiters are granted in arrival order: a run of queued readers is admitted
 * together, a writer only once every earlier holder has released. After
 * `poison()` every pending and future acquisition is rejected.
 */

export type Release = () => void;

type Mode = 'read' | 'write';

interface Waiter {
  mode: Mode;
  resolve: (release: Release) => void;
  reject: (error: Error) => void;
}

export class LockPoisonedError extends Error {
  constructor(public readonly reason: string) {
    super(`Lock poisoned: ${reason}`);
    this.name = 'LockPoisonedError';
    Object.setPrototypeOf(this, LockPoisonedError.prototype);
  }
}

export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private readonly queue: Waiter[] = [];
  private poisonReason: string | null = null;

  get isPoisoned(): boolean {
    return this.poisonReason !== null;
  }

  acquireRead(): Promise<Release> {
    return this.acquire('read');
  }

  acquireWrite(): Promise<Release> {
    return this.acquire('write');
  }

  poison(reason: string): void {
    if (this.poisonReason !== null) return;
    this.poisonReason = reason;
    const waiters = this.queue.splice(0, this.queue.length);
    for (const waiter of waiters) {
      waiter.reject(new LockPoisonedError(reason));
    }
  }

  private acquire(mode: Mode): Promise<Release> {
    if (this.poisonReason !== null) {
      return Promise.reject(new LockPoisonedError(this.poisonReason));
    }
    return new Promise<Release>((resolve, reject) => {
      this.queue.push({ mode, resolve, reject });
      this.dispatch();
    });
  }

  private dispatch(): void {
    while (this.queue.length > 0) {
      const head = this.queue[0];
      if (!head) return;
      if (head.mode === 'write') {
        if (this.writer || this.readers > 0) return;
        this.queue.shift();
        this.writer = true;
        head.resolve(this.releaser('write'));
        return;
      }
      if (this.writer) return;
      this.queue.shift();
      this.readers++;
      head.resolve(this.releaser('read'));
    }
  }

  private releaser(mode: Mode): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (mode === 'write') {
        this.writer = false;
      } else {
        this.readers--;
      }
      this.dispatch();
    };
  }
}
