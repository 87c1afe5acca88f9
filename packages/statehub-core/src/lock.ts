import type { MutationLockMode } from './config.js';
import { DisposedError } from './errors.js';

const noop = () => {};

/**
 * FIFO async lock. A task starts only after every earlier task settled, and the lock moves on
 * whether the task resolved or threw.
 */
export class MutationLock {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;
  private disposed = false;

  constructor(private readonly owner = 'MutationLock') {}

  /** Tasks running or waiting */
  get pending(): number {
    return this.queued;
  }

  run<R>(task: () => R | PromiseLike<R>): Promise<R> {
    if (this.disposed) {
      return Promise.reject(new DisposedError(this.owner, 'acquire the mutation lock'));
    }
    this.queued++;
    const result = this.tail.then(() => {
      if (this.disposed) {
        throw new DisposedError(this.owner, 'acquire the mutation lock');
      }
      return task();
    });
    this.tail = result.then(noop, noop).finally(() => {
      this.queued--;
    });
    return result;
  }

  /**
   * Queued tasks that have not started reject with `DisposedError`, as does every later `run`.
   * A task already running is not interrupted.
   */
  dispose(): void {
    this.disposed = true;
  }
}

/**
 * Hands out the lock guarding each state type: one lock for all types in `shared` mode, one per
 * type in `per-type` mode.
 */
export class LockPool {
  private readonly shared: MutationLock;
  private readonly byKey = new Map<object, MutationLock>();
  private disposed = false;

  constructor(
    readonly mode: MutationLockMode,
    private readonly owner = 'LockPool',
  ) {
    this.shared = new MutationLock(owner);
  }

  lockFor(key: object): MutationLock {
    if (this.disposed) {
      throw new DisposedError(this.owner, 'acquire the mutation lock');
    }
    if (this.mode === 'shared') return this.shared;

    let lock = this.byKey.get(key);
    if (!lock) {
      lock = new MutationLock(this.owner);
      this.byKey.set(key, lock);
    }
    return lock;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.shared.dispose();
    for (const lock of this.byKey.values()) lock.dispose();
    this.byKey.clear();
  }
}
