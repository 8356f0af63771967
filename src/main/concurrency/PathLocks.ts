import { ConcurrentMutationError } from '../../shared/errors';

export type LockRelease = () => void;

/**
 * Exclusive per-path locks plus a barrier for whole-library operations.
 *
 * Acquiring a held path fails immediately with ConcurrentMutationError; callers never queue on a song.
 * While a barrier is up, new acquisitions wait for it to come down.
 */
export class PathLocks {
  private readonly held = new Set<string>();
  private barrier: Promise<void> | null = null;
  private drainWaiters: Array<() => void> = [];

  public async acquire(key: string): Promise<LockRelease> {
    while (this.barrier) {
      await this.barrier;
    }
    if (this.held.has(key)) {
      throw new ConcurrentMutationError(key);
    }
    this.held.add(key);

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.held.delete(key);
      if (this.held.size === 0) {
        const waiters = this.drainWaiters;
        this.drainWaiters = [];
        waiters.forEach((resolve) => resolve());
      }
    };
  }

  public isHeld(key: string): boolean {
    return this.held.has(key);
  }

  public heldKeys(): string[] {
    return Array.from(this.held);
  }

  public get barrierRaised(): boolean {
    return this.barrier !== null;
  }

  /**
   * Raises the barrier, waits for every held lock to be released, runs `task`, then lowers the barrier.
   */
  public async exclusive<T>(task: () => Promise<T>): Promise<T> {
    while (this.barrier) {
      await this.barrier;
    }

    let lower: () => void = () => undefined;
    this.barrier = new Promise<void>((resolve) => {
      lower = resolve;
    });

    try {
      await this.drained();
      return await task();
    } finally {
      this.barrier = null;
      lower();
    }
  }

  private drained(): Promise<void> {
    if (this.held.size === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }
}
