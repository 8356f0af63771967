import { Logger } from '../utils/Logger';

export interface PoolTask {
  id: string;
  /** Must settle; a rejection is logged and counted as finished. */
  run(): Promise<void>;
}

export interface PoolStats {
  queued: number;
  running: number;
  concurrency: number;
}

/**
 * FIFO queue drained by a fixed number of concurrent workers.
 */
export class WorkerPool<T extends PoolTask = PoolTask> {
  private readonly queue: T[] = [];
  private readonly running = new Map<string, T>();
  private idleWaiters: Array<() => void> = [];
  private readonly logger: Logger;

  public constructor(
    private readonly concurrency: number,
    logger: Logger
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Worker pool concurrency must be a positive integer, got ${concurrency}`);
    }
    this.logger = logger.child('WorkerPool');
  }

  public submit(task: T): void {
    this.queue.push(task);
    this.logger.debug(`Queued ${task.id}. Queue size: ${this.queue.length}`);
    this.drain();
  }

  /**
   * Drops a task that has not started yet. Returns false when it is running or unknown.
   */
  public remove(id: string): boolean {
    const index = this.queue.findIndex((task) => task.id === id);
    if (index === -1) {
      return false;
    }
    this.queue.splice(index, 1);
    this.notifyIfIdle();
    return true;
  }

  public isRunning(id: string): boolean {
    return this.running.has(id);
  }

  public stats(): PoolStats {
    return { queued: this.queue.length, running: this.running.size, concurrency: this.concurrency };
  }

  /** Resolves once nothing is queued or running. */
  public onIdle(): Promise<void> {
    if (this.queue.length === 0 && this.running.size === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain(): void {
    while (this.running.size < this.concurrency) {
      const task = this.queue.shift();
      if (!task) {
        break;
      }
      this.running.set(task.id, task);
      void this.execute(task);
    }
  }

  private async execute(task: T): Promise<void> {
    try {
      await task.run();
    } catch (error) {
      this.logger.error(`Task ${task.id} threw outside its own error handling`, error);
    } finally {
      this.running.delete(task.id);
      this.drain();
      this.notifyIfIdle();
    }
  }

  private notifyIfIdle(): void {
    if (this.queue.length > 0 || this.running.size > 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
