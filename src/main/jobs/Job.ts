import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import { JobCancelledError, LibraryError, toLibraryError } from '../../shared/errors';
import type { JobKind, JobState, JobSummary } from '../../shared/models';
import type { PathLocks } from '../concurrency/PathLocks';
import { Logger } from '../utils/Logger';

export type JobOutcome<T> =
  | { state: 'complete'; value: T }
  | { state: 'failed'; error: LibraryError }
  | { state: 'cancelled' };

export interface JobEvents {
  state: JobSummary;
  progress: number;
}

export interface JobOptions<T> {
  /** Lock table the job takes `lockPath` from while it runs. */
  locks?: PathLocks;
  lockPath?: string;
  /** Runs after a successful run, still inside the lock. */
  commit?: (value: T) => Promise<void>;
  logger: Logger;
}

/** Type-independent view of a job, for registries that hold jobs of every kind. */
export interface JobHandle {
  readonly id: string;
  readonly kind: JobKind;
  readonly target: string;
  readonly state: JobState;
  readonly isTerminal: boolean;
  on<K extends keyof JobEvents>(event: K, listener: (payload: JobEvents[K]) => void): () => void;
  cancel(): void;
  run(): Promise<void>;
  toSummary(): JobSummary;
}

const TERMINAL_STATES: ReadonlySet<JobState> = new Set(['complete', 'failed', 'cancelled']);

export function isTerminalState(state: JobState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Background unit of work with an observable state machine.
 *
 * Subclasses list their working stages in order; a job moves forward through them, and may end in
 * `failed` or `cancelled` from any non-terminal state. `result` never rejects.
 */
export abstract class Job<T> implements JobHandle {
  public readonly id = randomUUID();
  public readonly result: Promise<JobOutcome<T>>;

  private currentState: JobState = 'pending';
  private currentProgress: number | null = null;
  private currentError: LibraryError | null = null;
  private readonly events = new EventEmitter();
  private readonly abortController = new AbortController();
  private settle: (outcome: JobOutcome<T>) => void = () => undefined;
  protected readonly logger: Logger;

  protected constructor(
    public readonly kind: JobKind,
    public readonly target: string,
    protected readonly stages: readonly JobState[],
    private readonly options: JobOptions<T>
  ) {
    this.logger = options.logger.child(`${kind}:${this.id.slice(0, 8)}`);
    this.result = new Promise<JobOutcome<T>>((resolve) => {
      this.settle = resolve;
    });
  }

  public get state(): JobState {
    return this.currentState;
  }

  public get progress(): number | null {
    return this.currentProgress;
  }

  public get error(): LibraryError | null {
    return this.currentError;
  }

  public get isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }

  public on<K extends keyof JobEvents>(event: K, listener: (payload: JobEvents[K]) => void): () => void {
    this.events.on(event, listener);
    return () => {
      this.events.off(event, listener);
    };
  }

  /**
   * Requests cancellation. A pending job ends immediately; a running one aborts its tools and cleans up.
   * No-op once the job is terminal.
   */
  public cancel(): void {
    if (this.isTerminal) {
      return;
    }
    this.logger.info('Cancellation requested');
    this.abortController.abort();
    if (this.currentState === 'pending') {
      this.finish({ state: 'cancelled' });
    }
  }

  public toSummary(): JobSummary {
    return {
      id: this.id,
      kind: this.kind,
      target: this.target,
      state: this.currentState,
      progress: this.currentProgress,
      error: this.currentError ? this.currentError.toJSON() : null
    };
  }

  /**
   * Entry point for the worker pool. Never rejects.
   */
  public async run(): Promise<void> {
    if (this.currentState !== 'pending') {
      return;
    }
    const signal = this.abortController.signal;
    let release: (() => void) | null = null;

    try {
      if (this.options.locks && this.options.lockPath !== undefined) {
        release = await this.options.locks.acquire(this.options.lockPath);
      }
      this.throwIfCancelled(signal);
      const value = await this.perform(signal);
      if (this.options.commit) {
        await this.options.commit(value);
      }
      this.finish({ state: 'complete', value });
    } catch (error) {
      if (signal.aborted || error instanceof JobCancelledError) {
        this.finish({ state: 'cancelled' });
      } else {
        this.finish({ state: 'failed', error: toLibraryError(error, { path: this.target }).withStage(this.currentState) });
      }
    } finally {
      release?.();
    }
  }

  /** The job's work. Called at most once, with the lock held. */
  protected abstract perform(signal: AbortSignal): Promise<T>;

  protected transition(next: JobState): void {
    const currentIndex = this.stages.indexOf(this.currentState);
    const nextIndex = this.stages.indexOf(next);
    if (nextIndex === -1 || nextIndex <= currentIndex) {
      throw new Error(`Invalid ${this.kind} job transition ${this.currentState} -> ${next}`);
    }
    this.currentState = next;
    this.currentProgress = null;
    this.logger.debug(`State -> ${next}`);
    this.events.emit('state', this.toSummary());
  }

  protected reportProgress(percentage: number): void {
    const clamped = Math.min(100, Math.max(0, percentage));
    this.currentProgress = clamped;
    this.events.emit('progress', clamped);
  }

  protected throwIfCancelled(signal: AbortSignal): void {
    if (signal.aborted) {
      throw new JobCancelledError({ path: this.target, stage: this.currentState });
    }
  }

  private finish(outcome: JobOutcome<T>): void {
    if (this.isTerminal) {
      return;
    }
    this.currentState = outcome.state;
    if (outcome.state === 'failed') {
      this.currentError = outcome.error;
      this.logger.warn(`Failed during ${outcome.error.stage ?? 'unknown stage'}: ${outcome.error.message}`);
    } else {
      this.logger.info(outcome.state === 'complete' ? 'Completed' : 'Cancelled');
    }
    this.events.emit('state', this.toSummary());
    this.settle(outcome);
  }
}
