import type { JobKind } from '../../shared/models';
import { Job, type JobOptions } from './Job';

export type OperationKind = Exclude<JobKind, 'download' | 'trim'>;

/**
 * Short single-step mutation (hide, show, delete, tag edit) run through the same pool and locks as the long jobs.
 */
export class OperationJob<T> extends Job<T> {
  public constructor(
    kind: OperationKind,
    target: string,
    private readonly action: (signal: AbortSignal) => Promise<T>,
    options: JobOptions<T>
  ) {
    super(kind, target, ['running'], options);
  }

  protected async perform(signal: AbortSignal): Promise<T> {
    this.transition('running');
    return this.action(signal);
  }
}
