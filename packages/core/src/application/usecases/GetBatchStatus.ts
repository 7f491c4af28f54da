import type { PipelineStatus } from '../../domain/model/PipelineStatus.js';
import type { BatchProgress } from '../../domain/model/Progress.js';
import type { PipelineContext } from '../PipelineContext.js';

/** Result of querying a batch run. */
export interface BatchStatusResult {
  readonly jobId: string;
  readonly status: PipelineStatus;
  readonly progress: BatchProgress;
  /** Effective worker count, `0` before the run has started. */
  readonly workers: number;
}

/** Use case: query the current state and progress of a batch run. */
export class GetBatchStatus {
  constructor(private readonly ctx: PipelineContext) {}

  execute(): BatchStatusResult {
    return {
      jobId: this.ctx.jobId,
      status: this.ctx.status,
      progress: this.ctx.buildProgress(),
      workers: this.ctx.workers,
    };
  }
}
