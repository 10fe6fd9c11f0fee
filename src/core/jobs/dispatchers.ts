/**
 * Job Dispatchers - Hand a submitted job to whatever will run it
 */

import type { JobKind } from '../../domain/entities/TrackedJob.js';

export interface DispatchRequest {
  jobId: string;
  kind: JobKind;
}

export interface JobDispatcher {
  dispatch(request: DispatchRequest): Promise<void>;
}

export interface JobExecutor {
  execute(jobId: string): Promise<void>;
}

/**
 * Runs the job in this process on the next macrotask, after `submit` has
 * returned the id to the caller.
 */
export class InProcessDispatcher implements JobDispatcher {
  constructor(private readonly executor: JobExecutor) {}

  async dispatch(request: DispatchRequest): Promise<void> {
    setImmediate(() => {
      this.executor.execute(request.jobId).catch((error: unknown) => {
        console.error(`[JobDispatcher] Job ${request.jobId} (${request.kind}) crashed:`, error);
      });
    });
  }
}
