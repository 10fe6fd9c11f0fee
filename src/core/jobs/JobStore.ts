/**
 * Job Store - Persistence for tracked job records
 *
 * The tracker running a job is the only writer of its record. Cancellation
 * requests from other processes are kept apart from the record and folded
 * into `cancelRequested` on read, so a request can never overwrite a state
 * the worker has already written. Stores hand out copies.
 */

import type { TrackedJob } from '../../domain/entities/TrackedJob.js';

export interface JobStore {
  get(id: string): Promise<TrackedJob | null>;
  save(job: TrackedJob): Promise<void>;
  requestCancel(id: string): Promise<void>;
}

/**
 * Process-local store. Records are never evicted while the process lives.
 */
export class InMemoryJobStore implements JobStore {
  private jobs = new Map<string, TrackedJob>();
  private cancelRequests = new Set<string>();

  async get(id: string): Promise<TrackedJob | null> {
    const job = this.jobs.get(id);
    if (!job) {
      return null;
    }
    const copy = structuredClone(job);
    copy.cancelRequested = copy.cancelRequested || this.cancelRequests.has(id);
    return copy;
  }

  async save(job: TrackedJob): Promise<void> {
    this.jobs.set(job.id, structuredClone(job));
  }

  async requestCancel(id: string): Promise<void> {
    this.cancelRequests.add(id);
  }
}
