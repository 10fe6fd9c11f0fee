/**
 * Job Tracker Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import type { TrackedJob } from '../../domain/entities/TrackedJob.js';
import { NotFoundError } from '../../domain/errors.js';
import type { DispatchRequest, JobDispatcher } from '../../core/jobs/dispatchers.js';
import { InMemoryJobStore } from '../../core/jobs/JobStore.js';
import { JobTracker } from '../../core/jobs/JobTracker.js';
import { flushJobs } from '../helpers/fakes.js';

class RecordingJobStore extends InMemoryJobStore {
  readonly progress: number[] = [];
  /** Runs once, after the next read and before its result is returned */
  afterNextRead: (() => Promise<void>) | null = null;

  async get(id: string): Promise<TrackedJob | null> {
    const job = await super.get(id);
    const hook = this.afterNextRead;
    if (hook) {
      this.afterNextRead = null;
      await hook();
    }
    return job;
  }

  async save(job: TrackedJob): Promise<void> {
    this.progress.push(job.progress);
    await super.save(job);
  }
}

class ManualDispatcher implements JobDispatcher {
  readonly requests: DispatchRequest[] = [];

  async dispatch(request: DispatchRequest): Promise<void> {
    this.requests.push(request);
  }
}

const hang = (): Promise<unknown> => new Promise(() => undefined);
const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe('JobTracker', () => {
  let store: RecordingJobStore;
  let tracker: JobTracker;

  beforeEach(() => {
    store = new RecordingJobStore();
    tracker = new JobTracker(store);
  });

  it('should report a running job at 0% right after submission', async () => {
    tracker.registerHandler('evaluation', async () => ({ ranked: 3 }));

    const id = await tracker.submit('evaluation', { jobText: 'Data Engineer' });
    const submitted = await tracker.get(id);
    expect(submitted.status).toBe('running');
    expect(submitted.progress).toBe(0);
    expect(submitted.params).toEqual({ jobText: 'Data Engineer' });

    await flushJobs();

    const done = await tracker.get(id);
    expect(done.status).toBe('completed');
    expect(done.progress).toBe(100);
    expect(done.result).toEqual({ ranked: 3 });
    expect(done.completedAt).toBeDefined();
  });

  it('should never move progress backwards', async () => {
    tracker.registerHandler('evaluation', async (_params, context) => {
      await context.report({ progress: 40, step: 'resolution' });
      await context.report({ progress: 20, step: 'evaluation' });
      await context.report({ progress: 60 });
      return null;
    });

    await tracker.submit('evaluation');
    await flushJobs();

    expect(store.progress).toEqual([0, 40, 40, 60, 100]);
  });

  it('should merge stage progress without going backwards', async () => {
    tracker.registerHandler('evaluation', async (_params, context) => {
      await context.report({
        stages: { profile: { status: 'processing', progress: 60 }, decision: { status: 'pending', progress: 0 } },
      });
      await context.report({ stages: { profile: { status: 'completed', progress: 100 } } });
      await context.report({ stages: { profile: { status: 'processing', progress: 30 } } });
      return (await tracker.get(context.jobId)).stages;
    });

    const id = await tracker.submit('evaluation');
    expect((await tracker.get(id)).stages).toEqual({});
    await flushJobs();

    expect((await tracker.get(id)).result).toEqual({
      profile: { status: 'completed', progress: 100 },
      decision: { status: 'pending', progress: 0 },
    });
  });

  it('should clamp reported progress', async () => {
    const dispatcher = new ManualDispatcher();
    tracker = new JobTracker(store, { dispatcher });
    tracker.registerHandler('index_build', async (_params, context) => {
      await context.report({ progress: 150, message: 'overshoot' });
      const job = await tracker.get(context.jobId);
      return job.progress;
    });

    const id = await tracker.submit('index_build');
    await tracker.execute(id);

    expect((await tracker.get(id)).result).toBe(100);
  });

  it('should end in error when the handler fails', async () => {
    tracker.registerHandler('evaluation', async () => {
      throw new Error('boom');
    });

    const id = await tracker.submit('evaluation');
    await flushJobs();

    const job = await tracker.get(id);
    expect(job.status).toBe('error');
    expect(job.step).toBe('error');
    expect(job.error).toEqual({ code: 'FAILED', message: 'boom' });
  });

  it('should fail jobs of a kind nobody handles', async () => {
    const id = await tracker.submit('index_build');
    await flushJobs();

    expect((await tracker.get(id)).error).toEqual({
      code: 'FAILED',
      message: 'No handler registered for index_build',
    });
  });

  it('should fail the job when dispatch fails', async () => {
    tracker = new JobTracker(store, {
      dispatcher: {
        dispatch: async () => {
          throw new Error('queue offline');
        },
      },
    });

    const id = await tracker.submit('evaluation');

    expect((await tracker.get(id)).error).toEqual({
      code: 'FAILED',
      message: 'Dispatch failed: queue offline',
    });
  });

  it('should throw NotFoundError for unknown ids', async () => {
    await expect(tracker.get('missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(tracker.cancel('missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should cancel a running job', async () => {
    tracker.registerHandler('evaluation', hang);

    const id = await tracker.submit('evaluation');
    await flushJobs();

    const requested = await tracker.cancel(id);
    expect(requested.status).toBe('running');
    expect(requested.cancelRequested).toBe(true);

    await flushJobs();
    const job = await tracker.get(id);
    expect(job.status).toBe('error');
    expect(job.error).toEqual({ code: 'CANCELLED', message: 'Job cancelled' });
  });

  it('should not start a job cancelled before it ran', async () => {
    const dispatcher = new ManualDispatcher();
    tracker = new JobTracker(store, { dispatcher });
    let started = false;
    tracker.registerHandler('evaluation', async () => {
      started = true;
    });

    const id = await tracker.submit('evaluation');
    expect(dispatcher.requests).toEqual([{ jobId: id, kind: 'evaluation' }]);

    await tracker.cancel(id);
    await tracker.execute(id);

    expect(started).toBe(false);
    expect((await tracker.get(id)).error).toEqual({
      code: 'CANCELLED',
      message: 'Job cancelled before it started',
    });
  });

  it('should pick up a cancellation flagged by another process', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    tracker.registerHandler('evaluation', async (_params, context) => {
      await gate;
      await context.report({ progress: 50 });
      return 'finished';
    });

    const id = await tracker.submit('evaluation');
    await flushJobs();

    await store.requestCancel(id);

    release();
    await flushJobs();

    expect((await tracker.get(id)).error?.code).toBe('CANCELLED');
  });

  it('should not overwrite a job finished by another tracker while cancelling', async () => {
    const api = new JobTracker(store, { dispatcher: new ManualDispatcher() });
    const worker = new JobTracker(store);
    worker.registerHandler('evaluation', async () => 'ranked');

    const id = await api.submit('evaluation');
    const savesBeforeCancel = store.progress.length;

    // The worker finishes between the API's read and anything it does next.
    store.afterNextRead = () => worker.execute(id);
    const requested = await api.cancel(id);
    expect(requested.status).toBe('running');
    expect(requested.cancelRequested).toBe(true);

    const job = await api.get(id);
    expect(job.status).toBe('completed');
    expect(job.result).toBe('ranked');
    // Only the worker's final write touched the record.
    expect(store.progress.length).toBe(savesBeforeCancel + 1);
  });

  it('should time out jobs that run too long', async () => {
    tracker = new JobTracker(store, { timeoutMs: 20 });
    tracker.registerHandler('index_build', hang);

    const id = await tracker.submit('index_build');
    await sleep(50);

    expect((await tracker.get(id)).error).toEqual({ code: 'TIMEOUT', message: 'Job exceeded 20ms' });
  });

  it('should leave finished jobs unchanged', async () => {
    tracker.registerHandler('evaluation', async () => 'ok');

    const id = await tracker.submit('evaluation');
    await flushJobs();

    const job = await tracker.cancel(id);
    expect(job.status).toBe('completed');
    expect(job.cancelRequested).toBe(false);
    expect(job.message).toBe('Job completed');
  });

  it('should hand out copies of the stored record', async () => {
    tracker = new JobTracker(store, { dispatcher: new ManualDispatcher() });

    const id = await tracker.submit('evaluation');
    const snapshot = await tracker.get(id);
    snapshot.progress = 99;

    expect((await tracker.get(id)).progress).toBe(0);
  });
});
