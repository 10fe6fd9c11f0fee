/**
 * Job Tracker - Long-running work exposed as pollable state machines
 *
 * Lifecycle: running -> completed | error
 *
 * `submit` stores a record and hands the id to a dispatcher without running
 * anything synchronously. The registered handler receives a JobContext whose
 * `report` is the only way to change the record while it runs. Writes for
 * one job are chained, so they apply in call order and never interleave.
 *
 * Handler failures, cancellation and timeouts all end in `error` with a
 * code; none of them is ever thrown at the submitter.
 */

import { v4 as uuid } from 'uuid';
import {
  isTerminal,
  type JobErrorCode,
  type StageProgress,
  type JobKind,
  type JobProgressUpdate,
  type TrackedJob,
} from '../../domain/entities/TrackedJob.js';
import { NotFoundError, errorMessage } from '../../domain/errors.js';
import { InProcessDispatcher, type JobDispatcher, type JobExecutor } from './dispatchers.js';
import type { JobStore } from './JobStore.js';

// =============================================================================
// TYPES
// =============================================================================

export interface JobContext {
  readonly jobId: string;
  /** Aborted when the job is cancelled or times out */
  readonly signal: AbortSignal;
  report(update: JobProgressUpdate): Promise<void>;
}

export type JobHandler = (params: Record<string, unknown>, context: JobContext) => Promise<unknown>;

export interface JobTrackerConfig {
  /** 0 disables the timeout */
  timeoutMs: number;
  dispatcher?: JobDispatcher;
}

const DEFAULT_CONFIG: JobTrackerConfig = {
  timeoutMs: 0,
};

export class JobAbortedError extends Error {
  constructor(
    public code: Exclude<JobErrorCode, 'FAILED'>,
    message: string
  ) {
    super(message);
    this.name = 'JobAbortedError';
  }
}

// =============================================================================
// JOB TRACKER
// =============================================================================

export class JobTracker implements JobExecutor {
  private store: JobStore;
  private config: JobTrackerConfig;
  private dispatcher: JobDispatcher;
  private handlers = new Map<JobKind, JobHandler>();
  private controllers = new Map<string, AbortController>();
  private writeChains = new Map<string, Promise<void>>();

  constructor(store: JobStore, config: Partial<JobTrackerConfig> = {}) {
    this.store = store;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.dispatcher = this.config.dispatcher ?? new InProcessDispatcher(this);
  }

  registerHandler(kind: JobKind, handler: JobHandler): void {
    this.handlers.set(kind, handler);
  }

  // ===========================================================================
  // SUBMITTER SIDE
  // ===========================================================================

  async submit(kind: JobKind, params: Record<string, unknown> = {}): Promise<string> {
    const now = new Date().toISOString();
    const job: TrackedJob = {
      id: uuid(),
      kind,
      status: 'running',
      progress: 0,
      step: 'queued',
      message: 'Job submitted',
      stages: {},
      params,
      createdAt: now,
      updatedAt: now,
      cancelRequested: false,
    };

    await this.store.save(job);
    console.log(`[JobTracker] Submitted ${kind} job ${job.id}`);

    try {
      await this.dispatcher.dispatch({ jobId: job.id, kind });
    } catch (error) {
      console.error(`[JobTracker] Dispatch failed for job ${job.id}:`, error);
      await this.finish(job.id, { code: 'FAILED', message: `Dispatch failed: ${errorMessage(error)}` });
    }

    return job.id;
  }

  async get(id: string): Promise<TrackedJob> {
    const job = await this.store.get(id);
    if (!job) {
      throw new NotFoundError('Job', id);
    }
    return job;
  }

  /**
   * Request cancellation. A running job ends in `error` with code CANCELLED
   * once its worker sees the request; a finished job is returned unchanged.
   * The record itself is left to the worker.
   */
  async cancel(id: string): Promise<TrackedJob> {
    const job = await this.get(id);
    if (isTerminal(job.status)) {
      return job;
    }
    await this.store.requestCancel(id);
    this.controllers.get(id)?.abort(new JobAbortedError('CANCELLED', 'Job cancelled'));
    console.log(`[JobTracker] Cancellation requested for job ${id}`);
    return { ...job, cancelRequested: true };
  }

  // ===========================================================================
  // WORKER SIDE
  // ===========================================================================

  /**
   * Run a submitted job to a terminal state. Called by a dispatcher or a
   * queue worker; never throws for handler failures.
   */
  async execute(id: string): Promise<void> {
    const job = await this.get(id);
    if (isTerminal(job.status)) {
      return;
    }
    if (job.cancelRequested) {
      await this.finish(id, { code: 'CANCELLED', message: 'Job cancelled before it started' });
      return;
    }

    const handler = this.handlers.get(job.kind);
    if (!handler) {
      await this.finish(id, { code: 'FAILED', message: `No handler registered for ${job.kind}` });
      return;
    }

    const controller = new AbortController();
    this.controllers.set(id, controller);
    const timer =
      this.config.timeoutMs > 0
        ? setTimeout(() => {
            controller.abort(
              new JobAbortedError('TIMEOUT', `Job exceeded ${this.config.timeoutMs}ms`)
            );
          }, this.config.timeoutMs)
        : null;

    const aborted = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });

    try {
      const context = this.createContext(id, controller);
      const result = await Promise.race([handler(job.params, context), aborted]);
      await this.finish(id, { result });
      console.log(`[JobTracker] Job ${id} completed`);
    } catch (error) {
      const code: JobErrorCode = error instanceof JobAbortedError ? error.code : 'FAILED';
      console.error(`[JobTracker] Job ${id} ended with ${code}: ${errorMessage(error)}`);
      await this.finish(id, { code, message: errorMessage(error) });
    } finally {
      if (timer) clearTimeout(timer);
      this.controllers.delete(id);
    }
  }

  private createContext(id: string, controller: AbortController): JobContext {
    return {
      jobId: id,
      signal: controller.signal,
      report: async (update) => {
        const job = await this.write(id, (current) => {
          if (update.progress !== undefined && Number.isFinite(update.progress)) {
            // Progress never moves backwards.
            current.progress = Math.max(current.progress, clampProgress(update.progress));
          }
          if (update.step !== undefined) current.step = update.step;
          if (update.message !== undefined) current.message = update.message;
          for (const [name, stage] of Object.entries(update.stages ?? {})) {
            current.stages[name] = mergeStage(current.stages[name], stage);
          }
        });
        // The request may come from another process.
        if (job.cancelRequested && !controller.signal.aborted) {
          controller.abort(new JobAbortedError('CANCELLED', 'Job cancelled'));
        }
      },
    };
  }

  private async finish(
    id: string,
    outcome: { result: unknown } | { code: JobErrorCode; message: string }
  ): Promise<void> {
    await this.write(id, (current) => {
      const now = new Date().toISOString();
      current.completedAt = now;
      if ('result' in outcome) {
        current.status = 'completed';
        current.progress = 100;
        current.step = 'completed';
        current.message = 'Job completed';
        current.result = outcome.result;
      } else {
        current.status = 'error';
        current.step = 'error';
        current.message = outcome.message;
        current.error = { code: outcome.code, message: outcome.message };
      }
    });
  }

  // ===========================================================================
  // SERIALIZED WRITES
  // ===========================================================================

  /**
   * Read-modify-write of one record, queued behind earlier writes to the same
   * job. Terminal records are returned unchanged.
   */
  private write(id: string, mutate: (job: TrackedJob) => void): Promise<TrackedJob> {
    const previous = this.writeChains.get(id) ?? Promise.resolve();
    const next = previous.then(async () => {
      const job = await this.get(id);
      if (isTerminal(job.status)) {
        return job;
      }
      mutate(job);
      job.updatedAt = new Date().toISOString();
      await this.store.save(job);
      return job;
    });

    // The chain only orders writes; each caller still sees its own outcome.
    const settled = next.then(
      () => undefined,
      () => undefined
    );
    this.writeChains.set(id, settled);
    void settled.then(() => {
      if (this.writeChains.get(id) === settled) {
        this.writeChains.delete(id);
      }
    });

    return next;
  }
}

function clampProgress(progress: number): number {
  return Math.min(100, Math.max(0, progress));
}

/**
 * A stage never leaves `completed` and its progress never moves backwards.
 */
function mergeStage(previous: StageProgress | undefined, next: StageProgress): StageProgress {
  const progress = Number.isFinite(next.progress) ? clampProgress(next.progress) : 0;
  if (!previous) {
    return { status: next.status, progress };
  }
  return {
    status: previous.status === 'completed' ? 'completed' : next.status,
    progress: Math.max(previous.progress, progress),
  };
}
