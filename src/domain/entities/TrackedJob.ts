/**
 * TrackedJob - A long-running unit of work exposed to pollers
 *
 * Lifecycle: running -> completed | error. Terminal states never change.
 */

export type JobKind = 'index_build' | 'evaluation';

export type JobStatus = 'running' | 'completed' | 'error';

export type JobErrorCode = 'FAILED' | 'CANCELLED' | 'TIMEOUT';

export const STAGE_STATUSES = ['pending', 'processing', 'completed'] as const;

export type StageStatus = (typeof STAGE_STATUSES)[number];

/** Progress of one named stage of a job, such as a single scorer */
export interface StageProgress {
  status: StageStatus;
  progress: number; // 0-100
}

export interface JobError {
  code: JobErrorCode;
  message: string;
}

export interface TrackedJob<TResult = unknown> {
  id: string;
  kind: JobKind;
  status: JobStatus;
  progress: number; // 0-100, never decreases
  step: string;
  message: string;
  /** Per-stage progress, keyed by stage name; empty until a handler reports one */
  stages: Record<string, StageProgress>;
  params: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
  result?: TResult;
  error?: JobError;
  cancelRequested: boolean;
}

export interface JobProgressUpdate {
  progress?: number;
  step?: string;
  message?: string;
  stages?: Record<string, StageProgress>;
}

export function isTerminal(status: JobStatus): boolean {
  return status === 'completed' || status === 'error';
}
