/**
 * Redis Job Store
 *
 * Shares tracked job records between the API process and queue workers.
 * Records are stored as JSON under `<prefix>:job:<id>` with no expiry. A
 * cancellation request is a separate `<prefix>:job:<id>:cancel` key, written
 * by the API process and read by the worker, so the two never race on the
 * record itself.
 */

import { z } from 'zod';
import { STAGE_STATUSES, type TrackedJob } from '../../domain/entities/TrackedJob.js';
import type { JobStore } from '../../core/jobs/JobStore.js';

/** The subset of the ioredis client the store needs */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

const trackedJobSchema = z.object({
  id: z.string(),
  kind: z.enum(['index_build', 'evaluation']),
  status: z.enum(['running', 'completed', 'error']),
  progress: z.number().min(0).max(100),
  step: z.string(),
  message: z.string(),
  stages: z
    .record(
      z.object({
        status: z.enum(STAGE_STATUSES),
        progress: z.number().min(0).max(100),
      })
    )
    .default({}),
  params: z.record(z.unknown()),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().optional(),
  result: z.unknown(),
  error: z
    .object({
      code: z.enum(['FAILED', 'CANCELLED', 'TIMEOUT']),
      message: z.string(),
    })
    .optional(),
  cancelRequested: z.boolean(),
});

export class RedisJobStore implements JobStore {
  constructor(
    private readonly client: KeyValueClient,
    private readonly prefix = 'shortlist'
  ) {}

  async get(id: string): Promise<TrackedJob | null> {
    const [raw, cancelFlag] = await Promise.all([
      this.client.get(this.key(id)),
      this.client.get(this.cancelKey(id)),
    ]);
    if (raw === null) {
      return null;
    }
    const parsed = trackedJobSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      console.warn(`[RedisJobStore] Discarding malformed record for job ${id}`);
      return null;
    }
    return { ...parsed.data, cancelRequested: parsed.data.cancelRequested || cancelFlag !== null };
  }

  async save(job: TrackedJob): Promise<void> {
    await this.client.set(this.key(job.id), JSON.stringify(job));
  }

  async requestCancel(id: string): Promise<void> {
    await this.client.set(this.cancelKey(id), '1');
  }

  private key(id: string): string {
    return `${this.prefix}:job:${id}`;
  }

  private cancelKey(id: string): string {
    return `${this.key(id)}:cancel`;
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
