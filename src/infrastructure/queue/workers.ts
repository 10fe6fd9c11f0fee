/**
 * Queue Workers
 *
 * Binds the BullMQ queues to the job tracker: each queued message carries a
 * tracked job id, and the worker runs that job's handler to a terminal state.
 */

import type { Job, Worker } from 'bullmq';
import { Redis } from 'ioredis';
import type { JobTracker } from '../../core/jobs/JobTracker.js';
import { QUEUE_NAMES, type JobData, type QueueManager } from './TaskQueue.js';

// =============================================================================
// PROCESSOR
// =============================================================================

export type JobProcessor = (job: Pick<Job<JobData>, 'data'>) => Promise<{ jobId: string }>;

export function createJobProcessor(tracker: JobTracker): JobProcessor {
  return async (job) => {
    const { jobId, type } = job.data;
    console.log(`[Workers] Running ${type} job ${jobId}`);
    // Handler failures end up in the tracked record, not in BullMQ.
    await tracker.execute(jobId);
    return { jobId };
  };
}

/**
 * Register one worker per queue. Call once per worker process.
 */
export function registerJobWorkers(
  queueManager: QueueManager,
  tracker: JobTracker,
  concurrency: number
): Worker<JobData>[] {
  const processor = createJobProcessor(tracker);
  const workers = Object.values(QUEUE_NAMES).map((name) =>
    queueManager.registerWorker(name, processor, concurrency)
  );
  console.log(`[Workers] ${workers.length} queue worker(s) registered (concurrency ${concurrency})`);
  return workers;
}

// =============================================================================
// CONNECTIVITY
// =============================================================================

/**
 * Test the Redis connection before creating workers.
 */
export async function testRedisConnection(redisUrl: string, timeoutMs = 3000): Promise<boolean> {
  return new Promise((resolve) => {
    const testClient = new Redis(redisUrl, {
      maxRetriesPerRequest: 1,
      retryStrategy: () => null,
      connectTimeout: timeoutMs,
      lazyConnect: true,
    });

    const timeout = setTimeout(() => {
      testClient.disconnect();
      resolve(false);
    }, timeoutMs);

    testClient
      .connect()
      .then(() => {
        clearTimeout(timeout);
        testClient.disconnect();
        resolve(true);
      })
      .catch(() => {
        clearTimeout(timeout);
        testClient.disconnect();
        resolve(false);
      });
  });
}
