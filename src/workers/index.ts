/**
 * Shortlist Engine - Background Workers
 *
 * Runs evaluation and index-build jobs queued by the API when
 * JOB_DISPATCH=queue. Job state is shared through the Redis job store.
 */

import 'dotenv/config';
import type { Worker } from 'bullmq';
import { loadConfig } from '../config.js';
import { createServices, type Services } from '../bootstrap.js';
import { getQueueManager } from '../infrastructure/queue/TaskQueue.js';
import { registerJobWorkers, testRedisConnection } from '../infrastructure/queue/workers.js';
import type { JobData } from '../infrastructure/queue/TaskQueue.js';

let services: Services | null = null;
let workers: Worker<JobData>[] = [];

async function startWorkers() {
  const config = loadConfig();

  if (config.jobStore !== 'redis') {
    throw new Error('Workers need JOB_STORE=redis to share job state with the API');
  }

  console.log('[Worker] Checking Redis connection...');
  if (!(await testRedisConnection(config.redisUrl))) {
    throw new Error(`Redis is not reachable at ${config.redisUrl}`);
  }

  services = createServices(config);
  const queueManager = getQueueManager({ redisUrl: config.redisUrl, prefix: config.queuePrefix });
  workers = registerJobWorkers(queueManager, services.tracker, config.workerConcurrency);

  console.log('[Worker] Ready, waiting for jobs...');
}

// =============================================================================
// SHUTDOWN
// =============================================================================

async function shutdown(signal: string) {
  console.log(`\n[Worker] ${signal} received. Shutting down workers...`);

  try {
    await Promise.all(workers.map((w) => w.close()));
    await services?.close();
    console.log('[Worker] Shutdown complete');
    process.exit(0);
  } catch (error) {
    console.error('[Worker] Error during shutdown:', error);
    process.exit(1);
  }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// =============================================================================
// RUN
// =============================================================================

startWorkers().catch((error: unknown) => {
  console.error('[Worker] Failed to start:', error);
  process.exit(1);
});
