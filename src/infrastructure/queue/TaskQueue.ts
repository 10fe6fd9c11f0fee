/**
 * Task Queue - BullMQ-based job dispatch
 *
 * Used when JOB_DISPATCH=queue. The API process enqueues job ids; worker
 * processes pick them up and run the registered handlers against the shared
 * Redis job store. Job state lives in the store, not in BullMQ.
 */

import { Queue, Worker, Job } from 'bullmq';
import type { ConnectionOptions } from 'bullmq';
import { Redis as IORedis } from 'ioredis';
import type { JobKind } from '../../domain/entities/TrackedJob.js';
import type { DispatchRequest, JobDispatcher } from '../../core/jobs/dispatchers.js';

type RedisClient = IORedis;

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface QueueConfig {
  redisUrl: string;
  prefix: string;
}

const DEFAULT_CONFIG: QueueConfig = {
  redisUrl: 'redis://localhost:6379',
  prefix: 'shortlist',
};

// =============================================================================
// QUEUE NAMES
// =============================================================================

export const QUEUE_NAMES = {
  EVALUATION: 'evaluation',
  INDEX_BUILD: 'index-build',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

export function queueForKind(kind: JobKind): QueueName {
  return kind === 'index_build' ? QUEUE_NAMES.INDEX_BUILD : QUEUE_NAMES.EVALUATION;
}

// =============================================================================
// JOB DATA
// =============================================================================

export interface JobData {
  type: JobKind;
  jobId: string;
}

export interface JobOptions {
  attempts?: number;
  removeOnComplete?: boolean | number;
  removeOnFail?: boolean | number;
}

// A retry would re-run a job whose tracked record is already terminal.
const DEFAULT_JOB_OPTIONS: JobOptions = {
  attempts: 1,
  removeOnComplete: 100,
  removeOnFail: 500,
};

// =============================================================================
// QUEUE MANAGER
// =============================================================================

export class QueueManager {
  private config: QueueConfig;
  private connection: ConnectionOptions;
  private queues: Map<string, Queue<JobData>> = new Map();
  private workers: Map<string, Worker<JobData>> = new Map();

  constructor(config: Partial<QueueConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    const redisUrl = new URL(this.config.redisUrl);
    this.connection = {
      host: redisUrl.hostname,
      port: parseInt(redisUrl.port || '6379'),
      password: redisUrl.password || undefined,
    };
  }

  getQueue(name: QueueName): Queue<JobData> {
    const existing = this.queues.get(name);
    if (existing) {
      return existing;
    }
    const queue = new Queue<JobData>(name, {
      connection: this.connection,
      prefix: this.config.prefix,
      defaultJobOptions: DEFAULT_JOB_OPTIONS,
    });
    this.queues.set(name, queue);
    return queue;
  }

  async addJob(queueName: QueueName, data: JobData, options: JobOptions = {}): Promise<Job<JobData>> {
    const queue = this.getQueue(queueName);
    // The tracked job id doubles as the BullMQ id so a double dispatch is a no-op.
    return queue.add(`${data.type}:${data.jobId}`, data, {
      ...DEFAULT_JOB_OPTIONS,
      ...options,
      jobId: data.jobId,
    });
  }

  registerWorker(
    queueName: QueueName,
    processor: (job: Job<JobData>) => Promise<unknown>,
    concurrency = 2
  ): Worker<JobData> {
    if (this.workers.has(queueName)) {
      throw new Error(`Worker already registered for queue: ${queueName}`);
    }

    const worker = new Worker<JobData>(queueName, processor, {
      connection: this.connection,
      prefix: this.config.prefix,
      concurrency,
    });

    worker.on('completed', (job) => {
      console.log(`[QueueManager] Job ${job.id} completed in queue ${queueName}`);
    });

    worker.on('failed', (job, err) => {
      console.error(`[QueueManager] Job ${job?.id} failed in queue ${queueName}:`, err);
    });

    worker.on('error', (err) => {
      console.error(`[QueueManager] Worker error in queue ${queueName}:`, err);
    });

    this.workers.set(queueName, worker);
    return worker;
  }

  async getQueueStats(queueName: QueueName): Promise<QueueStats> {
    const queue = this.getQueue(queueName);

    const [waiting, active, completed, failed, delayed] = await Promise.all([
      queue.getWaitingCount(),
      queue.getActiveCount(),
      queue.getCompletedCount(),
      queue.getFailedCount(),
      queue.getDelayedCount(),
    ]);

    return {
      queueName,
      waiting,
      active,
      completed,
      failed,
      delayed,
      total: waiting + active + delayed,
    };
  }

  async getAllQueueStats(): Promise<QueueStats[]> {
    const queueNames = Object.values(QUEUE_NAMES);
    return Promise.all(queueNames.map((name) => this.getQueueStats(name)));
  }

  async close(): Promise<void> {
    const closePromises: Promise<void>[] = [];

    for (const worker of this.workers.values()) {
      closePromises.push(worker.close());
    }

    for (const queue of this.queues.values()) {
      closePromises.push(queue.close());
    }

    await Promise.all(closePromises);

    this.workers.clear();
    this.queues.clear();
  }
}

export interface QueueStats {
  queueName: string;
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  total: number;
}

// =============================================================================
// DISPATCHER
// =============================================================================

/**
 * Hands tracked job ids to BullMQ. Workers registered with
 * `registerJobWorkers` execute them.
 */
export class QueueJobDispatcher implements JobDispatcher {
  constructor(private readonly queueManager: QueueManager) {}

  async dispatch(request: DispatchRequest): Promise<void> {
    await this.queueManager.addJob(queueForKind(request.kind), {
      type: request.kind,
      jobId: request.jobId,
    });
  }
}

// =============================================================================
// SINGLETON INSTANCE
// =============================================================================

let queueManagerInstance: QueueManager | null = null;

export function getQueueManager(config?: Partial<QueueConfig>): QueueManager {
  if (!queueManagerInstance) {
    queueManagerInstance = new QueueManager(config);
  }
  return queueManagerInstance;
}

export async function resetQueueManager(): Promise<void> {
  if (queueManagerInstance) {
    const instance = queueManagerInstance;
    queueManagerInstance = null;
    await instance.close();
  }
}

// =============================================================================
// REDIS CLIENT FOR DIRECT ACCESS
// =============================================================================

let redisClient: RedisClient | null = null;

export function getRedisClient(url = DEFAULT_CONFIG.redisUrl): RedisClient {
  if (!redisClient) {
    redisClient = new IORedis(url);
  }
  return redisClient;
}

export async function closeRedisClient(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
}
