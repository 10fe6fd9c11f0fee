/**
 * Task Queue Tests
 *
 * BullMQ is replaced by in-process mocks; nothing here talks to Redis.
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';

const mockAdd = jest.fn(async (name: string, data: unknown, options: unknown) => ({ id: name, data, options }));
const mockOn = jest.fn();

jest.mock('bullmq', () => ({
  Queue: jest.fn().mockImplementation(() => ({ add: mockAdd, close: jest.fn(async () => undefined) })),
  Worker: jest.fn().mockImplementation(() => ({ on: mockOn, close: jest.fn(async () => undefined) })),
}));

import { Queue, Worker } from 'bullmq';
import { InMemoryJobStore } from '../../core/jobs/JobStore.js';
import { JobTracker } from '../../core/jobs/JobTracker.js';
import {
  QUEUE_NAMES,
  QueueJobDispatcher,
  QueueManager,
  queueForKind,
} from '../../infrastructure/queue/TaskQueue.js';
import { createJobProcessor, registerJobWorkers } from '../../infrastructure/queue/workers.js';

describe('TaskQueue', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should route each job kind to its queue', () => {
    expect(queueForKind('evaluation')).toBe(QUEUE_NAMES.EVALUATION);
    expect(queueForKind('index_build')).toBe(QUEUE_NAMES.INDEX_BUILD);
  });

  it('should enqueue the tracked job id under its own BullMQ id', async () => {
    const manager = new QueueManager({ redisUrl: 'redis://:test-secret@redis.internal:6380', prefix: 'test' });
    const dispatcher = new QueueJobDispatcher(manager);

    await dispatcher.dispatch({ jobId: 'job-1', kind: 'index_build' });

    expect(Queue).toHaveBeenCalledWith('index-build', {
      connection: { host: 'redis.internal', port: 6380, password: 'test-secret' },
      prefix: 'test',
      defaultJobOptions: { attempts: 1, removeOnComplete: 100, removeOnFail: 500 },
    });
    expect(mockAdd).toHaveBeenCalledWith(
      'index_build:job-1',
      { type: 'index_build', jobId: 'job-1' },
      { attempts: 1, removeOnComplete: 100, removeOnFail: 500, jobId: 'job-1' }
    );
  });

  it('should reuse one queue per name', async () => {
    const manager = new QueueManager();
    const dispatcher = new QueueJobDispatcher(manager);

    await dispatcher.dispatch({ jobId: 'job-1', kind: 'evaluation' });
    await dispatcher.dispatch({ jobId: 'job-2', kind: 'evaluation' });

    expect(Queue).toHaveBeenCalledTimes(1);
    expect(mockAdd).toHaveBeenCalledTimes(2);
  });

  it('should leave submitted jobs running until a worker executes them', async () => {
    const tracker = new JobTracker(new InMemoryJobStore(), {
      dispatcher: new QueueJobDispatcher(new QueueManager()),
    });
    tracker.registerHandler('evaluation', async () => 'ranked');

    const id = await tracker.submit('evaluation', { jobText: 'Data Engineer' });
    expect((await tracker.get(id)).status).toBe('running');

    const processor = createJobProcessor(tracker);
    await expect(processor({ data: { type: 'evaluation', jobId: id } })).resolves.toEqual({ jobId: id });

    const job = await tracker.get(id);
    expect(job.status).toBe('completed');
    expect(job.result).toBe('ranked');
  });

  it('should register one worker per queue', () => {
    const manager = new QueueManager({ prefix: 'test' });
    const tracker = new JobTracker(new InMemoryJobStore());

    const workers = registerJobWorkers(manager, tracker, 3);

    expect(workers).toHaveLength(2);
    expect(jest.mocked(Worker).mock.calls.map(([name]) => name)).toEqual(['evaluation', 'index-build']);
    expect(mockOn).toHaveBeenCalledTimes(6);
    expect(() => registerJobWorkers(manager, tracker, 3)).toThrow(
      'Worker already registered for queue: evaluation'
    );
  });
});
