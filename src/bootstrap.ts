/**
 * Service wiring shared by the API server and the queue worker process.
 */

import type { AppConfig } from './config.js';
import { InMemoryJobStore, JobTracker, type JobStore } from './core/jobs/index.js';
import {
  EvaluationService,
  JobOfferCatalog,
  ProfileExtractor,
  RequirementExtractor,
  RetrievalQaService,
} from './domain/services/index.js';
import { FileSystemDocumentStore } from './infrastructure/documents/FileSystemDocumentStore.js';
import { RedisJobStore } from './infrastructure/queue/RedisJobStore.js';
import {
  QueueJobDispatcher,
  closeRedisClient,
  getQueueManager,
  getRedisClient,
  resetQueueManager,
} from './infrastructure/queue/TaskQueue.js';
import {
  ClaudeAnswerProvider,
  FallbackAnswerProvider,
  type AnswerProvider,
} from './integrations/llm/AnswerProvider.js';
import { getClaudeClient } from './integrations/llm/ClaudeClient.js';
import { LexicalVectorIndex } from './integrations/retrieval/index.js';

export interface Services {
  config: AppConfig;
  tracker: JobTracker;
  evaluation: EvaluationService;
  jobOffers: JobOfferCatalog;
  qa: RetrievalQaService;
  close(): Promise<void>;
}

export function createServices(config: AppConfig): Services {
  const store = new FileSystemDocumentStore(config.documentsDir);
  const index = new LexicalVectorIndex({ chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap });

  const jobStore: JobStore =
    config.jobStore === 'redis'
      ? new RedisJobStore(getRedisClient(config.redisUrl), config.queuePrefix)
      : new InMemoryJobStore();

  const tracker = new JobTracker(jobStore, {
    timeoutMs: config.jobTimeoutMs,
    dispatcher:
      config.jobDispatch === 'queue'
        ? new QueueJobDispatcher(getQueueManager({ redisUrl: config.redisUrl, prefix: config.queuePrefix }))
        : undefined,
  });

  const evaluation = new EvaluationService(
    {
      store,
      tracker,
      retrieval: index,
      indexBuilder: index,
      requirementExtractor: new RequirementExtractor({ defaultLanguage: config.defaultLanguage }),
      profileExtractor: new ProfileExtractor({ defaultLanguage: config.defaultLanguage }),
    },
    { defaultLimit: config.maxCandidates }
  );

  const jobOffers = new JobOfferCatalog(new FileSystemDocumentStore(config.jobOffersDir));
  const qa = new RetrievalQaService(index, createAnswerProvider(config));

  console.log(
    `[Bootstrap] Documents in ${config.documentsDir}, job offers in ${config.jobOffersDir}; jobs ${config.jobStore}/${config.jobDispatch}`
  );

  return {
    config,
    tracker,
    evaluation,
    jobOffers,
    qa,
    close: async () => {
      await resetQueueManager();
      await closeRedisClient();
    },
  };
}

function createAnswerProvider(config: AppConfig): AnswerProvider | null {
  if (!config.anthropicApiKey || config.anthropicModels.length === 0) {
    console.warn('[Bootstrap] No LLM configured; queries answer in retrieval-only mode');
    return null;
  }

  const client = getClaudeClient({ apiKey: config.anthropicApiKey });
  return new FallbackAnswerProvider(
    config.anthropicModels.map(
      (model) => new ClaudeAnswerProvider(client, { model, language: config.defaultLanguage })
    )
  );
}
