/**
 * Service configuration, read from the environment once at start-up.
 */

import { z } from 'zod';
import { ValidationError } from './domain/errors.js';

const intFrom = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const envSchema = z
  .object({
    PORT: intFrom(3000, 1),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    CORS_ORIGIN: z.string().default('*'),
    DOCUMENTS_DIR: z.string().min(1).default('./DATA/raw'),
    JOB_OFFERS_DIR: z.string().min(1).default('./DATA/jobs'),
    DEFAULT_LANGUAGE: z.string().min(1).default('French'),
    MAX_CANDIDATES: intFrom(10),
    JOB_TIMEOUT_MS: intFrom(0),
    JOB_STORE: z.enum(['memory', 'redis']).default('memory'),
    JOB_DISPATCH: z.enum(['in-process', 'queue']).default('in-process'),
    REDIS_URL: z.string().url().default('redis://localhost:6379'),
    QUEUE_PREFIX: z.string().min(1).default('shortlist'),
    WORKER_CONCURRENCY: intFrom(2, 1),
    CHUNK_SIZE: intFrom(1024, 1),
    CHUNK_OVERLAP: intFrom(128),
    ANTHROPIC_API_KEY: z.string().optional(),
    ANTHROPIC_MODELS: z.string().default(''),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  })
  .refine((env) => !(env.JOB_DISPATCH === 'queue' && env.JOB_STORE === 'memory'), {
    message: 'JOB_DISPATCH=queue needs JOB_STORE=redis so workers share job state',
    path: ['JOB_STORE'],
  });

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  corsOrigin: string;
  documentsDir: string;
  jobOffersDir: string;
  defaultLanguage: string;
  maxCandidates: number;
  jobTimeoutMs: number;
  jobStore: 'memory' | 'redis';
  jobDispatch: 'in-process' | 'queue';
  redisUrl: string;
  queuePrefix: string;
  workerConcurrency: number;
  chunkSize: number;
  chunkOverlap: number;
  anthropicApiKey: string | null;
  /** Ordered fallback list; empty means no LLM */
  anthropicModels: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank values count as unset so `.env` templates can leave keys empty.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ValidationError('Invalid configuration', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    corsOrigin: e.CORS_ORIGIN,
    documentsDir: e.DOCUMENTS_DIR,
    jobOffersDir: e.JOB_OFFERS_DIR,
    defaultLanguage: e.DEFAULT_LANGUAGE,
    maxCandidates: e.MAX_CANDIDATES,
    jobTimeoutMs: e.JOB_TIMEOUT_MS,
    jobStore: e.JOB_STORE,
    jobDispatch: e.JOB_DISPATCH,
    redisUrl: e.REDIS_URL,
    queuePrefix: e.QUEUE_PREFIX,
    workerConcurrency: e.WORKER_CONCURRENCY,
    chunkSize: e.CHUNK_SIZE,
    chunkOverlap: e.CHUNK_OVERLAP,
    anthropicApiKey: e.ANTHROPIC_API_KEY ?? null,
    anthropicModels: e.ANTHROPIC_MODELS.split(',')
      .map((model) => model.trim())
      .filter((model) => model.length > 0),
  };
}
