/**
 * Configuration Tests
 */

import { describe, it, expect } from '@jest/globals';
import { loadConfig } from '../config.js';
import { ValidationError } from '../domain/errors.js';

function configError(env: NodeJS.ProcessEnv): ValidationError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected the configuration to be rejected');
}

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      nodeEnv: 'development',
      corsOrigin: '*',
      documentsDir: './DATA/raw',
      jobOffersDir: './DATA/jobs',
      defaultLanguage: 'French',
      maxCandidates: 10,
      jobTimeoutMs: 0,
      jobStore: 'memory',
      jobDispatch: 'in-process',
      redisUrl: 'redis://localhost:6379',
      queuePrefix: 'shortlist',
      workerConcurrency: 2,
      chunkSize: 1024,
      chunkOverlap: 128,
      anthropicApiKey: null,
      anthropicModels: [],
    });
  });

  it('should coerce numbers and split the model list', () => {
    const config = loadConfig({
      PORT: '8080',
      JOB_TIMEOUT_MS: '60000',
      ANTHROPIC_API_KEY: 'test-secret',
      ANTHROPIC_MODELS: ' claude-primary , ,claude-backup',
    });

    expect(config.port).toBe(8080);
    expect(config.jobTimeoutMs).toBe(60000);
    expect(config.anthropicApiKey).toBe('test-secret');
    expect(config.anthropicModels).toEqual(['claude-primary', 'claude-backup']);
  });

  it('should treat blank values as unset', () => {
    const config = loadConfig({ PORT: '  ', ANTHROPIC_API_KEY: '' });

    expect(config.port).toBe(3000);
    expect(config.anthropicApiKey).toBeNull();
  });

  it('should reject malformed values', () => {
    expect(configError({ PORT: 'abc' }).details).toMatchObject({ issues: [{ path: 'PORT' }] });
    expect(configError({ JOB_STORE: 'postgres' }).details).toMatchObject({ issues: [{ path: 'JOB_STORE' }] });
  });

  it('should reject an overlap as large as the chunk size', () => {
    expect(configError({ CHUNK_SIZE: '256', CHUNK_OVERLAP: '256' }).details).toMatchObject({
      issues: [{ path: 'CHUNK_OVERLAP', message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE' }],
    });
  });

  it('should require the shared store for queue dispatch', () => {
    expect(configError({ JOB_DISPATCH: 'queue' }).details).toMatchObject({ issues: [{ path: 'JOB_STORE' }] });
    expect(loadConfig({ JOB_DISPATCH: 'queue', JOB_STORE: 'redis' }).jobDispatch).toBe('queue');
  });
});
