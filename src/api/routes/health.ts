/**
 * Health Check Routes
 */

import { Router } from 'express';
import type { Services } from '../../bootstrap.js';
import { getQueueManager } from '../../infrastructure/queue/TaskQueue.js';

export function createHealthRoutes(services: Services): Router {
  const router = Router();

  /**
   * Basic health check
   */
  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'shortlist-engine',
    });
  });

  /**
   * Detailed health check with dependencies
   */
  router.get('/ready', async (_req, res) => {
    const checks: Record<string, { status: string; latencyMs?: number; detail?: string }> = {};

    const storeStart = Date.now();
    try {
      const documents = await services.evaluation.listDocuments();
      checks.documents = {
        status: 'healthy',
        latencyMs: Date.now() - storeStart,
        detail: `${documents.length} document(s)`,
      };
    } catch {
      checks.documents = { status: 'unhealthy', latencyMs: Date.now() - storeStart };
    }

    if (services.config.jobDispatch === 'queue') {
      try {
        await getQueueManager().getAllQueueStats();
        checks.queue = { status: 'healthy' };
      } catch {
        checks.queue = { status: 'unhealthy' };
      }
    }

    const allHealthy = Object.values(checks).every((c) => c.status === 'healthy');

    res.status(allHealthy ? 200 : 503).json({
      status: allHealthy ? 'ready' : 'degraded',
      timestamp: new Date().toISOString(),
      checks,
    });
  });

  /**
   * Liveness probe (Kubernetes)
   */
  router.get('/live', (_req, res) => {
    res.json({ status: 'live' });
  });

  return router;
}
