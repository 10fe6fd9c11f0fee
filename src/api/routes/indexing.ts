/**
 * Index Routes
 */

import { Router } from 'express';
import type { EvaluationService } from '../../domain/services/EvaluationService.js';

export function createIndexRoutes(evaluation: EvaluationService): Router {
  const router = Router();

  /**
   * POST /index/build - Rebuild the retrieval index from the document store
   */
  router.post('/build', async (_req, res, next) => {
    try {
      const jobId = await evaluation.submitJob('index_build');
      res.status(202).json({ jobId, status: 'running' });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
