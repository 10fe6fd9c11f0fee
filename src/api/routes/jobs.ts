/**
 * Job Routes
 *
 * Polling surface for evaluation runs and index builds.
 */

import { Router } from 'express';
import type { EvaluationService } from '../../domain/services/EvaluationService.js';

export function createJobRoutes(evaluation: EvaluationService): Router {
  const router = Router();

  /**
   * GET /jobs/:id - Job snapshot
   */
  router.get('/:id', async (req, res, next) => {
    try {
      res.json(await evaluation.getJob(req.params.id));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /jobs/:id/cancel - Request cancellation
   */
  router.post('/:id/cancel', async (req, res, next) => {
    try {
      res.json(await evaluation.cancelJob(req.params.id));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
