/**
 * Evaluation Routes
 *
 * Runs are asynchronous: the response carries a job id to poll on /api/jobs.
 */

import { Router } from 'express';
import type { EvaluationService } from '../../domain/services/EvaluationService.js';
import { BadRequestError } from '../middleware/errorHandler.js';

export function createEvaluationRoutes(evaluation: EvaluationService): Router {
  const router = Router();

  /**
   * POST /evaluations - Start an evaluation run
   */
  router.post('/', async (req, res, next) => {
    try {
      if (!isRecord(req.body)) {
        throw new BadRequestError('Request body must be a JSON object');
      }
      const jobId = await evaluation.submitJob('evaluation', req.body);
      res.status(202).json({ jobId, status: 'running' });
    } catch (error) {
      next(error);
    }
  });

  return router;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
