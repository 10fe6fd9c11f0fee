/**
 * Document Routes
 */

import { Router } from 'express';
import type { EvaluationService } from '../../domain/services/EvaluationService.js';

export function createDocumentRoutes(evaluation: EvaluationService): Router {
  const router = Router();

  /**
   * GET /documents - Candidate documents available for evaluation
   */
  router.get('/', async (_req, res, next) => {
    try {
      const documents = await evaluation.listDocuments();
      res.json({ data: documents, count: documents.length });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
