/**
 * Requirement Routes
 */

import { Router } from 'express';
import { z } from 'zod';
import type { EvaluationService } from '../../domain/services/EvaluationService.js';

const extractSchema = z.object({
  jobText: z.string(),
  hints: z.unknown().optional(),
});

export function createRequirementRoutes(evaluation: EvaluationService): Router {
  const router = Router();

  /**
   * POST /requirements/extract - Structure a job description
   */
  router.post('/extract', (req, res, next) => {
    try {
      const { jobText, hints } = extractSchema.parse(req.body);
      res.json(evaluation.extractRequirement(jobText, hints));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
