/**
 * Query Routes
 */

import { Router } from 'express';
import { z } from 'zod';
import type { RetrievalQaService } from '../../domain/services/RetrievalQaService.js';

const querySchema = z.object({
  question: z.string().min(1),
  k: z.number().int().positive().max(50).default(10),
});

export function createQueryRoutes(qa: RetrievalQaService): Router {
  const router = Router();

  /**
   * POST /query - Ask a question about the indexed résumés
   */
  router.post('/', async (req, res, next) => {
    try {
      const { question, k } = querySchema.parse(req.body);
      res.json(await qa.ask(question, k));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
