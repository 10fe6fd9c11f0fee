/**
 * Job Offer Routes
 */

import { Router } from 'express';
import type { JobOfferCatalog } from '../../domain/services/JobOfferCatalog.js';

export function createJobOfferRoutes(catalog: JobOfferCatalog): Router {
  const router = Router();

  /**
   * GET /job-offers - Job offer files available as evaluation input
   */
  router.get('/', async (_req, res, next) => {
    try {
      const offers = await catalog.list();
      res.json({ data: offers, count: offers.length });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /job-offers/:id - One offer with its text, by stem or file name
   */
  router.get('/:id', async (req, res, next) => {
    try {
      res.json(await catalog.get(req.params.id));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
