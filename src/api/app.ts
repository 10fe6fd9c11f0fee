/**
 * Express Application - Shortlist Engine API
 */

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { randomUUID } from 'crypto';

import type { Services } from '../bootstrap.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import {
  createDocumentRoutes,
  createEvaluationRoutes,
  createHealthRoutes,
  createIndexRoutes,
  createJobOfferRoutes,
  createJobRoutes,
  createQueryRoutes,
  createRequirementRoutes,
} from './routes/index.js';

// =============================================================================
// CREATE APP
// =============================================================================

export function createApp(services: Services) {
  const app = express();

  // ===========================================================================
  // GLOBAL MIDDLEWARE
  // ===========================================================================

  // Security headers
  app.use(helmet());

  app.use(
    cors({
      origin: services.config.corsOrigin,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    })
  );

  // Job descriptions and cover letters can be long
  app.use(express.json({ limit: '10mb' }));

  // Request ID
  app.use((req, _res, next) => {
    if (!req.headers['x-request-id']) {
      req.headers['x-request-id'] = randomUUID();
    }
    next();
  });

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.use('/health', createHealthRoutes(services));

  app.use('/api/documents', createDocumentRoutes(services.evaluation));
  app.use('/api/job-offers', createJobOfferRoutes(services.jobOffers));
  app.use('/api/requirements', createRequirementRoutes(services.evaluation));
  app.use('/api/evaluations', createEvaluationRoutes(services.evaluation));
  app.use('/api/index', createIndexRoutes(services.evaluation));
  app.use('/api/jobs', createJobRoutes(services.evaluation));
  app.use('/api/query', createQueryRoutes(services.qa));

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export default createApp;
