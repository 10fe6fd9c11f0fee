/**
 * API Routes - Central export
 */

export { createHealthRoutes } from './health.js';
export { createDocumentRoutes } from './documents.js';
export { createRequirementRoutes } from './requirements.js';
export { createEvaluationRoutes } from './evaluations.js';
export { createIndexRoutes } from './indexing.js';
export { createJobRoutes } from './jobs.js';
export { createJobOfferRoutes } from './jobOffers.js';
export { createQueryRoutes } from './query.js';
