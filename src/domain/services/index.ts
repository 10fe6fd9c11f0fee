/**
 * Domain Services Module
 *
 * The evaluation pipeline stages and the façades built on them:
 * - Extraction: job text to requirement, résumé text to profile
 * - Resolution: which documents a run evaluates
 * - Scoring and aggregation: criterion scores, ranking, report
 * - Evaluation / retrieval QA: the operations exposed to callers
 * - Job offers: the catalogue of job descriptions on disk
 */

export {
  RequirementExtractor,
  parseRequirementHints,
  type RequirementExtractorConfig,
} from './RequirementExtractor.js';

export {
  ProfileExtractor,
  type ProfileExtractorConfig,
  type ProfileExtractionOptions,
} from './ProfileExtractor.js';

export {
  CandidateResolver,
  type CandidateResolverConfig,
  type ResolveRequest,
} from './CandidateResolver.js';

export * from './scoring/index.js';

export {
  DecisionAggregator,
  computeGlobalScore,
  recommendationFor,
  type CriterionWeights,
  type DecisionAggregatorConfig,
} from './DecisionAggregator.js';

export {
  EvaluationService,
  parseEvaluationParams,
  type EvaluationParams,
  type EvaluationRunResult,
  type EvaluationServiceConfig,
  type EvaluationServiceDeps,
} from './EvaluationService.js';

export {
  JobOfferCatalog,
  type JobOffer,
  type JobOfferCatalogConfig,
  type JobOfferSummary,
} from './JobOfferCatalog.js';

export {
  RetrievalQaService,
  NO_RELEVANT_DOCUMENTS,
  type AnswerMode,
  type AnswerSource,
  type QueryAnswer,
} from './RetrievalQaService.js';
