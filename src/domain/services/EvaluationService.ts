/**
 * Evaluation Service - The outward operations of the engine
 *
 * Wires the stages together:
 *   job text -> requirement -> resolved documents -> profiles -> scores -> ranking
 *
 * Evaluation runs and index builds are long-running and go through the job
 * tracker; the single-step operations are plain async calls.
 */

import { z } from 'zod';
import type { RawDocument, ResolutionResult, ResolutionTier } from '../entities/Document.js';
import { CANDIDATE_EXTENSIONS } from '../entities/Document.js';
import type {
  CandidateEvaluation,
  EvaluationReport,
  RankedEvaluation,
} from '../entities/Evaluation.js';
import type { JobRequirement } from '../entities/JobRequirement.js';
import type { JobKind, StageProgress, TrackedJob } from '../entities/TrackedJob.js';
import { ValidationError, errorMessage } from '../errors.js';
import { readDocument, stemOf, type DocumentStore } from '../repositories/DocumentStore.js';
import { CandidateResolver, type ResolveRequest } from './CandidateResolver.js';
import { DecisionAggregator } from './DecisionAggregator.js';
import { ProfileExtractor } from './ProfileExtractor.js';
import { RequirementExtractor, parseRequirementHints } from './RequirementExtractor.js';
import { ProfileScorer, SoftSkillScorer, TechnicalScorer } from './scoring/index.js';
import type { JobContext, JobTracker } from '../../core/jobs/JobTracker.js';
import type {
  IndexBuildResult,
  IndexBuilder,
  IndexDocument,
  RetrievalService,
} from '../../integrations/retrieval/types.js';

// =============================================================================
// PARAMETERS
// =============================================================================

const evaluationParamsSchema = z.object({
  jobText: z.string().min(1, 'jobText is required'),
  hints: z.unknown().optional(),
  mode: z.enum(['semantic', 'enumeration']).default('semantic'),
  explicitIds: z.array(z.string()).default([]),
  limit: z.number().int().min(0).optional(),
  /** Cover letters keyed by document name or stem */
  coverLetters: z.record(z.string()).default({}),
});

export type EvaluationParams = z.infer<typeof evaluationParamsSchema>;

export function parseEvaluationParams(input: unknown): EvaluationParams {
  const parsed = evaluationParamsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ValidationError('Invalid evaluation request', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  // Hints are checked up front so a bad request fails before a job exists.
  parseRequirementHints(parsed.data.hints);
  return parsed.data;
}

export interface EvaluationRunResult {
  requirement: JobRequirement;
  tier: ResolutionTier;
  unmatchedIds: string[];
  candidates: RankedEvaluation[];
  report: EvaluationReport;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface EvaluationServiceConfig {
  /** Candidate cap when a request gives none */
  defaultLimit: number;
  extensions: readonly string[];
}

const DEFAULT_CONFIG: EvaluationServiceConfig = {
  defaultLimit: 10,
  extensions: CANDIDATE_EXTENSIONS,
};

export interface EvaluationServiceDeps {
  store: DocumentStore;
  tracker: JobTracker;
  retrieval?: RetrievalService | null;
  indexBuilder?: IndexBuilder | null;
  requirementExtractor?: RequirementExtractor;
  profileExtractor?: ProfileExtractor;
  resolver?: CandidateResolver;
  aggregator?: DecisionAggregator;
}

const PROGRESS = {
  requirement: 5,
  resolution: 15,
  evaluationStart: 20,
  evaluationEnd: 90,
  ranking: 95,
  loadingStart: 5,
  loadingEnd: 15,
} as const;

/** Stages reported on an evaluation job, in the order they finish */
export const EVALUATION_STAGES = [
  'requirement',
  'resolution',
  'profile',
  'technical',
  'soft_skills',
  'decision',
] as const;

export type EvaluationStage = (typeof EVALUATION_STAGES)[number];

const SCORING_STAGES: readonly EvaluationStage[] = ['profile', 'technical', 'soft_skills'];

const DONE: StageProgress = { status: 'completed', progress: 100 };

// =============================================================================
// SERVICE
// =============================================================================

export class EvaluationService {
  private config: EvaluationServiceConfig;
  private store: DocumentStore;
  private tracker: JobTracker;
  private indexBuilder: IndexBuilder | null;
  private requirementExtractor: RequirementExtractor;
  private profileExtractor: ProfileExtractor;
  private resolver: CandidateResolver;
  private aggregator: DecisionAggregator;
  private profileScorer = new ProfileScorer();
  private technicalScorer = new TechnicalScorer();
  private softSkillScorer: SoftSkillScorer;

  constructor(deps: EvaluationServiceDeps, config: Partial<EvaluationServiceConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.store = deps.store;
    this.tracker = deps.tracker;
    this.indexBuilder = deps.indexBuilder ?? null;
    this.requirementExtractor = deps.requirementExtractor ?? new RequirementExtractor();
    this.profileExtractor = deps.profileExtractor ?? new ProfileExtractor();
    this.resolver =
      deps.resolver ??
      new CandidateResolver(deps.store, deps.retrieval ?? null, { extensions: this.config.extensions });
    this.aggregator = deps.aggregator ?? new DecisionAggregator();
    this.softSkillScorer = new SoftSkillScorer();

    this.tracker.registerHandler('evaluation', (params, context) =>
      this.runEvaluation(parseEvaluationParams(params), context)
    );
    this.tracker.registerHandler('index_build', (_params, context) => this.runIndexBuild(context));
  }

  // ===========================================================================
  // SINGLE-STEP OPERATIONS
  // ===========================================================================

  extractRequirement(jobText: string, hints?: unknown): JobRequirement {
    return this.requirementExtractor.extract(jobText, parseRequirementHints(hints));
  }

  async resolveCandidates(request: ResolveRequest): Promise<ResolutionResult> {
    return this.resolver.resolve(request);
  }

  evaluateOne(document: RawDocument, requirement: JobRequirement, coverLetter = ''): CandidateEvaluation {
    const profile = this.profileExtractor.extract(document.text, { requirement, coverLetter });
    return {
      sourceName: document.sourceName,
      similarity: document.similarity,
      profile,
      scores: {
        profile: this.profileScorer.score(profile, requirement),
        technical: this.technicalScorer.score(profile, requirement),
        softSkills: this.softSkillScorer.score(profile, requirement),
      },
    };
  }

  rankAndReport(
    evaluations: CandidateEvaluation[],
    requirement?: JobRequirement
  ): { candidates: RankedEvaluation[]; report: EvaluationReport } {
    const candidates = this.aggregator.rank(evaluations);
    return { candidates, report: this.aggregator.report(candidates, requirement) };
  }

  async listDocuments(): Promise<string[]> {
    return this.store.list(this.config.extensions);
  }

  // ===========================================================================
  // JOBS
  // ===========================================================================

  async submitJob(kind: JobKind, params: Record<string, unknown> = {}): Promise<string> {
    if (kind === 'evaluation') {
      parseEvaluationParams(params);
    } else if (!this.indexBuilder) {
      throw new ValidationError('No index builder is configured');
    }
    return this.tracker.submit(kind, params);
  }

  async getJob(id: string): Promise<TrackedJob> {
    return this.tracker.get(id);
  }

  async cancelJob(id: string): Promise<TrackedJob> {
    return this.tracker.cancel(id);
  }

  async runEvaluation(params: EvaluationParams, context: JobContext): Promise<EvaluationRunResult> {
    const { signal } = context;

    const requirement = this.extractRequirement(params.jobText, params.hints);
    await context.report({
      progress: PROGRESS.requirement,
      step: 'requirement',
      message: `Requirement extracted: ${requirement.title}`,
      stages: {
        ...stagesAt(EVALUATION_STAGES, { status: 'pending', progress: 0 }),
        requirement: DONE,
      },
    });
    signal.throwIfAborted();

    const resolution = await this.resolver.resolve({
      requirement,
      mode: params.mode,
      explicitIds: params.explicitIds,
      limit: params.limit ?? this.config.defaultLimit,
    });
    await context.report({
      progress: PROGRESS.resolution,
      step: 'resolution',
      message: `${resolution.documents.length} candidate(s) found (${resolution.tier})`,
      stages: { resolution: DONE },
    });
    signal.throwIfAborted();

    const evaluations: CandidateEvaluation[] = [];
    const total = resolution.documents.length;
    const span = PROGRESS.evaluationEnd - PROGRESS.evaluationStart;
    for (const [index, document] of resolution.documents.entries()) {
      evaluations.push(
        this.evaluateOne(document, requirement, coverLetterFor(params.coverLetters, document.sourceName))
      );
      // Every candidate goes through all three scorers at once.
      const done = index + 1;
      await context.report({
        progress: PROGRESS.evaluationStart + Math.round((span * done) / total),
        step: 'evaluation',
        message: `Evaluated ${document.sourceName} (${done}/${total})`,
        stages: stagesAt(SCORING_STAGES, {
          status: done === total ? 'completed' : 'processing',
          progress: Math.round((100 * done) / total),
        }),
      });
      signal.throwIfAborted();
    }

    const { candidates, report } = this.rankAndReport(evaluations, requirement);
    await context.report({
      progress: PROGRESS.ranking,
      step: 'ranking',
      message: report.summary,
      stages: { ...stagesAt(SCORING_STAGES, DONE), decision: DONE },
    });

    return {
      requirement,
      tier: resolution.tier,
      unmatchedIds: resolution.unmatchedIds,
      candidates,
      report,
    };
  }

  async runIndexBuild(context: JobContext): Promise<IndexBuildResult> {
    const builder = this.indexBuilder;
    if (!builder) {
      throw new ValidationError('No index builder is configured');
    }

    await context.report({ progress: PROGRESS.loadingStart, step: 'loading', message: 'Listing documents' });
    const names = await this.store.list(this.config.extensions);

    const documents: IndexDocument[] = [];
    const span = PROGRESS.loadingEnd - PROGRESS.loadingStart;
    for (const [index, name] of names.entries()) {
      context.signal.throwIfAborted();
      try {
        documents.push({ source: name, text: await readDocument(this.store, name) });
      } catch (error) {
        console.warn(`[EvaluationService] Skipping unreadable document ${name}: ${errorMessage(error)}`);
      }
      await context.report({
        progress: PROGRESS.loadingStart + Math.round((span * (index + 1)) / names.length),
        step: 'loading',
        message: `Loaded ${index + 1}/${names.length} documents`,
      });
    }

    return builder.build(documents, async (update) => {
      context.signal.throwIfAborted();
      await context.report(update);
    });
  }
}

function coverLetterFor(letters: Record<string, string>, sourceName: string): string {
  return letters[sourceName] ?? letters[stemOf(sourceName)] ?? '';
}

function stagesAt(names: readonly EvaluationStage[], stage: StageProgress): Record<string, StageProgress> {
  return Object.fromEntries(names.map((name) => [name, { ...stage }]));
}
