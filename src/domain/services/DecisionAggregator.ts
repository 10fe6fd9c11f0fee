/**
 * Decision Aggregator - Global score, recommendation, ranking and report
 *
 * globalScore = round(0.3·profile + 0.4·technical + 0.3·softSkills, 2)
 *
 * Ranking is a stable sort on globalScore, so candidates with equal scores
 * keep the order they were evaluated in.
 */

import type {
  CandidateEvaluation,
  EvaluationReport,
  RankedEvaluation,
  Recommendation,
  ReportStatistics,
  ScoreBreakdown,
  ScoreStatistics,
} from '../entities/Evaluation.js';
import { NO_CANDIDATES_SUMMARY, RECOMMENDATIONS, RECOMMENDATION_LABELS } from '../entities/Evaluation.js';
import type { JobRequirement } from '../entities/JobRequirement.js';
import { UNSPECIFIED } from '../entities/JobRequirement.js';
import { formatScore } from './scoring/curves.js';
import type { Criterion } from './scoring/types.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export type CriterionWeights = Record<Criterion, number>;

export interface DecisionAggregatorConfig {
  weights: CriterionWeights;
  topCount: number;
}

const DEFAULT_CONFIG: DecisionAggregatorConfig = {
  weights: { profile: 0.3, technical: 0.4, softSkills: 0.3 },
  topCount: 3,
};

const THRESHOLDS: Array<{ min: number; recommendation: Recommendation }> = [
  { min: 80, recommendation: 'strongly_recommended' },
  { min: 65, recommendation: 'recommended' },
  { min: 50, recommendation: 'to_consider' },
];

const STRENGTH_THRESHOLD = 70;
const IMPROVEMENT_THRESHOLD = 50;
const RATIONALE_EXCERPT = 100;

const CRITERIA: Array<{ key: Criterion; label: string; strength: string; improvement: string }> = [
  {
    key: 'profile',
    label: 'Profile',
    strength: 'Experience and background fit the role',
    improvement: 'Experience or education below expectations',
  },
  {
    key: 'technical',
    label: 'Technical',
    strength: 'Strong match on the requested skills',
    improvement: 'Technical gaps on the requested skills',
  },
  {
    key: 'softSkills',
    label: 'Soft skills',
    strength: 'Clear motivation and communication',
    improvement: 'Few soft-skill signals in the application',
  },
];

// =============================================================================
// SCORING HELPERS
// =============================================================================

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function computeGlobalScore(
  scores: ScoreBreakdown,
  weights: CriterionWeights = DEFAULT_CONFIG.weights
): number {
  return round2(
    weights.profile * scores.profile.score +
      weights.technical * scores.technical.score +
      weights.softSkills * scores.softSkills.score
  );
}

export function recommendationFor(globalScore: number): Recommendation {
  return THRESHOLDS.find((threshold) => globalScore >= threshold.min)?.recommendation ?? 'to_reject';
}

// =============================================================================
// AGGREGATOR
// =============================================================================

export class DecisionAggregator {
  private config: DecisionAggregatorConfig;

  constructor(config: Partial<DecisionAggregatorConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  rank(evaluations: CandidateEvaluation[]): RankedEvaluation[] {
    const scored = evaluations.map((evaluation) => {
      const globalScore = computeGlobalScore(evaluation.scores, this.config.weights);
      const recommendation = recommendationFor(globalScore);
      return {
        ...evaluation,
        rank: 0,
        globalScore,
        recommendation,
        justification: this.justify(evaluation, globalScore, recommendation),
      };
    });

    return scored
      .sort((a, b) => b.globalScore - a.globalScore)
      .map((evaluation, index) => ({ ...evaluation, rank: index + 1 }));
  }

  report(ranked: RankedEvaluation[], requirement?: JobRequirement): EvaluationReport {
    if (ranked.length === 0) {
      return { summary: NO_CANDIDATES_SUMMARY, statistics: null, topCandidates: [], requirement };
    }

    const statistics = this.statistics(ranked);
    const topCandidates = ranked.slice(0, this.config.topCount);

    return {
      summary: this.summarize(ranked, statistics, requirement),
      statistics,
      topCandidates,
      requirement,
    };
  }

  justify(evaluation: CandidateEvaluation, globalScore: number, recommendation: Recommendation): string {
    const { profile, scores } = evaluation;
    const lines = [
      `Candidate: ${profile.name} (${evaluation.sourceName})`,
      `Global score: ${formatScore(globalScore)}`,
      `Recommendation: ${RECOMMENDATION_LABELS[recommendation]}`,
      '',
      'Scores:',
      ...CRITERIA.map(
        ({ key, label }) =>
          `- ${label}: ${formatScore(scores[key].score)} - ${scores[key].rationale.slice(0, RATIONALE_EXCERPT)}`
      ),
    ];

    const strengths = CRITERIA.filter(({ key }) => scores[key].score >= STRENGTH_THRESHOLD).map(
      ({ strength }) => `✓ ${strength}`
    );
    const improvements = CRITERIA.filter(({ key }) => scores[key].score < IMPROVEMENT_THRESHOLD).map(
      ({ key, improvement }) =>
        key === 'technical' && scores.technical.missingRequired.length > 0
          ? `⚠ ${improvement} (missing: ${scores.technical.missingRequired.join(', ')})`
          : `⚠ ${improvement}`
    );

    if (strengths.length > 0) {
      lines.push('', 'Strengths:', ...strengths);
    }
    if (improvements.length > 0) {
      lines.push('', 'Areas for improvement:', ...improvements);
    }

    return lines.join('\n');
  }

  private statistics(ranked: RankedEvaluation[]): ReportStatistics {
    const recommendations: Record<Recommendation, number> = {
      strongly_recommended: 0,
      recommended: 0,
      to_consider: 0,
      to_reject: 0,
    };
    for (const evaluation of ranked) {
      recommendations[evaluation.recommendation] += 1;
    }

    return {
      totalCandidates: ranked.length,
      global: describe(ranked.map((e) => e.globalScore)),
      profile: describe(ranked.map((e) => e.scores.profile.score)),
      technical: describe(ranked.map((e) => e.scores.technical.score)),
      softSkills: describe(ranked.map((e) => e.scores.softSkills.score)),
      recommendations,
    };
  }

  private summarize(
    ranked: RankedEvaluation[],
    statistics: ReportStatistics,
    requirement?: JobRequirement
  ): string {
    const best = ranked[0];
    const role = requirement && requirement.title !== UNSPECIFIED ? ` for ${requirement.title}` : '';
    const counts = RECOMMENDATIONS.filter((key) => statistics.recommendations[key] > 0)
      .map((key) => `${statistics.recommendations[key]} ${RECOMMENDATION_LABELS[key].toLowerCase()}`)
      .join(', ');

    return (
      `${ranked.length} candidate${ranked.length === 1 ? '' : 's'} evaluated${role}. ` +
      `Best: ${best.profile.name} with ${formatScore(best.globalScore)} (${RECOMMENDATION_LABELS[best.recommendation]}). ` +
      `Average global score ${formatScore(statistics.global.mean)}. ${counts}.`
    );
  }
}

function describe(values: number[]): ScoreStatistics {
  const total = values.reduce((sum, value) => sum + value, 0);
  return {
    mean: round2(total / values.length),
    max: round2(Math.max(...values)),
    min: round2(Math.min(...values)),
  };
}
