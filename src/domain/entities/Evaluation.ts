/**
 * Evaluation - Scores, rankings and reports for candidates
 */

import type { CandidateProfile } from './CandidateProfile.js';
import type { JobRequirement } from './JobRequirement.js';

// =============================================================================
// CRITERION SCORES
// =============================================================================

export interface CriterionScore {
  score: number; // 0-100
  rationale: string;
}

export interface TechnicalScore extends CriterionScore {
  matchedRequired: string[];
  missingRequired: string[];
  matchedOptional: string[];
}

export interface SoftSkillScore extends CriterionScore {
  motivation: number;
  communication: number;
  leadership: number;
  detectedSoftSkills: string[];
}

export interface ScoreBreakdown {
  profile: CriterionScore;
  technical: TechnicalScore;
  softSkills: SoftSkillScore;
}

// =============================================================================
// EVALUATIONS
// =============================================================================

export const RECOMMENDATIONS = ['strongly_recommended', 'recommended', 'to_consider', 'to_reject'] as const;

export type Recommendation = (typeof RECOMMENDATIONS)[number];

export const RECOMMENDATION_LABELS: Record<Recommendation, string> = {
  strongly_recommended: 'Strongly recommended',
  recommended: 'Recommended',
  to_consider: 'To consider',
  to_reject: 'To reject',
};

/**
 * One candidate after extraction and scoring, before ranking.
 */
export interface CandidateEvaluation {
  sourceName: string;
  similarity: number;
  profile: CandidateProfile;
  scores: ScoreBreakdown;
}

export interface RankedEvaluation extends CandidateEvaluation {
  rank: number;
  globalScore: number;
  recommendation: Recommendation;
  justification: string;
}

// =============================================================================
// REPORT
// =============================================================================

export interface ScoreStatistics {
  mean: number;
  max: number;
  min: number;
}

export interface ReportStatistics {
  totalCandidates: number;
  global: ScoreStatistics;
  profile: ScoreStatistics;
  technical: ScoreStatistics;
  softSkills: ScoreStatistics;
  recommendations: Record<Recommendation, number>;
}

export interface EvaluationReport {
  summary: string;
  statistics: ReportStatistics | null;
  topCandidates: RankedEvaluation[];
  requirement?: JobRequirement;
}

export const NO_CANDIDATES_SUMMARY = 'no candidates evaluated';
