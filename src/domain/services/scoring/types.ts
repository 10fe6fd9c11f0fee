import type { CandidateProfile } from '../../entities/CandidateProfile.js';
import type { CriterionScore } from '../../entities/Evaluation.js';
import type { JobRequirement } from '../../entities/JobRequirement.js';

export type Criterion = 'profile' | 'technical' | 'softSkills';

/**
 * A pure scorer for one evaluation criterion.
 */
export interface CriterionScorer<TScore extends CriterionScore = CriterionScore> {
  readonly criterion: Criterion;
  score(profile: CandidateProfile, requirement?: JobRequirement): TScore;
}

