/**
 * Technical Scorer - Skill match against the requirement
 *
 * Required skills drive up to 70 points (+5 when every one is matched),
 * optional skills up to 30; the total is capped at 100.
 */

import type { CandidateProfile } from '../../entities/CandidateProfile.js';
import type { TechnicalScore } from '../../entities/Evaluation.js';
import type { JobRequirement } from '../../entities/JobRequirement.js';
import { skillCoverage } from '../../patterns/SkillVocabulary.js';
import {
  TECHNICAL_OPTIONAL_CURVE,
  TECHNICAL_REQUIRED_CURVE,
  applyCurve,
  clampScore,
  formatScore,
} from './curves.js';
import type { CriterionScorer } from './types.js';

const ALL_REQUIRED_BONUS = 5;
const NEUTRAL_SCORE = 50;

export class TechnicalScorer implements CriterionScorer<TechnicalScore> {
  readonly criterion = 'technical' as const;

  score(profile: CandidateProfile, requirement?: JobRequirement): TechnicalScore {
    const requiredSkills = requirement?.requiredSkills ?? [];
    const optionalSkills = requirement?.optionalSkills ?? [];
    const required = skillCoverage(requiredSkills, profile.skills);
    const optional = skillCoverage(optionalSkills, profile.skills);

    let score: number;
    if (requiredSkills.length === 0) {
      score = optionalSkills.length === 0 ? NEUTRAL_SCORE : optional.ratio * 100;
    } else {
      // A requirement without optional skills is judged on its required ones alone.
      const optionalRatio = optionalSkills.length > 0 ? optional.ratio : required.ratio;
      score =
        applyCurve(TECHNICAL_REQUIRED_CURVE, required.ratio) +
        (required.missing.length === 0 ? ALL_REQUIRED_BONUS : 0) +
        applyCurve(TECHNICAL_OPTIONAL_CURVE, optionalRatio);
    }
    score = clampScore(score);

    const parts = [`Technical match ${formatScore(score)}`];
    if (requiredSkills.length > 0) {
      parts.push(
        `required ${required.matched.length}/${requiredSkills.length}` +
          (required.matched.length > 0 ? ` (${required.matched.join(', ')})` : '')
      );
    }
    if (optionalSkills.length > 0) {
      parts.push(
        `optional ${optional.matched.length}/${optionalSkills.length}` +
          (optional.matched.length > 0 ? ` (${optional.matched.join(', ')})` : '')
      );
    }
    if (requiredSkills.length === 0 && optionalSkills.length === 0) {
      parts.push('no skills listed in the requirement');
    }
    if (required.missing.length > 0) {
      parts.push(`missing: ${required.missing.join(', ')}`);
    }

    return {
      score,
      rationale: `${parts.join('; ')}.`,
      matchedRequired: required.matched,
      missingRequired: required.missing,
      matchedOptional: optional.matched,
    };
  }
}
