/**
 * Profile Scorer - Overall résumé strength, optionally against a requirement
 *
 * Without a requirement: experience (≤30) + skills (≤40) + education (≤30).
 * With one: experience tier (≤30) + required-skill curve (≤40) + optional
 * bonus (≤10) + education (20 when any is listed).
 */

import type { CandidateProfile } from '../../entities/CandidateProfile.js';
import type { CriterionScore } from '../../entities/Evaluation.js';
import type { JobRequirement } from '../../entities/JobRequirement.js';
import { skillCoverage } from '../../patterns/SkillVocabulary.js';
import {
  PROFILE_OPTIONAL_CURVE,
  PROFILE_REQUIRED_CURVE,
  applyCurve,
  clampScore,
  formatScore,
} from './curves.js';
import type { CriterionScorer } from './types.js';

const EDUCATION_POINTS = 20;

export class ProfileScorer implements CriterionScorer {
  readonly criterion = 'profile' as const;

  score(profile: CandidateProfile, requirement?: JobRequirement): CriterionScore {
    const years = profile.yearsExperience;
    const skillCount = profile.skills.length;
    const educationCount = profile.education.length;

    if (!requirement) {
      const score = clampScore(
        10 * Math.min(3, years) + 2 * Math.min(20, skillCount) + 10 * Math.min(3, educationCount)
      );
      return {
        score,
        rationale: `${profileLabel(score)} ${formatScore(score)}. ${describe(years, skillCount, educationCount)}`,
      };
    }

    const experience = experienceTier(years, requirement.experienceMin);

    let skills: number;
    let skillNote: string;
    if (requirement.requiredSkills.length > 0) {
      const required = skillCoverage(requirement.requiredSkills, profile.skills);
      const optional = skillCoverage(requirement.optionalSkills, profile.skills);
      const bonus =
        requirement.optionalSkills.length > 0 ? applyCurve(PROFILE_OPTIONAL_CURVE, optional.ratio) : 0;
      skills = applyCurve(PROFILE_REQUIRED_CURVE, required.ratio) + bonus;
      skillNote = `${required.matched.length}/${requirement.requiredSkills.length} required skills`;
      if (requirement.optionalSkills.length > 0) {
        skillNote += `, ${optional.matched.length}/${requirement.optionalSkills.length} optional`;
      }
    } else {
      skills = Math.min(50, 2 * skillCount);
      skillNote = `${skillCount} skills`;
    }

    const education = educationCount > 0 ? EDUCATION_POINTS : 0;
    const score = clampScore(experience + skills + education);

    return {
      score,
      rationale:
        `${profileLabel(score)} ${formatScore(score)}. ` +
        `${years} years of experience (minimum ${requirement.experienceMin}), ${skillNote}, ` +
        `${educationCount} education entries.`,
    };
  }
}

export function experienceTier(years: number, minimum: number): number {
  if (years >= minimum) return 30;
  if (years >= 0.7 * minimum) return 20;
  if (years >= 0.5 * minimum) return 10;
  return 0;
}

function profileLabel(score: number): string {
  if (score >= 80) return 'Excellent profile';
  if (score >= 60) return 'Good profile';
  if (score >= 40) return 'Acceptable profile';
  return 'Weak profile';
}

function describe(years: number, skills: number, education: number): string {
  return `${years} years of experience, ${skills} skills, ${education} education entries.`;
}
