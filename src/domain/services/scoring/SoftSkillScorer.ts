/**
 * Soft-Skill Scorer - Motivation, communication and leadership signals
 *
 * Reads the cover letter and the résumé text. Keyword tables come from the
 * pattern library and match as substrings, so stems ("supervis") work.
 */

import type { CandidateProfile } from '../../entities/CandidateProfile.js';
import type { SoftSkillScore } from '../../entities/Evaluation.js';
import type { JobRequirement } from '../../entities/JobRequirement.js';
import { getPatternLibrary, type PatternLibrary } from '../../patterns/PatternLibrary.js';
import { containsKeyword, countKeywords } from '../../patterns/matching.js';
import { clampScore, formatScore } from './curves.js';
import type { CriterionScorer } from './types.js';

// =============================================================================
// WEIGHTS
// =============================================================================

const WEIGHTS = {
  motivation: 0.4,
  communication: 0.3,
  leadership: 0.2,
  tags: 0.1,
} as const;

const SHORT_LETTER = 50;
const DETAILED_LETTER = 200;
const MAX_TAGS_LISTED = 5;

// =============================================================================
// SCORER
// =============================================================================

export class SoftSkillScorer implements CriterionScorer<SoftSkillScore> {
  readonly criterion = 'softSkills' as const;
  private library: PatternLibrary;

  constructor(library: PatternLibrary = getPatternLibrary()) {
    this.library = library;
  }

  // The requirement is accepted for a uniform scorer signature; soft skills
  // are judged on the candidate's own documents.
  score(profile: CandidateProfile, _requirement?: JobRequirement): SoftSkillScore {
    const letter = profile.coverLetter;
    const resume = profile.rawText;

    const motivation = this.motivation(letter);
    const communication = this.communication(letter, resume);
    const leadership = this.leadership(profile);
    const detectedSoftSkills = this.detectTags(letter, resume);

    const score = clampScore(
      WEIGHTS.motivation * motivation +
        WEIGHTS.communication * communication +
        WEIGHTS.leadership * leadership +
        WEIGHTS.tags * Math.min(100, 10 * detectedSoftSkills.length)
    );

    let rationale =
      `${softSkillLabel(score)} ${formatScore(score)}. ` +
      `Motivation ${formatScore(motivation)}, communication ${formatScore(communication)}, ` +
      `leadership ${formatScore(leadership)}.`;
    if (detectedSoftSkills.length > 0) {
      rationale += ` Detected: ${detectedSoftSkills.slice(0, MAX_TAGS_LISTED).join(', ')}.`;
    }

    return { score, rationale, motivation, communication, leadership, detectedSoftSkills };
  }

  motivation(letter: string): number {
    if (letter.length < SHORT_LETTER) {
      return 30;
    }
    const lower = letter.toLowerCase();
    const { positive, negative } = this.library.softSkills.motivation;
    let score = 50 + Math.min(30, 5 * countKeywords(lower, positive)) - 10 * countKeywords(lower, negative);
    if (letter.length > DETAILED_LETTER) {
      score += 10;
    }
    return clampScore(score);
  }

  communication(letter: string, resume: string): number {
    const { salutations, closings, resumeSections } = this.library.softSkills.communication;
    let score = 50;

    if (letter.length > 0) {
      const lower = letter.toLowerCase();
      const opening = lower.slice(0, 100);
      if (salutations.some((word) => containsKeyword(opening, word))) score += 10;
      if (letter.length >= 200 && letter.length <= 800) {
        score += 10;
      } else if (letter.length < 100) {
        score -= 20;
      }
      if (closings.some((word) => containsKeyword(lower, word))) score += 10;
    }

    if (resume.length > 0) {
      const lower = resume.toLowerCase();
      const groups = resumeSections.filter((group) => group.some((word) => containsKeyword(lower, word)));
      score += 5 * groups.length;
    }

    return clampScore(score);
  }

  leadership(profile: CandidateProfile): number {
    const { keywords, titles } = this.library.softSkills.leadership;
    let score = 30 + Math.min(40, 5 * countKeywords(profile.rawText.toLowerCase(), keywords));
    for (const experience of profile.experiences) {
      const title = experience.title.toLowerCase();
      if (titles.some((word) => containsKeyword(title, word))) {
        score += 10;
      }
    }
    return clampScore(score);
  }

  detectTags(letter: string, resume: string): string[] {
    const text = `${letter} ${resume}`.toLowerCase();
    return Object.entries(this.library.softSkills.tags)
      .filter(([, words]) => words.some((word) => containsKeyword(text, word)))
      .map(([tag]) => tag);
  }
}

function softSkillLabel(score: number): string {
  if (score >= 80) return 'Excellent soft skills';
  if (score >= 60) return 'Good soft skills';
  if (score >= 40) return 'Acceptable soft skills';
  return 'Soft skills to develop';
}
