/**
 * Profile Extractor - Structured candidate profile from résumé text
 *
 * Pure and total: the same text (and clock) always yields the same profile,
 * and a field that cannot be read falls back to a sentinel ("name not
 * found", empty string, empty list, zero years) instead of raising. Fields
 * that fell back are listed in `degradedFields`.
 */

import * as crypto from 'crypto';
import {
  MAX_EDUCATION,
  MAX_EXPERIENCES,
  NAME_NOT_FOUND,
  type CandidateProfile,
  type Education,
  type Experience,
  type ProfileField,
} from '../entities/CandidateProfile.js';
import type { JobRequirement } from '../entities/JobRequirement.js';
import { getPatternLibrary, type PatternLibrary } from '../patterns/PatternLibrary.js';
import { containsAnyPhrase, findPhrase, titleCase } from '../patterns/matching.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ProfileExtractorConfig {
  library: PatternLibrary;
  defaultLanguage: string;
  /** Resolves "present" in date ranges */
  clock: () => Date;
}

export interface ProfileExtractionOptions {
  requirement?: JobRequirement;
  coverLetter?: string;
}

const DEFAULT_CONFIG: Omit<ProfileExtractorConfig, 'library'> = {
  defaultLanguage: 'French',
  clock: () => new Date(),
};

const NAME_SCAN_LINES = 10;
const MAX_HEADING_LENGTH = 60;

// =============================================================================
// EXTRACTOR
// =============================================================================

export class ProfileExtractor {
  private config: ProfileExtractorConfig;

  constructor(config: Partial<ProfileExtractorConfig> = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      library: getPatternLibrary(),
      ...config,
    };
  }

  extract(text: string, options: ProfileExtractionOptions = {}): CandidateProfile {
    const rawText = typeof text === 'string' ? text : '';
    const degraded: ProfileField[] = [];

    const email = this.extractEmail(rawText);
    if (!email) degraded.push('email');

    const name = this.extractName(rawText, email);
    if (name === NAME_NOT_FOUND) degraded.push('name');

    const phone = this.extractPhone(rawText);
    if (!phone) degraded.push('phone');

    const experiences = this.extractExperiences(rawText);
    if (experiences.length === 0) degraded.push('experiences');

    const education = this.extractEducation(rawText);
    if (education.length === 0) degraded.push('education');

    const skills = this.extractSkills(rawText, options.requirement);
    if (skills.length === 0) degraded.push('skills');

    let languages = this.extractLanguages(rawText);
    if (languages.length === 0) {
      languages = [this.config.defaultLanguage];
      degraded.push('languages');
    }

    const profile: CandidateProfile = {
      id: candidateId(email, name, rawText),
      name,
      email,
      phone,
      experiences,
      education,
      skills,
      languages,
      yearsExperience: this.yearsOfExperience(experiences),
      rawText,
      coverLetter: options.coverLetter ?? '',
      degradedFields: degraded,
    };

    if (degraded.length > 0) {
      console.debug(`[ProfileExtractor] ${profile.id}: fell back on ${degraded.join(', ')}`);
    }

    return profile;
  }

  // ===========================================================================
  // IDENTITY
  // ===========================================================================

  private extractName(text: string, email: string): string {
    const lines = text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .slice(0, NAME_SCAN_LINES);

    for (const line of lines) {
      for (const piece of line.split(/\s*\|\s*|\s+[-–]\s+/)) {
        const name = this.acceptName(this.stripNamePrefixes(piece));
        if (name) return name;
      }
    }

    return nameFromEmail(email) ?? NAME_NOT_FOUND;
  }

  private stripNamePrefixes(piece: string): string {
    let current = piece.trim();
    let stripped = true;
    while (stripped) {
      stripped = false;
      const lower = current.toLowerCase();
      for (const prefix of this.config.library.lexicon.resume.namePrefixes) {
        if (findPhrase(lower, prefix) === 0 || (prefix.endsWith('.') && lower.startsWith(prefix))) {
          current = current.slice(prefix.length).replace(/^[\s:,-]+/, '');
          stripped = true;
          break;
        }
      }
    }
    return current;
  }

  private acceptName(candidate: string): string | null {
    if (candidate.includes('@') || /https?:|www\./i.test(candidate) || /\d{4}/.test(candidate)) {
      return null;
    }
    if (this.isSectionHeading(candidate)) {
      return null;
    }

    const words = candidate.split(/\s+/).filter((word) => word.length > 0);
    if (words.length < 2 || words.length > 4) {
      return null;
    }

    if (words.every((word) => /^[\p{Lu}'’-]+$/u.test(word) && /\p{Lu}{2,}/u.test(word))) {
      return titleCase(words.join(' '));
    }
    if (words.every((word) => /^\p{Lu}\p{Ll}+(?:[-'’]\p{Lu}?\p{Ll}+)*$/u.test(word))) {
      return words.join(' ');
    }
    return null;
  }

  private isSectionHeading(candidate: string): boolean {
    const { sectionHeadings, experienceSections, educationSections } = this.config.library.lexicon.resume;
    const head = candidate.toLowerCase().replace(/[\s:]+$/, '');
    return [...sectionHeadings, ...experienceSections, ...educationSections].includes(head);
  }

  private extractEmail(text: string): string {
    return text.match(this.config.library.patterns.email)?.[0] ?? '';
  }

  private extractPhone(text: string): string {
    for (const pattern of this.config.library.patterns.phones) {
      const match = text.match(pattern);
      if (match) return match[0].trim();
    }
    return '';
  }

  // ===========================================================================
  // EXPERIENCE / EDUCATION
  // ===========================================================================

  private extractExperiences(text: string): Experience[] {
    const { lexicon, patterns } = this.config.library;
    const section = this.locateSection(text, lexicon.resume.experienceSections) ?? text;
    const experiences: Experience[] = [];
    const seen = new Set<string>();

    for (const pattern of patterns.experienceEntries) {
      for (const match of section.matchAll(pattern)) {
        if (experiences.length >= MAX_EXPERIENCES) return experiences;

        const startYear = yearOf(match[2]);
        if (startYear === null) continue;
        const title = match[1].trim().replace(/[\s,;:\-–]+$/u, '');
        const key = `${title.toLowerCase()}|${startYear}`;
        if (seen.has(key)) continue;
        seen.add(key);

        experiences.push({ title, startYear, endYear: this.endYearOf(match[3]) });
      }
    }

    return experiences;
  }

  private endYearOf(raw: string | undefined): Experience['endYear'] {
    if (raw === undefined) return null;
    if (containsAnyPhrase(raw.toLowerCase(), this.config.library.lexicon.resume.presentWords)) {
      return 'present';
    }
    return yearOf(raw);
  }

  private yearsOfExperience(experiences: Experience[]): number {
    const currentYear = this.config.clock().getFullYear();
    const total = experiences.reduce((sum, experience) => {
      if (experience.endYear === null) return sum;
      const end = experience.endYear === 'present' ? currentYear : experience.endYear;
      return sum + (end - experience.startYear);
    }, 0);
    // Spans are summed as written; only the total is floored.
    return Math.max(0, total);
  }

  private extractEducation(text: string): Education[] {
    const { lexicon, patterns } = this.config.library;
    const section = this.locateSection(text, lexicon.resume.educationSections);
    const degrees: string[] = [];

    const add = (degree: string): void => {
      const lower = degree.toLowerCase();
      if (degree.length === 0 || degrees.length >= MAX_EDUCATION) return;
      if (degrees.some((existing) => existing.toLowerCase().includes(lower) || lower.includes(existing.toLowerCase()))) {
        return;
      }
      degrees.push(degree);
    };

    for (const match of (section ?? text).matchAll(patterns.educationDegree)) {
      add(match[0].trim());
    }
    // Dated lines are too generic to trust outside an education section.
    if (section) {
      for (const match of section.matchAll(patterns.educationDated)) {
        add(match[0].trim());
      }
    }

    return degrees.map((degree) => ({ degree }));
  }

  /**
   * Body of the first section whose heading line is one of `headings`,
   * up to the next heading line of any known section.
   */
  private locateSection(text: string, headings: readonly string[]): string | null {
    const { sectionHeadings, experienceSections, educationSections } = this.config.library.lexicon.resume;
    const allHeadings = [...sectionHeadings, ...experienceSections, ...educationSections];
    const lines = text.split('\n');

    const start = lines.findIndex((line) => isHeadingLine(line, headings));
    if (start === -1) return null;

    let end = lines.length;
    for (let i = start + 1; i < lines.length; i++) {
      if (isHeadingLine(lines[i], allHeadings)) {
        end = i;
        break;
      }
    }

    return lines.slice(start + 1, end).join('\n');
  }

  // ===========================================================================
  // SKILLS / LANGUAGES
  // ===========================================================================

  private extractSkills(text: string, requirement?: JobRequirement): string[] {
    const extraTerms = requirement ? [...requirement.requiredSkills, ...requirement.optionalSkills] : [];
    return this.config.library.vocabulary.extract(text, extraTerms);
  }

  private extractLanguages(text: string): string[] {
    const lower = text.toLowerCase();
    return Object.entries(this.config.library.lexicon.languages)
      .filter(([, keywords]) => containsAnyPhrase(lower, keywords))
      .map(([language]) => language);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function isHeadingLine(line: string, headings: readonly string[]): boolean {
  const head = line
    .trim()
    .toLowerCase()
    .replace(/^[\s\-*•#]+/u, '')
    .replace(/[\s:]+$/, '');
  if (head.length === 0 || head.length > MAX_HEADING_LENGTH) return false;
  return headings.some((heading) => head === heading || head.startsWith(`${heading}:`));
}

function yearOf(raw: string | undefined): number | null {
  const match = raw?.match(/\d{4}/);
  return match ? Number(match[0]) : null;
}

function nameFromEmail(email: string): string | null {
  if (!email) return null;
  const parts = email.split('@')[0].split('.');
  if (parts.length < 2 || parts.length > 4 || !parts.every((part) => /^\p{L}+$/u.test(part))) {
    return null;
  }
  return titleCase(parts.join(' '));
}

function candidateId(email: string, name: string, text: string): string {
  if (email) {
    return email.split('@')[0].toLowerCase();
  }
  if (name !== NAME_NOT_FOUND) {
    return name.toLowerCase().replace(/\s+/g, '_');
  }
  const digest = crypto.createHash('sha1').update(text).digest('hex');
  return `candidate-${digest.slice(0, 8)}`;
}
