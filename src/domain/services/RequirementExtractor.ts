/**
 * Requirement Extractor - Structured criteria from free-text job descriptions
 *
 * Turns a job posting into a frozen JobRequirement. Every field has a
 * default, so any text (including an empty one) yields a requirement.
 *
 * Skill classification, in priority order:
 * 1. Section headers ("Required skills:", "Nice to have:") at the start of a line
 * 2. Cue words in the clause around the mention ("Python required", "Power BI a plus")
 * 3. The core-skill allowlist from the vocabulary
 *
 * Recruiter hints override whatever the text suggests.
 */

import { z } from 'zod';
import {
  CONTRACT_TYPES,
  SENIORITY_LEVELS,
  UNSPECIFIED,
  type ContractType,
  type JobRequirement,
  type RequirementHints,
  type SalaryRange,
  type Seniority,
} from '../entities/JobRequirement.js';
import { ValidationError } from '../errors.js';
import { getPatternLibrary, normalizeSkill, type PatternLibrary } from '../patterns/PatternLibrary.js';
import { containsAnyPhrase, containsPhrase, findPhrase } from '../patterns/matching.js';
import { uniqueSkills, withoutSkills, type SkillMention } from '../patterns/SkillVocabulary.js';

// =============================================================================
// TYPES
// =============================================================================

export interface RequirementExtractorConfig {
  library: PatternLibrary;
  defaultLanguage: string;
}

type SkillClass = 'required' | 'optional';

interface SkillSection {
  start: number;
  end: number;
  kind: SkillClass | 'closing';
}

const DEFAULT_CONFIG: Omit<RequirementExtractorConfig, 'library'> = {
  defaultLanguage: 'French',
};

const MAX_TITLE_LINE = 100;
const CONTEXT_WINDOW = 60;
const MAX_KEYWORDS = 10;
const CLAUSE_DELIMITERS = new Set([',', ';', '!', '?', '\n']);

// =============================================================================
// HINT VALIDATION
// =============================================================================

const skillList = z.array(z.string().trim().min(1));

const requirementHintsSchema = z
  .object({
    title: z.string().trim().min(1).optional(),
    seniority: z.enum(SENIORITY_LEVELS).optional(),
    experienceMin: z.number().int().min(0).max(60).optional(),
    experienceMax: z.number().int().min(0).max(60).optional(),
    requiredSkills: skillList.optional(),
    optionalSkills: skillList.optional(),
    languages: skillList.optional(),
    location: z.string().trim().min(1).optional(),
    salaryMin: z.number().min(0).optional(),
    salaryMax: z.number().min(0).optional(),
    contractType: z.enum(CONTRACT_TYPES).optional(),
    notes: z.string().optional(),
  })
  .refine(
    (hints) =>
      hints.experienceMin === undefined ||
      hints.experienceMax === undefined ||
      hints.experienceMax === 0 ||
      hints.experienceMax >= hints.experienceMin,
    { message: 'experienceMax must be 0 or at least experienceMin', path: ['experienceMax'] }
  )
  .refine(
    (hints) =>
      hints.salaryMin === undefined ||
      hints.salaryMax === undefined ||
      hints.salaryMax === 0 ||
      hints.salaryMax >= hints.salaryMin,
    { message: 'salaryMax must be 0 or at least salaryMin', path: ['salaryMax'] }
  );

/**
 * Validate recruiter hints coming from outside the process.
 * `undefined` and `null` mean "no hints".
 */
export function parseRequirementHints(input: unknown): RequirementHints {
  if (input === undefined || input === null) {
    return {};
  }
  const parsed = requirementHintsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid requirement hints', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return parsed.data;
}

// =============================================================================
// EXTRACTOR
// =============================================================================

export class RequirementExtractor {
  private config: RequirementExtractorConfig;

  constructor(config: Partial<RequirementExtractorConfig> = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      library: getPatternLibrary(),
      ...config,
    };
  }

  extract(jobText: string, hints: RequirementHints = {}): JobRequirement {
    const text = typeof jobText === 'string' ? jobText : '';
    const lower = text.toLowerCase();

    const experience = this.extractExperience(lower, hints);
    const skills = this.extractSkills(text, hints);

    const requirement: JobRequirement = {
      title: hints.title?.trim() || this.extractTitle(text, lower),
      seniority: hints.seniority ?? this.extractSeniority(lower),
      experienceMin: experience.min,
      experienceMax: experience.max,
      requiredSkills: skills.required,
      optionalSkills: skills.optional,
      languages: this.extractLanguages(lower, hints),
      location: hints.location?.trim() || this.extractLocation(lower),
      salary: this.extractSalary(lower, hints),
      contractType: hints.contractType ?? this.extractContractType(lower),
      keywords: this.extractKeywords(lower),
      notes: hints.notes?.trim() ?? '',
    };

    return freezeRequirement(requirement);
  }

  // ===========================================================================
  // TITLE / SENIORITY
  // ===========================================================================

  private extractTitle(text: string, lower: string): string {
    for (const title of this.config.library.lexicon.jobTitles) {
      if (containsPhrase(lower, title.phrase)) {
        return title.display;
      }
    }

    const firstLine = text
      .split('\n')
      .map((line) => line.trim())
      .find((line) => line.length > 0);
    if (firstLine && firstLine.length < MAX_TITLE_LINE) {
      return firstLine;
    }

    return UNSPECIFIED;
  }

  private extractSeniority(lower: string): Seniority {
    const { senior, junior, mid } = this.config.library.lexicon.seniority;
    if (containsAnyPhrase(lower, senior)) return 'senior';
    if (containsAnyPhrase(lower, junior)) return 'junior';
    if (containsAnyPhrase(lower, mid)) return 'mid';
    return 'unspecified';
  }

  // ===========================================================================
  // EXPERIENCE
  // ===========================================================================

  private extractExperience(lower: string, hints: RequirementHints): { min: number; max: number } {
    const { experienceRange, experienceSingle } = this.config.library.patterns;
    let min = 0;
    let max = 0;

    for (const match of lower.matchAll(experienceRange)) {
      const a = Number(match[1]);
      const b = Number(match[2]);
      min = Math.max(min, Math.min(a, b));
      max = Math.max(max, Math.max(a, b));
    }

    // Ranges are consumed so "3-5 years" does not also read as "5 years".
    const remaining = lower.replace(experienceRange, ' ');
    for (const pattern of experienceSingle) {
      for (const match of remaining.matchAll(pattern)) {
        min = Math.max(min, Number(match[1]));
      }
    }

    min = Math.max(min, hints.experienceMin ?? 0);
    max = hints.experienceMax ?? max;
    if (max !== 0 && max < min) {
      max = min;
    }

    return { min, max };
  }

  // ===========================================================================
  // SKILLS
  // ===========================================================================

  private extractSkills(
    text: string,
    hints: RequirementHints
  ): { required: string[]; optional: string[] } {
    const { vocabulary } = this.config.library;
    const sections = this.locateSections(text);
    const classes = new Map<string, SkillClass>();

    for (const mention of vocabulary.findMentions(text)) {
      const kind =
        this.sectionClass(sections, mention.index) ??
        this.contextClass(text, mention) ??
        (vocabulary.isCore(mention.skill) ? 'required' : 'optional');

      if (classes.get(mention.skill) !== 'required') {
        classes.set(mention.skill, kind);
      }
    }

    const detectedRequired = [...classes].filter(([, kind]) => kind === 'required').map(([skill]) => skill);
    const detectedOptional = [...classes].filter(([, kind]) => kind === 'optional').map(([skill]) => skill);

    const normalize = (skills: string[] | undefined): string[] =>
      (skills ?? []).map((skill) => normalizeSkill(skill, this.config.library));

    const required = uniqueSkills([...detectedRequired, ...normalize(hints.requiredSkills)]);
    const optional = withoutSkills(
      uniqueSkills([...detectedOptional, ...normalize(hints.optionalSkills)]),
      required
    );

    return { required, optional };
  }

  /**
   * Header lines split the text into spans. A span runs from its header to
   * the next header of any kind, or to the end of the text.
   */
  private locateSections(text: string): SkillSection[] {
    const { required, optional, closing } = this.config.library.lexicon.sectionMarkers;
    const markers: Array<{ marker: string; kind: SkillSection['kind'] }> = [
      ...required.map((marker) => ({ marker, kind: 'required' as const })),
      ...optional.map((marker) => ({ marker, kind: 'optional' as const })),
      ...closing.map((marker) => ({ marker, kind: 'closing' as const })),
    ].sort((a, b) => b.marker.length - a.marker.length);

    const headers: Array<{ start: number; kind: SkillSection['kind'] }> = [];
    let offset = 0;

    for (const line of text.split('\n')) {
      const head = line
        .toLowerCase()
        .replace(/^[\s\-*•·#>]+/u, '');
      const found = markers.find(({ marker }) => findPhrase(head, marker) === 0);
      if (found) {
        headers.push({ start: offset, kind: found.kind });
      }
      offset += line.length + 1;
    }

    return headers.map((header, index) => ({
      start: header.start,
      end: index + 1 < headers.length ? headers[index + 1].start : text.length,
      kind: header.kind,
    }));
  }

  private sectionClass(sections: SkillSection[], index: number): SkillClass | null {
    const section = sections.find((s) => index >= s.start && index < s.end);
    if (!section || section.kind === 'closing') {
      return null;
    }
    return section.kind;
  }

  private contextClass(text: string, mention: SkillMention): SkillClass | null {
    const clause = clauseAround(text, mention.index, mention.index + mention.length).toLowerCase();
    const { optional, required } = this.config.library.lexicon.contextCues;
    if (containsAnyPhrase(clause, optional)) return 'optional';
    if (containsAnyPhrase(clause, required)) return 'required';
    return null;
  }

  // ===========================================================================
  // LANGUAGES / LOCATION / SALARY / CONTRACT
  // ===========================================================================

  private extractLanguages(lower: string, hints: RequirementHints): string[] {
    const detected = Object.entries(this.config.library.lexicon.languages)
      .filter(([, keywords]) => containsAnyPhrase(lower, keywords))
      .map(([language]) => language);

    const languages = uniqueStrings([...(hints.languages ?? []).map((l) => l.trim()), ...detected]);
    return languages.length > 0 ? languages : [this.config.defaultLanguage];
  }

  private extractLocation(lower: string): string {
    const location = this.config.library.lexicon.locations.find((entry) =>
      containsPhrase(lower, entry.phrase)
    );
    return location ? location.display : UNSPECIFIED;
  }

  private extractSalary(lower: string, hints: RequirementHints): SalaryRange {
    const { salaryRange, salaryPerYear, salaryLabelled } = this.config.library.patterns;
    const compact = lower.replace(/\s+/g, '');
    let min = 0;
    let max = 0;

    const range = compact.match(salaryRange);
    if (range) {
      const secondInThousands = range[4].startsWith('k');
      let first = amount(range[1], range[2] !== undefined);
      const second = amount(range[3], secondInThousands);
      // "45-55k€" puts the unit on the upper bound only.
      if (secondInThousands && range[2] === undefined && first < 1000) {
        first *= 1000;
      }
      min = Math.min(first, second);
      max = Math.max(first, second);
    } else {
      const single = compact.match(salaryPerYear) ?? compact.match(salaryLabelled);
      if (single) {
        min = amount(single[1], single[2] !== undefined);
        max = min;
      }
    }

    return {
      min: hints.salaryMin ?? min,
      max: hints.salaryMax ?? max,
    };
  }

  private extractContractType(lower: string): ContractType {
    const contract = this.config.library.lexicon.contracts.find((entry) =>
      containsAnyPhrase(lower, entry.keywords)
    );
    return contract ? contract.type : 'CDI';
  }

  // ===========================================================================
  // KEYWORDS
  // ===========================================================================

  private extractKeywords(lower: string): string[] {
    const counts = new Map<string, number>();
    for (const [word] of lower.matchAll(/\p{L}{4,}/gu)) {
      if (this.config.library.stopwords.has(word)) continue;
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }

    // Map iteration follows first occurrence and Array#sort is stable.
    return [...counts]
      .sort((a, b) => b[1] - a[1])
      .slice(0, MAX_KEYWORDS)
      .map(([word]) => word);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function amount(digits: string, thousands: boolean): number {
  const value = Number.parseInt(digits, 10);
  return thousands ? value * 1000 : value;
}

function uniqueStrings(values: string[]): string[] {
  const seen = new Set<string>();
  return values.filter((value) => {
    const key = value.toLowerCase();
    if (value.length === 0 || seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function isSentenceEnd(text: string, index: number): boolean {
  return text[index] === '.' && (index + 1 >= text.length || /\s/.test(text[index + 1]));
}

/**
 * The clause containing [start, end): bounded by `, ; ! ?`, a newline or a
 * sentence end, and by CONTEXT_WINDOW characters on each side.
 */
export function clauseAround(text: string, start: number, end: number): string {
  let left = start;
  const leftLimit = Math.max(0, start - CONTEXT_WINDOW);
  while (left > leftLimit) {
    const previous = left - 1;
    if (CLAUSE_DELIMITERS.has(text[previous]) || isSentenceEnd(text, previous)) break;
    left = previous;
  }

  let right = end;
  const rightLimit = Math.min(text.length, end + CONTEXT_WINDOW);
  while (right < rightLimit) {
    if (CLAUSE_DELIMITERS.has(text[right]) || isSentenceEnd(text, right)) break;
    right += 1;
  }

  return text.slice(left, right);
}

function freezeRequirement(requirement: JobRequirement): JobRequirement {
  Object.freeze(requirement.requiredSkills);
  Object.freeze(requirement.optionalSkills);
  Object.freeze(requirement.languages);
  Object.freeze(requirement.keywords);
  Object.freeze(requirement.salary);
  return Object.freeze(requirement);
}
