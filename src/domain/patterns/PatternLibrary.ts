/**
 * Pattern Library
 *
 * Versioned bundle of the keyword tables and regular expressions used by the
 * extractors and scorers. The default library is loaded from the JSON files
 * under ./data; tests and callers can build an alternative one with
 * `createPatternLibrary` and pass it to any extractor or scorer.
 */

import { z } from 'zod';
import { CONTRACT_TYPES } from '../entities/JobRequirement.js';
import { SkillVocabulary } from './SkillVocabulary.js';
import { buildTextPatterns, type TextPatterns } from './TextPatterns.js';
import skillsData from './data/skills.json';
import lexiconData from './data/lexicon.json';
import softSkillsData from './data/soft-skills.json';
import stopwordsData from './data/stopwords.json';

// =============================================================================
// TABLE SCHEMAS
// =============================================================================

const words = z.array(z.string().min(1));
const phrase = z.object({ phrase: z.string().min(1), display: z.string().min(1) });

const skillTableSchema = z.object({
  version: z.string(),
  skills: z.array(
    z.object({
      name: z.string().min(1),
      aliases: words,
      caseSensitiveAliases: words.optional(),
      core: z.boolean().optional(),
    })
  ),
});

const lexiconSchema = z.object({
  version: z.string(),
  jobTitles: z.array(phrase),
  seniority: z.object({ senior: words, junior: words, mid: words }),
  sectionMarkers: z.object({ required: words, optional: words, closing: words }),
  contextCues: z.object({ optional: words, required: words }),
  languages: z.record(words),
  locations: z.array(phrase),
  contracts: z.array(z.object({ type: z.enum(CONTRACT_TYPES), keywords: words })),
  resume: z.object({
    namePrefixes: words,
    sectionHeadings: words,
    experienceSections: words,
    educationSections: words,
    presentWords: words,
    degreeWords: words,
  }),
});

const softSkillLexiconSchema = z.object({
  version: z.string(),
  motivation: z.object({ positive: words, negative: words }),
  communication: z.object({
    salutations: words,
    closings: words,
    resumeSections: z.array(words),
  }),
  leadership: z.object({ keywords: words, titles: words }),
  tags: z.record(words),
});

const stopwordTableSchema = z.object({
  version: z.string(),
  stopwords: words,
});

export type SkillTable = z.infer<typeof skillTableSchema>;
export type Lexicon = z.infer<typeof lexiconSchema>;
export type SoftSkillLexicon = z.infer<typeof softSkillLexiconSchema>;

// =============================================================================
// LIBRARY
// =============================================================================

export interface PatternLibrary {
  readonly version: string;
  readonly vocabulary: SkillVocabulary;
  readonly lexicon: Lexicon;
  readonly softSkills: SoftSkillLexicon;
  readonly stopwords: ReadonlySet<string>;
  readonly patterns: TextPatterns;
}

export interface PatternTables {
  skills: unknown;
  lexicon: unknown;
  softSkills: unknown;
  stopwords: unknown;
}

/**
 * Validate raw tables and compile them. Throws a ZodError when a table does
 * not have the expected shape.
 */
export function createPatternLibrary(tables: PatternTables): PatternLibrary {
  const skills = skillTableSchema.parse(tables.skills);
  const lexicon = lexiconSchema.parse(tables.lexicon);
  const softSkills = softSkillLexiconSchema.parse(tables.softSkills);
  const stopwords = stopwordTableSchema.parse(tables.stopwords);

  return {
    version: [skills.version, lexicon.version, softSkills.version, stopwords.version].join('+'),
    vocabulary: new SkillVocabulary(skills.skills),
    lexicon,
    softSkills,
    stopwords: new Set(stopwords.stopwords.map((word) => word.toLowerCase())),
    patterns: buildTextPatterns(lexicon.resume.presentWords, lexicon.resume.degreeWords),
  };
}

let defaultLibrary: PatternLibrary | null = null;

export function getPatternLibrary(): PatternLibrary {
  if (!defaultLibrary) {
    defaultLibrary = createPatternLibrary({
      skills: skillsData,
      lexicon: lexiconData,
      softSkills: softSkillsData,
      stopwords: stopwordsData,
    });
  }
  return defaultLibrary;
}

/**
 * Canonical skill name, shared by every component that compares skills.
 */
export function normalizeSkill(name: string, library: PatternLibrary = getPatternLibrary()): string {
  return library.vocabulary.normalize(name);
}
