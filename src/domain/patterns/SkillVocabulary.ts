/**
 * Skill Vocabulary
 *
 * The one place skill identity is decided. Extractors scan text with
 * `findMentions`, and every comparison between a requirement skill and a
 * candidate skill goes through `skillKey` / `skillsMatch`.
 */

import { escapeRegExp } from './matching.js';

// =============================================================================
// TYPES
// =============================================================================

export interface SkillDefinition {
  name: string;
  aliases: string[];
  caseSensitiveAliases?: string[];
  core?: boolean;
}

export interface SkillMention {
  skill: string;
  index: number;
  length: number;
}

interface CompiledSkill {
  name: string;
  patterns: RegExp[];
}

// =============================================================================
// NORMALIZATION
// =============================================================================

const SEPARATORS = /[\s\-_./]+/g;
const LEFT_BOUNDARY = '(?<![\\p{L}\\p{N}_])';
const RIGHT_BOUNDARY = '(?![\\p{L}\\p{N}_+#&])';

/**
 * Comparison key: lower case with `-`, `_`, `.`, `/` and runs of whitespace
 * collapsed to a single space. "Scikit-learn" -> "scikit learn".
 */
export function skillKey(name: string): string {
  return name.toLowerCase().replace(SEPARATORS, ' ').trim();
}

function compactKey(name: string): string {
  return skillKey(name).replace(/ /g, '');
}

function aliasPattern(alias: string): string {
  return alias
    .split(SEPARATORS)
    .filter((token) => token.length > 0)
    .map(escapeRegExp)
    .join('[\\s\\-_./]?');
}

function compile(aliases: string[], flags: string): RegExp | null {
  if (aliases.length === 0) return null;
  const alternatives = [...aliases]
    .sort((a, b) => b.length - a.length)
    .map(aliasPattern)
    .join('|');
  return new RegExp(`${LEFT_BOUNDARY}(?:${alternatives})${RIGHT_BOUNDARY}`, flags);
}

// =============================================================================
// VOCABULARY
// =============================================================================

export class SkillVocabulary {
  private readonly definitions: SkillDefinition[];
  private readonly compiled: CompiledSkill[];
  private readonly canonicalByKey = new Map<string, string>();
  private readonly coreKeys = new Set<string>();
  private readonly extraTermCache = new Map<string, CompiledSkill>();

  constructor(definitions: SkillDefinition[]) {
    this.definitions = definitions;
    this.compiled = definitions.map((definition) => {
      const patterns: RegExp[] = [];
      const insensitive = compile([definition.name, ...definition.aliases], 'giu');
      if (insensitive) patterns.push(insensitive);
      const sensitive = compile(definition.caseSensitiveAliases ?? [], 'gu');
      if (sensitive) patterns.push(sensitive);
      return { name: definition.name, patterns };
    });

    for (const definition of definitions) {
      const names = [
        definition.name,
        ...definition.aliases,
        ...(definition.caseSensitiveAliases ?? []),
      ];
      for (const name of names) {
        this.canonicalByKey.set(skillKey(name), definition.name);
        this.canonicalByKey.set(compactKey(name), definition.name);
      }
      if (definition.core) {
        this.coreKeys.add(skillKey(definition.name));
      }
    }
  }

  get size(): number {
    return this.definitions.length;
  }

  /**
   * Canonical display name for any alias; unknown skills come back trimmed
   * with inner whitespace collapsed.
   */
  normalize(name: string): string {
    const trimmed = name.trim().replace(/\s+/g, ' ');
    return (
      this.canonicalByKey.get(skillKey(trimmed)) ??
      this.canonicalByKey.get(compactKey(trimmed)) ??
      trimmed
    );
  }

  isKnown(name: string): boolean {
    return this.canonicalByKey.has(skillKey(name)) || this.canonicalByKey.has(compactKey(name));
  }

  isCore(name: string): boolean {
    return this.coreKeys.has(skillKey(this.normalize(name)));
  }

  /**
   * Every occurrence of every vocabulary skill (plus optional extra terms
   * that are not in the vocabulary), sorted by offset.
   */
  findMentions(text: string, extraTerms: readonly string[] = []): SkillMention[] {
    const mentions: SkillMention[] = [];
    const skills = [...this.compiled, ...this.compileExtraTerms(extraTerms)];

    for (const skill of skills) {
      for (const pattern of skill.patterns) {
        for (const match of text.matchAll(pattern)) {
          if (match.index === undefined) continue;
          mentions.push({ skill: skill.name, index: match.index, length: match[0].length });
        }
      }
    }

    return mentions.sort((a, b) => a.index - b.index);
  }

  /**
   * Distinct canonical skills present in the text, in vocabulary order.
   */
  extract(text: string, extraTerms: readonly string[] = []): string[] {
    const found = new Set(this.findMentions(text, extraTerms).map((mention) => mention.skill));
    const ordered = [...this.compiled, ...this.compileExtraTerms(extraTerms)]
      .map((skill) => skill.name)
      .filter((name) => found.has(name));
    return uniqueSkills(ordered);
  }

  private compileExtraTerms(terms: readonly string[]): CompiledSkill[] {
    const result: CompiledSkill[] = [];
    for (const term of terms) {
      const name = this.normalize(term);
      if (name.length === 0 || this.isKnown(name)) continue;
      let compiled = this.extraTermCache.get(name);
      if (!compiled) {
        const pattern = compile([name], 'giu');
        compiled = { name, patterns: pattern ? [pattern] : [] };
        this.extraTermCache.set(name, compiled);
      }
      result.push(compiled);
    }
    return result;
  }
}

// =============================================================================
// SET OPERATIONS
// =============================================================================

/**
 * De-duplicate by skill key, keeping the first spelling seen.
 */
export function uniqueSkills(skills: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const skill of skills) {
    const key = skillKey(skill);
    if (key.length === 0 || seen.has(key)) continue;
    seen.add(key);
    result.push(skill);
  }
  return result;
}

export function withoutSkills(skills: readonly string[], excluded: readonly string[]): string[] {
  const excludedKeys = new Set(excluded.map(skillKey));
  return skills.filter((skill) => !excludedKeys.has(skillKey(skill)));
}

function tokens(key: string): string[] {
  return key.split(' ').filter((token) => token.length >= 2);
}

/**
 * Whether a candidate skill satisfies a wanted skill. Both sides are
 * expected in canonical form. Checks, in order: exact key, substring either
 * way (shorter key of at least 3 characters), then shared words for
 * multi-word skills (at least `min(2, words - 1)` of them).
 */
export function skillsMatch(wanted: string, candidate: string): boolean {
  const a = skillKey(wanted);
  const b = skillKey(candidate);
  if (a.length === 0 || b.length === 0) return false;
  if (a === b) return true;

  const shorter = a.length <= b.length ? a : b;
  if (shorter.length >= 3 && (a.includes(b) || b.includes(a))) {
    return true;
  }

  const wantedTokens = tokens(a);
  const words = a.split(' ').length;
  if (words < 2) return false;
  const candidateTokens = new Set(tokens(b));
  const shared = wantedTokens.filter((token) => candidateTokens.has(token)).length;
  return shared >= Math.min(2, words - 1);
}

export function findMatch(wanted: string, candidateSkills: readonly string[]): string | undefined {
  return candidateSkills.find((candidate) => skillsMatch(wanted, candidate));
}

export interface SkillCoverage {
  matched: string[];
  missing: string[];
  /** matched / wanted, 0 when nothing is wanted */
  ratio: number;
}

export function skillCoverage(wanted: readonly string[], candidateSkills: readonly string[]): SkillCoverage {
  const matched: string[] = [];
  const missing: string[] = [];
  for (const skill of wanted) {
    if (findMatch(skill, candidateSkills) !== undefined) {
      matched.push(skill);
    } else {
      missing.push(skill);
    }
  }
  return { matched, missing, ratio: wanted.length > 0 ? matched.length / wanted.length : 0 };
}
