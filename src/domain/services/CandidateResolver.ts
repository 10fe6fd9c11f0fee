/**
 * Candidate Resolver - Which documents an evaluation run looks at
 *
 * Three tiers, each tried only when the previous one produced nothing:
 * 1. Explicit ids chosen by the recruiter
 * 2. Semantic search through the retrieval service
 * 3. Enumeration of the document store
 *
 * Every tier returns full document text (never retrieval chunks), unique by
 * source name, capped at `limit`.
 */

import {
  CANDIDATE_EXTENSIONS,
  type RawDocument,
  type ResolutionResult,
  type ResolutionTier,
  type RetrievalMode,
} from '../entities/Document.js';
import type { JobRequirement } from '../entities/JobRequirement.js';
import { UNSPECIFIED } from '../entities/JobRequirement.js';
import { errorMessage } from '../errors.js';
import { baseName, readDocument, stemOf, type DocumentStore } from '../repositories/DocumentStore.js';
import type { RetrievalHit, RetrievalService } from '../../integrations/retrieval/types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ResolveRequest {
  requirement: JobRequirement;
  mode: RetrievalMode;
  explicitIds?: string[];
  limit: number;
}

export interface CandidateResolverConfig {
  extensions: readonly string[];
  /** Query used when the requirement has neither title nor required skills */
  fallbackQuery: string;
  querySkillCount: number;
}

const DEFAULT_CONFIG: CandidateResolverConfig = {
  extensions: CANDIDATE_EXTENSIONS,
  fallbackQuery: 'candidate CV',
  querySkillCount: 3,
};

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;

// =============================================================================
// RESOLVER
// =============================================================================

export class CandidateResolver {
  private config: CandidateResolverConfig;

  constructor(
    private readonly store: DocumentStore,
    private readonly retrieval: RetrievalService | null = null,
    config: Partial<CandidateResolverConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async resolve(request: ResolveRequest): Promise<ResolutionResult> {
    const limit = Math.max(0, Math.floor(request.limit));
    const ids = (request.explicitIds ?? []).map((id) => id.trim()).filter((id) => id.length > 0);
    let unmatchedIds: string[] = [];

    if (limit === 0) {
      return { documents: [], tier: 'none', unmatchedIds: ids };
    }

    if (ids.length > 0) {
      const explicit = await this.resolveExplicit(ids, limit);
      unmatchedIds = explicit.unmatchedIds;
      if (explicit.documents.length > 0) {
        return this.result(explicit.documents, 'explicit', unmatchedIds);
      }
    }

    if (request.mode === 'semantic' && this.retrieval) {
      const semantic = await this.resolveSemantic(this.retrieval, request.requirement, limit);
      if (semantic.length > 0) {
        return this.result(semantic, 'semantic', unmatchedIds);
      }
    }

    const enumerated = await this.resolveEnumeration(limit);
    return this.result(enumerated, enumerated.length > 0 ? 'enumeration' : 'none', unmatchedIds);
  }

  buildQuery(requirement: JobRequirement): string {
    const parts: string[] = [];
    if (requirement.title && requirement.title !== UNSPECIFIED) {
      parts.push(requirement.title);
    }
    parts.push(...requirement.requiredSkills.slice(0, this.config.querySkillCount));
    return parts.length > 0 ? parts.join(' ') : this.config.fallbackQuery;
  }

  // ===========================================================================
  // TIERS
  // ===========================================================================

  private async resolveExplicit(
    ids: string[],
    limit: number
  ): Promise<{ documents: RawDocument[]; unmatchedIds: string[] }> {
    const names = await this.store.list(this.config.extensions);
    const texts = new Map<string, string | null>();
    const readOnce = async (name: string): Promise<string | null> => {
      if (!texts.has(name)) {
        texts.set(name, await this.tryRead(name));
      }
      return texts.get(name) ?? null;
    };

    const documents: RawDocument[] = [];
    const unmatchedIds: string[] = [];
    const taken = new Set<string>();

    for (const id of ids) {
      if (documents.length >= limit) break;

      const name = this.matchByName(names, id) ?? (await this.matchByEmail(names, id, readOnce));
      if (!name) {
        console.warn(`[CandidateResolver] No document matches id "${id}"`);
        unmatchedIds.push(id);
        continue;
      }
      if (taken.has(name)) continue;

      const text = await readOnce(name);
      if (text === null) {
        unmatchedIds.push(id);
        continue;
      }
      taken.add(name);
      documents.push({ sourceName: name, text, similarity: 1.0 });
    }

    return { documents, unmatchedIds };
  }

  private matchByName(names: string[], id: string): string | undefined {
    const lower = id.toLowerCase();
    return (
      names.find((name) => stemOf(name) === id) ??
      names.find((name) => name.toLowerCase() === lower || stemOf(name).toLowerCase() === lower) ??
      names.find((name) => name.toLowerCase().startsWith(lower))
    );
  }

  private async matchByEmail(
    names: string[],
    id: string,
    readOnce: (name: string) => Promise<string | null>
  ): Promise<string | undefined> {
    const lower = id.toLowerCase();
    for (const name of names) {
      const text = await readOnce(name);
      const localPart = text?.match(EMAIL_PATTERN)?.[0].split('@')[0].toLowerCase();
      if (localPart && localPart.includes(lower)) {
        return name;
      }
    }
    return undefined;
  }

  private async resolveSemantic(
    retrieval: RetrievalService,
    requirement: JobRequirement,
    limit: number
  ): Promise<RawDocument[]> {
    const query = this.buildQuery(requirement);
    let hits: RetrievalHit[];
    try {
      // Over-fetch: several hits may be chunks of the same document.
      hits = await retrieval.search(query, 2 * limit);
    } catch (error) {
      console.warn(`[CandidateResolver] Semantic tier failed: ${errorMessage(error)}`);
      return [];
    }

    const documents: RawDocument[] = [];
    const seen = new Set<string>();
    for (const hit of hits) {
      if (documents.length >= limit) break;
      const name = baseName(hit.source);
      if (seen.has(name)) continue;
      seen.add(name);

      const text = await this.tryRead(name);
      if (text !== null) {
        documents.push({ sourceName: name, text, similarity: hit.similarityScore });
      }
    }

    console.log(`[CandidateResolver] Semantic tier: ${hits.length} hits -> ${documents.length} documents`);
    return documents;
  }

  private async resolveEnumeration(limit: number): Promise<RawDocument[]> {
    const documents: RawDocument[] = [];
    for (const name of await this.store.list(this.config.extensions)) {
      if (documents.length >= limit) break;
      const text = await this.tryRead(name);
      if (text !== null) {
        documents.push({ sourceName: name, text, similarity: 1.0 });
      }
    }
    return documents;
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private async tryRead(name: string): Promise<string | null> {
    try {
      return await readDocument(this.store, name);
    } catch (error) {
      console.warn(`[CandidateResolver] Skipping unreadable document ${name}: ${errorMessage(error)}`);
      return null;
    }
  }

  private result(documents: RawDocument[], tier: ResolutionTier, unmatchedIds: string[]): ResolutionResult {
    return { documents, tier, unmatchedIds };
  }
}
