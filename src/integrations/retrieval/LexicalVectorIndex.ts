/**
 * Lexical Vector Index - In-process retrieval over résumé chunks
 *
 * Documents are split into overlapping character windows, each window is
 * turned into a term-frequency vector, and queries are ranked by cosine
 * similarity. Implements both sides of the retrieval contract: the builder
 * used by index-build jobs and the search used by the candidate resolver.
 */

import { CollaboratorUnavailableError } from '../../domain/errors.js';
import type {
  IndexBuildProgress,
  IndexBuildResult,
  IndexBuilder,
  IndexDocument,
  RetrievalHit,
  RetrievalService,
} from './types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface LexicalVectorIndexConfig {
  chunkSize: number;
  chunkOverlap: number;
}

interface IndexedChunk {
  source: string;
  content: string;
  vector: Map<string, number>;
  norm: number;
}

const DEFAULT_CONFIG: LexicalVectorIndexConfig = {
  chunkSize: 1024,
  chunkOverlap: 128,
};

const PROGRESS = {
  splitting: 30,
  embeddingStart: 50,
  embeddingEnd: 90,
  finalizing: 90,
} as const;

// =============================================================================
// INDEX
// =============================================================================

export class LexicalVectorIndex implements RetrievalService, IndexBuilder {
  private config: LexicalVectorIndexConfig;
  private chunks: IndexedChunk[] = [];
  private built = false;

  constructor(config: Partial<LexicalVectorIndexConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.chunkOverlap >= this.config.chunkSize) {
      throw new RangeError('chunkOverlap must be smaller than chunkSize');
    }
  }

  get isBuilt(): boolean {
    return this.built;
  }

  get size(): number {
    return this.chunks.length;
  }

  async build(
    documents: IndexDocument[],
    onProgress?: (update: IndexBuildProgress) => void | Promise<void>
  ): Promise<IndexBuildResult> {
    const { chunkSize, chunkOverlap } = this.config;
    await onProgress?.({
      step: 'splitting',
      progress: PROGRESS.splitting,
      message: `Splitting ${documents.length} documents (chunk size ${chunkSize}, overlap ${chunkOverlap})`,
    });

    const chunks: IndexedChunk[] = [];
    const span = PROGRESS.embeddingEnd - PROGRESS.embeddingStart;

    for (const [index, document] of documents.entries()) {
      for (const content of splitText(document.text, chunkSize, chunkOverlap)) {
        const vector = termVector(content);
        chunks.push({ source: document.source, content, vector, norm: vectorNorm(vector) });
      }
      await onProgress?.({
        step: 'embedding',
        progress: PROGRESS.embeddingStart + Math.round((span * (index + 1)) / documents.length),
        message: `Indexed ${document.source} (${index + 1}/${documents.length})`,
      });
    }

    await onProgress?.({
      step: 'finalizing',
      progress: PROGRESS.finalizing,
      message: `Index ready with ${chunks.length} chunks`,
    });

    // Swap in one step so searches never see a half-built index.
    this.chunks = chunks;
    this.built = true;
    console.log(`[LexicalVectorIndex] Built ${chunks.length} chunks from ${documents.length} documents`);

    return { documents: documents.length, chunks: chunks.length };
  }

  async search(query: string, k: number): Promise<RetrievalHit[]> {
    if (!this.built) {
      throw new CollaboratorUnavailableError('Retrieval index', 'index has not been built');
    }

    const queryVector = termVector(query);
    const queryNorm = vectorNorm(queryVector);
    if (queryNorm === 0 || k <= 0) {
      return [];
    }

    return this.chunks
      .map((chunk) => ({
        source: chunk.source,
        content: chunk.content,
        similarityScore: cosine(queryVector, queryNorm, chunk.vector, chunk.norm),
      }))
      .filter((hit) => hit.similarityScore > 0)
      .sort((a, b) => b.similarityScore - a.similarityScore)
      .slice(0, k);
  }
}

// =============================================================================
// TEXT PROCESSING
// =============================================================================

/**
 * Overlapping windows of at most `chunkSize` characters. A window ends at
 * the last space in its second half when there is one.
 */
export function splitText(text: string, chunkSize: number, chunkOverlap: number): string[] {
  const clean = text.trim();
  if (clean.length === 0) return [];
  if (clean.length <= chunkSize) return [clean];

  const chunks: string[] = [];
  let start = 0;
  while (start < clean.length) {
    let end = Math.min(clean.length, start + chunkSize);
    if (end < clean.length) {
      const space = clean.lastIndexOf(' ', end);
      if (space > start + chunkSize / 2) {
        end = space;
      }
    }

    const chunk = clean.slice(start, end).trim();
    if (chunk.length > 0) chunks.push(chunk);
    if (end >= clean.length) break;
    start = Math.max(end - chunkOverlap, start + 1);
  }
  return chunks;
}

export function termVector(text: string): Map<string, number> {
  const vector = new Map<string, number>();
  for (const [term] of text.toLowerCase().matchAll(/[\p{L}\p{N}+#]{2,}/gu)) {
    vector.set(term, (vector.get(term) ?? 0) + 1);
  }
  return vector;
}

function vectorNorm(vector: Map<string, number>): number {
  let sum = 0;
  for (const value of vector.values()) sum += value * value;
  return Math.sqrt(sum);
}

function cosine(a: Map<string, number>, normA: number, b: Map<string, number>, normB: number): number {
  if (normA === 0 || normB === 0) return 0;
  let dot = 0;
  for (const [term, weight] of a) {
    const other = b.get(term);
    if (other !== undefined) dot += weight * other;
  }
  return dot / (normA * normB);
}
