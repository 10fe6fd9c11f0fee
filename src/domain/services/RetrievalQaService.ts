/**
 * Retrieval QA Service - Free-text questions over the indexed résumés
 *
 * With an answer provider the retrieved chunks become the LLM context.
 * Without one, or when every provider fails, the chunks themselves are the
 * answer (retrieval-only mode).
 */

import { CollaboratorUnavailableError, ValidationError } from '../errors.js';
import { baseName } from '../repositories/DocumentStore.js';
import type { RetrievalHit, RetrievalService } from '../../integrations/retrieval/types.js';
import type { AnswerProvider } from '../../integrations/llm/AnswerProvider.js';

export type AnswerMode = 'llm' | 'retrieval_only';

export interface AnswerSource {
  source: string;
  excerpt: string;
  similarity: number;
}

export interface QueryAnswer {
  answer: string;
  mode: AnswerMode;
  provider?: string;
  sources: AnswerSource[];
  confidence: number;
}

export const NO_RELEVANT_DOCUMENTS = 'No relevant documents found.';

const EXCERPT_LENGTH = 200;
const DEFAULT_K = 10;

export class RetrievalQaService {
  constructor(
    private readonly retrieval: RetrievalService,
    private readonly provider: AnswerProvider | null = null
  ) {}

  async ask(question: string, k = DEFAULT_K): Promise<QueryAnswer> {
    const trimmed = question.trim();
    if (!trimmed) {
      throw new ValidationError('Question must not be empty');
    }

    const hits = await this.retrieval.search(trimmed, Math.max(1, Math.floor(k)));
    const sources = hits.map(toSource);
    const confidence = round3(
      sources.length > 0 ? sources.reduce((sum, s) => sum + s.similarity, 0) / sources.length : 0
    );

    if (hits.length === 0) {
      return { answer: NO_RELEVANT_DOCUMENTS, mode: 'retrieval_only', sources, confidence: 0 };
    }

    const excerpts = hits.map((hit) => hit.content).join('\n\n');

    if (this.provider) {
      // Each excerpt is labelled so the answer can cite its document.
      const context = hits.map((hit) => `[${baseName(hit.source)}]\n${hit.content}`).join('\n\n');
      try {
        const answer = await this.provider.answer(context, trimmed);
        return { answer, mode: 'llm', provider: this.provider.name, sources, confidence };
      } catch (error) {
        if (!(error instanceof CollaboratorUnavailableError)) {
          throw error;
        }
        console.warn(`[RetrievalQaService] ${error.message}; answering from retrieval only`);
      }
    }

    return { answer: excerpts, mode: 'retrieval_only', sources, confidence };
  }
}

function toSource(hit: RetrievalHit): AnswerSource {
  return {
    source: baseName(hit.source),
    excerpt: hit.content.length > EXCERPT_LENGTH ? `${hit.content.slice(0, EXCERPT_LENGTH)}...` : hit.content,
    similarity: round3(hit.similarityScore),
  };
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
