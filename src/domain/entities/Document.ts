/**
 * Document - A candidate document as handed to the evaluation pipeline
 */

export interface RawDocument {
  /** File name (basename) in the document store; unique within one run */
  sourceName: string;
  /** Full document text, never a retrieval chunk */
  text: string;
  /** Retrieval relevance; 1.0 when not retrieved semantically */
  similarity: number;
}

export type ResolutionTier = 'explicit' | 'semantic' | 'enumeration' | 'none';

export type RetrievalMode = 'semantic' | 'enumeration';

export interface ResolutionResult {
  documents: RawDocument[];
  tier: ResolutionTier;
  unmatchedIds: string[];
}

export const CANDIDATE_EXTENSIONS = ['.txt', '.md', '.pdf', '.docx'] as const;
