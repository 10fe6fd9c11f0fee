/**
 * Retrieval collaborators: similarity search over indexed résumé chunks,
 * and the builder that produces the index.
 */

export interface RetrievalHit {
  /** Path or file name of the document the chunk came from */
  source: string;
  content: string;
  similarityScore: number;
}

export interface RetrievalService {
  search(query: string, k: number): Promise<RetrievalHit[]>;
}

export interface IndexDocument {
  source: string;
  text: string;
}

export type IndexBuildStep = 'splitting' | 'embedding' | 'finalizing';

export interface IndexBuildProgress {
  step: IndexBuildStep;
  progress: number;
  message: string;
}

export interface IndexBuildResult {
  documents: number;
  chunks: number;
}

export interface IndexBuilder {
  build(
    documents: IndexDocument[],
    onProgress?: (update: IndexBuildProgress) => void | Promise<void>
  ): Promise<IndexBuildResult>;
}
