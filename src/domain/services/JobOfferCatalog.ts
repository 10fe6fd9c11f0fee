/**
 * Job Offer Catalog - Job descriptions kept as files beside the résumés
 *
 * Offers are addressed by file name or by stem, so `data-engineer` and
 * `data-engineer.pdf` name the same offer. The text an offer returns is what
 * a caller then submits as an evaluation's job text.
 */

import { CANDIDATE_EXTENSIONS } from '../entities/Document.js';
import { NotFoundError } from '../errors.js';
import { readDocument, stemOf, type DocumentStore } from '../repositories/DocumentStore.js';

export interface JobOfferSummary {
  id: string;
  fileName: string;
  type: string;
}

export interface JobOffer extends JobOfferSummary {
  content: string;
}

export interface JobOfferCatalogConfig {
  extensions: readonly string[];
}

const DEFAULT_CONFIG: JobOfferCatalogConfig = {
  extensions: CANDIDATE_EXTENSIONS,
};

export class JobOfferCatalog {
  private config: JobOfferCatalogConfig;

  constructor(
    private readonly store: DocumentStore,
    config: Partial<JobOfferCatalogConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async list(): Promise<JobOfferSummary[]> {
    const names = await this.store.list(this.config.extensions);
    return names.map(summarize);
  }

  async get(id: string): Promise<JobOffer> {
    const names = await this.store.list(this.config.extensions);
    // An exact file name wins over a stem shared by several files.
    const name = names.find((candidate) => candidate === id) ?? names.find((candidate) => stemOf(candidate) === id);
    if (!name) {
      throw new NotFoundError('Job offer', id);
    }

    return { ...summarize(name), content: await readDocument(this.store, name) };
  }
}

function summarize(fileName: string): JobOfferSummary {
  const stem = stemOf(fileName);
  return {
    id: stem,
    fileName,
    type: fileName.slice(stem.length + 1).toLowerCase(),
  };
}
