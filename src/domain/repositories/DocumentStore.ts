/**
 * Document Store - Read access to the candidate document collection
 *
 * Documents are addressed by file name relative to the store root.
 */

import * as path from 'path';

export interface DocumentStore {
  /** File names with one of the given extensions, sorted */
  list(extensions?: readonly string[]): Promise<string[]>;
  readText(name: string): Promise<string>;
  readPdfText(name: string): Promise<string>;
  readDocxText(name: string): Promise<string>;
}

/**
 * Read a document with the reader matching its extension.
 */
export async function readDocument(store: DocumentStore, name: string): Promise<string> {
  switch (path.extname(name).toLowerCase()) {
    case '.pdf':
      return store.readPdfText(name);
    case '.docx':
      return store.readDocxText(name);
    default:
      return store.readText(name);
  }
}

/**
 * File name without directories, for either path separator.
 */
export function baseName(source: string): string {
  const parts = source.split(/[\\/]/);
  return parts[parts.length - 1] ?? source;
}

export function stemOf(name: string): string {
  const ext = path.extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}
