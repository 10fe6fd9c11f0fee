/**
 * File System Document Store
 *
 * Serves candidate documents from one directory. Plain text and markdown
 * are read as UTF-8, PDF through pdf-parse and DOCX through mammoth.
 */

import { promises as fs, type Dirent } from 'fs';
import * as path from 'path';
import pdf from 'pdf-parse';
import * as mammoth from 'mammoth';
import { CANDIDATE_EXTENSIONS } from '../../domain/entities/Document.js';
import { NotFoundError } from '../../domain/errors.js';
import type { DocumentStore } from '../../domain/repositories/DocumentStore.js';

export class FileSystemDocumentStore implements DocumentStore {
  constructor(private readonly rootDir: string) {}

  async list(extensions: readonly string[] = CANDIDATE_EXTENSIONS): Promise<string[]> {
    const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.rootDir, { withFileTypes: true });
    } catch (error) {
      if (isMissing(error)) {
        console.warn(`[DocumentStore] Directory not found: ${this.rootDir}`);
        return [];
      }
      throw error;
    }

    return entries
      .filter((entry) => entry.isFile() && wanted.has(path.extname(entry.name).toLowerCase()))
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));
  }

  async readText(name: string): Promise<string> {
    const buffer = await this.readFile(name);
    return buffer.toString('utf-8');
  }

  async readPdfText(name: string): Promise<string> {
    const buffer = await this.readFile(name);
    const result = await pdf(buffer);
    return result.text;
  }

  async readDocxText(name: string): Promise<string> {
    const buffer = await this.readFile(name);
    const result = await mammoth.extractRawText({ buffer });
    return result.value;
  }

  private async readFile(name: string): Promise<Buffer> {
    // Names never escape the root directory.
    const filePath = path.join(this.rootDir, path.basename(name));
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      if (isMissing(error)) {
        throw new NotFoundError('Document', name);
      }
      throw error;
    }
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
