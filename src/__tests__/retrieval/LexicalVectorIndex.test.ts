/**
 * Lexical Vector Index Tests
 */

import { describe, it, expect } from '@jest/globals';
import { CollaboratorUnavailableError } from '../../domain/errors.js';
import {
  LexicalVectorIndex,
  splitText,
  termVector,
} from '../../integrations/retrieval/LexicalVectorIndex.js';
import type { IndexBuildProgress } from '../../integrations/retrieval/types.js';

const DOCUMENTS = [
  { source: 'raw/jane.doe.txt', text: 'Python developer' },
  { source: 'raw/paul.martin.txt', text: 'Java Kubernetes Docker' },
];

describe('LexicalVectorIndex', () => {
  it('should refuse searches before the index is built', async () => {
    const index = new LexicalVectorIndex();

    expect(index.isBuilt).toBe(false);
    await expect(index.search('python', 5)).rejects.toBeInstanceOf(CollaboratorUnavailableError);
  });

  it('should reject an overlap as large as the chunk size', () => {
    expect(() => new LexicalVectorIndex({ chunkSize: 100, chunkOverlap: 100 })).toThrow(RangeError);
  });

  it('should report build progress by step', async () => {
    const index = new LexicalVectorIndex();
    const updates: IndexBuildProgress[] = [];

    const result = await index.build(DOCUMENTS, (update) => {
      updates.push(update);
    });

    expect(result).toEqual({ documents: 2, chunks: 2 });
    expect(updates.map((u) => [u.step, u.progress])).toEqual([
      ['splitting', 30],
      ['embedding', 70],
      ['embedding', 90],
      ['finalizing', 90],
    ]);
    expect(updates[1].message).toBe('Indexed raw/jane.doe.txt (1/2)');
    expect(updates[3].message).toBe('Index ready with 2 chunks');
  });

  it('should rank chunks by cosine similarity', async () => {
    const index = new LexicalVectorIndex();
    await index.build(DOCUMENTS);

    const hits = await index.search('Python', 5);

    expect(hits).toHaveLength(1);
    expect(hits[0].source).toBe('raw/jane.doe.txt');
    expect(hits[0].content).toBe('Python developer');
    expect(hits[0].similarityScore).toBeCloseTo(Math.SQRT1_2);
  });

  it('should return nothing for queries without terms', async () => {
    const index = new LexicalVectorIndex();
    await index.build(DOCUMENTS);

    await expect(index.search('?', 5)).resolves.toEqual([]);
    await expect(index.search('python', 0)).resolves.toEqual([]);
    await expect(index.search('rust', 5)).resolves.toEqual([]);
  });

  it('should replace the previous index on rebuild', async () => {
    const index = new LexicalVectorIndex();
    await index.build(DOCUMENTS);
    await index.build([{ source: 'raw/ana.lopez.txt', text: 'Rust engineer' }]);

    expect(index.size).toBe(1);
    await expect(index.search('python', 5)).resolves.toEqual([]);
    expect((await index.search('rust', 5)).map((hit) => hit.source)).toEqual(['raw/ana.lopez.txt']);
  });
});

describe('splitText', () => {
  it('should keep short text whole', () => {
    expect(splitText('  short text  ', 100, 10)).toEqual(['short text']);
    expect(splitText('   ', 100, 10)).toEqual([]);
  });

  it('should split on spaces with overlap', () => {
    expect(splitText('aaaa bbbb cccc dddd', 10, 2)).toEqual(['aaaa bbbb', 'bb cccc', 'cc dddd']);
  });
});

describe('termVector', () => {
  it('should count lowercase terms and keep symbols used in skill names', () => {
    expect([...termVector('C++ and C# and c++')]).toEqual([
      ['c++', 2],
      ['and', 2],
      ['c#', 1],
    ]);
  });
});
