import type { Chunk, IndexEntry } from '../types';

/** A chunk with predictable fields, for index tests. */
export function makeChunk(id: string, text = `text of ${id}`, sourceFile = 'app.log'): Chunk {
  return {
    chunkId: id,
    sourceFile,
    lineStart: 1,
    lineEnd: 1,
    text,
    contentHash: `hash-${id}`,
    timestampRange: null,
  };
}

export function entries(vectors: Record<string, number[]>): IndexEntry[] {
  return Object.entries(vectors).map(([id, vector]) => ({ chunk: makeChunk(id), vector }));
}
