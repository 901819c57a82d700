import { ConfigError, ModelMismatchError } from '@logkb/shared';
import type { Chunk, IndexEntry, SearchHit } from '../types';
import { InMemoryVectorSource } from './vector-source';
import type { VectorSource } from './vector-source';

/**
 * Cosine similarity of two equal-length vectors; 0 when either has zero norm.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

interface Candidate {
  index: number;
  score: number;
}

/** Higher score first; equal scores keep insertion order. */
function ranksBefore(a: Candidate, b: Candidate): boolean {
  return a.score > b.score || (a.score === b.score && a.index < b.index);
}

/**
 * Keeps the k best candidates seen so far. The root is the worst of them, so
 * a new candidate only has to beat the root to get in.
 */
class BoundedHeap {
  private items: Candidate[] = [];

  constructor(readonly capacity: number) {}

  push(candidate: Candidate): void {
    const root = this.items[0];
    if (this.items.length < this.capacity) {
      this.items.push(candidate);
      this.bubbleUp(this.items.length - 1);
    } else if (root && ranksBefore(candidate, root)) {
      this.items[0] = candidate;
      this.bubbleDown(0);
    }
  }

  sorted(): Candidate[] {
    return [...this.items].sort((a, b) => (ranksBefore(a, b) ? -1 : ranksBefore(b, a) ? 1 : 0));
  }

  /** True when `items[i]` should sit above `items[j]`, i.e. ranks worse. */
  private worse(i: number, j: number): boolean {
    const a = this.items[i];
    const b = this.items[j];
    return a !== undefined && b !== undefined && ranksBefore(b, a);
  }

  private swap(i: number, j: number): void {
    const a = this.items[i];
    const b = this.items[j];
    if (a === undefined || b === undefined) return;
    this.items[i] = b;
    this.items[j] = a;
  }

  private bubbleUp(i: number): void {
    while (i > 0) {
      const parent = Math.floor((i - 1) / 2);
      if (!this.worse(i, parent)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private bubbleDown(i: number): void {
    for (;;) {
      const left = 2 * i + 1;
      const right = 2 * i + 2;
      let worst = i;
      if (left < this.items.length && this.worse(left, worst)) worst = left;
      if (right < this.items.length && this.worse(right, worst)) worst = right;
      if (worst === i) break;
      this.swap(i, worst);
      i = worst;
    }
  }
}

/**
 * Ordered (chunk, vector) pairs under a single embedding model. Positions are
 * stable: entry `i` of the chunk list owns row `i` of the vector source.
 *
 * Search is exact: every stored vector is scored against the query.
 */
export class VectorIndex {
  private source: VectorSource;
  private readonly chunks: Chunk[];

  constructor(
    readonly modelId: string,
    readonly dimensions: number,
    chunks: Chunk[],
    source: VectorSource,
  ) {
    if (source.dimensions !== dimensions || source.size !== chunks.length) {
      throw new ModelMismatchError(
        `Vector source holds ${source.size} vectors of dimension ${source.dimensions}, ` +
          `expected ${chunks.length} of dimension ${dimensions}`,
      );
    }
    this.chunks = chunks;
    this.source = source;
  }

  /** A new index replacing whatever came before (full rebuild). */
  static build(modelId: string, dimensions: number, entries: Iterable<IndexEntry>): VectorIndex {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new ConfigError(`Index dimension must be a positive integer, got ${dimensions}`);
    }
    const index = new VectorIndex(modelId, dimensions, [], new InMemoryVectorSource(dimensions));
    index.append(entries, modelId);
    return index;
  }

  get size(): number {
    return this.chunks.length;
  }

  chunk(index: number): Chunk {
    const chunk = this.chunks[index];
    if (!chunk) {
      throw new RangeError(`Chunk index ${index} out of range [0, ${this.chunks.length})`);
    }
    return chunk;
  }

  vector(index: number): Float32Array {
    return this.source.get(index);
  }

  allChunks(): readonly Chunk[] {
    return this.chunks;
  }

  /**
   * Adds entries after the existing ones. Every vector must match the index
   * dimension and, when given, `modelId` must match the index model.
   * Validation runs before anything is added.
   */
  append(entries: Iterable<IndexEntry>, modelId: string = this.modelId): void {
    if (modelId !== this.modelId) {
      throw new ModelMismatchError(
        `Cannot append vectors from model "${modelId}" to an index built with "${this.modelId}"`,
      );
    }
    const batch = [...entries];
    for (const { chunk, vector } of batch) {
      if (vector.length !== this.dimensions) {
        throw new ModelMismatchError(
          `Vector for chunk ${chunk.chunkId} has dimension ${vector.length}, index "${this.modelId}" expects ${this.dimensions}`,
        );
      }
    }
    if (batch.length === 0) return;

    const target = this.writableSource();
    for (const { chunk, vector } of batch) {
      target.push(vector);
      this.chunks.push(chunk);
    }
  }

  /**
   * The `k` entries most similar to `query` by cosine similarity, best first.
   * Equal scores keep insertion order.
   */
  search(query: ArrayLike<number>, k: number): SearchHit[] {
    if (!Number.isInteger(k) || k <= 0) {
      throw new ConfigError(`k must be a positive integer, got ${k}`);
    }
    if (this.size === 0) {
      return [];
    }
    if (query.length !== this.dimensions) {
      throw new ModelMismatchError(
        `Query vector has dimension ${query.length}, index "${this.modelId}" expects ${this.dimensions}`,
      );
    }

    const heap = new BoundedHeap(Math.min(k, this.size));
    for (let i = 0; i < this.size; i++) {
      heap.push({ index: i, score: cosineSimilarity(query, this.source.get(i)) });
    }
    return heap.sorted().map(({ index, score }) => ({ ...this.chunk(index), score }));
  }

  close(): void {
    this.source.close();
  }

  /** File-backed sources are read-only; appending copies them into memory first. */
  private writableSource(): InMemoryVectorSource {
    if (this.source instanceof InMemoryVectorSource) {
      return this.source;
    }
    const copy = InMemoryVectorSource.from(this.source);
    this.source.close();
    this.source = copy;
    return copy;
  }
}
