import { createHash } from 'crypto';
import type { Embedder } from './embedder';

const TOKEN_PATTERN = /[a-z0-9_]+/g;

/**
 * In-process embedder based on signed feature hashing: every lower-cased
 * alphanumeric token is hashed into one of `dims` buckets, counts are
 * accumulated and the result is L2-normalized. Texts sharing tokens get
 * similar vectors, so it is usable for keyword-level retrieval without a
 * network round-trip. Deterministic for a given (model, dims).
 */
export class LocalHashEmbedder implements Embedder {
  constructor(
    private readonly dimensions: number = 384,
    private readonly model: string = 'feature',
  ) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  dims(): number {
    return this.dimensions;
  }

  id(): string {
    return `local-hash:${this.model}:${this.dimensions}`;
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().match(TOKEN_PATTERN) ?? []) {
      const digest = createHash('sha256').update(`${this.model}\u0000${token}`).digest();
      const bucket = digest.readUInt32BE(0) % this.dimensions;
      const sign = (digest.readUInt8(4) & 1) === 0 ? 1 : -1;
      vector[bucket] = (vector[bucket] ?? 0) + sign;
    }
    return l2Normalize(vector);
  }
}

function l2Normalize(arr: number[]): number[] {
  const norm = Math.sqrt(arr.reduce((sum, val) => sum + val * val, 0));
  if (norm === 0) {
    return arr;
  }
  return arr.map((val) => val / norm);
}
