import { LRUCache } from '@logkb/shared';
import { hash } from 'ohash';
import type { EmbedOptions, Embedder } from './embedder';

/** Maximum number of single-text embeddings to keep (LRU eviction) */
const EMBEDDING_CACHE_MAX_SIZE = 500;

/**
 * Memoizes per-text embeddings in memory. Used on the query path, where the
 * same questions are asked repeatedly; builds go through the persistent
 * embedding cache instead.
 */
export class CachingEmbedder implements Embedder {
  private cache: LRUCache<string, number[]>;

  constructor(
    private readonly underlyingEmbedder: Embedder,
    maxSize: number = EMBEDDING_CACHE_MAX_SIZE,
  ) {
    this.cache = new LRUCache(maxSize);
  }

  async embedTexts(texts: string[], opts?: EmbedOptions): Promise<number[][]> {
    const keys = texts.map((text) => hash([this.underlyingEmbedder.id(), text]));
    const missing = new Map<string, string>();
    keys.forEach((key, i) => {
      const text = texts[i];
      if (text !== undefined && !this.cache.has(key)) {
        missing.set(key, text);
      }
    });

    const fresh = new Map<string, number[]>();
    if (missing.size > 0) {
      const embeddings = await this.underlyingEmbedder.embedTexts([...missing.values()], opts);
      [...missing.keys()].forEach((key, i) => {
        const vector = embeddings[i];
        if (vector) {
          fresh.set(key, vector);
          this.cache.set(key, vector);
        }
      });
    }

    return keys.map((key) => {
      const vector = fresh.get(key) ?? this.cache.get(key);
      if (!vector) {
        throw new Error(`Embedder ${this.id()} returned fewer vectors than requested`);
      }
      return vector;
    });
  }

  dims(): number {
    return this.underlyingEmbedder.dims();
  }

  id(): string {
    return this.underlyingEmbedder.id();
  }
}
