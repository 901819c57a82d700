/**
 * A small LRU (Least Recently Used) cache over a Map, whose iteration order is
 * insertion order. The least recently used entry is evicted once the cache
 * exceeds `maxSize`; `onEvict` sees every entry that leaves through eviction.
 */
export class LRUCache<K, V> {
  private cache: Map<K, V>;
  private readonly maxSize: number;
  private readonly onEvict?: (key: K, value: V) => void;

  constructor(maxSize: number, options: { onEvict?: (key: K, value: V) => void } = {}) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new Error('LRU cache maxSize must be a positive integer');
    }
    this.maxSize = maxSize;
    this.onEvict = options.onEvict;
    this.cache = new Map();
  }

  get(key: K): V | undefined {
    if (!this.cache.has(key)) {
      return undefined;
    }
    const value = this.cache.get(key);
    // Re-insert to mark as most recently used
    this.cache.delete(key);
    if (value !== undefined) {
      this.cache.set(key, value);
    }
    return value;
  }

  has(key: K): boolean {
    return this.cache.has(key);
  }

  set(key: K, value: V): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    } else if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.entries().next();
      if (!oldest.done) {
        const [oldestKey, oldestValue] = oldest.value;
        this.cache.delete(oldestKey);
        this.onEvict?.(oldestKey, oldestValue);
      }
    }
    this.cache.set(key, value);
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  /** Values from least to most recently used. */
  values(): V[] {
    return [...this.cache.values()];
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
