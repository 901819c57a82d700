import { LRUCache } from './lru-cache';

describe('LRUCache', () => {
  it('throws for invalid maxSize', () => {
    expect(() => new LRUCache(0)).toThrow(/maxSize/i);
    expect(() => new LRUCache(1.5)).toThrow(/maxSize/i);
  });

  it('gets, sets, evicts the least recently used entry, and tracks size', () => {
    const cache = new LRUCache<string, number>(2);

    cache.set('a', 1);
    cache.set('b', 2);
    expect(cache.size).toBe(2);

    // Touch "a" so "b" becomes the eviction candidate.
    expect(cache.get('a')).toBe(1);

    cache.set('c', 3);
    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
    expect(cache.has('c')).toBe(true);
  });

  it('reports evicted entries to onEvict', () => {
    const evicted: Array<[string, number]> = [];
    const cache = new LRUCache<string, number>(1, {
      onEvict: (key, value) => evicted.push([key, value]),
    });

    cache.set('a', 1);
    cache.set('a', 2);
    cache.set('b', 3);

    expect(evicted).toEqual([['a', 2]]);
  });

  it('deletes entries without calling onEvict and lists values by recency', () => {
    const onEvict = vi.fn();
    const cache = new LRUCache<string, number>(3, { onEvict });
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('c', 3);
    cache.get('a');

    expect(cache.delete('b')).toBe(true);
    expect(cache.delete('missing')).toBe(false);
    expect(cache.values()).toEqual([3, 1]);
    expect(onEvict).not.toHaveBeenCalled();
  });

  it('clears', () => {
    const cache = new LRUCache<string, number>(2);
    cache.set('a', 1);
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.get('a')).toBeUndefined();
  });
});
