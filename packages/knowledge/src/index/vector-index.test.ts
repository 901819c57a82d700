import { ConfigError, ModelMismatchError } from '@logkb/shared';
import { entries, makeChunk } from '../testing/fixtures';
import { VectorIndex, cosineSimilarity } from './vector-index';

const MODEL = 'test:unit:2';

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors, 0 for orthogonal ones and 0 against a zero vector', () => {
    expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });
});

describe('VectorIndex', () => {
  it('returns the closest vectors best first, the exact match scoring 1', () => {
    const index = VectorIndex.build(MODEL, 2, entries({ a: [1, 0], b: [0, 1], c: [0.9, 0.1] }));

    const hits = index.search([1, 0], 2);

    expect(hits.map((h) => h.chunkId)).toEqual(['a', 'c']);
    expect(hits[0]?.score).toBe(1);
    expect(hits[1]?.score).toBeCloseTo(0.9 / Math.sqrt(0.82), 6);
    expect(hits[0]).toMatchObject({ sourceFile: 'app.log', text: 'text of a' });
  });

  it('breaks ties by insertion order', () => {
    const index = VectorIndex.build(MODEL, 2, entries({ first: [1, 0], second: [2, 0], third: [3, 0] }));
    expect(index.search([1, 0], 2).map((h) => h.chunkId)).toEqual(['first', 'second']);
    expect(index.search([4, 0], 3).map((h) => h.chunkId)).toEqual(['first', 'second', 'third']);
  });

  it('returns every entry when k exceeds the size', () => {
    const index = VectorIndex.build(MODEL, 2, entries({ a: [1, 0], b: [0, 1], c: [-1, 0] }));
    expect(index.search([0, 1], 10).map((h) => h.chunkId)).toEqual(['b', 'a', 'c']);
  });

  it('returns an empty result for an empty index', () => {
    const index = VectorIndex.build(MODEL, 2, []);
    expect(index.size).toBe(0);
    expect(index.search([1, 0], 5)).toEqual([]);
  });

  it.each([0, -1, 1.5])('rejects k = %s', (k) => {
    const index = VectorIndex.build(MODEL, 2, entries({ a: [1, 0] }));
    expect(() => index.search([1, 0], k)).toThrow(ConfigError);
  });

  it('rejects a query of the wrong dimension', () => {
    const index = VectorIndex.build(MODEL, 2, entries({ a: [1, 0] }));
    expect(() => index.search([1, 0, 0], 1)).toThrow(ModelMismatchError);
  });

  it('appends entries after the existing ones', () => {
    const index = VectorIndex.build(MODEL, 2, entries({ a: [1, 0] }));
    index.append([{ chunk: makeChunk('b'), vector: [0, 1] }]);

    expect(index.size).toBe(2);
    expect(index.allChunks().map((c) => c.chunkId)).toEqual(['a', 'b']);
    expect(Array.from(index.vector(1))).toEqual([0, 1]);
  });

  it('refuses vectors from another model or of another dimension and stays unchanged', () => {
    const index = VectorIndex.build(MODEL, 2, entries({ a: [1, 0] }));

    expect(() => index.append(entries({ b: [0, 1] }), 'other:model:2')).toThrow(ModelMismatchError);
    expect(() => index.append(entries({ b: [0, 1], c: [0, 1, 0] }))).toThrow(ModelMismatchError);
    expect(index.size).toBe(1);
  });

  it('refuses to build from vectors of mixed dimension', () => {
    expect(() => VectorIndex.build(MODEL, 2, entries({ a: [1, 0], b: [1] }))).toThrow(
      ModelMismatchError,
    );
    expect(() => VectorIndex.build(MODEL, 0, [])).toThrow(ConfigError);
  });
});
