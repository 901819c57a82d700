import { LocalHashEmbedder } from './local_hash_embedder';

function norm(vector: number[]): number {
  return Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
}

function dot(a: number[], b: number[]): number {
  return a.reduce((sum, val, i) => sum + val * (b[i] ?? 0), 0);
}

describe('LocalHashEmbedder', () => {
  it('is deterministic', async () => {
    const embedder = new LocalHashEmbedder();
    const first = await embedder.embedTexts(['ERROR db timeout']);
    const second = await embedder.embedTexts(['ERROR db timeout']);
    expect(first).toEqual(second);
  });

  it('produces vectors of the declared dimension and reports its model id', async () => {
    const embedder = new LocalHashEmbedder(128, 'bow');
    const [vector] = await embedder.embedTexts(['hello world']);
    expect(vector).toHaveLength(128);
    expect(embedder.dims()).toBe(128);
    expect(embedder.id()).toBe('local-hash:bow:128');
  });

  it('produces unit vectors, and a zero vector for text without tokens', async () => {
    const embedder = new LocalHashEmbedder(64);
    const [words, punctuation] = await embedder.embedTexts(['hello world', '--- ...']);
    expect(norm(words ?? [])).toBeCloseTo(1);
    expect(punctuation).toEqual(new Array(64).fill(0));
  });

  it('ignores case and punctuation', async () => {
    const embedder = new LocalHashEmbedder(64);
    const [a, b] = await embedder.embedTexts(['Connection REFUSED!', 'connection refused']);
    expect(a).toEqual(b);
  });

  it('scores texts that share tokens above texts that share none', async () => {
    const embedder = new LocalHashEmbedder(1024);
    const [query, related, unrelated] = await embedder.embedTexts([
      'payment error',
      'payment error while charging card',
      'user logged in',
    ]);
    expect(dot(query ?? [], related ?? [])).toBeGreaterThan(0.5);
    expect(Math.abs(dot(query ?? [], unrelated ?? []))).toBeLessThan(0.5);
  });
});
