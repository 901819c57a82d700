import { describe, it, expect } from 'vitest';
import { DEFAULT_MODEL_ID, KnowledgeBaseConfigSchema, defaultConfig } from './schema';

describe('KnowledgeBaseConfigSchema', () => {
  it('fills every default', () => {
    const config = defaultConfig();
    expect(config.rootDir).toBe('./data');
    expect(config.chunking).toEqual({ chunkSize: 800, overlap: 100 });
    expect(config.retrieval.topK).toBe(5);
    expect(config.embeddings).toEqual({
      modelId: DEFAULT_MODEL_ID,
      batchSize: 32,
      concurrency: 2,
      timeoutMs: 30000,
      apiKeyEnv: 'OPENAI_API_KEY',
      retry: { maxRetries: 3, initialDelayMs: 1000, maxDelayMs: 10000, backoffFactor: 2 },
    });
    expect(config.cache.enabled).toBe(true);
    expect(config.logFiles.extensions).toEqual(['.log', '.txt', '.jsonl']);
  });

  it('merges partial sections with their defaults', () => {
    const config = defaultConfig({
      chunking: { chunkSize: 40, overlap: 10 },
      embeddings: { batchSize: 2 },
    });
    expect(config.chunking).toEqual({ chunkSize: 40, overlap: 10 });
    expect(config.embeddings.batchSize).toBe(2);
    expect(config.embeddings.concurrency).toBe(2);
  });

  it('rejects overlap >= chunkSize', () => {
    const result = KnowledgeBaseConfigSchema.safeParse({ chunking: { chunkSize: 10, overlap: 10 } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['chunking', 'overlap']);
    }
  });

  it('rejects a non-positive topK', () => {
    expect(KnowledgeBaseConfigSchema.safeParse({ retrieval: { topK: 0 } }).success).toBe(false);
  });
});
