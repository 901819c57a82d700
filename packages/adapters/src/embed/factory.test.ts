import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConfigError, defaultConfig } from '@logkb/shared';

const mockEmbeddingsCreate = vi.fn();

vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      embeddings = {
        create: mockEmbeddingsCreate,
      };
    },
    APIError: class extends Error {},
  };
});

import { createEmbedder, listEmbeddingProviders } from './factory';
import type { EmbedderFactory } from './factory';
import { LocalHashEmbedder } from './local_hash_embedder';

describe('createEmbedder', () => {
  const settings = defaultConfig().embeddings;
  const originalOpenAiKey = process.env.OPENAI_API_KEY;

  afterEach(() => {
    if (originalOpenAiKey === undefined) {
      delete process.env.OPENAI_API_KEY;
    } else {
      process.env.OPENAI_API_KEY = originalOpenAiKey;
    }
  });

  it('creates a local feature-hashing embedder', async () => {
    const embedder = createEmbedder('local-hash:feature:16', settings);

    expect(embedder).toBeInstanceOf(LocalHashEmbedder);
    expect(embedder.dims()).toBe(16);
    expect(embedder.id()).toBe('local-hash:feature:16');
    expect(await embedder.embedTexts(['hello'])).toHaveLength(1);
  });

  it('creates an OpenAI embedder using the configured key variable', () => {
    process.env.OPENAI_API_KEY = 'test-secret';

    const embedder = createEmbedder('openai:text-embedding-3-small:256', settings);

    expect(embedder.id()).toBe('openai:text-embedding-3-small:256');
    expect(embedder.dims()).toBe(256);
  });

  it('throws ConfigError for unsupported providers', () => {
    expect(() => createEmbedder('cohere:embed-v3:1024', settings)).toThrow(
      /Unsupported embedding provider "cohere"/,
    );
    expect(() => createEmbedder('toString:x:4', settings)).toThrow(ConfigError);
  });

  it('rejects embedders whose dimension disagrees with the model id', () => {
    const lying: EmbedderFactory = () => new LocalHashEmbedder(8);
    expect(() => createEmbedder('fake:m:4', settings, { fake: lying })).toThrow(
      /produces 8-dimensional vectors, expected 4/,
    );
  });
});

describe('listEmbeddingProviders', () => {
  it('lists the built-in providers by name', () => {
    const providers = listEmbeddingProviders();

    expect(providers.map((p) => p.provider)).toEqual(['local-hash', 'openai']);
    expect(providers[0]).toEqual({
      provider: 'local-hash',
      description: 'Feature hashing of word tokens; offline and deterministic',
      exampleModelIds: ['local-hash:feature:384'],
    });
    expect(providers[1].apiKeySetting).toBe('embeddings.apiKeyEnv');
  });

  it('describes providers it does not know', () => {
    const custom: EmbedderFactory = (spec) => new LocalHashEmbedder(spec.dims, spec.model);

    expect(listEmbeddingProviders({ mine: custom })).toEqual([
      { provider: 'mine', description: 'Custom provider', exampleModelIds: [] },
    ]);
  });
});
