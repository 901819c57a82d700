import { ConfigError } from '@logkb/shared';
import type { EmbeddingsConfig } from '@logkb/shared';
import type { Embedder } from './embedder';
import { LocalHashEmbedder } from './local_hash_embedder';
import { parseModelId } from './model-id';
import type { ModelSpec } from './model-id';
import { OpenAIEmbedder } from './openai_embedder';

export type EmbedderFactory = (spec: ModelSpec, settings: EmbeddingsConfig) => Embedder;

/**
 * Provider dispatch table: the first segment of a model id selects the
 * factory. Adding a backend means adding an entry here.
 */
export const defaultEmbedderFactories: Readonly<Record<string, EmbedderFactory>> = {
  openai: (spec, settings) =>
    new OpenAIEmbedder({
      apiKeyEnv: settings.apiKeyEnv,
      model: spec.model,
      dimensions: spec.dims,
    }),
  'local-hash': (spec) => new LocalHashEmbedder(spec.dims, spec.model),
};

export interface EmbeddingProviderInfo {
  provider: string;
  description: string;
  /** Model ids that work out of the box */
  exampleModelIds: string[];
  /** Name of the setting holding the API key, when the provider needs one */
  apiKeySetting?: string;
}

const PROVIDER_DESCRIPTIONS: Readonly<Record<string, Omit<EmbeddingProviderInfo, 'provider'>>> = {
  openai: {
    description: 'OpenAI embeddings API',
    exampleModelIds: [
      'openai:text-embedding-3-small:1536',
      'openai:text-embedding-3-large:3072',
      'openai:text-embedding-ada-002:1536',
    ],
    apiKeySetting: 'embeddings.apiKeyEnv',
  },
  'local-hash': {
    description: 'Feature hashing of word tokens; offline and deterministic',
    exampleModelIds: ['local-hash:feature:384'],
  },
};

/** The providers of a dispatch table, sorted by name. */
export function listEmbeddingProviders(
  factories: Readonly<Record<string, EmbedderFactory>> = defaultEmbedderFactories,
): EmbeddingProviderInfo[] {
  return Object.keys(factories)
    .sort()
    .map((provider) => {
      const known = Object.hasOwn(PROVIDER_DESCRIPTIONS, provider) ? PROVIDER_DESCRIPTIONS[provider] : undefined;
      return { provider, ...(known ?? { description: 'Custom provider', exampleModelIds: [] }) };
    });
}

export function createEmbedder(
  modelId: string,
  settings: EmbeddingsConfig,
  factories: Readonly<Record<string, EmbedderFactory>> = defaultEmbedderFactories,
): Embedder {
  const spec = parseModelId(modelId);
  const factory = Object.hasOwn(factories, spec.provider) ? factories[spec.provider] : undefined;
  if (!factory) {
    throw new ConfigError(
      `Unsupported embedding provider "${spec.provider}" in model id "${modelId}". ` +
        `Known providers: ${Object.keys(factories).sort().join(', ')}`,
    );
  }

  const embedder = factory(spec, settings);
  if (embedder.dims() !== spec.dims) {
    throw new ConfigError(
      `Embedder for "${modelId}" produces ${embedder.dims()}-dimensional vectors, expected ${spec.dims}.`,
    );
  }
  return embedder;
}
