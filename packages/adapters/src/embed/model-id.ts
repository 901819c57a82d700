import { ConfigError } from '@logkb/shared';

export interface ModelSpec {
  /** The full `<provider>:<model>:<dims>` identifier */
  id: string;
  provider: string;
  model: string;
  dims: number;
}

/**
 * Parses a model id of the form `<provider>:<model>:<dims>`. The model name may
 * itself contain colons; the provider is the first segment and the dimension
 * the last.
 */
export function parseModelId(modelId: string): ModelSpec {
  const parts = modelId.split(':');
  if (parts.length < 3) {
    throw new ConfigError(
      `Invalid model id "${modelId}". Expected "<provider>:<model>:<dims>", e.g. "openai:text-embedding-3-small:1536".`,
    );
  }
  const provider = parts[0] ?? '';
  const dimsPart = parts[parts.length - 1] ?? '';
  const model = parts.slice(1, -1).join(':');
  const dims = Number(dimsPart);

  if (!provider || !model) {
    throw new ConfigError(`Invalid model id "${modelId}": provider and model must be non-empty.`);
  }
  if (!/^\d+$/.test(dimsPart) || !Number.isSafeInteger(dims) || dims <= 0) {
    throw new ConfigError(
      `Invalid model id "${modelId}": dimension "${dimsPart}" is not a positive integer.`,
    );
  }

  return { id: modelId, provider, model, dims };
}
