import OpenAI, { APIError } from 'openai';
import { ConfigError, ProviderError, RateLimitError } from '@logkb/shared';
import type { EmbedOptions, Embedder } from './embedder';

export interface OpenAIEmbedderConfig {
  apiKey?: string;
  apiKeyEnv?: string;
  model?: string;
  /** Declared output dimension; requested explicitly from models that accept it. */
  dimensions?: number;
  /** Alternate endpoint for OpenAI-compatible embedding servers. */
  baseURL?: string;
}

const DEFAULT_DIMS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

export class OpenAIEmbedder implements Embedder {
  private client: OpenAI;
  private model: string;
  private dimensions: number;

  constructor(config: OpenAIEmbedderConfig) {
    const apiKey = config.apiKey || (config.apiKeyEnv && process.env[config.apiKeyEnv]);
    if (!apiKey) {
      throw new ConfigError(
        `Missing API Key for OpenAI provider. Checked config.apiKey and env var ${config.apiKeyEnv}`,
      );
    }
    this.model = config.model || 'text-embedding-3-small';
    this.dimensions = config.dimensions ?? DEFAULT_DIMS[this.model] ?? 0;
    this.client = new OpenAI({
      apiKey,
      baseURL: config.baseURL,
      // Retries and timeouts are owned by executeProviderRequest.
      maxRetries: 0,
    });
  }

  async embedTexts(texts: string[], opts: EmbedOptions = {}): Promise<number[][]> {
    try {
      const response = await this.client.embeddings.create(
        {
          model: this.model,
          input: texts,
          dimensions: this.model.startsWith('text-embedding-3') ? this.dimensions : undefined,
        },
        { signal: opts.signal },
      );
      // Results carry their input position; sort instead of trusting response order.
      return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    } catch (error) {
      throw this.mapError(error);
    }
  }

  dims(): number {
    return this.dimensions;
  }

  id(): string {
    return `openai:${this.model}:${this.dimensions}`;
  }

  private mapError(error: unknown): unknown {
    if (error instanceof APIError) {
      if (error.status === 429) {
        return new RateLimitError(error.message, {
          cause: error,
          retryAfter: retryAfterSeconds(error.headers),
        });
      }
      if (error.status === 401 || error.status === 403) {
        return new ConfigError(error.message, { cause: error });
      }
      // Other statuses keep their `status` so 5xx responses stay retriable.
      return error;
    }
    if (error instanceof Error) return error;
    return new ProviderError(String(error));
  }
}

function retryAfterSeconds(headers: unknown): number | undefined {
  if (typeof headers !== 'object' || headers === null || !('retry-after' in headers)) {
    return undefined;
  }
  const value = Number(headers['retry-after']);
  return Number.isFinite(value) && value >= 0 ? value : undefined;
}
