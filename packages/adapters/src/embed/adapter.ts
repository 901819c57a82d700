import pLimit from 'p-limit';
import type { LimitFunction } from 'p-limit';
import { ProviderError, eventMeta, logger as defaultLogger } from '@logkb/shared';
import type { EmbeddingsConfig, Logger } from '@logkb/shared';
import { executeProviderRequest } from '../common';
import { CachingEmbedder } from './caching_embedder';
import type { Embedder } from './embedder';
import { createEmbedder, defaultEmbedderFactories } from './factory';
import type { EmbedderFactory } from './factory';
import { parseModelId } from './model-id';

export interface EmbeddingAdapterOptions {
  logger?: Logger;
  /** Provider dispatch table; defaults to the built-in providers. */
  factories?: Readonly<Record<string, EmbedderFactory>>;
}

export interface EmbedRequestOptions {
  settings: EmbeddingsConfig;
  /** Correlates provider events with the build or query that caused them. */
  runId?: string;
  /** Checked between batches; a batch already sent is allowed to finish. */
  signal?: AbortSignal;
}

export interface EmbedBatchOptions extends EmbedRequestOptions {
  /** Called once per successful batch with the input positions it covered. */
  onBatch?: (indices: number[], vectors: number[][]) => void | Promise<void>;
}

export interface BatchFailure {
  batchIndex: number;
  /** Input positions left without a vector */
  indices: number[];
  error: string;
}

export interface EmbedBatchResult {
  /** Same order and length as the input; `null` where the text was not embedded. */
  vectors: Array<number[] | null>;
  failures: BatchFailure[];
  /** True when the signal fired before every batch was sent. */
  cancelled: boolean;
}

/**
 * Batches texts for one embedding model, retries transient provider errors and
 * bounds in-flight requests per model. The concurrency limiter is shared by
 * every caller of this adapter, so builds of different issues draw from the
 * same upstream budget without waiting on each other's locks.
 */
export class EmbeddingAdapter {
  private readonly logger: Logger;
  private readonly factories: Readonly<Record<string, EmbedderFactory>>;
  private readonly embedders = new Map<string, Embedder>();
  private readonly queryEmbedders = new Map<string, Embedder>();
  private readonly limiters = new Map<string, LimitFunction>();

  constructor(options: EmbeddingAdapterOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.factories = options.factories ?? defaultEmbedderFactories;
  }

  embedderFor(modelId: string, settings: EmbeddingsConfig): Embedder {
    let embedder = this.embedders.get(modelId);
    if (!embedder) {
      embedder = createEmbedder(modelId, settings, this.factories);
      this.embedders.set(modelId, embedder);
    }
    return embedder;
  }

  /**
   * Embeds `texts` in batches of `settings.batchSize`. A batch that exhausts
   * its retries fails as a unit and is reported in `failures`; the other
   * batches still run.
   */
  async embedBatch(
    texts: string[],
    modelId: string,
    options: EmbedBatchOptions,
  ): Promise<EmbedBatchResult> {
    return this.runBatches(this.embedderFor(modelId, options.settings), texts, modelId, options);
  }

  /**
   * Embeds a single text, throwing when the provider gives up. Repeated
   * queries are answered from an in-memory cache.
   */
  async embedQuery(text: string, modelId: string, options: EmbedRequestOptions): Promise<number[]> {
    let embedder = this.queryEmbedders.get(modelId);
    if (!embedder) {
      embedder = new CachingEmbedder(this.embedderFor(modelId, options.settings));
      this.queryEmbedders.set(modelId, embedder);
    }

    const result = await this.runBatches(embedder, [text], modelId, options);
    const vector = result.vectors[0];
    if (!vector) {
      const reason = result.cancelled ? 'cancelled' : (result.failures[0]?.error ?? 'unknown error');
      throw new ProviderError(`Failed to embed query with model "${modelId}": ${reason}`, {
        details: { modelId },
      });
    }
    return vector;
  }

  private async runBatches(
    embedder: Embedder,
    texts: string[],
    modelId: string,
    options: EmbedBatchOptions,
  ): Promise<EmbedBatchResult> {
    const { settings, signal, onBatch } = options;
    const runId = options.runId ?? 'embed';
    const spec = parseModelId(modelId);
    const limit = this.limiterFor(modelId, settings.concurrency);

    const vectors: Array<number[] | null> = texts.map(() => null);
    const failures: BatchFailure[] = [];
    let cancelled = false;
    let callbackError: unknown;

    const batches: number[][] = [];
    for (let start = 0; start < texts.length; start += settings.batchSize) {
      const end = Math.min(start + settings.batchSize, texts.length);
      batches.push(Array.from({ length: end - start }, (_, i) => start + i));
    }

    const runBatch = async (indices: number[], batchIndex: number): Promise<void> => {
      if (signal?.aborted || callbackError !== undefined) {
        cancelled = cancelled || Boolean(signal?.aborted);
        return;
      }
      const batchTexts = indices.map((i) => texts[i] ?? '');

      let result: number[][];
      try {
        result = await executeProviderRequest(
          { runId, logger: this.logger, timeoutMs: settings.timeoutMs, retryOptions: settings.retry },
          spec.provider,
          spec.model,
          async (requestSignal) => {
            const embedded = await embedder.embedTexts(batchTexts, { signal: requestSignal });
            assertShape(embedded, batchTexts.length, spec.dims, modelId);
            return embedded;
          },
        );
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        failures.push({ batchIndex, indices, error: message });
        await this.batchFinished(runId, modelId, batchIndex, batches.length, indices.length, message);
        return;
      }

      indices.forEach((inputIndex, i) => {
        vectors[inputIndex] = result[i] ?? null;
      });
      await this.batchFinished(runId, modelId, batchIndex, batches.length, indices.length);

      if (onBatch) {
        try {
          await onBatch(indices, result);
        } catch (error) {
          callbackError ??= error;
        }
      }
    };

    await Promise.all(batches.map((indices, batchIndex) => limit(() => runBatch(indices, batchIndex))));

    if (callbackError !== undefined) {
      throw callbackError;
    }

    failures.sort((a, b) => a.batchIndex - b.batchIndex);
    return { vectors, failures, cancelled };
  }

  private limiterFor(modelId: string, concurrency: number): LimitFunction {
    let limit = this.limiters.get(modelId);
    if (!limit) {
      limit = pLimit(concurrency);
      this.limiters.set(modelId, limit);
    }
    return limit;
  }

  private async batchFinished(
    runId: string,
    modelId: string,
    batchIndex: number,
    batchCount: number,
    size: number,
    error?: string,
  ): Promise<void> {
    await this.logger.log({
      type: 'EmbeddingBatchFinished',
      ...eventMeta(runId),
      payload: { modelId, batchIndex, batchCount, size, success: error === undefined, error },
    });
  }
}

function assertShape(vectors: number[][], expected: number, dims: number, modelId: string): void {
  if (vectors.length !== expected) {
    throw new ProviderError(
      `Model "${modelId}" returned ${vectors.length} vectors for ${expected} texts`,
    );
  }
  for (const vector of vectors) {
    if (vector.length !== dims) {
      throw new ProviderError(
        `Model "${modelId}" returned a vector of dimension ${vector.length}, declared ${dims}`,
      );
    }
    if (!vector.every((value) => Number.isFinite(value))) {
      throw new ProviderError(`Model "${modelId}" returned a vector with non-finite values`);
    }
  }
}
