import { randomUUID } from 'crypto';
import { resolve } from 'path';
import { pathExists } from 'fs-extra';
import {
  BuildCancelledError,
  BuildFailureError,
  StorageError,
  eventMeta,
  logger as defaultLogger,
} from '@logkb/shared';
import type { ChunkingConfig, KnowledgeBaseConfig, Logger } from '@logkb/shared';
import { parseModelId } from '@logkb/adapters';
import type { EmbeddingAdapter, ModelSpec } from '@logkb/adapters';
import { EmbeddingCache } from '../cache/embedding-cache';
import { chunkLogText, validateChunkingOptions } from '../chunking/chunker';
import type { KnowledgeBaseMetadata } from '../index/persistence';
import { VectorIndex } from '../index/vector-index';
import { IssueWorkspace } from '../storage/issue-workspace';
import { KnowledgeBaseStore } from '../storage/kb-store';
import type { CommittedKnowledgeBase } from '../storage/kb-store';
import type { Chunk, IndexEntry } from '../types';
import { acquireFileLock } from './file-lock';
import { IssueLocks } from './locks';
import type { BuildMode, BuildPhase, BuildReport, BuildStatus, UpdateRequest } from './types';

export interface KnowledgeBaseManagerOptions {
  adapter: EmbeddingAdapter;
  logger?: Logger;
  /** Share one instance between managers that may build the same issues. */
  locks?: IssueLocks;
  /** How long a build waits for another process building the same issue. */
  lockTimeoutMs?: number;
}

export interface KnowledgeBaseStatus {
  issueId: string;
  /** Metadata of the committed knowledge base, or null when none was built yet. */
  metadata: KnowledgeBaseMetadata | null;
  lastBuild: BuildStatus | null;
  /** True while a build for the issue holds its lock or waits for it, in this or another process. */
  building: boolean;
}

interface BuildContext {
  request: UpdateRequest;
  config: KnowledgeBaseConfig;
  workspace: IssueWorkspace;
  store: KnowledgeBaseStore;
  spec: ModelSpec;
  runId: string;
  log: Logger;
  report: BuildReport;
}

interface ChunkPlan {
  chunks: Chunk[];
  mode: BuildMode;
  /** Chunks to append to the committed index when `mode` is `append` */
  fresh: Chunk[];
}

function sameChunking(a: ChunkingConfig | undefined, b: ChunkingConfig): boolean {
  return a !== undefined && a.chunkSize === b.chunkSize && a.overlap === b.overlap;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Builds and updates the knowledge base of each issue: collects its raw logs,
 * chunks them, resolves vectors from the embedding cache or the committed
 * index, embeds what is left and commits a new generation. Builds of one
 * issue are serialized; nothing is committed unless every chunk has a vector.
 */
export class KnowledgeBaseManager {
  private readonly adapter: EmbeddingAdapter;
  private readonly logger: Logger;
  private readonly locks: IssueLocks;
  private readonly lockTimeoutMs: number | undefined;
  private readonly caches = new Map<string, Promise<EmbeddingCache>>();

  constructor(options: KnowledgeBaseManagerOptions) {
    this.adapter = options.adapter;
    this.logger = options.logger ?? defaultLogger;
    this.locks = options.locks ?? new IssueLocks();
    this.lockTimeoutMs = options.lockTimeoutMs;
  }

  /**
   * Brings the knowledge base of `request.issueId` up to date with its raw
   * logs. Throws `BuildFailureError` when some texts could not be embedded and
   * `BuildCancelledError` when the signal fired; in both cases the committed
   * knowledge base is left as it was and the vectors embedded so far stay
   * cached for the next attempt.
   */
  async update(request: UpdateRequest, config: KnowledgeBaseConfig): Promise<BuildReport> {
    validateChunkingOptions(config.chunking);
    const modelId = request.modelId ?? config.embeddings.modelId;
    const spec = parseModelId(modelId);
    // Unknown providers and missing credentials fail here, before the lock.
    this.adapter.embedderFor(modelId, config.embeddings);

    const workspace = new IssueWorkspace(config.rootDir);
    await workspace.assertIssueExists(request.issueId);
    const key = resolve(workspace.issueDir(request.issueId));
    return this.locks.run(key, async () => {
      const lock = await acquireFileLock(workspace.buildLockPath(request.issueId), {
        timeoutMs: this.lockTimeoutMs,
      });
      try {
        return await this.build(request, config, workspace, spec);
      } finally {
        await lock.release();
      }
    });
  }

  async status(issueId: string, config: KnowledgeBaseConfig): Promise<KnowledgeBaseStatus> {
    const workspace = new IssueWorkspace(config.rootDir);
    await workspace.assertIssueExists(issueId);
    const store = new KnowledgeBaseStore(workspace, this.logger);
    return {
      issueId,
      metadata: store.currentMetadata(issueId),
      lastBuild: await store.readStatus(issueId),
      building:
        this.locks.isBusy(resolve(workspace.issueDir(issueId))) ||
        (await pathExists(workspace.buildLockPath(issueId))),
    };
  }

  /** The shared embedding cache under `config.rootDir`, loaded on first use. */
  cache(config: KnowledgeBaseConfig): Promise<EmbeddingCache> {
    const path = resolve(new IssueWorkspace(config.rootDir).cachePath());
    let cache = this.caches.get(path);
    if (!cache) {
      cache = new EmbeddingCache(path).init();
      this.caches.set(path, cache);
      void cache.catch(() => this.caches.delete(path));
    }
    return cache;
  }

  async close(): Promise<void> {
    const pending = [...this.caches.values()];
    this.caches.clear();
    for (const result of await Promise.allSettled(pending)) {
      if (result.status === 'fulfilled') result.value.close();
    }
  }

  private async build(
    request: UpdateRequest,
    config: KnowledgeBaseConfig,
    workspace: IssueWorkspace,
    spec: ModelSpec,
  ): Promise<BuildReport> {
    const { issueId } = request;
    const started = Date.now();
    const startedAt = new Date(started).toISOString();
    const store = new KnowledgeBaseStore(workspace, this.logger);
    const ctx: BuildContext = {
      request,
      config,
      workspace,
      store,
      spec,
      runId: `build-${randomUUID()}`,
      log: this.logger.child({ issueId }),
      report: {
        issueId,
        modelId: spec.id,
        mode: 'rebuild',
        chunksProcessed: 0,
        newChunks: 0,
        cacheHits: 0,
        cacheMisses: 0,
        reusedFromIndex: 0,
        embeddedTexts: 0,
        embeddingFailures: 0,
        failedBatches: 0,
        sourceFiles: [],
        generation: null,
        durationMs: 0,
      },
    };
    const { report } = ctx;

    await workspace.assertIssueExists(issueId);
    await this.logger.log({
      type: 'KnowledgeBaseBuildStarted',
      ...eventMeta(ctx.runId),
      payload: { issueId, modelId: spec.id, forceRebuild: request.forceRebuild ?? false },
    });

    let committed: CommittedKnowledgeBase | null = null;
    try {
      this.progress(ctx, 'collecting', 0, 'Collecting raw log files');
      const files = await workspace.listRawFiles(issueId, config.logFiles.extensions);
      report.sourceFiles = files.map((file) => file.name);

      const loaded = request.forceRebuild ? null : this.loadCommitted(ctx);
      const previousMetadata = loaded
        ? loaded.metadata
        : request.forceRebuild
          ? await this.readPreviousMetadata(ctx)
          : null;
      const priorChunkIds = new Set(loaded?.index.allChunks().map((chunk) => chunk.chunkId));
      if (loaded && loaded.index.modelId === spec.id) {
        committed = loaded;
      } else {
        loaded?.index.close();
      }

      this.progress(ctx, 'chunking', 10, `Chunking ${files.length} file(s)`);
      const plan = await this.planChunks(ctx, committed);
      report.mode = plan.mode;
      report.chunksProcessed = plan.chunks.length;
      report.newChunks = plan.chunks.filter((chunk) => !priorChunkIds.has(chunk.chunkId)).length;

      this.progress(ctx, 'resolving', 30, `Resolving vectors for ${plan.chunks.length} chunk(s)`);
      const useCache =
        !request.forceRebuild && (previousMetadata === null || previousMetadata.modelId === spec.id);
      const vectors = await this.resolveVectors(ctx, plan.chunks, committed, useCache);

      await this.embedMissing(ctx, plan.chunks, vectors);
      if (request.signal?.aborted) {
        throw new BuildCancelledError(`Build of issue "${issueId}" was cancelled`, report);
      }

      this.progress(ctx, 'committing', 90, 'Committing knowledge base');
      report.generation = await this.commit(ctx, plan, vectors, committed, previousMetadata);

      report.durationMs = Date.now() - started;
      await store.writeStatus(issueId, {
        status: 'succeeded',
        startedAt,
        finishedAt: new Date().toISOString(),
        report,
      });
      await this.logger.log({
        type: 'KnowledgeBaseBuildFinished',
        ...eventMeta(ctx.runId),
        payload: {
          issueId,
          modelId: spec.id,
          mode: report.mode,
          chunksProcessed: report.chunksProcessed,
          cacheHits: report.cacheHits,
          cacheMisses: report.cacheMisses,
          generation: report.generation,
          durationMs: report.durationMs,
        },
      });
      await ctx.log.info(
        `Knowledge base ${report.mode === 'unchanged' ? 'unchanged' : 'committed'}: ` +
          `${report.chunksProcessed} chunks, ${report.cacheHits} cache hits, ${report.embeddedTexts} embedded`,
      );
      this.progress(ctx, 'complete', 100, 'Done');
      return report;
    } catch (error) {
      report.durationMs = Date.now() - started;
      const cancelled = error instanceof BuildCancelledError;
      await this.recordFailure(ctx, startedAt, cancelled, error);
      throw error;
    } finally {
      committed?.index.close();
    }
  }

  private progress(ctx: BuildContext, phase: BuildPhase, percent: number, message: string): void {
    ctx.request.onProgress?.({ phase, percent, message });
  }

  private loadCommitted(ctx: BuildContext): CommittedKnowledgeBase | null {
    const { store, request, config } = ctx;
    try {
      return store.loadCurrent(request.issueId, config.index);
    } catch (error) {
      if (error instanceof StorageError) {
        throw new StorageError(
          `${error.message}. Rebuild the knowledge base with a forced rebuild to replace it.`,
          { cause: error },
        );
      }
      throw error;
    }
  }

  /** A forced rebuild only needs the model history of the committed knowledge base. */
  private async readPreviousMetadata(ctx: BuildContext): Promise<KnowledgeBaseMetadata | null> {
    try {
      return ctx.store.currentMetadata(ctx.request.issueId);
    } catch (error) {
      if (error instanceof StorageError) {
        await ctx.log.warn(`Replacing unreadable knowledge base: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  /**
   * Chunks of the committed index are reused for files it already covers,
   * provided they were cut with the same chunking parameters; only new files
   * are read and chunked. A file that disappeared forces a rebuild.
   */
  private async planChunks(
    ctx: BuildContext,
    committed: CommittedKnowledgeBase | null,
  ): Promise<ChunkPlan> {
    const files = ctx.report.sourceFiles;
    if (!committed || !sameChunking(committed.metadata.chunking, ctx.config.chunking)) {
      const chunks = await this.chunkFiles(ctx, files);
      return { chunks, mode: 'rebuild', fresh: chunks };
    }

    const present = new Set(files);
    const indexed = new Set(committed.metadata.sourceFiles);
    const removed = committed.metadata.sourceFiles.filter((file) => !present.has(file));
    const added = files.filter((file) => !indexed.has(file));

    const kept = committed.index.allChunks().filter((chunk) => present.has(chunk.sourceFile));
    const fresh = await this.chunkFiles(ctx, added);
    const mode: BuildMode = removed.length > 0 ? 'rebuild' : added.length > 0 ? 'append' : 'unchanged';
    if (removed.length > 0) {
      await ctx.log.info(`Rebuilding: ${removed.length} indexed file(s) no longer present`);
    }
    return { chunks: [...kept, ...fresh], mode, fresh };
  }

  private async chunkFiles(ctx: BuildContext, files: string[]): Promise<Chunk[]> {
    const chunks: Chunk[] = [];
    for (const file of files) {
      const text = await ctx.workspace.readRawFile(ctx.request.issueId, file);
      chunks.push(...chunkLogText(text, file, ctx.config.chunking));
    }
    return chunks;
  }

  /**
   * Looks every distinct content hash up in the cache, then fills remaining
   * misses from the committed index of the same model. Vectors recovered from
   * the index are written back to the cache.
   */
  private async resolveVectors(
    ctx: BuildContext,
    chunks: Chunk[],
    committed: CommittedKnowledgeBase | null,
    useCache: boolean,
  ): Promise<Map<string, ArrayLike<number>>> {
    const { report, spec } = ctx;
    const cache = ctx.config.cache.enabled ? await this.cache(ctx.config) : null;
    const needed = new Set(chunks.map((chunk) => chunk.contentHash));
    const vectors = new Map<string, ArrayLike<number>>();

    if (cache && useCache) {
      for (const [contentHash, vector] of cache.getMany(needed, spec.id)) {
        vectors.set(contentHash, vector);
      }
    }
    report.cacheHits = chunks.filter((chunk) => vectors.has(chunk.contentHash)).length;
    report.cacheMisses = chunks.length - report.cacheHits;

    if (committed) {
      const recovered: Array<{ contentHash: string; vector: number[] }> = [];
      committed.index.allChunks().forEach((chunk, i) => {
        if (needed.has(chunk.contentHash) && !vectors.has(chunk.contentHash)) {
          const vector = Array.from(committed.index.vector(i));
          vectors.set(chunk.contentHash, vector);
          recovered.push({ contentHash: chunk.contentHash, vector });
        }
      });
      const recoveredHashes = new Set(recovered.map((entry) => entry.contentHash));
      report.reusedFromIndex = chunks.filter((chunk) => recoveredHashes.has(chunk.contentHash)).length;
      if (cache && recovered.length > 0) {
        await this.storeInCache(ctx, cache, recovered, vectors);
      }
    }
    return vectors;
  }

  /**
   * Embeds each distinct text still without a vector, once. Every successful
   * batch is cached immediately so a failed or cancelled build can be retried
   * without paying for it again.
   */
  private async embedMissing(
    ctx: BuildContext,
    chunks: Chunk[],
    vectors: Map<string, ArrayLike<number>>,
  ): Promise<void> {
    const { report, request, spec } = ctx;
    const texts = new Map<string, string>();
    for (const chunk of chunks) {
      if (!vectors.has(chunk.contentHash) && !texts.has(chunk.contentHash)) {
        texts.set(chunk.contentHash, chunk.text);
      }
    }
    const pending = [...texts.keys()];
    report.embeddedTexts = pending.length;

    if (request.signal?.aborted) {
      throw new BuildCancelledError(`Build of issue "${request.issueId}" was cancelled`, report);
    }
    if (pending.length === 0) return;

    const cache = ctx.config.cache.enabled ? await this.cache(ctx.config) : null;
    this.progress(ctx, 'embedding', 40, `Embedding ${pending.length} text(s) with ${spec.id}`);
    await ctx.log.info(`Embedding ${pending.length} text(s) with ${spec.id}`);

    let done = 0;
    const result = await this.adapter.embedBatch(
      pending.map((contentHash) => texts.get(contentHash) ?? ''),
      spec.id,
      {
        settings: ctx.config.embeddings,
        runId: ctx.runId,
        signal: request.signal,
        onBatch: async (indices, batchVectors) => {
          const batch = indices.map((inputIndex, i) => ({
            contentHash: pending[inputIndex],
            vector: batchVectors[i],
          }));
          for (const { contentHash, vector } of batch) {
            vectors.set(contentHash, vector);
          }
          if (cache) {
            await this.storeInCache(ctx, cache, batch, vectors);
          }
          done += indices.length;
          this.progress(
            ctx,
            'embedding',
            40 + Math.round((50 * done) / pending.length),
            `Embedded ${done}/${pending.length} text(s)`,
          );
        },
      },
    );

    report.failedBatches = result.failures.length;
    report.embeddingFailures = result.failures.reduce((sum, f) => sum + f.indices.length, 0);

    if (result.cancelled) {
      throw new BuildCancelledError(
        `Build of issue "${request.issueId}" was cancelled after embedding ${done} of ${pending.length} text(s)`,
        report,
      );
    }
    if (result.failures.length > 0) {
      throw new BuildFailureError(
        `${report.embeddingFailures} of ${pending.length} text(s) could not be embedded with "${spec.id}" ` +
          `(${report.failedBatches} failed batch(es)); nothing was committed. ` +
          `First error: ${result.failures[0].error}`,
        report,
      );
    }
  }

  /**
   * Writes vectors to the cache. Where the cache already holds a different
   * vector for the key, the cached one wins and the conflict is logged.
   */
  private async storeInCache(
    ctx: BuildContext,
    cache: EmbeddingCache,
    batch: Array<{ contentHash: string; vector: ArrayLike<number> }>,
    vectors: Map<string, ArrayLike<number>>,
  ): Promise<void> {
    for (const result of await cache.putMany(batch, ctx.spec.id)) {
      if (result.outcome !== 'conflict') continue;
      vectors.set(result.contentHash, result.cached);
      await this.logger.log({
        type: 'CacheConsistencyViolation',
        ...eventMeta(ctx.runId),
        payload: { contentHash: result.contentHash, modelId: ctx.spec.id },
      });
      await ctx.log.warn(
        `Cached embedding ${result.contentHash.slice(0, 12)} differs from a fresh one; keeping the cached vector`,
      );
    }
  }

  private async commit(
    ctx: BuildContext,
    plan: ChunkPlan,
    vectors: Map<string, ArrayLike<number>>,
    committed: CommittedKnowledgeBase | null,
    previous: KnowledgeBaseMetadata | null,
  ): Promise<string | null> {
    const { spec, report, request, config } = ctx;
    if (plan.mode === 'unchanged') {
      return committed?.generation ?? null;
    }

    const toEntries = (chunks: Chunk[]): IndexEntry[] =>
      chunks.map((chunk) => {
        const vector = vectors.get(chunk.contentHash);
        if (!vector) {
          throw new BuildFailureError(`No vector was resolved for chunk ${chunk.chunkId}`, report);
        }
        return { chunk, vector };
      });

    let index: VectorIndex;
    if (plan.mode === 'append' && committed) {
      index = committed.index;
      index.append(toEntries(plan.fresh), spec.id);
    } else {
      index = VectorIndex.build(spec.id, spec.dims, toEntries(plan.chunks));
    }

    const builtAt = new Date().toISOString();
    const history = previous?.modelsHistory ?? [];
    const last = history.length > 0 ? history[history.length - 1] : undefined;
    const modelsHistory =
      last?.modelId === spec.id ? history : [...history, { modelId: spec.id, since: builtAt }];

    try {
      return await ctx.store.commit(request.issueId, index, {
        schemaVersion: 1,
        issueId: request.issueId,
        modelId: spec.id,
        dimensions: spec.dims,
        chunkCount: index.size,
        sourceFiles: report.sourceFiles,
        buildMode: plan.mode,
        builtAt,
        modelsHistory,
        chunking: { chunkSize: config.chunking.chunkSize, overlap: config.chunking.overlap },
      });
    } finally {
      if (index !== committed?.index) index.close();
    }
  }

  private async recordFailure(
    ctx: BuildContext,
    startedAt: string,
    cancelled: boolean,
    error: unknown,
  ): Promise<void> {
    const { report, request, spec } = ctx;
    const message = errorMessage(error);
    try {
      await ctx.store.writeStatus(request.issueId, {
        status: cancelled ? 'cancelled' : 'failed',
        startedAt,
        finishedAt: new Date().toISOString(),
        report,
        error: message,
      });
    } catch (statusError) {
      await ctx.log.warn(`Could not record build status: ${errorMessage(statusError)}`);
    }
    await this.logger.log({
      type: 'KnowledgeBaseBuildFailed',
      ...eventMeta(ctx.runId),
      payload: {
        issueId: request.issueId,
        modelId: spec.id,
        reason: cancelled ? 'cancelled' : 'failed',
        embeddingFailures: report.embeddingFailures,
        failedBatches: report.failedBatches,
        error: message,
        durationMs: report.durationMs,
      },
    });
    if (cancelled) {
      await ctx.log.warn(message);
    } else if (error instanceof Error) {
      await ctx.log.error(error, 'Knowledge base build failed');
    }
  }
}
