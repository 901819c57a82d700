import { randomUUID } from 'crypto';
import { resolve } from 'path';
import {
  ConfigError,
  KnowledgeBaseNotFoundError,
  LRUCache,
  ModelMismatchError,
  UsageError,
  eventMeta,
  logger as defaultLogger,
} from '@logkb/shared';
import type { KnowledgeBaseConfig, Logger } from '@logkb/shared';
import type { EmbeddingAdapter } from '@logkb/adapters';
import { loadIndex } from '../index/persistence';
import type { VectorIndex } from '../index/vector-index';
import { IssueWorkspace } from '../storage/issue-workspace';
import { KnowledgeBaseStore } from '../storage/kb-store';
import type { SearchHit } from '../types';

const MAX_ATTEMPTS = 3;

export interface RetrieverOptions {
  adapter: EmbeddingAdapter;
  logger?: Logger;
}

export interface RetrieveOptions {
  /** Fail with `ModelMismatchError` unless the knowledge base uses this model. */
  modelId?: string;
  runId?: string;
  signal?: AbortSignal;
}

/**
 * Read-only similarity search over committed knowledge bases. Opened
 * generations are kept in an LRU; a snapshot is opened and searched in the same
 * tick, so a concurrent commit is either fully visible or not at all.
 */
export class Retriever {
  private readonly adapter: EmbeddingAdapter;
  private readonly logger: Logger;
  private snapshots: LRUCache<string, VectorIndex> | null = null;
  /** Issue directory to the snapshot key last opened for it */
  private readonly latest = new Map<string, string>();

  constructor(options: RetrieverOptions) {
    this.adapter = options.adapter;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * The `topK` chunks most similar to `queryText`, best first. The query is
   * embedded with the model of the committed knowledge base.
   */
  async retrieve(
    issueId: string,
    queryText: string,
    topK: number,
    config: KnowledgeBaseConfig,
    options: RetrieveOptions = {},
  ): Promise<SearchHit[]> {
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new ConfigError(`topK must be a positive integer, got ${topK}`);
    }
    if (queryText.trim() === '') {
      throw new UsageError('Query text must not be empty.');
    }

    const started = Date.now();
    const runId = options.runId ?? `query-${randomUUID()}`;
    const workspace = new IssueWorkspace(config.rootDir);
    await workspace.assertIssueExists(issueId);
    const store = new KnowledgeBaseStore(workspace);

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      const metadata = store.currentMetadata(issueId);
      if (!metadata) {
        throw new KnowledgeBaseNotFoundError(issueId);
      }
      if (options.modelId !== undefined && options.modelId !== metadata.modelId) {
        throw new ModelMismatchError(
          `Knowledge base of issue "${issueId}" was built with "${metadata.modelId}", not "${options.modelId}". ` +
            'Rebuild it with the requested model first.',
          { details: { issueId, indexModelId: metadata.modelId, requestedModelId: options.modelId } },
        );
      }

      const query = await this.adapter.embedQuery(queryText, metadata.modelId, {
        settings: config.embeddings,
        runId,
        signal: options.signal,
      });

      // No await from here on.
      const index = this.openCurrent(store, workspace, issueId, config);
      if (!index) {
        throw new KnowledgeBaseNotFoundError(issueId);
      }
      if (index.modelId !== metadata.modelId) {
        // Rebuilt with another model while the query was being embedded.
        continue;
      }
      const hits = index.search(query, topK);

      await this.logger.log({
        type: 'RetrievalFinished',
        ...eventMeta(runId),
        payload: {
          issueId,
          modelId: index.modelId,
          topK,
          hitCount: hits.length,
          candidateCount: index.size,
          durationMs: Date.now() - started,
        },
      });
      return hits;
    }

    throw new ModelMismatchError(
      `Knowledge base of issue "${issueId}" kept changing model during the query; try again.`,
    );
  }

  close(): void {
    for (const index of this.snapshots?.values() ?? []) {
      index.close();
    }
    this.snapshots?.clear();
    this.latest.clear();
  }

  private openCurrent(
    store: KnowledgeBaseStore,
    workspace: IssueWorkspace,
    issueId: string,
    config: KnowledgeBaseConfig,
  ): VectorIndex | null {
    const generation = store.currentGeneration(issueId);
    if (!generation) {
      return null;
    }
    const snapshots = (this.snapshots ??= new LRUCache<string, VectorIndex>(
      config.index.maxOpenSnapshots,
      { onEvict: (_key, index) => index.close() },
    ));

    const key = resolve(store.generationDir(issueId, generation));
    let index = snapshots.get(key);
    if (!index) {
      index = loadIndex(key, config.index);
      snapshots.set(key, index);
    }

    const issueKey = resolve(workspace.issueDir(issueId));
    const previous = this.latest.get(issueKey);
    if (previous !== undefined && previous !== key) {
      const stale = snapshots.get(previous);
      snapshots.delete(previous);
      stale?.close();
    }
    this.latest.set(issueKey, key);
    return index;
  }
}
