import { randomBytes } from 'crypto';
import { existsSync, promises as fs, readFileSync } from 'fs';
import { join } from 'path';
import { pathExists, remove } from 'fs-extra';
import { z } from 'zod';
import {
  StorageError,
  atomicWrite,
  atomicWriteJson,
  logger as defaultLogger,
  readJsonIfExists,
} from '@logkb/shared';
import type { Logger } from '@logkb/shared';
import { loadIndex, readMetadata, writeIndexFiles } from '../index/persistence';
import type { IndexReadOptions, KnowledgeBaseMetadata } from '../index/persistence';
import type { VectorIndex } from '../index/vector-index';
import type { BuildStatus } from '../manager/types';
import type { IssueWorkspace } from './issue-workspace';

const CURRENT_FILE = 'CURRENT';
const GENERATIONS_DIR = 'generations';
const GENERATION_PATTERN = /^\d{13}-[0-9a-f]{8}$/;

const BuildStatusSchema = z.object({
  status: z.enum(['succeeded', 'failed', 'cancelled']),
  startedAt: z.string(),
  finishedAt: z.string(),
  report: z.object({
    issueId: z.string(),
    modelId: z.string(),
    mode: z.enum(['rebuild', 'append', 'unchanged']),
    chunksProcessed: z.number(),
    newChunks: z.number(),
    cacheHits: z.number(),
    cacheMisses: z.number(),
    reusedFromIndex: z.number(),
    embeddedTexts: z.number(),
    embeddingFailures: z.number(),
    failedBatches: z.number(),
    sourceFiles: z.array(z.string()),
    generation: z.string().nullable(),
    durationMs: z.number(),
  }),
  error: z.string().optional(),
});

export interface CommittedKnowledgeBase {
  generation: string;
  metadata: KnowledgeBaseMetadata;
  index: VectorIndex;
}

export function newGenerationId(): string {
  return `${Date.now().toString().padStart(13, '0')}-${randomBytes(4).toString('hex')}`;
}

/**
 * Committed knowledge bases on disk. Each commit writes a complete generation
 * directory under `kb/generations/` and then atomically replaces `kb/CURRENT`
 * with its name, so readers see either the previous or the new generation.
 * The generation that was current before a commit is kept for readers still
 * using it; generations older than that one are removed.
 */
export class KnowledgeBaseStore {
  constructor(
    private readonly workspace: IssueWorkspace,
    private readonly logger: Logger = defaultLogger,
  ) {}

  private currentPath(issueId: string): string {
    return join(this.workspace.kbDir(issueId), CURRENT_FILE);
  }

  generationDir(issueId: string, generation: string): string {
    return join(this.workspace.kbDir(issueId), GENERATIONS_DIR, generation);
  }

  /** Synchronous so that a read of CURRENT and the open that follows happen in one tick. */
  currentGeneration(issueId: string): string | null {
    const path = this.currentPath(issueId);
    if (!existsSync(path)) {
      return null;
    }
    const generation = readFileSync(path, 'utf8').trim();
    return generation || null;
  }

  currentMetadata(issueId: string): KnowledgeBaseMetadata | null {
    const generation = this.currentGeneration(issueId);
    return generation ? readMetadata(this.generationDir(issueId, generation)) : null;
  }

  loadCurrent(issueId: string, options: IndexReadOptions): CommittedKnowledgeBase | null {
    const generation = this.currentGeneration(issueId);
    if (!generation) {
      return null;
    }
    const dir = this.generationDir(issueId, generation);
    return { generation, metadata: readMetadata(dir), index: loadIndex(dir, options) };
  }

  /**
   * Writes `index` as a new generation and makes it current.
   */
  async commit(
    issueId: string,
    index: VectorIndex,
    metadata: Omit<KnowledgeBaseMetadata, 'generation'>,
  ): Promise<string> {
    const previous = this.currentGeneration(issueId);
    const generation = newGenerationId();
    const dir = this.generationDir(issueId, generation);

    try {
      await writeIndexFiles(dir, index, { ...metadata, generation });
    } catch (error) {
      await remove(dir);
      throw new StorageError(`Failed to write knowledge base generation for issue "${issueId}"`, {
        cause: error,
      });
    }
    await atomicWrite(this.currentPath(issueId), generation + '\n');
    try {
      await this.pruneGenerations(issueId, generation, previous);
    } catch (error) {
      // The new generation is already current; leftovers go with the next commit.
      await this.logger.warn(
        `Could not prune old knowledge base generations of issue "${issueId}": ` +
          (error instanceof Error ? error.message : String(error)),
      );
    }
    return generation;
  }

  async readStatus(issueId: string): Promise<BuildStatus | null> {
    const raw = await readJsonIfExists(this.workspace.buildStatusPath(issueId));
    if (raw === null) return null;
    const parsed = BuildStatusSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  async writeStatus(issueId: string, status: BuildStatus): Promise<void> {
    await atomicWriteJson(this.workspace.buildStatusPath(issueId), status);
  }

  /**
   * Removes generations older than `previous`, the one that was current before
   * `generation` was committed. Generation ids sort by creation time; names
   * that are not generation ids and generations newer than `generation` are
   * left alone.
   */
  async pruneGenerations(issueId: string, generation: string, previous: string | null): Promise<string[]> {
    if (previous === null) return [];
    const root = join(this.workspace.kbDir(issueId), GENERATIONS_DIR);
    if (!(await pathExists(root))) return [];
    const removed: string[] = [];
    for (const name of (await fs.readdir(root)).sort()) {
      if (!GENERATION_PATTERN.test(name) || name >= previous || name >= generation) continue;
      await remove(join(root, name));
      removed.push(name);
    }
    return removed;
  }
}
