export const name = '@logkb/knowledge';

export * from './types';
export { chunkLogText, chunkIdFor, validateChunkingOptions } from './chunking/chunker';
export { extractTimestamps, timestampRange } from './chunking/timestamps';
export { EmbeddingCache } from './cache/embedding-cache';
export type { CacheStats, PutManyResult, PutOutcome } from './cache/embedding-cache';
export { VectorIndex, cosineSimilarity } from './index/vector-index';
export { InMemoryVectorSource, PagedFileVectorSource } from './index/vector-source';
export type { VectorSource, PagedVectorSourceOptions } from './index/vector-source';
export { loadIndex, readMetadata, writeIndexFiles } from './index/persistence';
export type { IndexReadOptions, KnowledgeBaseMetadata } from './index/persistence';
export { IssueWorkspace, assertIssueId, sanitizeFileName } from './storage/issue-workspace';
export type { IssueManifest, RawFileInfo } from './storage/issue-workspace';
export { KnowledgeBaseStore } from './storage/kb-store';
export type { CommittedKnowledgeBase } from './storage/kb-store';
export { IssueLocks } from './manager/locks';
export { KnowledgeBaseManager } from './manager/manager';
export type { KnowledgeBaseManagerOptions, KnowledgeBaseStatus } from './manager/manager';
export type {
  BuildMode,
  BuildOutcome,
  BuildPhase,
  BuildProgress,
  BuildReport,
  BuildStatus,
  UpdateRequest,
} from './manager/types';
export { Retriever } from './retriever/retriever';
export type { RetrieveOptions, RetrieverOptions } from './retriever/retriever';
