/**
 * Base interface for all logkb events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the build or query that produced the event */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when a knowledge base build acquires the issue lock and starts. */
export interface KnowledgeBaseBuildStarted extends BaseEvent {
  type: 'KnowledgeBaseBuildStarted';
  payload: {
    issueId: string;
    modelId: string;
    forceRebuild: boolean;
  };
}

/** Emitted after a build commits (or finds nothing to commit). */
export interface KnowledgeBaseBuildFinished extends BaseEvent {
  type: 'KnowledgeBaseBuildFinished';
  payload: {
    issueId: string;
    modelId: string;
    mode: 'rebuild' | 'append' | 'unchanged';
    chunksProcessed: number;
    cacheHits: number;
    cacheMisses: number;
    generation: string | null;
    durationMs: number;
  };
}

/** Emitted when a build fails or is cancelled without committing. */
export interface KnowledgeBaseBuildFailed extends BaseEvent {
  type: 'KnowledgeBaseBuildFailed';
  payload: {
    issueId: string;
    modelId: string;
    reason: 'failed' | 'cancelled';
    embeddingFailures: number;
    failedBatches: number;
    error: string;
    durationMs: number;
  };
}

/** Emitted for every embedding batch, successful or not. */
export interface EmbeddingBatchFinished extends BaseEvent {
  type: 'EmbeddingBatchFinished';
  payload: {
    modelId: string;
    batchIndex: number;
    batchCount: number;
    size: number;
    success: boolean;
    error?: string;
  };
}

/** Emitted when a provider API request starts */
export interface ProviderRequestStarted extends BaseEvent {
  type: 'ProviderRequestStarted';
  payload: {
    provider: string;
    model: string;
  };
}

/**
 * Emitted when a provider API request completes (success or failure).
 */
export interface ProviderRequestFinished extends BaseEvent {
  type: 'ProviderRequestFinished';
  payload: {
    provider: string;
    durationMs: number;
    success: boolean;
    error?: string;
    /** Number of retry attempts made (0 = succeeded on first try) */
    retries: number;
  };
}

/** Emitted when a cache write is rejected because the stored vector differs. */
export interface CacheConsistencyViolation extends BaseEvent {
  type: 'CacheConsistencyViolation';
  payload: {
    contentHash: string;
    modelId: string;
  };
}

/** Emitted after a similarity search over an issue's knowledge base. */
export interface RetrievalFinished extends BaseEvent {
  type: 'RetrievalFinished';
  payload: {
    issueId: string;
    modelId: string;
    topK: number;
    hitCount: number;
    candidateCount: number;
    durationMs: number;
  };
}

export type LogkbEvent =
  | KnowledgeBaseBuildStarted
  | KnowledgeBaseBuildFinished
  | KnowledgeBaseBuildFailed
  | EmbeddingBatchFinished
  | ProviderRequestStarted
  | ProviderRequestFinished
  | CacheConsistencyViolation
  | RetrievalFinished;

export type LogkbEventType = LogkbEvent['type'];

/**
 * Common metadata for an event emitted now.
 */
export function eventMeta(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId,
  };
}
