export type BuildMode = 'rebuild' | 'append' | 'unchanged';

/**
 * Outcome of one knowledge base build, successful or not. Attached to
 * `BuildFailureError` and `BuildCancelledError` so callers can decide whether
 * to retry.
 */
export interface BuildReport {
  issueId: string;
  /** The model the build embedded with; the active model after a successful commit. */
  modelId: string;
  mode: BuildMode;
  /** Chunks in the resulting knowledge base */
  chunksProcessed: number;
  /** Chunks that were not in the committed index before this build (all of them on a forced rebuild) */
  newChunks: number;
  cacheHits: number;
  cacheMisses: number;
  /** Cache misses satisfied by vectors already in the committed index */
  reusedFromIndex: number;
  /** Distinct texts sent to the provider */
  embeddedTexts: number;
  /** Texts left without a vector after retries */
  embeddingFailures: number;
  failedBatches: number;
  sourceFiles: string[];
  /** Committed generation, or null when nothing was committed */
  generation: string | null;
  durationMs: number;
}

export type BuildPhase =
  | 'collecting'
  | 'chunking'
  | 'resolving'
  | 'embedding'
  | 'committing'
  | 'complete';

export interface BuildProgress {
  phase: BuildPhase;
  /** 0-100 across the whole build */
  percent: number;
  message: string;
}

export interface UpdateRequest {
  issueId: string;
  /** Defaults to `config.embeddings.modelId` */
  modelId?: string;
  forceRebuild?: boolean;
  /** Cancels the build between embedding batches */
  signal?: AbortSignal;
  onProgress?: (progress: BuildProgress) => void;
}

export type BuildOutcome = 'succeeded' | 'failed' | 'cancelled';

export interface BuildStatus {
  status: BuildOutcome;
  startedAt: string;
  finishedAt: string;
  report: BuildReport;
  error?: string;
}
