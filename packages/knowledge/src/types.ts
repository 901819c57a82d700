/**
 * A bounded span of one log file, the unit that is embedded and retrieved.
 */
export interface Chunk {
  /** Deterministic from (sourceFile, lineStart, lineEnd) */
  chunkId: string;
  sourceFile: string;
  /** 1-based, inclusive */
  lineStart: number;
  /** 1-based, inclusive */
  lineEnd: number;
  text: string;
  /** sha256 of `text`; the embedding cache key together with the model id */
  contentHash: string;
  /** Earliest and latest timestamps found in `text`, normalized to ISO 8601 */
  timestampRange: [string, string] | null;
}

export interface ChunkingOptions {
  chunkSize: number;
  overlap: number;
}

/** A chunk together with the vector it is indexed under. */
export interface IndexEntry {
  chunk: Chunk;
  vector: ArrayLike<number>;
}

export interface SearchHit extends Chunk {
  /** Cosine similarity in [-1, 1] */
  score: number;
}
