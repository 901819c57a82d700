export interface EmbedOptions {
  /** Aborts the provider call. */
  signal?: AbortSignal;
}

/**
 * A vector-generation backend. Every variant returns one vector per input
 * text, in input order, each of length `dims()`.
 */
export interface Embedder {
  embedTexts(texts: string[], opts?: EmbedOptions): Promise<number[][]>;
  dims(): number;
  /** The model id this embedder was created for. */
  id(): string;
}
