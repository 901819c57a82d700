import type { SearchHit } from '@logkb/knowledge';

/**
 * Text-completion backend the answer is generated with. Opaque to logkb:
 * it receives the assembled prompt and returns the model's raw reply.
 */
export interface TextGenerator {
  generate(prompt: string, options?: { signal?: AbortSignal }): Promise<string>;
}

export interface RagQuery {
  issueId: string;
  question: string;
  /** Defaults to `config.retrieval.topK` */
  topK?: number;
  /** Require the knowledge base to use this embedding model. */
  modelId?: string;
  signal?: AbortSignal;
  /** Set to false to keep this exchange out of the issue's history. */
  record?: boolean;
}

export interface RagResult {
  answer: string;
  /** `file: lines a-b` citations */
  references: string[];
  chunks: SearchHit[];
  metadata: {
    issueId: string;
    question: string;
    topK: number;
    chunksRetrieved: number;
    /** True when the generator failed and the answer only lists the excerpts. */
    fallback: boolean;
    timestamp: string;
    durationMs: number;
  };
}
