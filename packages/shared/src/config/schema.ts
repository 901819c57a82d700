import { z } from 'zod';

export const DEFAULT_MODEL_ID = 'local-hash:feature:384';

export const ChunkingConfigSchema = z
  .object({
    chunkSize: z.number().int().positive().default(800),
    overlap: z.number().int().min(0).default(100),
  })
  .refine((data) => data.overlap < data.chunkSize, {
    message: 'chunking.overlap must be strictly less than chunking.chunkSize',
    path: ['overlap'],
  });

export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  initialDelayMs: z.number().min(0).default(1000),
  maxDelayMs: z.number().min(0).default(10000),
  backoffFactor: z.number().min(1).default(2),
});

export const EmbeddingsConfigSchema = z.object({
  /** `<provider>:<model>:<dims>`, e.g. `openai:text-embedding-3-small:1536` */
  modelId: z.string().min(1).default(DEFAULT_MODEL_ID),
  batchSize: z.number().int().positive().default(32),
  /** Concurrent provider requests per model, shared by every build. */
  concurrency: z.number().int().positive().default(2),
  /** Applies to each provider call, not to a whole build. */
  timeoutMs: z.number().int().positive().default(30000),
  apiKeyEnv: z.string().default('OPENAI_API_KEY'),
  retry: RetryConfigSchema.default({}),
});

export const KnowledgeBaseConfigSchema = z.object({
  rootDir: z.string().default('./data'),
  chunking: ChunkingConfigSchema.default({}),
  retrieval: z
    .object({
      topK: z.number().int().positive().default(5),
    })
    .default({}),
  embeddings: EmbeddingsConfigSchema.default({}),
  cache: z
    .object({
      enabled: z.boolean().default(true),
    })
    .default({}),
  index: z
    .object({
      /** Committed vector files above this size are read page by page. */
      inMemoryMaxBytes: z.number().int().min(0).default(64 * 1024 * 1024),
      pageSizeVectors: z.number().int().positive().default(256),
      maxCachedPages: z.number().int().positive().default(64),
      /** Committed snapshots the retriever keeps open. */
      maxOpenSnapshots: z.number().int().positive().default(8),
    })
    .default({}),
  logFiles: z
    .object({
      extensions: z.array(z.string()).default(['.log', '.txt', '.jsonl']),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
      traceFile: z.string().optional(),
    })
    .default({}),
});

export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type KnowledgeBaseConfig = z.infer<typeof KnowledgeBaseConfigSchema>;
export type KnowledgeBaseConfigInput = z.input<typeof KnowledgeBaseConfigSchema>;

/**
 * Fully-defaulted configuration, handy for tests and programmatic callers.
 */
export function defaultConfig(overrides: KnowledgeBaseConfigInput = {}): KnowledgeBaseConfig {
  return KnowledgeBaseConfigSchema.parse(overrides);
}
