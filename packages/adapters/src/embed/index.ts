export * from './embedder';
export * from './model-id';
export * from './factory';
export * from './adapter';
export { OpenAIEmbedder } from './openai_embedder';
export type { OpenAIEmbedderConfig } from './openai_embedder';
export { LocalHashEmbedder } from './local_hash_embedder';
export { CachingEmbedder } from './caching_embedder';
