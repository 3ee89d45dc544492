/**
 * Embedder Module
 *
 * Remote embedding generation: OAuth2 token cache, direct/orchestration
 * backends, retry with backoff, and bounded-concurrency chunk embedding.
 *
 * Usage:
 * ```typescript
 * import { createEmbeddingProvider, embedChunks } from './embedder/index.js';
 *
 * const client = createEmbeddingProvider(config.embedding, getInferenceSettings());
 * const embedded = await embedChunks(chunkDocument(text), client, { concurrency: 4 });
 * ```
 */

// Provider factory
export { createEmbeddingProvider, type ProviderOptions } from './provider.js';

// Client and its parts
export { EmbeddingClient, DEFAULT_EMBEDDING_MODEL, DEFAULT_DIMENSIONS } from './client.js';
export { TokenCache, DEFAULT_TOKEN_TTL_SECONDS, type TokenState, type TokenCacheOptions } from './token-cache.js';
export { selectBackend, buildRequestBody, parseVectors, type BackendSettings } from './backends.js';
export {
  withRetry,
  backoffDelay,
  isTransientStatus,
  isTransientFailure,
  sleep,
  HttpStatusError,
  DEFAULT_RETRY_POLICY,
  type RetryOptions,
} from './retry.js';

// Embedder orchestration
export { embedChunks, type Embedded } from './embedder.js';

// Types
export type {
  EmbeddingProvider,
  EmbeddingResult,
  EmbeddingBackend,
  BackendKind,
  EmbeddingClientOptions,
  EmbedderOptions,
  FetchFn,
  RetryPolicy,
} from './types.js';
