/**
 * Embedder Types
 *
 * The pipeline and retriever only see `EmbeddingProvider`; which backend
 * (direct or orchestration) answers the call is the client's business.
 */

import type { Logger } from '../../utils/index.js';

/**
 * One embedded text.
 */
export interface EmbeddingResult {
  embedding: number[];
  model: string;
}

/**
 * Anything that turns text into fixed-size vectors.
 * Tests implement this with deterministic fakes.
 */
export interface EmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  /** Largest number of texts sent in one request */
  readonly maxBatchSize: number;
  embed(text: string): Promise<EmbeddingResult>;
  /** One result per input, in input order */
  embedBatch(texts: string[]): Promise<EmbeddingResult[]>;
  isAvailable(): Promise<boolean>;
}

/** Signature of the global fetch, injectable for tests */
export type FetchFn = typeof fetch;

/**
 * Bounded retry with exponential backoff.
 * Attempt n (0-based) that fails transiently waits `baseDelayMs * 2^n`.
 */
export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

/**
 * Which endpoint shape serves embeddings. Chosen once per client.
 */
export type EmbeddingBackend =
  | {
      kind: 'direct';
      deploymentId: string;
      /** `{base}/v2/inference/deployments/{id}/embeddings` */
      url: string;
      model: string;
      dimensions: number;
    }
  | {
      kind: 'orchestration';
      deploymentId: string;
      /** `{orchestrationUrl}/v2/inference/deployments/{id}/v2/embeddings` */
      url: string;
      model: string;
      dimensions: number;
    };

export type BackendKind = EmbeddingBackend['kind'];

/**
 * Everything the embedding client needs. Missing required values raise
 * ConfigurationError at construction.
 */
export interface EmbeddingClientOptions {
  baseUrl?: string;
  authUrl?: string;
  clientId?: string;
  clientSecret?: string;
  resourceGroup?: string;
  embeddingDeploymentId?: string;
  orchestrationDeploymentId?: string;
  /** Defaults to baseUrl */
  orchestrationUrl?: string;
  model?: string;
  dimensions?: number;
  batchSize?: number;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  /** Refresh margin; 10% of the token lifetime when omitted */
  tokenMarginSeconds?: number;
  fetch?: FetchFn;
  /** Replaces the real delay between attempts (tests) */
  sleep?: (ms: number) => Promise<void>;
  /** Clock in milliseconds (tests) */
  now?: () => number;
  logger?: Logger;
}

/**
 * Options for the embedChunks orchestration function.
 */
export interface EmbedderOptions {
  /** Concurrent embedding requests (default 4) */
  concurrency?: number;
  /** Fired after each chunk settles */
  onProgress?: (processed: number, total: number) => void;
  /** Non-fatal: the chunk is left out and processing continues */
  onError?: (error: Error, chunkIndex: number) => void;
}
