/**
 * Embedder Orchestration
 *
 * Attaches vectors to chunks. Requests are grouped by the provider's
 * batch size and run under a concurrency limit. A batch rejected for its
 * content is retried one chunk at a time so a single bad chunk does not sink
 * its neighbours; a batch lost to an outage or to authentication fails as a
 * whole, since every chunk would meet the same error. Chunks that still
 * fail are reported through onError and left out.
 */

import pLimit from 'p-limit';

import { AuthenticationError, EmbeddingServiceError } from '../../errors/index.js';
import type { EmbedderOptions, EmbeddingProvider } from './types.js';

const DEFAULT_CONCURRENCY = 4;

export type Embedded<T> = T & { embedding: number[] };

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Failures that do not depend on which texts were sent */
function isServiceFailure(error: unknown): boolean {
  return (
    error instanceof AuthenticationError ||
    (error instanceof EmbeddingServiceError && error.transient)
  );
}

/**
 * Embed `chunks` and return the ones that succeeded, in input order.
 *
 * @example
 * ```typescript
 * const embedded = await embedChunks(chunkDocument(text), client, {
 *   concurrency: 4,
 *   onError: (error, i) => logger.warn(`chunk ${i}: ${error.message}`),
 * });
 * ```
 */
export async function embedChunks<T extends { content: string }>(
  chunks: T[],
  provider: EmbeddingProvider,
  options: EmbedderOptions = {}
): Promise<Array<Embedded<T>>> {
  const { concurrency = DEFAULT_CONCURRENCY, onProgress, onError } = options;

  if (chunks.length === 0) {
    return [];
  }

  const limit = pLimit(Math.max(1, concurrency));
  const batchSize = Math.max(1, provider.maxBatchSize);
  const vectors = new Array<number[] | undefined>(chunks.length);
  let processed = 0;

  const settle = (count: number) => {
    processed += count;
    onProgress?.(processed, chunks.length);
  };

  const embedOne = async (index: number, chunk: T) => {
    try {
      const result = await provider.embed(chunk.content);
      vectors[index] = result.embedding;
    } catch (error) {
      onError?.(toError(error), index);
    }
    settle(1);
  };

  const tasks: Array<Promise<void>> = [];
  for (let start = 0; start < chunks.length; start += batchSize) {
    const batch = chunks.slice(start, start + batchSize);

    tasks.push(
      limit(async () => {
        if (batch.length === 1) {
          await embedOne(start, batch[0]);
          return;
        }
        try {
          const results = await provider.embedBatch(batch.map((chunk) => chunk.content));
          results.forEach((result, offset) => {
            vectors[start + offset] = result.embedding;
          });
          settle(batch.length);
        } catch (error) {
          if (isServiceFailure(error)) {
            batch.forEach((_, offset) => onError?.(toError(error), start + offset));
            settle(batch.length);
            return;
          }
          for (const [offset, chunk] of batch.entries()) {
            await embedOne(start + offset, chunk);
          }
        }
      })
    );
  }

  await Promise.all(tasks);

  const embedded: Array<Embedded<T>> = [];
  chunks.forEach((chunk, index) => {
    const embedding = vectors[index];
    if (embedding !== undefined) {
      embedded.push({ ...chunk, embedding });
    }
  });
  return embedded;
}
