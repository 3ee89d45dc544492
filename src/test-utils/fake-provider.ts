/**
 * Deterministic EmbeddingProvider for pipeline and retrieval tests that do
 * not care about the HTTP layer.
 */

import { EmbeddingServiceError } from '../errors/index.js';
import type { EmbeddingProvider, EmbeddingResult } from '../indexer/embedder/index.js';
import { fakeEmbedding } from './fake-inference.js';

export interface FakeProviderOptions {
  dimensions?: number;
  maxBatchSize?: number;
  /** Texts containing any of these strings fail to embed */
  failOn?: string[];
  /** Fail every call the way an exhausted outage does */
  unavailable?: boolean;
}

export function createFakeProvider(
  options: FakeProviderOptions = {}
): EmbeddingProvider & { calls: string[][] } {
  const { dimensions = 8, maxBatchSize = 16, failOn = [], unavailable = false } = options;
  const calls: string[][] = [];

  const embedOne = (text: string): EmbeddingResult => {
    if (unavailable) {
      throw new EmbeddingServiceError('Embedding service unavailable', 503, true);
    }
    if (failOn.some((bad) => text.includes(bad))) {
      throw new Error(`Cannot embed: ${text.slice(0, 20)}`);
    }
    return { embedding: fakeEmbedding(text, dimensions), model: 'fake-model' };
  };

  return {
    name: 'fake',
    dimensions,
    maxBatchSize,
    calls,

    async embed(text: string): Promise<EmbeddingResult> {
      calls.push([text]);
      return embedOne(text);
    },

    async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
      calls.push(texts);
      return texts.map(embedOne);
    },

    async isAvailable(): Promise<boolean> {
      return !unavailable;
    },
  };
}
