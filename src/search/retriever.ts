/**
 * Retriever
 *
 * Embed the query, let the backend rank rows by cosine similarity, and
 * return them in the backend's order with content cut to an excerpt.
 */

import { getErrorMessage } from '../errors/index.js';
import type { DocumentStore, MatchRow } from '../database/index.js';
import type { EmbeddingProvider } from '../indexer/embedder/index.js';
import { silentLogger, type Logger } from '../utils/index.js';
import type { QueryOptions, RetrievalOutcome, RetrievalResult, RetrieverOptions } from './types.js';

export const DEFAULT_MATCH_COUNT = 5;
export const MAX_MATCH_COUNT = 50;
export const DEFAULT_EXCERPT_LENGTH = 1000;

/**
 * Normalize a requested result count.
 *
 * Fractions are floored first; missing, non-numeric and non-positive
 * values fall back to `fallback`; anything above 50 becomes 50.
 *
 * @example
 * ```ts
 * clampMatchCount(undefined) // 5
 * clampMatchCount(7.9)       // 7
 * clampMatchCount(500)       // 50
 * ```
 */
export function clampMatchCount(value: unknown, fallback = DEFAULT_MATCH_COUNT): number {
  let numeric = Number.NaN;
  if (typeof value === 'number') {
    numeric = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    numeric = Number(value);
  }

  if (!Number.isFinite(numeric)) return fallback;
  const floored = Math.floor(numeric);
  if (floored <= 0) return fallback;
  return Math.min(floored, MAX_MATCH_COUNT);
}

function toResult(row: MatchRow, excerptLength: number): RetrievalResult {
  return {
    url: row.url,
    chunkNumber: row.chunk_number,
    content: row.content.slice(0, excerptLength),
    metadata: row.metadata ?? {},
    sourceId: row.source_id,
    similarity: row.similarity,
    ...(row.summary ? { summary: row.summary } : {}),
  };
}

export class Retriever {
  private readonly excerptLength: number;
  private readonly defaultMatchCount: number;
  private readonly logger: Logger;

  constructor(
    private readonly embedder: EmbeddingProvider,
    private readonly pages: DocumentStore,
    private readonly codeExamples: DocumentStore,
    options: RetrieverOptions = {}
  ) {
    this.excerptLength = options.excerptLength ?? DEFAULT_EXCERPT_LENGTH;
    this.defaultMatchCount = clampMatchCount(options.defaultMatchCount);
    this.logger = options.logger ?? silentLogger;
  }

  /** Search document chunks */
  query(text: string, options: QueryOptions = {}): Promise<RetrievalOutcome> {
    return this.search(this.pages, text, options);
  }

  /** Search stored code examples */
  searchCodeExamples(text: string, options: QueryOptions = {}): Promise<RetrievalOutcome> {
    return this.search(this.codeExamples, text, options);
  }

  private async search(store: DocumentStore, text: string, options: QueryOptions): Promise<RetrievalOutcome> {
    const query = text.trim();
    if (!query) {
      return { ok: false, query: text, error: 'Query cannot be empty' };
    }

    const source = options.source?.trim() || null;
    const matchCount = clampMatchCount(options.matchCount, this.defaultMatchCount);

    let embedding: number[];
    try {
      embedding = (await this.embedder.embed(query)).embedding;
    } catch (error) {
      this.logger.warn(`Query embedding failed: ${getErrorMessage(error)}`);
      return { ok: false, query, error: `Failed to embed query: ${getErrorMessage(error)}` };
    }

    try {
      const rows = await store.match(embedding, matchCount, source ?? undefined);
      this.logger.debug?.(`${rows.length} matches for "${query}"${source ? ` in ${source}` : ''}`);
      return {
        ok: true,
        query,
        source,
        matchCount,
        results: rows.map((row) => toResult(row, this.excerptLength)),
      };
    } catch (error) {
      return { ok: false, query, error: getErrorMessage(error) };
    }
  }
}
