/**
 * Search Module Types
 *
 * Result shapes for similarity search over stored chunks and code
 * examples.
 */

import type { Logger } from '../utils/index.js';

/**
 * One ranked chunk, content already cut to the excerpt length.
 */
export interface RetrievalResult {
  /** Origin the chunk came from (web URL or file:// URI) */
  url: string;
  chunkNumber: number;
  content: string;
  /** Stored chunk attributes (file_name, title, chunk_start, ...) */
  metadata: Record<string, unknown>;
  sourceId: string;
  /** Cosine similarity as computed by the backend, higher is closer */
  similarity: number;
  /** Code examples only */
  summary?: string;
}

export interface QueryOptions {
  /** Restrict results to one source_id */
  source?: string;
  /** Clamped with clampMatchCount */
  matchCount?: unknown;
}

/**
 * Retrieval never throws for a failed search; the reason comes back as
 * `error`.
 */
export type RetrievalOutcome =
  | { ok: true; query: string; source: string | null; matchCount: number; results: RetrievalResult[] }
  | { ok: false; query: string; error: string };

export interface RetrieverOptions {
  /** Characters of content kept per result (default 1000) */
  excerptLength?: number;
  /** Used when a call gives no usable match count (default 5) */
  defaultMatchCount?: number;
  logger?: Logger;
}

/**
 * Options for formatting results as text.
 */
export interface FormatOptions {
  /** Characters of the one-line snippet (default 200) */
  snippetLength?: number;
  /** Show the [0.92] prefix (default true) */
  showScore?: boolean;
  /** Show the [source_id] prefix (default false) */
  showSource?: boolean;
}

/**
 * Flat result for `--json` output.
 */
export interface FormattedResultJSON {
  similarity: number;
  url: string;
  chunkNumber: number;
  sourceId: string;
  content: string;
  title?: string;
  summary?: string;
}
