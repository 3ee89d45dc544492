/**
 * Storage Types
 *
 * Row shapes of the three tables behind the PostgREST endpoint:
 * `crawled_pages`, `code_examples` and `sources`.
 */

import { z } from 'zod';

import type { Logger } from '../utils/index.js';
import type { FetchFn } from '../indexer/embedder/index.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/** A JSON object row as PostgREST returns it */
export type Row = Record<string, unknown>;

export interface StorageGatewayOptions {
  /** PostgREST base URL */
  url: string;
  /** Sent as both `Authorization: Bearer` and `apikey` */
  serviceKey?: string;
  fetch?: FetchFn;
  timeoutMs?: number;
  logger?: Logger;
}

export interface StorageRequestOptions {
  /** PostgREST `Prefer` header, e.g. `return=representation` */
  prefer?: string;
  timeoutMs?: number;
}

export type DocumentTable = 'crawled_pages' | 'code_examples';

/**
 * Attributes stored in the `metadata` jsonb column.
 */
export interface ChunkMetadata {
  source_type: 'local_file' | 'webpage';
  chunk_start: number;
  chunk_end: number;
  chunk_count: number;
  word_count: number;
  char_count: number;
  crawled_at: string;
  file_path?: string;
  file_name?: string;
  file_extension?: string;
  title?: string;
  language?: string;
  [key: string]: unknown;
}

/**
 * One row to insert into `crawled_pages` or `code_examples`.
 */
export interface ChunkRecord {
  /** Origin: web URL or file:// URI */
  url: string;
  chunk_number: number;
  content: string;
  metadata: ChunkMetadata;
  source_id: string;
  embedding: number[];
  /** code_examples only */
  summary?: string;
}

export const MatchRowSchema = z.object({
  id: z.number().optional(),
  url: z.string(),
  chunk_number: z.number().int(),
  content: z.string(),
  summary: z.string().nullable().optional(),
  metadata: z.record(z.unknown()).nullable().optional(),
  source_id: z.string(),
  similarity: z.number(),
});

/** One ranked row from a match_* RPC */
export type MatchRow = z.infer<typeof MatchRowSchema>;

export const SourceRowSchema = z.object({
  source_id: z.string(),
  summary: z.string().nullable().optional(),
  total_word_count: z.number().int().nullable().optional(),
  created_at: z.string().nullable().optional(),
  updated_at: z.string().nullable().optional(),
});

export interface SourceRecord {
  source_id: string;
  summary: string | null;
  total_word_count: number;
  created_at?: string;
  updated_at?: string;
}

export type UpsertMode = 'accumulate' | 'replace';

export interface UpsertResult {
  outcome: 'created' | 'updated';
  source: SourceRecord;
}

export interface InsertReport {
  stored: number;
  failed: number;
  errors: string[];
}

export interface RemoveSourceResult {
  sourceId: string;
  chunksDeleted: number;
  codeExamplesDeleted: number;
  sourceDeleted: boolean;
}
