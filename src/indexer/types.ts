/**
 * Indexer Types
 *
 * File discovery and ingestion result shapes shared by the scanner, the
 * pipeline, the tool layer and the CLI.
 */

import type { DocumentStore, SourceRegistry, UpsertResult } from '../database/index.js';
import type { EmbeddingProvider } from './embedder/index.js';
import type { Logger } from '../utils/index.js';

/** Extensions scanned when none are given */
export const DEFAULT_FILE_EXTENSIONS = ['.md', '.txt', '.html', '.rst'];

/**
 * Metadata about a discovered file.
 */
export interface FileInfo {
  /** Absolute path to the file */
  path: string;

  /** Path relative to the scanned root */
  relativePath: string;

  /** File name with extension */
  name: string;

  /** Lowercase extension with the leading dot (e.g. '.md') */
  extension: string;

  /** File size in bytes */
  size: number;
}

export interface ScanOptions {
  /** Descend into subdirectories (default true) */
  recursive?: boolean;

  /** Extensions with leading dot; DEFAULT_FILE_EXTENSIONS when omitted */
  extensions?: string[];

  /** Follow symlinks during traversal (default false) */
  followSymlinks?: boolean;
}

export interface ScanResult {
  /** Absolute root that was scanned */
  rootPath: string;

  /** True when the root is a single file */
  isFile: boolean;

  /** Matching files sorted by absolute path */
  files: FileInfo[];
}

// ============================================================================
// Ingestion
// ============================================================================

/**
 * One document on its way into storage: a local file or a fetched page.
 */
export interface SourceDocument {
  /** Web URL or file:// URI; chunks are replaced per origin */
  origin: string;
  content: string;
  sourceType: 'local_file' | 'webpage';
  title?: string;
  filePath?: string;
  fileName?: string;
  fileExtension?: string;
}

/**
 * What happened to one document.
 */
export interface DocumentOutcome {
  origin: string;
  status: 'processed' | 'skipped' | 'failed';
  chunks: number;
  chunksStored: number;
  chunksFailed: number;
  codeExamplesStored: number;
  wordCount: number;
  charCount: number;
  error?: string;
}

export type SourceOutcome =
  | { outcome: UpsertResult['outcome']; totalWordCount: number }
  | { outcome: 'skipped' }
  | { outcome: 'failed'; error: string };

/**
 * Totals of one ingestion call.
 */
export interface IngestionReport {
  sourceId: string;
  /** True unless the source could not be written or verified */
  ok: boolean;
  documentsProcessed: number;
  documentsFailed: number;
  documentsSkipped: number;
  chunksStored: number;
  chunksFailed: number;
  codeExamplesStored: number;
  wordCount: number;
  charCount: number;
  source: SourceOutcome;
  documents: DocumentOutcome[];
}

export type BatchStatus = 'ALL_FILES_PROCESSED' | 'MORE_FILES_REMAINING' | 'BATCH_COMPLETED';

export interface BatchReport extends IngestionReport {
  status: BatchStatus;
  totalFiles: number;
  batchSize: number;
  startIndex: number;
  /** Exclusive */
  endIndex: number;
  remainingFiles: number;
  /** Checkpoint for the next call; null when the corpus is exhausted */
  nextFile: string | null;
  /** Set when start_from was given but not found */
  checkpointMissed: boolean;
}

/**
 * Fired once per document after it settles, in completion order.
 */
export interface ProgressOptions {
  onDocument?: (outcome: DocumentOutcome, completed: number, total: number) => void;
}

export interface LocalIngestOptions extends ProgressOptions {
  recursive?: boolean;
  extensions?: string[];
}

export interface BatchIngestOptions extends LocalIngestOptions {
  batchSize?: number;
  /** Absolute or relative path of the first file of this batch */
  startFrom?: string;
}

export interface PageIngestOptions extends ProgressOptions {
  sourceKey: string;
  summary: string;
}

/**
 * Pipeline tunables; defaults mirror the [chunking] and [ingestion]
 * config sections.
 */
export interface PipelineSettings {
  chunkSize: number;
  chunkOverlap: number;
  maxConcurrentFiles: number;
  maxConcurrentChunks: number;
  extractCodeExamples: boolean;
  minCodeLength: number;
}

export interface PipelineDependencies {
  embedder: EmbeddingProvider;
  pages: DocumentStore;
  codeExamples: DocumentStore;
  sources: SourceRegistry;
  settings?: Partial<PipelineSettings>;
  logger?: Logger;
  /** Clock for crawled_at (tests) */
  now?: () => Date;
}
