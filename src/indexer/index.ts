/**
 * Indexer Module
 *
 * Everything on the write path: file discovery, web crawling, chunking,
 * embedding and the ingestion pipeline that ties them to storage.
 *
 * @example
 * ```ts
 * import { IngestionPipeline } from './indexer/index.js';
 *
 * const pipeline = new IngestionPipeline({ embedder, pages, codeExamples, sources, logger });
 * let report = await pipeline.ingestLocalBatch('./docs', { batchSize: 10 });
 * while (report.nextFile) {
 *   report = await pipeline.ingestLocalBatch('./docs', { batchSize: 10, startFrom: report.nextFile });
 * }
 * ```
 */

export {
  IngestionPipeline,
  webSourceKey,
  localSourceKey,
  pageSummary,
  crawlSummary,
  DEFAULT_PIPELINE_SETTINGS,
  DEFAULT_BATCH_SIZE,
} from './pipeline.js';

export { scanPath, parseExtensions, comparePaths } from './scanner.js';

export {
  DEFAULT_FILE_EXTENSIONS,
  type FileInfo,
  type ScanOptions,
  type ScanResult,
  type SourceDocument,
  type DocumentOutcome,
  type SourceOutcome,
  type IngestionReport,
  type BatchStatus,
  type BatchReport,
  type ProgressOptions,
  type LocalIngestOptions,
  type BatchIngestOptions,
  type PageIngestOptions,
  type PipelineSettings,
  type PipelineDependencies,
} from './types.js';
