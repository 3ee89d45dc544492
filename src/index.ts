/**
 * doc-retriever - Library Entry Point
 *
 * The CLI (`docr`) covers most uses:
 * ```bash
 * docr crawl https://docs.example.com/sitemap.xml
 * docr ingest ./docs
 * docr query "how do retries work"
 * docr serve                       # tools over JSON-RPC on stdio
 * ```
 *
 * This module exposes the same building blocks for embedding the pipeline
 * in another program.
 *
 * @example Ingest and search from code
 * ```typescript
 * import { Services, loadConfig, getStorageSettings, getInferenceSettings } from 'doc-retriever';
 *
 * const services = new Services(loadConfig(), {
 *   storage: getStorageSettings(),
 *   inference: getInferenceSettings(),
 * });
 * await services.pipeline.ingestLocalFiles('./docs');
 * const outcome = await services.retriever.query('authentication');
 * ```
 *
 * @packageDocumentation
 */

export { Services, type ServicesOptions } from './services.js';
export { VERSION } from './version.js';

export {
  loadConfig,
  getStorageSettings,
  getInferenceSettings,
  DEFAULT_CONFIG,
  type Config,
  type StorageSettings,
  type InferenceSettings,
} from './config/index.js';

export {
  StorageGateway,
  DocumentStore,
  SourceRegistry,
  type ChunkRecord,
  type SourceRecord,
  type RemoveSourceResult,
} from './database/index.js';

export {
  IngestionPipeline,
  webSourceKey,
  localSourceKey,
  type IngestionReport,
  type BatchReport,
} from './indexer/index.js';
export { WebCrawler, type CrawlResult, type FetchedPage } from './indexer/crawler/index.js';
export { createEmbeddingProvider, type EmbeddingProvider } from './indexer/embedder/index.js';
export { Retriever, type RetrievalResult, type RetrievalOutcome } from './search/index.js';
export { createToolServer, serveStdio, RpcServer, ToolRegistry, createTools } from './server/index.js';

export * from './errors/index.js';
export type { Logger } from './utils/index.js';
