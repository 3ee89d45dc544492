/**
 * Service Container
 *
 * Wires config and environment settings into the storage, crawling,
 * ingestion and retrieval objects shared by the CLI and the tool server.
 *
 * The embedding client is built on first use so commands that only touch
 * storage (sources, remove) run without inference credentials.
 */

import type { Config, InferenceSettings, StorageSettings } from './config/index.js';
import { DocumentStore, SourceRegistry, StorageGateway } from './database/index.js';
import { WebCrawler } from './indexer/crawler/index.js';
import { createEmbeddingProvider, type EmbeddingProvider, type FetchFn } from './indexer/embedder/index.js';
import { IngestionPipeline, parseExtensions } from './indexer/index.js';
import { Retriever } from './search/index.js';
import { silentLogger, type Logger } from './utils/index.js';

export interface ServicesOptions {
  storage: StorageSettings;
  inference: InferenceSettings;
  logger?: Logger;
  /** Per-destination fetch overrides (tests) */
  fetch?: {
    storage?: FetchFn;
    inference?: FetchFn;
    web?: FetchFn;
  };
  /** Use this provider instead of building the embedding client */
  embedder?: EmbeddingProvider;
  now?: () => Date;
}

export class Services {
  readonly gateway: StorageGateway;
  readonly pages: DocumentStore;
  readonly codeExamples: DocumentStore;
  readonly sources: SourceRegistry;
  readonly crawler: WebCrawler;
  readonly logger: Logger;

  private embedderInstance: EmbeddingProvider | undefined;
  private pipelineInstance: IngestionPipeline | undefined;
  private retrieverInstance: Retriever | undefined;

  constructor(
    readonly config: Config,
    private readonly options: ServicesOptions
  ) {
    this.logger = options.logger ?? silentLogger;
    this.embedderInstance = options.embedder;

    this.gateway = new StorageGateway({
      url: options.storage.url,
      serviceKey: options.storage.serviceKey,
      fetch: options.fetch?.storage,
      logger: this.logger,
    });
    const writeBatchSize = config.ingestion.write_batch_size;
    this.pages = new DocumentStore(this.gateway, 'crawled_pages', { writeBatchSize });
    this.codeExamples = new DocumentStore(this.gateway, 'code_examples', { writeBatchSize });
    this.sources = new SourceRegistry(this.gateway, {
      pages: this.pages,
      codeExamples: this.codeExamples,
      now: options.now,
    });
    this.crawler = new WebCrawler({
      fetch: options.fetch?.web,
      timeoutMs: config.crawl.timeout_ms,
      userAgent: config.crawl.user_agent,
      logger: this.logger,
    });
  }

  /**
   * @throws ConfigurationError when inference settings are incomplete
   */
  get embedder(): EmbeddingProvider {
    this.embedderInstance ??= createEmbeddingProvider(this.config.embedding, this.options.inference, {
      fetch: this.options.fetch?.inference,
      logger: this.logger,
    });
    return this.embedderInstance;
  }

  get pipeline(): IngestionPipeline {
    const { chunking, ingestion } = this.config;
    this.pipelineInstance ??= new IngestionPipeline({
      embedder: this.embedder,
      pages: this.pages,
      codeExamples: this.codeExamples,
      sources: this.sources,
      settings: {
        chunkSize: chunking.chunk_size,
        chunkOverlap: chunking.chunk_overlap,
        maxConcurrentFiles: ingestion.max_concurrent_files,
        maxConcurrentChunks: ingestion.max_concurrent_chunks,
        extractCodeExamples: ingestion.extract_code_examples,
        minCodeLength: ingestion.min_code_length,
      },
      logger: this.logger,
      now: this.options.now,
    });
    return this.pipelineInstance;
  }

  get retriever(): Retriever {
    this.retrieverInstance ??= new Retriever(this.embedder, this.pages, this.codeExamples, {
      excerptLength: this.config.search.excerpt_length,
      defaultMatchCount: this.config.search.match_count,
      logger: this.logger,
    });
    return this.retrieverInstance;
  }

  /** Extensions from `csv`, or the configured default list */
  extensions(csv?: string): string[] {
    return parseExtensions(csv?.trim() ? csv : this.config.ingestion.file_extensions);
  }
}
