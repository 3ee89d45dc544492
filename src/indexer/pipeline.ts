/**
 * Ingestion Pipeline
 *
 * Orchestrates the storage path for every input:
 * Enumerate → Read → Chunk → Embed → Replace chunks → Upsert source
 *
 * Each document is processed under a file-level p-limit; its chunk
 * embeddings run under a second limit inside it. Per-document failures are
 * caught and counted, so a batch always settles with a report.
 *
 * Chunks are replaced per origin: the previous rows for a URL or file are
 * deleted right before the new ones are written.
 */

import { readFile } from 'node:fs/promises';
import { basename, dirname, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import pLimit from 'p-limit';

import { ValidationError, getErrorMessage } from '../errors/index.js';
import type { ChunkRecord, DocumentStore, SourceRegistry, UpsertMode } from '../database/index.js';
import { silentLogger, type Logger } from '../utils/index.js';
import { chunkDocument, countWords, extractCodeBlocks, summarizeCodeBlock } from './chunker/index.js';
import { htmlToText, type CrawlKind, type FetchedPage } from './crawler/index.js';
import { embedChunks, type EmbeddingProvider } from './embedder/index.js';
import { scanPath } from './scanner.js';
import {
  DEFAULT_FILE_EXTENSIONS,
  type BatchIngestOptions,
  type BatchReport,
  type DocumentOutcome,
  type FileInfo,
  type IngestionReport,
  type LocalIngestOptions,
  type PageIngestOptions,
  type PipelineDependencies,
  type PipelineSettings,
  type ProgressOptions,
  type SourceDocument,
  type SourceOutcome,
} from './types.js';

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  chunkSize: 1000,
  chunkOverlap: 200,
  maxConcurrentFiles: 3,
  maxConcurrentChunks: 4,
  extractCodeExamples: false,
  minCodeLength: 1000,
};

export const DEFAULT_BATCH_SIZE = 10;

/**
 * Source key for a web crawl: the URL's host, or its path when it has none.
 */
export function webSourceKey(url: string): string {
  const parsed = new URL(url);
  return parsed.host || parsed.pathname;
}

/**
 * Source key for a local path: `local:<basename of the resolved path>`.
 */
export function localSourceKey(path: string): string {
  return `local:${basename(resolve(path))}`;
}

/** Source summary for a single fetched page */
export function pageSummary(page: Pick<FetchedPage, 'url' | 'title'>): string {
  return page.title ? `${page.title} (${page.url})` : `Content from ${page.url}`;
}

/** Source summary for a multi-page crawl */
export function crawlSummary(kind: CrawlKind, url: string): string {
  return `Crawled ${kind} ${url}`;
}

function emptyOutcome(origin: string, status: DocumentOutcome['status'], error?: string): DocumentOutcome {
  return {
    origin,
    status,
    chunks: 0,
    chunksStored: 0,
    chunksFailed: 0,
    codeExamplesStored: 0,
    wordCount: 0,
    charCount: 0,
    ...(error !== undefined ? { error } : {}),
  };
}

export class IngestionPipeline {
  private readonly embedder: EmbeddingProvider;
  private readonly pages: DocumentStore;
  private readonly codeExamples: DocumentStore;
  private readonly sources: SourceRegistry;
  private readonly settings: PipelineSettings;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: PipelineDependencies) {
    this.embedder = deps.embedder;
    this.pages = deps.pages;
    this.codeExamples = deps.codeExamples;
    this.sources = deps.sources;
    this.settings = { ...DEFAULT_PIPELINE_SETTINGS, ...deps.settings };
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  // ==========================================================================
  // Entry points
  // ==========================================================================

  /**
   * Ingest every matching file under `path` in one call.
   * The source's word count is replaced with this run's total.
   *
   * @throws FileNotFoundError | ValidationError when nothing can be enumerated
   */
  async ingestLocalFiles(path: string, options: LocalIngestOptions = {}): Promise<IngestionReport> {
    const { files, rootPath } = await this.enumerate(path, options);
    const sourceId = localSourceKey(path);

    const documents = await this.processFiles(files, sourceId, options);
    return this.finish(sourceId, `Local files from ${rootPath}`, documents, 'replace');
  }

  /**
   * Ingest one batch of the sorted file list, starting at `startFrom`.
   *
   * Feeding each report's `nextFile` back as `startFrom` walks the whole
   * corpus exactly once. A checkpoint that is not in the list restarts at
   * the first file.
   */
  async ingestLocalBatch(path: string, options: BatchIngestOptions = {}): Promise<BatchReport> {
    const { files, rootPath, isFile } = await this.enumerate(path, options);
    const sourceId = localSourceKey(path);
    const batchSize = Math.max(1, Math.floor(options.batchSize ?? DEFAULT_BATCH_SIZE));

    let startIndex = 0;
    let checkpointMissed = false;
    const checkpoint = options.startFrom?.trim();
    if (checkpoint) {
      const target = resolve(isFile ? dirname(rootPath) : rootPath, checkpoint);
      const found = files.findIndex((file) => file.path === target);
      if (found === -1) {
        checkpointMissed = true;
        this.logger.warn(`Checkpoint ${checkpoint} not found in ${rootPath}; starting from the first file`);
      } else {
        startIndex = found;
      }
    }

    const endIndex = Math.min(startIndex + batchSize, files.length);
    this.logger.info?.(`Batch ${startIndex + 1}-${endIndex} of ${files.length} files`);

    const documents = await this.processFiles(files.slice(startIndex, endIndex), sourceId, options);
    const report = await this.finish(
      sourceId,
      `Local files from ${rootPath}`,
      documents,
      startIndex === 0 ? 'replace' : 'accumulate'
    );

    const remainingFiles = files.length - endIndex;
    const status =
      remainingFiles > 0
        ? 'MORE_FILES_REMAINING'
        : report.documentsFailed > 0
          ? 'BATCH_COMPLETED'
          : 'ALL_FILES_PROCESSED';

    return {
      ...report,
      status,
      totalFiles: files.length,
      batchSize,
      startIndex,
      endIndex,
      remainingFiles,
      nextFile: remainingFiles > 0 ? files[endIndex].path : null,
      checkpointMissed,
    };
  }

  /**
   * Ingest crawled pages under one source. Pages sharing a URL are
   * ingested once.
   */
  async ingestPages(pages: FetchedPage[], options: PageIngestOptions): Promise<IngestionReport> {
    // Redirects can land two requested URLs on one page. Its chunks are
    // written once, from the first copy.
    const unique = new Map<string, FetchedPage>();
    for (const page of pages) {
      if (unique.has(page.url)) {
        this.logger.debug?.(`Skipping duplicate page ${page.url}`);
      } else {
        unique.set(page.url, page);
      }
    }

    const documents: SourceDocument[] = [...unique.values()].map((page) => ({
      origin: page.url,
      content: page.content,
      sourceType: 'webpage',
      ...(page.title ? { title: page.title } : {}),
    }));

    const outcomes = await this.runLimited(
      documents.map((document) => () => this.processDocument(document, options.sourceKey)),
      options
    );
    return this.finish(options.sourceKey, options.summary, outcomes, 'replace');
  }

  // ==========================================================================
  // Per-document work
  // ==========================================================================

  /**
   * Chunk, embed and store one document. Never throws; failures come back
   * as a `failed` outcome.
   */
  async processDocument(document: SourceDocument, sourceId: string): Promise<DocumentOutcome> {
    const { origin } = document;

    if (!document.content.trim()) {
      return emptyOutcome(origin, 'skipped');
    }

    try {
      const chunks = chunkDocument(document.content, {
        maxSize: this.settings.chunkSize,
        overlap: this.settings.chunkOverlap,
      });

      const embedErrors: string[] = [];
      const embedded = await embedChunks(chunks, this.embedder, {
        concurrency: this.settings.maxConcurrentChunks,
        onError: (error, index) => {
          embedErrors.push(error.message);
          this.logger.warn(`Embedding failed for ${origin} chunk ${index}: ${error.message}`);
        },
      });

      const wordCount = countWords(document.content);
      const charCount = document.content.length;
      const outcome: DocumentOutcome = {
        ...emptyOutcome(origin, 'processed'),
        chunks: chunks.length,
        chunksFailed: chunks.length - embedded.length,
      };

      // Old chunks stay in place when nothing new could be embedded
      if (embedded.length === 0) {
        return {
          ...outcome,
          status: 'failed',
          error: `No chunk of ${origin} could be embedded${embedErrors.length > 0 ? `: ${embedErrors[0]}` : ''}`,
        };
      }

      const crawledAt = this.now().toISOString();
      const records: ChunkRecord[] = embedded.map((chunk) => ({
        url: origin,
        chunk_number: chunk.index,
        content: chunk.content,
        metadata: {
          ...this.documentMetadata(document),
          chunk_start: chunk.start,
          chunk_end: chunk.end,
          chunk_count: chunks.length,
          word_count: countWords(chunk.content),
          char_count: chunk.content.length,
          crawled_at: crawledAt,
        },
        source_id: sourceId,
        embedding: chunk.embedding,
      }));

      const removed = await this.pages.deleteByOrigin(origin);
      if (removed > 0) {
        this.logger.debug?.(`Replaced ${removed} previous chunks of ${origin}`);
      }
      const written = await this.pages.insertMany(records);

      const stored = {
        ...outcome,
        chunksStored: written.stored,
        chunksFailed: outcome.chunksFailed + written.failed,
        wordCount,
        charCount,
      };
      if (written.stored === 0) {
        return { ...stored, status: 'failed', wordCount: 0, charCount: 0, error: written.errors[0] };
      }

      if (this.settings.extractCodeExamples) {
        stored.codeExamplesStored = await this.storeCodeExamples(document, sourceId, crawledAt);
      }
      return stored;
    } catch (error) {
      this.logger.warn(`Failed to ingest ${origin}: ${getErrorMessage(error)}`);
      return emptyOutcome(origin, 'failed', getErrorMessage(error));
    }
  }

  /**
   * Replace the code examples of one document. Failures are logged and
   * count as zero stored; the document's chunks are already written.
   */
  private async storeCodeExamples(
    document: SourceDocument,
    sourceId: string,
    crawledAt: string
  ): Promise<number> {
    try {
      const blocks = extractCodeBlocks(document.content, { minLength: this.settings.minCodeLength });
      await this.codeExamples.deleteByOrigin(document.origin);
      if (blocks.length === 0) return 0;

      const examples = blocks.map((block, index) => {
        const summary = summarizeCodeBlock(block);
        return { index, block, summary, content: `${summary}\n\n${block.code}` };
      });
      const embedded = await embedChunks(examples, this.embedder, {
        concurrency: this.settings.maxConcurrentChunks,
        onError: (error, index) =>
          this.logger.warn(`Embedding failed for ${document.origin} code example ${index}: ${error.message}`),
      });

      const written = await this.codeExamples.insertMany(
        embedded.map((example) => ({
          url: document.origin,
          chunk_number: example.index,
          content: example.block.code,
          summary: example.summary,
          metadata: {
            ...this.documentMetadata(document),
            language: example.block.language,
            ...(example.block.heading ? { heading: example.block.heading } : {}),
            chunk_start: 0,
            chunk_end: example.block.code.length,
            chunk_count: blocks.length,
            word_count: countWords(example.block.code),
            char_count: example.block.code.length,
            crawled_at: crawledAt,
          },
          source_id: sourceId,
          embedding: example.embedding,
        }))
      );
      return written.stored;
    } catch (error) {
      this.logger.warn(`Code examples of ${document.origin} not stored: ${getErrorMessage(error)}`);
      return 0;
    }
  }

  private documentMetadata(document: SourceDocument) {
    return {
      source_type: document.sourceType,
      ...(document.title ? { title: document.title } : {}),
      ...(document.filePath ? { file_path: document.filePath } : {}),
      ...(document.fileName ? { file_name: document.fileName } : {}),
      ...(document.fileExtension ? { file_extension: document.fileExtension } : {}),
    };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async enumerate(path: string, options: LocalIngestOptions) {
    if (!path.trim()) {
      throw new ValidationError('File path cannot be empty');
    }
    const extensions = options.extensions ?? DEFAULT_FILE_EXTENSIONS;
    const scan = await scanPath(path, { recursive: options.recursive ?? true, extensions });
    if (scan.files.length === 0) {
      throw new ValidationError(`No files found with extensions ${extensions.join(', ')} in ${scan.rootPath}`);
    }
    return scan;
  }

  private processFiles(
    files: FileInfo[],
    sourceId: string,
    progress: ProgressOptions
  ): Promise<DocumentOutcome[]> {
    return this.runLimited(
      files.map((file) => async () => {
        const origin = pathToFileURL(file.path).href;
        let raw: string;
        try {
          raw = await readFile(file.path, 'utf-8');
        } catch (error) {
          this.logger.warn(`Cannot read ${file.path}: ${getErrorMessage(error)}`);
          return emptyOutcome(origin, 'failed', getErrorMessage(error));
        }

        const html = file.extension === '.html' || file.extension === '.htm';
        const { title, text } = html ? htmlToText(raw) : { title: undefined, text: raw };
        return this.processDocument(
          {
            origin,
            content: text,
            sourceType: 'local_file',
            ...(title ? { title } : {}),
            filePath: file.path,
            fileName: file.name,
            fileExtension: file.extension,
          },
          sourceId
        );
      }),
      progress
    );
  }

  /**
   * Run document tasks under the file-level limit and wait for all of them.
   */
  private async runLimited(
    tasks: Array<() => Promise<DocumentOutcome>>,
    progress: ProgressOptions
  ): Promise<DocumentOutcome[]> {
    const limit = pLimit(this.settings.maxConcurrentFiles);
    let completed = 0;

    return Promise.all(
      tasks.map((task) =>
        limit(async () => {
          const outcome = await task();
          completed++;
          progress.onDocument?.(outcome, completed, tasks.length);
          return outcome;
        })
      )
    );
  }

  private async finish(
    sourceId: string,
    summary: string,
    documents: DocumentOutcome[],
    mode: UpsertMode
  ): Promise<IngestionReport> {
    const report: IngestionReport = {
      sourceId,
      ok: true,
      documentsProcessed: 0,
      documentsFailed: 0,
      documentsSkipped: 0,
      chunksStored: 0,
      chunksFailed: 0,
      codeExamplesStored: 0,
      wordCount: 0,
      charCount: 0,
      source: { outcome: 'skipped' },
      documents,
    };

    for (const document of documents) {
      if (document.status === 'processed') report.documentsProcessed++;
      else if (document.status === 'failed') report.documentsFailed++;
      else report.documentsSkipped++;

      report.chunksStored += document.chunksStored;
      report.chunksFailed += document.chunksFailed;
      report.codeExamplesStored += document.codeExamplesStored;
      report.wordCount += document.wordCount;
      report.charCount += document.charCount;
    }

    report.source = await this.recordSource(sourceId, summary, report.wordCount, mode, report.chunksStored > 0);
    report.ok = report.source.outcome !== 'failed';
    return report;
  }

  private async recordSource(
    sourceId: string,
    summary: string,
    wordCount: number,
    mode: UpsertMode,
    anythingStored: boolean
  ): Promise<SourceOutcome> {
    if (!anythingStored) {
      return { outcome: 'skipped' };
    }
    try {
      const { outcome, source } = await this.sources.upsert(sourceId, summary, wordCount, mode);
      this.logger.debug?.(`Source ${sourceId} ${outcome}, ${source.total_word_count} words`);
      return { outcome, totalWordCount: source.total_word_count };
    } catch (error) {
      this.logger.warn(`Source ${sourceId} was not recorded: ${getErrorMessage(error)}`);
      return { outcome: 'failed', error: getErrorMessage(error) };
    }
  }
}
