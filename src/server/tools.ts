/**
 * Tool Surface
 *
 * The operations offered to a calling agent. Arguments are validated with
 * zod; every call runs under the configured wall-clock budget and every
 * failure comes back as `{ success: false, error }`. Nothing thrown inside
 * a tool reaches the protocol layer.
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import { ToolTimeoutError, ValidationError, getErrorMessage } from '../errors/index.js';
import { assertCrawlableUrl } from '../indexer/crawler/index.js';
import {
  crawlSummary,
  pageSummary,
  webSourceKey,
  type DocumentOutcome,
  type IngestionReport,
} from '../indexer/index.js';
import type { RetrievalOutcome, RetrievalResult } from '../search/index.js';
import type { Services } from '../services.js';
import { silentLogger, type Logger } from '../utils/index.js';
import type { Tool, ToolDefinition, ToolDescriptor, ToolResult } from './types.js';

// ============================================================================
// Registry
// ============================================================================

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Erase a tool's argument type behind a validating `run`.
 */
export function defineTool<Schema extends z.ZodTypeAny>(definition: ToolDefinition<Schema>): Tool {
  return {
    name: definition.name,
    description: definition.description,
    parameters: definition.parameters,
    run: async (rawArgs) => {
      const parsed = definition.parameters.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        return { success: false, error: `Invalid arguments for ${definition.name}: ${describeIssues(parsed.error)}` };
      }
      return definition.execute(parsed.data);
    },
  };
}

/**
 * Reject with ToolTimeoutError when `work` takes longer than `timeoutMs`.
 * The work itself is not cancelled.
 */
export async function withTimeout<T>(work: Promise<T>, toolName: string, timeoutMs: number): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new ToolTimeoutError(toolName, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeoutPromise]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}

export interface ToolRegistryOptions {
  timeoutMs: number;
  logger?: Logger;
}

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();
  private readonly logger: Logger;

  constructor(
    tools: Tool[],
    private readonly options: ToolRegistryOptions
  ) {
    for (const tool of tools) {
      this.tools.set(tool.name, tool);
    }
    this.logger = options.logger ?? silentLogger;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: zodToJsonSchema(tool.parameters, { $refStrategy: 'none' }),
    }));
  }

  /**
   * Run a tool. Always resolves.
   */
  async call(name: string, rawArgs: unknown): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { success: false, error: `Unknown tool: ${name}` };
    }

    const started = Date.now();
    try {
      const result = await withTimeout(tool.run(rawArgs), name, this.options.timeoutMs);
      this.logger.debug?.(`${name} finished in ${Date.now() - started}ms (success=${result.success})`);
      return result;
    } catch (error) {
      this.logger.warn(`${name} failed: ${getErrorMessage(error)}`);
      return { success: false, error: getErrorMessage(error) };
    }
  }
}

// ============================================================================
// Result shaping
// ============================================================================

function filePathsOf(documents: DocumentOutcome[], limit: number): string[] {
  return documents
    .filter((document) => document.status === 'processed')
    .slice(0, limit)
    .map((document) => fileURLToPath(document.origin));
}

/** First reason a report is not a full success */
function reportError(report: IngestionReport): string | undefined {
  if (report.source.outcome === 'failed') {
    return report.source.error;
  }
  return undefined;
}

function retrievalResult(
  outcome: RetrievalOutcome,
  mapResult: (result: RetrievalResult) => Record<string, unknown>
): ToolResult {
  if (!outcome.ok) {
    return { success: false, query: outcome.query, error: outcome.error };
  }
  return {
    success: true,
    query: outcome.query,
    source_filter: outcome.source,
    results: outcome.results.map(mapResult),
    count: outcome.results.length,
  };
}

// ============================================================================
// Tools
// ============================================================================

const matchCountArg = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .describe('Results to return (1-50, default 5)');

/**
 * Build the tool set over shared services.
 */
export function createTools(services: Services): Tool[] {
  const { config } = services;

  return [
    defineTool({
      name: 'get_available_sources',
      description:
        'List every source (website host or local folder) that has been ingested, with its summary ' +
        'and word count. Use a source_id from here to filter perform_rag_query.',
      parameters: z.object({}),
      execute: async () => {
        const sources = await services.sources.list();
        return {
          success: true,
          sources: sources.map((source) => ({
            source_id: source.source_id,
            summary: source.summary,
            total_words: source.total_word_count,
            created_at: source.created_at ?? null,
            updated_at: source.updated_at ?? null,
          })),
          count: sources.length,
        };
      },
    }),

    defineTool({
      name: 'crawl_single_page',
      description: 'Fetch one web page without following links, then chunk, embed and store it.',
      parameters: z.object({
        url: z.string().describe('Page URL (http or https)'),
      }),
      execute: async ({ url }) => {
        const target = assertCrawlableUrl(url);
        const page = await services.crawler.fetchPage(target);
        if (!page.content.trim()) {
          return { success: false, url: target, error: `No content found at ${target}` };
        }

        const sourceId = webSourceKey(target);
        const report = await services.pipeline.ingestPages([page], {
          sourceKey: sourceId,
          summary: pageSummary(page),
        });
        const document = report.documents[0];
        const internal = page.links.filter((link) => webSourceKey(link) === sourceId).length;

        return {
          success: report.ok && document?.status === 'processed',
          url: target,
          source_id: sourceId,
          chunks_stored: report.chunksStored,
          chunks_failed: report.chunksFailed,
          code_examples_stored: report.codeExamplesStored,
          content_length: page.content.length,
          total_word_count: report.wordCount,
          links_count: { internal, external: page.links.length - internal },
          ...(document?.error ? { error: document.error } : {}),
          ...(reportError(report) ? { error: reportError(report) } : {}),
        };
      },
    }),

    defineTool({
      name: 'smart_crawl_url',
      description:
        'Crawl a URL with the strategy its shape suggests: every page of a sitemap, a single text ' +
        'file (.txt), or a web page plus its internal links up to max_depth levels. Everything ' +
        'found is chunked, embedded and stored under the site host as source_id.',
      parameters: z.object({
        url: z.string().describe('Sitemap, .txt file or web page URL'),
        max_depth: z.number().int().optional().describe('Link levels for web pages (1-10, default 3)'),
        max_concurrent: z.number().int().optional().describe('Parallel requests (1-50, default 10)'),
      }),
      execute: async ({ url, max_depth, max_concurrent }) => {
        const target = assertCrawlableUrl(url);
        const maxDepth = max_depth ?? config.crawl.max_depth;
        const maxConcurrent = max_concurrent ?? config.crawl.max_concurrent;

        const crawl = await services.crawler.crawl(target, { maxDepth, maxConcurrent });
        const pages = crawl.pages.filter((page) => page.content.trim());
        if (pages.length === 0) {
          return {
            success: false,
            url: target,
            crawl_type: crawl.kind,
            pages_failed: crawl.failures.length,
            error: `No content found at ${target}`,
          };
        }

        const sourceId = webSourceKey(target);
        const report = await services.pipeline.ingestPages(pages, {
          sourceKey: sourceId,
          summary: crawlSummary(crawl.kind, target),
        });

        const urls = pages.map((page) => page.url);
        return {
          success: report.ok,
          url: target,
          crawl_type: crawl.kind,
          source_id: sourceId,
          pages_crawled: pages.length,
          pages_failed: crawl.failures.length,
          documents_failed: report.documentsFailed,
          chunks_stored: report.chunksStored,
          chunks_failed: report.chunksFailed,
          code_examples_stored: report.codeExamplesStored,
          total_word_count: report.wordCount,
          urls_crawled: urls.length > 5 ? [...urls.slice(0, 5), '...'] : urls,
          max_depth_used: maxDepth,
          max_concurrent_used: maxConcurrent,
          ...(reportError(report) ? { error: reportError(report) } : {}),
        };
      },
    }),

    defineTool({
      name: 'crawl_local_files',
      description:
        'Ingest a local file or every matching file under a directory in one call. For large ' +
        'directories use crawl_local_files_batch.',
      parameters: z.object({
        file_path: z.string().describe('File or directory path'),
        recursive: z.boolean().default(true).describe('Include subdirectories'),
        file_extensions: z.string().optional().describe('Comma-separated, default ".md,.txt,.html,.rst"'),
      }),
      execute: async ({ file_path, recursive, file_extensions }) => {
        const report = await services.pipeline.ingestLocalFiles(file_path, {
          recursive,
          extensions: services.extensions(file_extensions),
        });

        return {
          success: report.ok,
          path: file_path,
          source_id: report.sourceId,
          files_found: report.documents.length,
          files_processed: report.documentsProcessed,
          files_failed: report.documentsFailed,
          files_skipped: report.documentsSkipped,
          total_content_length: report.charCount,
          total_word_count: report.wordCount,
          total_chunks_stored: report.chunksStored,
          chunks_failed: report.chunksFailed,
          code_examples_stored: report.codeExamplesStored,
          processed_files: filePathsOf(report.documents, 5),
          ...(reportError(report) ? { error: reportError(report) } : {}),
        };
      },
    }),

    defineTool({
      name: 'crawl_local_files_batch',
      description:
        'Ingest the next batch_size files of a directory, in sorted path order. Pass the returned ' +
        'next_file as start_from to continue until status is ALL_FILES_PROCESSED.',
      parameters: z.object({
        file_path: z.string().describe('File or directory path'),
        batch_size: z.number().int().min(1).optional().describe('Files per call (default 10)'),
        recursive: z.boolean().default(true),
        file_extensions: z.string().optional(),
        start_from: z.string().default('').describe('next_file from the previous call'),
      }),
      execute: async ({ file_path, batch_size, recursive, file_extensions, start_from }) => {
        const report = await services.pipeline.ingestLocalBatch(file_path, {
          batchSize: batch_size ?? config.ingestion.batch_size,
          recursive,
          extensions: services.extensions(file_extensions),
          startFrom: start_from,
        });

        const note =
          report.status === 'MORE_FILES_REMAINING'
            ? `${report.remainingFiles} files remain; call again with start_from="${report.nextFile ?? ''}"`
            : report.status === 'BATCH_COMPLETED'
              ? `Reached the last file with ${report.documentsFailed} failed in this batch`
              : 'All files processed';

        return {
          success: report.ok,
          status: report.status,
          path: file_path,
          source_id: report.sourceId,
          batch_info: {
            total_files_found: report.totalFiles,
            batch_size: report.batchSize,
            files_processed_in_batch: report.documentsProcessed,
            files_failed_in_batch: report.documentsFailed,
            files_skipped_in_batch: report.documentsSkipped,
            remaining_files: report.remainingFiles,
            start_index: report.startIndex,
            end_index: report.endIndex,
          },
          batch_word_count: report.wordCount,
          batch_chunks_stored: report.chunksStored,
          chunks_failed: report.chunksFailed,
          code_examples_stored: report.codeExamplesStored,
          processed_files: filePathsOf(report.documents, 3),
          next_file: report.nextFile,
          checkpoint_found: !report.checkpointMissed,
          note,
          ...(reportError(report) ? { error: reportError(report) } : {}),
        };
      },
    }),

    defineTool({
      name: 'delete_source',
      description: 'Delete a source with all of its stored chunks and code examples.',
      parameters: z.object({
        source_id: z.string().describe('A source_id from get_available_sources'),
      }),
      execute: async ({ source_id }) => {
        const sourceId = source_id.trim();
        if (!sourceId) {
          throw new ValidationError('Source ID cannot be empty');
        }

        const removed = await services.sources.remove(sourceId);
        if (!removed.sourceDeleted && removed.chunksDeleted === 0 && removed.codeExamplesDeleted === 0) {
          return { success: false, source_id: sourceId, error: `Source not found: ${sourceId}` };
        }
        return {
          success: true,
          source_id: sourceId,
          chunks_deleted: removed.chunksDeleted,
          code_examples_deleted: removed.codeExamplesDeleted,
          source_deleted: removed.sourceDeleted,
        };
      },
    }),

    defineTool({
      name: 'perform_rag_query',
      description:
        'Semantic search over stored documentation chunks, optionally restricted to one source_id.',
      parameters: z.object({
        query: z.string().describe('What to look for'),
        source: z.string().optional().describe('source_id to filter by'),
        match_count: matchCountArg,
      }),
      execute: async ({ query, source, match_count }) => {
        const outcome = await services.retriever.query(query, { source, matchCount: match_count });
        return retrievalResult(outcome, (result) => ({
          url: result.url,
          content: result.content,
          metadata: result.metadata,
          similarity: result.similarity,
        }));
      },
    }),

    defineTool({
      name: 'search_code_examples',
      description:
        'Semantic search over code examples extracted from ingested documentation ' +
        '(requires extract_code_examples to be enabled at ingestion time).',
      parameters: z.object({
        query: z.string().describe('What the code should do'),
        source_id: z.string().optional().describe('source_id to filter by'),
        match_count: matchCountArg,
      }),
      execute: async ({ query, source_id, match_count }) => {
        const outcome = await services.retriever.searchCodeExamples(query, {
          source: source_id,
          matchCount: match_count,
        });
        return retrievalResult(outcome, (result) => ({
          url: result.url,
          code: result.content,
          summary: result.summary ?? null,
          metadata: result.metadata,
          source_id: result.sourceId,
          similarity: result.similarity,
        }));
      },
    }),
  ];
}
