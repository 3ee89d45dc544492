/**
 * Configuration Schema
 *
 * Defines the shape of ~/.docr/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 *
 * Secrets and endpoints are NOT here; they come from the environment
 * (see env.ts).
 */

import { z } from 'zod';

/**
 * Text chunking
 * Overlap is checked against chunk_size by the chunker itself.
 */
export const ChunkingConfigSchema = z.object({
  chunk_size: z
    .number()
    .int()
    .min(1)
    .max(100000)
    .describe('Maximum characters per chunk'),
  chunk_overlap: z
    .number()
    .int()
    .min(0)
    .describe('Characters shared between consecutive chunks (must be < chunk_size)'),
});

/**
 * Embedding client tuning
 */
export const EmbeddingConfigSchema = z.object({
  dimensions: z
    .number()
    .int()
    .min(1)
    .describe('Vector size; must match the storage column (vector(1536))'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(256)
    .describe('Texts per embedding request'),
  max_attempts: z
    .number()
    .int()
    .min(1)
    .max(10)
    .describe('Attempts per request for transient failures'),
  base_delay_ms: z
    .number()
    .int()
    .min(0)
    .describe('Backoff base; attempt n waits base * 2^n'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Per-request timeout'),
  token_margin_seconds: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe('Refresh the token this long before expiry (default: 10% of its lifetime)'),
});

/**
 * Ingestion pipeline
 */
export const IngestionConfigSchema = z.object({
  file_extensions: z.string().describe('Comma-separated extensions to ingest'),
  batch_size: z.number().int().min(1).max(1000).describe('Files per resumable batch'),
  max_concurrent_files: z.number().int().min(1).max(64),
  max_concurrent_chunks: z.number().int().min(1).max(64),
  write_batch_size: z
    .number()
    .int()
    .min(1)
    .max(1000)
    .describe('Rows per insert request'),
  extract_code_examples: z
    .boolean()
    .describe('Store fenced code blocks in code_examples'),
  min_code_length: z.number().int().min(1).describe('Shortest code block worth storing'),
});

/**
 * Web crawling
 */
export const CrawlConfigSchema = z.object({
  max_depth: z.number().int().min(1).max(10),
  max_concurrent: z.number().int().min(1).max(50),
  timeout_ms: z.number().int().min(1000).max(600000),
  user_agent: z.string().min(1),
});

/**
 * Retrieval
 */
export const SearchConfigSchema = z.object({
  match_count: z.number().int().min(1).max(50).describe('Default number of results'),
  excerpt_length: z.number().int().min(1).describe('Characters of content returned per result'),
});

/**
 * Tool server
 */
export const ServerConfigSchema = z.object({
  tool_timeout_ms: z
    .number()
    .int()
    .min(1000)
    .describe('Wall-clock budget for one tool invocation'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  chunking: ChunkingConfigSchema,
  embedding: EmbeddingConfigSchema,
  ingestion: IngestionConfigSchema,
  crawl: CrawlConfigSchema,
  search: SearchConfigSchema,
  server: ServerConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
