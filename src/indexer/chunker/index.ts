/**
 * Chunker Module
 *
 * Usage:
 * ```typescript
 * import { chunkDocument, extractCodeBlocks } from './chunker/index.js';
 *
 * const chunks = chunkDocument(text, { maxSize: 1000, overlap: 200 });
 * const examples = extractCodeBlocks(markdown, { minLength: 300 });
 * ```
 */

export { chunkSpans, chunkDocument, chunkText, countWords } from './chunker.js';

export { extractCodeBlocks, summarizeCodeBlock } from './code-blocks.js';

export type { ChunkSpan, TextChunk, CodeBlock, CodeBlockOptions } from './types.js';

export {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CHUNK_OVERLAP,
  BOUNDARY_CHARS,
  resolveChunkOptions,
  type ChunkOptions,
} from './config.js';
