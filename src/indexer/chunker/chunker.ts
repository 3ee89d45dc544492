/**
 * Chunker
 *
 * Splits text into overlapping windows of at most `maxSize` characters.
 * A window is shortened to end just after the last sentence or line break
 * in its second half, so chunks rarely stop mid-sentence.
 *
 * Pure functions: the same input and options always give the same chunks.
 */

import { BOUNDARY_CHARS, resolveChunkOptions, type ChunkOptions } from './config.js';
import type { ChunkSpan, TextChunk } from './types.js';

/**
 * Compute the untrimmed spans a text is cut into.
 *
 * Every window after the first starts `overlap` characters before the end
 * of the previous one, but always at least one character later than the
 * previous start, so the loop ends after at most `text.length` windows.
 */
export function chunkSpans(text: string, options: ChunkOptions = {}): ChunkSpan[] {
  const { maxSize, overlap } = resolveChunkOptions(options);

  if (text.length <= maxSize) {
    return [{ start: 0, end: text.length }];
  }

  const spans: ChunkSpan[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + maxSize, text.length);

    if (end < text.length) {
      const floor = start + Math.floor(maxSize / 2);
      for (let i = end - 1; i >= floor; i--) {
        if (BOUNDARY_CHARS.has(text.charAt(i))) {
          end = i + 1;
          break;
        }
      }
    }

    spans.push({ start, end });

    if (end >= text.length) {
      break;
    }
    start = Math.max(end - overlap, start + 1);
  }

  return spans;
}

/**
 * Chunk text and keep the span of every chunk.
 *
 * Text that fits in one window is returned as-is; longer text is trimmed
 * per chunk and empty chunks are dropped.
 */
export function chunkDocument(text: string, options: ChunkOptions = {}): TextChunk[] {
  const spans = chunkSpans(text, options);

  if (spans.length === 1) {
    if (text.trim().length === 0) return [];
    return [{ index: 0, content: text, start: 0, end: text.length }];
  }

  const chunks: TextChunk[] = [];
  for (const span of spans) {
    const content = text.slice(span.start, span.end).trim();
    if (content.length > 0) {
      chunks.push({ index: chunks.length, content, start: span.start, end: span.end });
    }
  }
  return chunks;
}

/**
 * Chunk text into an ordered list of non-empty strings.
 *
 * @example
 * ```ts
 * chunkText(readme, { maxSize: 1000, overlap: 200 });
 * ```
 */
export function chunkText(text: string, options: ChunkOptions = {}): string[] {
  return chunkDocument(text, options).map((chunk) => chunk.content);
}

/**
 * Count whitespace-separated words.
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}
