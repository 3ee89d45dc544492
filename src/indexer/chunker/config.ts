/**
 * Chunker Configuration
 *
 * Character-based sizes. 1000/200 keeps a chunk well inside the embedding
 * model's input limit while giving neighbouring chunks shared context.
 */

import { ConfigurationError } from '../../errors/index.js';

export const DEFAULT_CHUNK_SIZE = 1000;

export const DEFAULT_CHUNK_OVERLAP = 200;

/** Characters after which a chunk may end */
export const BOUNDARY_CHARS: ReadonlySet<string> = new Set(['.', '!', '?', '\n']);

/**
 * Options accepted by the chunking functions.
 */
export interface ChunkOptions {
  /** Maximum characters per chunk (default 1000) */
  maxSize?: number;
  /** Characters repeated at the start of the next chunk (default 200) */
  overlap?: number;
}

/**
 * Resolve defaults and reject settings that could never make progress.
 *
 * @throws ConfigurationError when maxSize is not a positive integer or
 *   overlap is outside [0, maxSize)
 */
export function resolveChunkOptions(options: ChunkOptions = {}): Required<ChunkOptions> {
  const maxSize = options.maxSize ?? DEFAULT_CHUNK_SIZE;
  const overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;

  if (!Number.isInteger(maxSize) || maxSize <= 0) {
    throw new ConfigurationError(
      `Chunk size must be a positive integer, got ${maxSize}`,
      'Set chunking.chunk_size to a whole number greater than 0'
    );
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxSize) {
    throw new ConfigurationError(
      `Chunk overlap must be an integer in [0, ${maxSize}), got ${overlap}`,
      'Set chunking.chunk_overlap below chunking.chunk_size'
    );
  }

  return { maxSize, overlap };
}
