/**
 * Chunker Types
 */

/**
 * Half-open character range `[start, end)` of the source text.
 */
export interface ChunkSpan {
  start: number;
  end: number;
}

/**
 * A trimmed chunk plus the span it was cut from.
 * `index` is the 0-based position among the chunks that survived trimming,
 * which is what gets stored as `chunk_number`.
 */
export interface TextChunk {
  index: number;
  content: string;
  start: number;
  end: number;
}

/**
 * A fenced code block found in markdown, with the prose around it.
 */
export interface CodeBlock {
  code: string;
  /** Info string of the fence, 'text' when absent */
  language: string;
  /** Nearest heading above the block */
  heading?: string;
  /** Prose immediately before the block */
  contextBefore: string;
  /** Prose immediately after the block */
  contextAfter: string;
}

export interface CodeBlockOptions {
  /** Blocks shorter than this (after trimming) are ignored */
  minLength?: number;
  /** Characters of surrounding prose kept on each side */
  contextLength?: number;
}
