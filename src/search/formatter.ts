/**
 * Search Result Formatter
 *
 * Text and JSON output of retrieval results for the CLI.
 *
 * @example
 * ```typescript
 * formatResult(result);
 * // [0.92] https://docs.test/guide#3
 * //   Install the package with npm and import the client...
 * ```
 */

import type { FormatOptions, FormattedResultJSON, RetrievalResult } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Default maximum snippet length in characters */
const DEFAULT_SNIPPET_LENGTH = 200;

/** Indent for snippet content in text output */
const SNIPPET_INDENT = '  ';

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Format a similarity score as a 2-decimal string.
 *
 * @example
 * ```typescript
 * formatScore(0.9234)  // "0.92"
 * formatScore(1)       // "1.00"
 * ```
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Collapse whitespace and cut to `maxLength`, adding "..." when cut.
 *
 * @example
 * ```typescript
 * truncateSnippet("Hello world", 5)        // "Hello..."
 * truncateSnippet("Line 1\nLine 2", 20)    // "Line 1 Line 2"
 * ```
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();

  if (normalized.length <= maxLength) {
    return normalized;
  }

  return normalized.slice(0, maxLength) + '...';
}

function titleOf(result: RetrievalResult): string | undefined {
  const title = result.metadata.title;
  return typeof title === 'string' && title ? title : undefined;
}

// ============================================================================
// Text Formatting Functions
// ============================================================================

/**
 * Format a single result for text display: a header line with score,
 * source and location, then the indented snippet.
 */
export function formatResult(result: RetrievalResult, options: FormatOptions = {}): string {
  const { snippetLength = DEFAULT_SNIPPET_LENGTH, showScore = true, showSource = false } = options;

  const parts: string[] = [];
  if (showScore) {
    parts.push(`[${formatScore(result.similarity)}]`);
  }
  if (showSource) {
    parts.push(`[${result.sourceId}]`);
  }
  parts.push(`${result.url}#${result.chunkNumber}`);

  const title = titleOf(result);
  if (title) {
    parts.push(`(${title})`);
  }

  const body = result.summary ? `${result.summary}: ${result.content}` : result.content;
  return `${parts.join(' ')}\n${SNIPPET_INDENT}${truncateSnippet(body, snippetLength)}`;
}

/**
 * Format results separated by blank lines.
 */
export function formatResults(results: RetrievalResult[], options: FormatOptions = {}): string {
  return results.map((result) => formatResult(result, options)).join('\n\n');
}

// ============================================================================
// JSON Formatting Functions
// ============================================================================

export function formatResultJSON(result: RetrievalResult): FormattedResultJSON {
  const title = titleOf(result);
  return {
    similarity: result.similarity,
    url: result.url,
    chunkNumber: result.chunkNumber,
    sourceId: result.sourceId,
    content: result.content,
    ...(title ? { title } : {}),
    ...(result.summary ? { summary: result.summary } : {}),
  };
}

export function formatResultsJSON(results: RetrievalResult[]): FormattedResultJSON[] {
  return results.map(formatResultJSON);
}
