/**
 * Search Module
 *
 * Similarity search over stored chunks and code examples. Ranking runs in
 * the storage backend (`match_crawled_pages`, `match_code_examples`).
 *
 * @example
 * ```typescript
 * import { Retriever } from './search/index.js';
 *
 * const retriever = new Retriever(embedder, pages, codeExamples, { excerptLength: 1000 });
 * const outcome = await retriever.query('configure retries', { source: 'docs.test', matchCount: 5 });
 * if (outcome.ok) console.log(outcome.results.length);
 * ```
 *
 * @packageDocumentation
 */

export {
  Retriever,
  clampMatchCount,
  DEFAULT_MATCH_COUNT,
  MAX_MATCH_COUNT,
  DEFAULT_EXCERPT_LENGTH,
} from './retriever.js';

export {
  formatScore,
  truncateSnippet,
  formatResult,
  formatResults,
  formatResultJSON,
  formatResultsJSON,
} from './formatter.js';

export type {
  RetrievalResult,
  RetrievalOutcome,
  QueryOptions,
  RetrieverOptions,
  FormatOptions,
  FormattedResultJSON,
} from './types.js';
