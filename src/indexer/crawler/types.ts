/**
 * Crawler Types
 */

import type { Logger } from '../../utils/index.js';
import type { FetchFn } from '../embedder/index.js';

/** How smart_crawl_url treats a URL */
export type CrawlKind = 'sitemap' | 'text_file' | 'webpage';

/**
 * A fetched page reduced to text.
 */
export interface FetchedPage {
  /** Final URL after redirects */
  url: string;
  title?: string;
  /** Plain text; HTML <pre> blocks become fenced code */
  content: string;
  contentType: string;
  /** Absolute http(s) links found on the page, fragment removed */
  links: string[];
}

export interface CrawlFailure {
  url: string;
  error: string;
}

export interface CrawlResult {
  kind: CrawlKind;
  pages: FetchedPage[];
  failures: CrawlFailure[];
}

export interface CrawlerOptions {
  fetch?: FetchFn;
  timeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
}

export interface CrawlOptions {
  /** Link levels followed from the start page (1 = start page only) */
  maxDepth?: number;
  /** Concurrent page requests */
  maxConcurrent?: number;
}
