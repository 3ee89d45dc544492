/**
 * Crawler Module
 *
 * Fetches web pages, sitemaps and text files and reduces them to text for
 * the ingestion pipeline.
 */

export {
  WebCrawler,
  detectCrawlKind,
  assertCrawlableUrl,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_CONCURRENT,
} from './crawler.js';
export { fetchPage, fetchText, htmlToText, normalizeText, DEFAULT_USER_AGENT } from './fetcher.js';
export { extractLinks, isInternalLink, normalizeUrl } from './links.js';
export { parseSitemap, type SitemapEntries } from './sitemap.js';
export type {
  CrawlKind,
  FetchedPage,
  CrawlFailure,
  CrawlResult,
  CrawlerOptions,
  CrawlOptions,
} from './types.js';
