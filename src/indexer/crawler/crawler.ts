/**
 * Web Crawler
 *
 * Three strategies, picked from the URL:
 * - sitemap:   fetch every <loc> (following nested sitemap indexes)
 * - text_file: fetch the file as-is
 * - webpage:   breadth-first over internal links, up to maxDepth levels
 *
 * Page requests run under a p-limit semaphore. A page that fails is
 * recorded and the crawl goes on.
 */

import pLimit from 'p-limit';

import { ValidationError, getErrorMessage } from '../../errors/index.js';
import { silentLogger, type Logger } from '../../utils/index.js';
import { fetchPage, fetchText } from './fetcher.js';
import { isInternalLink, normalizeUrl } from './links.js';
import { parseSitemap } from './sitemap.js';
import type {
  CrawlFailure,
  CrawlKind,
  CrawlOptions,
  CrawlResult,
  CrawlerOptions,
  FetchedPage,
} from './types.js';

export const DEFAULT_MAX_DEPTH = 3;
export const DEFAULT_MAX_CONCURRENT = 10;

/** Upper bound on nested sitemap documents per crawl */
const MAX_SITEMAP_DOCUMENTS = 20;

/**
 * Classify a URL the same way for every caller.
 */
export function detectCrawlKind(url: string): CrawlKind {
  if (url.includes('sitemap')) {
    return 'sitemap';
  }
  if (url.endsWith('.txt')) {
    return 'text_file';
  }
  return 'webpage';
}

/**
 * @throws ValidationError for blank or non-http(s) URLs
 */
export function assertCrawlableUrl(url: string): string {
  const trimmed = url.trim();
  if (!trimmed) {
    throw new ValidationError('URL cannot be empty');
  }
  if (!URL.canParse(trimmed)) {
    throw new ValidationError(`Invalid URL: ${trimmed}`);
  }
  const { protocol } = new URL(trimmed);
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new ValidationError(`Only http(s) URLs can be crawled: ${trimmed}`);
  }
  return trimmed;
}

function clamp(value: number | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(value)));
}

export class WebCrawler {
  private readonly logger: Logger;

  constructor(private readonly options: CrawlerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  fetchPage(url: string): Promise<FetchedPage> {
    return fetchPage(assertCrawlableUrl(url), this.options);
  }

  /**
   * Crawl with the strategy detectCrawlKind picks for `url`.
   */
  async crawl(url: string, options: CrawlOptions = {}): Promise<CrawlResult> {
    const start = assertCrawlableUrl(url);
    const maxConcurrent = clamp(options.maxConcurrent, DEFAULT_MAX_CONCURRENT, 1, 50);
    const kind = detectCrawlKind(start);

    switch (kind) {
      case 'sitemap': {
        const urls = await this.sitemapUrls(start);
        this.logger.info?.(`Sitemap ${start} lists ${urls.length} URLs`);
        return { kind, ...(await this.fetchAll(urls, maxConcurrent)) };
      }
      case 'text_file':
        return { kind, ...(await this.fetchAll([start], 1)) };
      case 'webpage':
        return {
          kind,
          ...(await this.crawlRecursive(
            start,
            clamp(options.maxDepth, DEFAULT_MAX_DEPTH, 1, 10),
            maxConcurrent
          )),
        };
    }
  }

  /**
   * Page URLs of a sitemap, following sitemap indexes.
   *
   * @throws CrawlError when the top-level sitemap cannot be fetched
   */
  async sitemapUrls(url: string): Promise<string[]> {
    const urls = new Set<string>();
    const seen = new Set<string>();
    const queue = [url];

    while (queue.length > 0 && seen.size < MAX_SITEMAP_DOCUMENTS) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);

      try {
        const { body } = await fetchText(next, this.options);
        const entries = await parseSitemap(body);
        entries.urls.forEach((entry) => urls.add(entry));
        queue.push(...entries.sitemaps);
      } catch (error) {
        if (next === url) throw error;
        this.logger.warn(`Skipping nested sitemap ${next}: ${getErrorMessage(error)}`);
      }
    }

    return [...urls];
  }

  private async crawlRecursive(
    start: string,
    maxDepth: number,
    maxConcurrent: number
  ): Promise<Omit<CrawlResult, 'kind'>> {
    const visited = new Set<string>();
    const pages: FetchedPage[] = [];
    const failures: CrawlFailure[] = [];
    let frontier = [normalizeUrl(start)];

    for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
      frontier.forEach((url) => visited.add(url));
      this.logger.debug?.(`Depth ${depth + 1}: ${frontier.length} URLs`);

      const level = await this.fetchAll(frontier, maxConcurrent);
      failures.push(...level.failures);

      const next = new Set<string>();
      for (const page of level.pages) {
        const finalUrl = normalizeUrl(page.url);
        if (pages.some((existing) => normalizeUrl(existing.url) === finalUrl)) {
          continue;
        }
        visited.add(finalUrl);
        pages.push(page);

        for (const link of page.links) {
          if (!visited.has(link) && isInternalLink(link, start)) {
            next.add(link);
          }
        }
      }
      frontier = [...next];
    }

    return { pages, failures };
  }

  /**
   * Fetch URLs concurrently. Resolves once every request settled; pages
   * keep input order.
   */
  private async fetchAll(urls: string[], maxConcurrent: number): Promise<Omit<CrawlResult, 'kind'>> {
    const limit = pLimit(maxConcurrent);
    const settled = await Promise.all(
      urls.map((url) =>
        limit(async (): Promise<FetchedPage | CrawlFailure> => {
          try {
            return await fetchPage(url, this.options);
          } catch (error) {
            this.logger.warn(`Failed to crawl ${url}: ${getErrorMessage(error)}`);
            return { url, error: getErrorMessage(error) };
          }
        })
      )
    );

    const pages: FetchedPage[] = [];
    const failures: CrawlFailure[] = [];
    for (const item of settled) {
      if ('error' in item) failures.push(item);
      else pages.push(item);
    }
    return { pages, failures };
  }
}
