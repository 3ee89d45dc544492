/**
 * Tests for the crawl strategies
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { ValidationError } from '../../../errors/index.js';
import { FakeWeb } from '../../../test-utils/index.js';
import { WebCrawler, assertCrawlableUrl, detectCrawlKind } from '../crawler.js';

describe('detectCrawlKind', () => {
  it.each([
    ['https://docs.test/sitemap.xml', 'sitemap'],
    ['https://docs.test/sitemaps/index', 'sitemap'],
    ['https://docs.test/llms.txt', 'text_file'],
    ['https://docs.test/guide', 'webpage'],
  ])('%s is a %s', (url, kind) => {
    expect(detectCrawlKind(url)).toBe(kind);
  });
});

describe('assertCrawlableUrl', () => {
  it('trims and accepts http(s)', () => {
    expect(assertCrawlableUrl('  https://docs.test/  ')).toBe('https://docs.test/');
  });

  it('rejects blank input', () => {
    expect(() => assertCrawlableUrl('   ')).toThrow(new ValidationError('URL cannot be empty'));
  });

  it('rejects other schemes', () => {
    expect(() => assertCrawlableUrl('file:///etc/hosts')).toThrow('Only http(s) URLs can be crawled');
  });
});

describe('WebCrawler', () => {
  let web: FakeWeb;
  let crawler: WebCrawler;

  beforeEach(() => {
    web = new FakeWeb()
      .page(
        'https://docs.test/',
        '<p>Root</p><a href="/a">a</a><a href="/b">b</a><a href="https://other.test/x">x</a><a href="/#top">top</a>'
      )
      .page('https://docs.test/a', '<p>Page A</p><p><a href="/c">c</a> <a href="/">home</a></p>')
      .page('https://docs.test/c', '<p>Page C</p>');
    crawler = new WebCrawler({ fetch: web.fetch });
  });

  describe('recursive crawl', () => {
    it('fetches only the start page at depth 1', async () => {
      const result = await crawler.crawl('https://docs.test/', { maxDepth: 1 });

      expect(result.kind).toBe('webpage');
      expect(result.pages.map((page) => page.url)).toEqual(['https://docs.test/']);
      expect(result.failures).toEqual([]);
    });

    it('follows internal links level by level and records failures', async () => {
      const result = await crawler.crawl('https://docs.test/', { maxDepth: 2 });

      expect(result.pages.map((page) => page.url)).toEqual(['https://docs.test/', 'https://docs.test/a']);
      expect(result.failures).toEqual([{ url: 'https://docs.test/b', error: 'HTTP 404 from https://docs.test/b' }]);
    });

    it('never visits a page twice or leaves the site', async () => {
      const result = await crawler.crawl('https://docs.test/', { maxDepth: 5 });

      expect(result.pages.map((page) => page.url)).toEqual([
        'https://docs.test/',
        'https://docs.test/a',
        'https://docs.test/c',
      ]);
      expect(web.requested.filter((url) => url === 'https://docs.test/')).toHaveLength(1);
      expect(web.requested).not.toContain('https://other.test/x');
    });

    it('clamps maxDepth to at least one level', async () => {
      const result = await crawler.crawl('https://docs.test/', { maxDepth: 0 });
      expect(result.pages).toHaveLength(1);
    });
  });

  describe('sitemap crawl', () => {
    it('fetches every listed page, following sitemap indexes', async () => {
      web
        .page(
          'https://docs.test/sitemap.xml',
          '<sitemapindex><sitemap><loc>https://docs.test/sitemap-pages.xml</loc></sitemap></sitemapindex>',
          'application/xml'
        )
        .page(
          'https://docs.test/sitemap-pages.xml',
          '<urlset><url><loc>https://docs.test/a</loc></url><url><loc>https://docs.test/c</loc></url></urlset>',
          'application/xml'
        );

      const result = await crawler.crawl('https://docs.test/sitemap.xml');

      expect(result.kind).toBe('sitemap');
      expect(result.pages.map((page) => page.content)).toEqual(['Page A\nc home', 'Page C']);
    });

    it('skips a nested sitemap that fails', async () => {
      web.page(
        'https://docs.test/sitemap.xml',
        '<sitemapindex><sitemap><loc>https://docs.test/gone.xml</loc></sitemap></sitemapindex>',
        'application/xml'
      );

      expect(await crawler.sitemapUrls('https://docs.test/sitemap.xml')).toEqual([]);
    });

    it('throws when the sitemap itself cannot be fetched', async () => {
      await expect(crawler.crawl('https://docs.test/missing-sitemap.xml')).rejects.toThrow(
        'HTTP 404 from https://docs.test/missing-sitemap.xml'
      );
    });
  });

  describe('text file crawl', () => {
    it('fetches the single file', async () => {
      web.page('https://docs.test/llms.txt', 'All the docs', 'text/plain');

      const result = await crawler.crawl('https://docs.test/llms.txt');

      expect(result).toEqual({
        kind: 'text_file',
        pages: [
          {
            url: 'https://docs.test/llms.txt',
            content: 'All the docs',
            contentType: 'text/plain',
            links: [],
          },
        ],
        failures: [],
      });
    });
  });
});
