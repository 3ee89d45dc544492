/**
 * Crawl Command
 *
 * Fetches web content and stores it under the site's host:
 *   docr crawl <url>              Sitemap, .txt file, or page + internal links
 *   docr crawl <url> --single     Only this page
 *   docr crawl <url> -d 2 -c 5    Limit link depth and parallel requests
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import { CrawlOptionsSchema, parseInput } from '../validation.js';
import { CrawlError } from '../../errors/index.js';
import { assertCrawlableUrl, type CrawlResult } from '../../indexer/crawler/index.js';
import { crawlSummary, pageSummary, webSourceKey } from '../../indexer/index.js';

interface CrawlCommandOptions {
  single?: boolean;
  depth?: string;
  concurrency?: string;
}

/**
 * Create the crawl command.
 */
export function createCrawlCommand(getContext: () => CommandContext): Command {
  return new Command('crawl')
    .argument('<url>', 'Page, sitemap or .txt URL')
    .description('Crawl a URL and store its content for search')
    .option('-s, --single', 'Fetch only this page, without following links', false)
    .option('-d, --depth <n>', 'Link levels to follow for web pages (1-10)')
    .option('-c, --concurrency <n>', 'Parallel requests (1-50)')
    .action(async (url: string, cmdOptions: CrawlCommandOptions) => {
      const ctx = getContext();
      const options = parseInput(CrawlOptionsSchema, cmdOptions);
      const target = assertCrawlableUrl(url);

      const services = ctx.services();
      const maxDepth = options.depth ?? services.config.crawl.max_depth;
      const maxConcurrent = options.concurrency ?? services.config.crawl.max_concurrent;
      const sourceKey = webSourceKey(target);
      ctx.debug(`Crawling ${target} into source ${sourceKey} (depth ${maxDepth}, concurrency ${maxConcurrent})`);

      const reporter = createProgressReporter({ json: ctx.options.json, verbose: ctx.options.verbose });
      const started = Date.now();

      reporter.startStage('crawling');
      let crawl: CrawlResult;
      try {
        crawl = options.single
          ? { kind: 'webpage', pages: [await services.crawler.fetchPage(target)], failures: [] }
          : await services.crawler.crawl(target, { maxDepth, maxConcurrent });
      } catch (error) {
        reporter.failStage(`Could not crawl ${target}`);
        throw error;
      }

      const pages = crawl.pages.filter((page) => page.content.trim());
      for (const failure of crawl.failures) {
        reporter.warn(`${failure.url}: ${failure.error}`);
      }
      reporter.completeStage(pages.length, `pages (${crawl.kind})`);

      if (pages.length === 0) {
        throw new CrawlError(`No content found at ${target}`, target);
      }

      reporter.startStage('ingesting', pages.length);
      const report = await services.pipeline.ingestPages(pages, {
        sourceKey,
        summary: options.single ? pageSummary(pages[0]) : crawlSummary(crawl.kind, target),
        onDocument: reporter.onDocument,
      });
      reporter.completeStage(report.documentsProcessed, 'pages stored');

      reporter.showSummary({
        report,
        durationMs: Date.now() - started,
        pagesFailed: crawl.failures.length,
      });

      if (!ctx.options.json && report.ok) {
        ctx.log(`Search it with ${chalk.cyan(`docr query "..." --source ${sourceKey}`)}`);
      }
      if (!report.ok || report.documentsProcessed === 0) {
        process.exitCode = 1;
      }
    });
}
