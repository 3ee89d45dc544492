/**
 * Sources Command
 *
 * Lists every ingested source with its word count:
 *   docr sources          - Show table of all sources
 *   docr ls               - Alias for sources
 *   docr sources --json   - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { formatTable, type Column } from '../../utils/table.js';

/**
 * Format a number with thousand separators
 */
function formatNumber(n: number): string {
  return n.toLocaleString();
}

/**
 * Format a timestamp as relative time (e.g., "2 hours ago")
 */
export function formatRelativeTime(isoString: string | undefined, now = new Date()): string {
  if (!isoString) return 'Never';

  const date = new Date(isoString);
  if (Number.isNaN(date.getTime())) return 'Unknown';

  const diffSec = Math.floor((now.getTime() - date.getTime()) / 1000);
  const diffMin = Math.floor(diffSec / 60);
  const diffHour = Math.floor(diffMin / 60);
  const diffDay = Math.floor(diffHour / 24);

  if (diffSec < 60) return 'Just now';
  if (diffMin < 60) return `${diffMin} minute${diffMin === 1 ? '' : 's'} ago`;
  if (diffHour < 24) return `${diffHour} hour${diffHour === 1 ? '' : 's'} ago`;
  if (diffDay < 7) return `${diffDay} day${diffDay === 1 ? '' : 's'} ago`;
  if (diffDay < 30) {
    const weeks = Math.floor(diffDay / 7);
    return `${weeks} week${weeks === 1 ? '' : 's'} ago`;
  }

  return date.toISOString().slice(0, 10);
}

/**
 * Create the sources command
 */
export function createSourcesCommand(getContext: () => CommandContext): Command {
  return new Command('sources')
    .alias('ls')
    .description('List all ingested sources')
    .action(async () => {
      const ctx = getContext();
      ctx.debug('Listing sources...');

      const sources = await ctx.services().sources.list();
      ctx.debug(`Found ${sources.length} source(s)`);

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              count: sources.length,
              sources: sources.map((source) => ({
                sourceId: source.source_id,
                summary: source.summary,
                totalWords: source.total_word_count,
                createdAt: source.created_at ?? null,
                updatedAt: source.updated_at ?? null,
              })),
            },
            null,
            2
          )
        );
        return;
      }

      if (sources.length === 0) {
        ctx.log(chalk.yellow('No sources ingested yet.'));
        ctx.log('');
        ctx.log(chalk.dim('Get started:'));
        ctx.log(`  ${chalk.cyan('docr crawl https://docs.example.com/sitemap.xml')}`);
        ctx.log(`  ${chalk.cyan('docr ingest ./docs')}`);
        return;
      }

      const columns: Column[] = [
        { header: 'Source', key: 'source' },
        { header: 'Summary', key: 'summary', maxWidth: 50 },
        { header: 'Words', key: 'words', align: 'right' },
        { header: 'Last Updated', key: 'updated' },
      ];

      const rows = sources.map((source) => ({
        source: source.source_id,
        summary: source.summary ?? '',
        words: formatNumber(source.total_word_count),
        updated: formatRelativeTime(source.updated_at ?? source.created_at),
      }));

      ctx.log(formatTable(columns, rows));
      ctx.log('');
      ctx.log(chalk.dim(`${sources.length} source${sources.length === 1 ? '' : 's'}`));
    });
}
