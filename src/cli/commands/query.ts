/**
 * Query Command
 *
 * Similarity search over stored chunks:
 *   docr query "how do I authenticate"
 *   docr query "pagination" --source docs.example.com -k 10
 *   docr query "retry with backoff" --code     Search code examples instead
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { QueryArgsSchema, QueryOptionsSchema, parseInput } from '../validation.js';
import { CLIError } from '../../errors/index.js';
import { formatResults, formatResultsJSON } from '../../search/index.js';

interface QueryCommandOptions {
  source?: string;
  count?: string;
  code?: boolean;
}

/**
 * Create the query command.
 */
export function createQueryCommand(getContext: () => CommandContext): Command {
  return new Command('query')
    .alias('q')
    .argument('<query>', 'What to search for')
    .description('Search stored documentation by meaning')
    .option('-s, --source <id>', 'Only search this source (see: docr sources)')
    .option('-k, --count <n>', 'Number of results (1-50)')
    .option('--code', 'Search extracted code examples', false)
    .action(async (rawQuery: string, cmdOptions: QueryCommandOptions) => {
      const ctx = getContext();
      const { query } = parseInput(QueryArgsSchema, { query: rawQuery });
      const options = parseInput(QueryOptionsSchema, cmdOptions);

      const retriever = ctx.services().retriever;
      const startTime = performance.now();

      const outcome = options.code
        ? await retriever.searchCodeExamples(query, { source: options.source, matchCount: options.count })
        : await retriever.query(query, { source: options.source, matchCount: options.count });
      const elapsed = Math.round(performance.now() - startTime);

      if (!outcome.ok) {
        throw new CLIError(outcome.error, 'Check the storage and inference settings with: docr config list');
      }
      ctx.debug(`Search took ${elapsed}ms`);

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              query: outcome.query,
              source: outcome.source,
              matchCount: outcome.matchCount,
              count: outcome.results.length,
              results: formatResultsJSON(outcome.results),
            },
            null,
            2
          )
        );
        return;
      }

      if (outcome.results.length === 0) {
        ctx.log(chalk.yellow(`No results for "${query}"${outcome.source ? ` in ${outcome.source}` : ''}.`));
        ctx.log(chalk.dim('List what is stored with: docr sources'));
        return;
      }

      const kind = options.code ? 'code example' : 'result';
      ctx.log(
        chalk.dim(
          `${outcome.results.length} ${kind}${outcome.results.length === 1 ? '' : 's'} for "${query}" (${elapsed}ms)`
        )
      );
      ctx.log('');
      ctx.log(formatResults(outcome.results, { showSource: outcome.source === null }));
    });
}
