/**
 * Remove Command
 *
 * Deletes a source and everything stored under it:
 *   docr remove <source>          - Show what would be deleted (requires --force)
 *   docr remove <source> --force  - Delete without confirmation
 *
 * Chunks and code examples are deleted before the source row, so an
 * interrupted removal can simply be run again.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { CLIError } from '../../errors/index.js';

interface RemoveOptions {
  force?: boolean;
}

/**
 * Create the remove command
 */
export function createRemoveCommand(getContext: () => CommandContext): Command {
  return new Command('remove')
    .alias('rm')
    .argument('<source>', 'Source id to remove (see: docr sources)')
    .description('Remove a source with all of its chunks and code examples')
    .option('-f, --force', 'Skip confirmation prompt')
    .action(async (sourceId: string, options: RemoveOptions) => {
      const ctx = getContext();
      ctx.debug(`Remove command called for source: ${sourceId}`);

      const services = ctx.services();
      const source = await services.sources.get(sourceId);

      if (!source) {
        throw new CLIError(`Source not found: ${sourceId}`, 'Run: docr sources  to see available sources');
      }

      // Confirmation check (unless --force or --json mode)
      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow(`This will permanently delete "${sourceId}" and all of its stored chunks.`));
        if (source.summary) {
          ctx.log(`  - ${chalk.dim('Summary:')} ${source.summary}`);
        }
        ctx.log(`  - ${chalk.dim('Words:')} ${source.total_word_count.toLocaleString()}`);
        ctx.log('');
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm deletion.`);
        process.exitCode = 1;
        return;
      }

      const result = await services.sources.remove(sourceId);
      ctx.debug(`Deleted ${result.chunksDeleted} chunks, ${result.codeExamplesDeleted} code examples`);

      if (ctx.options.json) {
        console.log(
          JSON.stringify({
            success: true,
            sourceId,
            deleted: {
              chunks: result.chunksDeleted,
              codeExamples: result.codeExamplesDeleted,
              source: result.sourceDeleted,
            },
          })
        );
      } else {
        ctx.log(`${chalk.green('✓')} Removed source "${chalk.cyan(sourceId)}"`);
        ctx.log(`  - Deleted ${result.chunksDeleted.toLocaleString()} chunks`);
        ctx.log(`  - Deleted ${result.codeExamplesDeleted.toLocaleString()} code examples`);
      }
    });
}
