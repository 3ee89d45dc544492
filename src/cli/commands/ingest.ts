/**
 * Ingest Command
 *
 * Stores local documentation files for search.
 *
 * Usage:
 *   docr ingest <path>                         Every matching file in one run
 *   docr ingest ./docs -e .md,.rst             Only these extensions
 *   docr ingest ./docs --batch-size 20         The first 20 files, then stop
 *   docr ingest ./docs -b 20 --start-from x.md Resume at a checkpoint
 *   docr ingest ./docs -b 20 --all             Every batch, one after another
 *
 * Files are taken in sorted path order, so the next_file printed after a
 * batch is a stable checkpoint as long as the directory does not change.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import { IngestOptionsSchema, parseInput } from '../validation.js';
import type { BatchReport } from '../../indexer/index.js';

interface IngestCommandOptions {
  extensions?: string;
  recursive?: boolean;
  batchSize?: string;
  startFrom?: string;
  all?: boolean;
}

/**
 * Create the ingest command.
 */
export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .argument('<path>', 'File or directory to ingest')
    .description('Ingest local files for search')
    .option('-e, --extensions <list>', 'Comma-separated extensions (default from config)')
    .option('--no-recursive', 'Skip subdirectories')
    .option('-b, --batch-size <n>', 'Process this many files per batch')
    .option('--start-from <file>', 'Resume a batch run at this file')
    .option('--all', 'Keep running batches until every file is processed', false)
    .action(async (path: string, cmdOptions: IngestCommandOptions) => {
      const ctx = getContext();
      const options = parseInput(IngestOptionsSchema, cmdOptions);
      const services = ctx.services();
      const extensions = services.extensions(options.extensions);
      ctx.debug(`Ingesting ${path} (${extensions.join(', ')}, recursive=${options.recursive})`);

      const reporter = createProgressReporter({ json: ctx.options.json, verbose: ctx.options.verbose });
      const started = Date.now();

      const batchMode = options.batchSize !== undefined || options.startFrom !== undefined || options.all;
      if (!batchMode) {
        reporter.startStage('ingesting');
        const report = await services.pipeline.ingestLocalFiles(path, {
          recursive: options.recursive,
          extensions,
          onDocument: reporter.onDocument,
        });
        reporter.completeStage(report.documentsProcessed, 'files');
        reporter.showSummary({ report, durationMs: Date.now() - started });

        if (!report.ok || report.documentsFailed > 0) {
          process.exitCode = 1;
        }
        return;
      }

      const batchSize = options.batchSize ?? services.config.ingestion.batch_size;
      let startFrom = options.startFrom;
      let batch: BatchReport;

      do {
        reporter.startStage('ingesting', batchSize);
        batch = await services.pipeline.ingestLocalBatch(path, {
          batchSize,
          recursive: options.recursive,
          extensions,
          startFrom,
          onDocument: reporter.onDocument,
        });
        if (batch.checkpointMissed) {
          reporter.warn(`Checkpoint ${startFrom ?? ''} not found; started from the first file`);
        }
        reporter.completeStage(
          batch.documentsProcessed,
          `files (${batch.startIndex + 1}-${batch.endIndex} of ${batch.totalFiles})`
        );
        reporter.showSummary({ report: batch, durationMs: Date.now() - started });
        startFrom = batch.nextFile ?? undefined;
      } while (options.all && batch.nextFile !== null && batch.ok && !batch.checkpointMissed);

      if (!ctx.options.json) {
        if (batch.nextFile) {
          ctx.log(`${batch.remainingFiles} file${batch.remainingFiles === 1 ? '' : 's'} remaining. Continue with:`);
          ctx.log(`  ${chalk.cyan(`docr ingest ${path} --batch-size ${batchSize} --start-from "${batch.nextFile}"`)}`);
        } else {
          ctx.log(chalk.dim(`Status: ${batch.status}`));
        }
      }

      if (!batch.ok || batch.status === 'BATCH_COMPLETED') {
        process.exitCode = 1;
      }
    });
}
