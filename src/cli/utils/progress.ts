/**
 * Progress Reporter
 *
 * Progress display for crawl and ingest runs. Supports multiple output
 * modes:
 * - Interactive: ora spinner updated per settled document
 * - JSON: NDJSON event stream for scripts
 * - Text: one line per stage for non-TTY environments
 *
 * Spinner updates are throttled to 100ms to prevent flickering.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

import type { DocumentOutcome, IngestionReport } from '../../indexer/index.js';

export type ProgressStage = 'scanning' | 'crawling' | 'ingesting';

const STAGE_LABELS: Record<ProgressStage, string> = {
  scanning: 'Scanning',
  crawling: 'Crawling',
  ingesting: 'Ingesting',
};

export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** List every document as it settles */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;

  /** Line sink (defaults to console.log) */
  write: (line: string) => void;
}

export type ProgressEventType = 'stage_start' | 'document' | 'stage_complete' | 'warning' | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: ProgressStage;
  data: Record<string, unknown>;
}

/** What the final summary shows */
export interface RunSummary {
  report: IngestionReport;
  durationMs: number;
  /** Pages the crawler could not fetch */
  pagesFailed?: number;
}

/**
 * ProgressReporter manages all progress display during a crawl or ingest.
 *
 * Usage:
 * ```typescript
 * const reporter = createProgressReporter({ json: false });
 *
 * reporter.startStage('ingesting', files.length);
 * await pipeline.ingestLocalFiles(path, { onDocument: reporter.onDocument });
 * reporter.completeStage(report.documentsProcessed, 'documents');
 * reporter.showSummary({ report, durationMs });
 * ```
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private currentStage: ProgressStage | null = null;
  private lastUpdateTime = 0;

  private static readonly UPDATE_THROTTLE_MS = 100;

  /** Maximum length for origin display */
  private static readonly MAX_ORIGIN_LENGTH = 50;

  constructor(private readonly options: ProgressReporterOptions) {
    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * Start a stage. `total` 0 means unknown.
   */
  startStage(stage: ProgressStage, total = 0): void {
    this.currentStage = stage;

    if (this.options.json) {
      this.emitJson({ type: 'stage_start', stage, data: { total } });
      return;
    }

    const label = STAGE_LABELS[stage];
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({
        text: total > 0 ? `0/${total}` : `${label}...`,
        prefixText: chalk.cyan(label.padEnd(12)),
      }).start();
    } else {
      this.options.write(`${label}...`);
    }
  }

  /**
   * Pipeline `onDocument` callback.
   */
  readonly onDocument = (outcome: DocumentOutcome, completed: number, total: number): void => {
    if (this.options.json) {
      this.emitJson({
        type: 'document',
        stage: this.currentStage ?? undefined,
        data: { completed, total, ...outcome },
      });
      return;
    }

    if (this.options.verbose || outcome.status === 'failed') {
      this.printOutcome(outcome);
    }

    const now = performance.now();
    if (this.spinner && now - this.lastUpdateTime >= ProgressReporter.UPDATE_THROTTLE_MS) {
      this.lastUpdateTime = now;
      const percentage = Math.round((completed / Math.max(total, 1)) * 100);
      const progressText = `${completed}/${total} (${percentage}%)`;
      this.spinner.text = `${progressText.padEnd(18)} ${chalk.dim(this.truncateOrigin(outcome.origin))}`;
    }
  };

  /**
   * Mark the current stage as complete.
   */
  completeStage(processed: number, unit: string): void {
    const stage = this.currentStage;
    if (!stage) return;

    if (this.options.json) {
      this.emitJson({ type: 'stage_complete', stage, data: { processed, unit } });
    } else if (this.spinner) {
      this.spinner.succeed(`${processed.toLocaleString()} ${unit}`);
    } else {
      this.options.write(`${STAGE_LABELS[stage]} complete: ${processed.toLocaleString()} ${unit}`);
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Stop the current stage after a fatal error. The error itself is
   * printed by the CLI error handler.
   */
  failStage(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
    }
    this.currentStage = null;
    this.spinner = null;
  }

  warn(message: string): void {
    if (this.options.json) {
      this.emitJson({ type: 'warning', stage: this.currentStage ?? undefined, data: { message } });
      return;
    }
    this.clearLine(() => this.options.write(chalk.yellow(`Warning: ${message}`)));
  }

  /**
   * Display the final summary.
   */
  showSummary({ report, durationMs, pagesFailed }: RunSummary): void {
    if (this.options.json) {
      this.emitJson({ type: 'complete', data: { durationMs, pagesFailed, ...withoutDocuments(report) } });
      return;
    }

    const write = this.options.write;
    const failed = report.documentsFailed > 0 || !report.ok;
    write('');
    write(failed ? chalk.yellow.bold('Finished with errors') : chalk.green.bold('Done ✓'));
    write('');
    write(`  ${chalk.dim('Source:')}           ${report.sourceId}`);
    write(`  ${chalk.dim('Documents:')}        ${describeDocuments(report)}`);
    write(`  ${chalk.dim('Chunks stored:')}    ${report.chunksStored.toLocaleString()}`);
    if (report.chunksFailed > 0) {
      write(`  ${chalk.dim('Chunks failed:')}    ${report.chunksFailed.toLocaleString()}`);
    }
    if (report.codeExamplesStored > 0) {
      write(`  ${chalk.dim('Code examples:')}    ${report.codeExamplesStored.toLocaleString()}`);
    }
    write(`  ${chalk.dim('Words:')}            ${report.wordCount.toLocaleString()}`);
    if (pagesFailed) {
      write(`  ${chalk.dim('Pages not fetched:')} ${pagesFailed.toLocaleString()}`);
    }
    write(`  ${chalk.dim('Time elapsed:')}     ${formatDuration(durationMs)}`);

    if (report.source.outcome === 'failed') {
      write('');
      write(chalk.red(`  Source not recorded: ${report.source.error}`));
    }
    write('');
  }

  private printOutcome(outcome: DocumentOutcome): void {
    const line =
      outcome.status === 'failed'
        ? chalk.red(`  ✗ ${outcome.origin}: ${outcome.error ?? 'failed'}`)
        : outcome.status === 'skipped'
          ? chalk.dim(`  - ${outcome.origin} (empty)`)
          : chalk.dim(`  → ${outcome.origin} (${outcome.chunksStored} chunks)`);
    this.clearLine(() => this.options.write(line));
  }

  /** Print above a running spinner */
  private clearLine(print: () => void): void {
    if (this.spinner) {
      this.spinner.clear();
      print();
      this.spinner.render();
    } else {
      print();
    }
  }

  private emitJson(event: Omit<ProgressEvent, 'timestamp'>): void {
    this.options.write(JSON.stringify({ ...event, timestamp: new Date().toISOString() }));
  }

  private truncateOrigin(origin: string): string {
    if (origin.length <= ProgressReporter.MAX_ORIGIN_LENGTH) {
      return origin;
    }
    return '...' + origin.slice(-(ProgressReporter.MAX_ORIGIN_LENGTH - 3));
  }
}

function withoutDocuments(report: IngestionReport): Omit<IngestionReport, 'documents'> {
  const { documents: _documents, ...rest } = report;
  return rest;
}

function describeDocuments(report: IngestionReport): string {
  const parts = [`${report.documentsProcessed.toLocaleString()} processed`];
  if (report.documentsFailed > 0) parts.push(`${report.documentsFailed} failed`);
  if (report.documentsSkipped > 0) parts.push(`${report.documentsSkipped} empty`);
  return parts.join(', ');
}

/**
 * Format milliseconds as human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Create a ProgressReporter with sensible defaults.
 */
export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
    write: options.write ?? ((line) => console.log(line)),
  });
}
