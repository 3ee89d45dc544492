/**
 * Error display for the CLI
 *
 * Text goes to stderr as `Error:` / `Hint:` lines, or as one JSON object
 * with `--json`. The service errors carry their HTTP context (status,
 * response body, URL) as details: always in JSON, with `--verbose` in text.
 */

import chalk from 'chalk';
import {
  AuthenticationError,
  CLIError,
  CrawlError,
  EmbeddingServiceError,
  StorageError,
  ToolTimeoutError,
} from './types.js';

export interface ErrorHandlerOptions {
  /** Show details and stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

export type ErrorDetails = Record<string, string | number>;

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  details?: ErrorDetails;
  stack?: string;
}

/** Response bodies are cut to this many characters in details */
const MAX_RESPONSE_TEXT = 500;

/**
 * Plain message for any thrown value.
 *
 * Used at the tool boundary, where every failure becomes an `error` string.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * The diagnostic fields of an error, or undefined when it has none.
 *
 * @example
 * ```typescript
 * errorDetails(new StorageError('Insert failed', 409, '{"code":"23505"}'));
 * // { status: 409, response: '{"code":"23505"}' }
 * ```
 */
export function errorDetails(error: unknown): ErrorDetails | undefined {
  const details: ErrorDetails = {};

  if (error instanceof StorageError) {
    if (error.status !== undefined) details.status = error.status;
    if (error.responseText) details.response = error.responseText.slice(0, MAX_RESPONSE_TEXT);
  } else if (error instanceof AuthenticationError || error instanceof EmbeddingServiceError) {
    if (error.status !== undefined) details.status = error.status;
  } else if (error instanceof CrawlError) {
    details.url = error.url;
    if (error.status !== undefined) details.status = error.status;
  } else if (error instanceof ToolTimeoutError) {
    details.tool = error.toolName;
    details.timeoutMs = error.timeoutMs;
  }

  return Object.keys(details).length > 0 ? details : undefined;
}

function toOutput(error: unknown, verbose: boolean): ErrorOutput {
  if (!(error instanceof Error)) {
    return { error: String(error), code: 1 };
  }
  const code = error instanceof CLIError ? error.code : 1;
  const hint = error instanceof CLIError ? error.hint : undefined;
  const details = errorDetails(error);
  return {
    error: error.message,
    code,
    ...(hint !== undefined ? { hint } : {}),
    ...(details ? { details } : {}),
    ...(verbose && error.stack ? { stack: error.stack } : {}),
  };
}

/**
 * Format an error for display.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const output = toOutput(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }

  const lines = [chalk.red('Error: ') + output.error];
  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  } else if (error instanceof Error && !(error instanceof CLIError) && !verbose) {
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  if (verbose && output.details) {
    for (const [key, value] of Object.entries(output.details)) {
      lines.push(chalk.dim(`  ${key}: `) + String(value));
    }
  }
  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }

  return lines.join('\n');
}

/**
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Print the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler for `uncaughtException` / `unhandledRejection`.
 */
export function createGlobalErrorHandler(options: ErrorHandlerOptions = {}): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
