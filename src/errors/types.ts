/**
 * Error type definitions for doc-retriever
 *
 * Every error carries:
 * - An actionable message plus an optional recovery hint
 * - An exit code for the CLI
 *
 * The tool layer never lets these escape; it converts them into
 * `{ success: false, error }` results. The CLI prints them through
 * `handleError`.
 */

/**
 * Base class for all doc-retriever errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Missing or invalid settings. Fatal for the operation, never for the process.
 *
 * Examples:
 * - Inference credentials or deployment ids not set
 * - Invalid TOML in ~/.docr/config.toml
 * - A chunk overlap that is not smaller than the chunk size
 *
 * Exit code 2: Configuration error
 */
export class ConfigurationError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: docr config list  to see current settings', 2);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when the OAuth2 token exchange fails, or a freshly issued token is
 * still rejected by the inference service.
 *
 * Exit code 4: Authentication error
 */
export class AuthenticationError extends CLIError {
  /** HTTP status of the failing exchange, when there was a response */
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(
      message,
      'Check INFERENCE_AUTH_URL, INFERENCE_CLIENT_ID and INFERENCE_CLIENT_SECRET',
      4
    );
    this.name = 'AuthenticationError';
    this.status = status;
  }
}

/**
 * Thrown when an embedding request fails after the retry budget is spent,
 * or the service answers with vectors that do not match the request.
 *
 * Exit code 6: Embedding service error
 */
export class EmbeddingServiceError extends CLIError {
  public readonly status?: number;

  /**
   * True when the service itself was failing (network, timeout, 408, 429,
   * 5xx) and the retry budget ran out. False when the request or its
   * answer was at fault.
   */
  public readonly transient: boolean;

  constructor(message: string, status?: number, transient = false) {
    super(message, 'Check the deployment ids and that the inference service is reachable', 6);
    this.name = 'EmbeddingServiceError';
    this.status = status;
    this.transient = transient;
  }
}

/**
 * Thrown for any non-2xx answer from the storage backend.
 *
 * Exit code 5: Storage error
 */
export class StorageError extends CLIError {
  /** HTTP status, absent when the request never got a response */
  public readonly status?: number;

  /** Raw response body, for diagnostics */
  public readonly responseText?: string;

  constructor(message: string, status?: number, responseText?: string) {
    super(message, 'Check STORAGE_URL and STORAGE_SERVICE_KEY', 5);
    this.name = 'StorageError';
    this.status = status;
    this.responseText = responseText;
  }
}

/**
 * Thrown when input validation fails (empty url, path or query, bad tool
 * arguments).
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when a tool invocation exceeds its wall-clock budget.
 *
 * Exit code 7: Timeout
 */
export class ToolTimeoutError extends CLIError {
  public readonly toolName: string;
  public readonly timeoutMs: number;

  constructor(toolName: string, timeoutMs: number) {
    super(
      `Tool "${toolName}" timed out after ${timeoutMs}ms`,
      'For large directories use crawl_local_files_batch and resume with next_file',
      7
    );
    this.name = 'ToolTimeoutError';
    this.toolName = toolName;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Thrown when a page cannot be fetched or yields no usable text.
 *
 * Exit code 8: Crawl error
 */
export class CrawlError extends CLIError {
  public readonly url: string;
  /** HTTP status, absent for network failures */
  public readonly status?: number;

  constructor(message: string, url: string, status?: number) {
    super(message, 'Check that the URL is reachable and serves HTML or text', 8);
    this.name = 'CrawlError';
    this.url = url;
    this.status = status;
  }
}
