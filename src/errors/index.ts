/**
 * Error handling module
 *
 * Usage:
 *   import { ConfigurationError, handleError } from './errors/index.js';
 *
 *   throw new ConfigurationError('No deployment configured');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigurationError,
  AuthenticationError,
  EmbeddingServiceError,
  StorageError,
  ValidationError,
  ToolTimeoutError,
  CrawlError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  errorDetails,
  getErrorMessage,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
  type ErrorDetails,
} from './handler.js';
