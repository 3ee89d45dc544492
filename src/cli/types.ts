import type { Services } from '../services.js';
import type { Logger } from '../utils/index.js';

/**
 * Global CLI options available to all commands
 * These are parsed at the root level and passed down to subcommands
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose: boolean;
  /** Output results as JSON instead of human-readable text */
  json: boolean;
}

/**
 * Context passed to all command handlers
 * Combines parsed options with runtime utilities. Satisfies Logger, so
 * commands hand it straight to library code.
 */
export interface CommandContext extends Logger {
  options: GlobalOptions;
  /** Log a message (respects --json flag) */
  log: (message: string) => void;
  /** Log a debug message (only shown with --verbose) */
  debug: (message: string) => void;
  /** Log a warning (respects --json flag) */
  warn: (message: string) => void;
  /** Log an error message */
  error: (message: string) => void;
  /**
   * Build storage, crawling and retrieval services from config and the
   * environment. `logger` defaults to the context itself.
   */
  services: (logger?: Logger) => Services;
}
