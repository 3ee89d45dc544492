/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Table formatting for CLI output
export {
  formatTable,
  truncateCell,
  type Column,
  type Alignment,
  type Row,
} from './table.js';

// Injectable logging for library code
export {
  consoleLogger,
  silentLogger,
  createStderrLogger,
  type Logger,
} from './logger.js';
