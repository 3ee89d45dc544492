/**
 * Startup Configuration Validation
 *
 * Reports missing storage/inference settings before a command runs, so a
 * crawl does not fail minutes in on the first embedding call.
 *
 * IMPORTANT: This is a WARNING system, not a hard block.
 * The command itself raises ConfigurationError when it actually needs a
 * missing value.
 */

import chalk from 'chalk';
import { loadEnv, missingInferenceSettings, SETUP_INSTRUCTIONS } from './env.js';
import { loadConfig } from './loader.js';

// ============================================================================
// Types
// ============================================================================

export interface StartupValidationResult {
  valid: boolean;
  /** Non-fatal issues */
  warnings: string[];
  /** Missing settings the command needs */
  errors: string[];
  /** Setup instructions matching the errors */
  hints: string[];
}

export interface StartupValidationOptions {
  /** Skip storage checks (for commands that never touch the database) */
  skipStorage?: boolean;
  /** Skip inference checks (for commands that never embed) */
  skipInference?: boolean;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate configuration at CLI startup.
 *
 * @example
 * const result = validateStartupConfig({ skipInference: true });
 * printStartupValidation(result);
 */
export function validateStartupConfig(
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const { skipStorage = false, skipInference = false } = options;
  const warnings: string[] = [];
  const errors: string[] = [];
  const hints: string[] = [];

  try {
    loadConfig(false);
  } catch (error) {
    // Commands fall back to nothing here; loading again will raise properly
    warnings.push(error instanceof Error ? error.message : String(error));
  }

  if (!skipStorage) {
    const env = loadEnv();
    if (!env.STORAGE_SERVICE_KEY) {
      warnings.push('STORAGE_SERVICE_KEY is not set; requests go out unauthenticated');
    }
    if (!/^https?:\/\//.test(env.STORAGE_URL)) {
      errors.push(`STORAGE_URL is not an http(s) URL: ${env.STORAGE_URL}`);
      hints.push(SETUP_INSTRUCTIONS.storage);
    }
  }

  if (!skipInference) {
    const missing = missingInferenceSettings();
    if (missing.length > 0) {
      errors.push(`Inference service not configured: missing ${missing.join(', ')}`);
      hints.push(SETUP_INSTRUCTIONS.inference);
    }
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
    hints,
  };
}

/**
 * Print startup validation warnings/errors to stderr.
 *
 * @param verbose - Whether to show warnings too (default: only errors)
 */
export function printStartupValidation(
  result: StartupValidationResult,
  verbose = false
): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }

  for (const hint of result.hints) {
    console.error(chalk.dim(hint));
  }

  if (verbose) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
  }
}

/** Commands that talk to the storage backend */
export const COMMANDS_REQUIRING_STORAGE = ['sources', 'crawl', 'ingest', 'query', 'remove', 'serve'];

/** Commands that embed text */
export const COMMANDS_REQUIRING_INFERENCE = ['crawl', 'ingest', 'query'];

export function getValidationOptionsForCommand(command: string): StartupValidationOptions {
  return {
    skipStorage: !COMMANDS_REQUIRING_STORAGE.includes(command),
    skipInference: !COMMANDS_REQUIRING_INFERENCE.includes(command),
  };
}
