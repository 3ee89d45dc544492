#!/usr/bin/env node
/**
 * doc-retriever CLI Entry Point
 *
 * This is the main entry point for the `docr` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createConfigCommand } from './commands/config.js';
import { createCrawlCommand } from './commands/crawl.js';
import { createIngestCommand } from './commands/ingest.js';
import { createQueryCommand } from './commands/query.js';
import { createRemoveCommand } from './commands/remove.js';
import { createServeCommand } from './commands/serve.js';
import { createSourcesCommand } from './commands/sources.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import {
  getInferenceSettings,
  getStorageSettings,
  getValidationOptionsForCommand,
  loadConfig,
  printStartupValidation,
  validateStartupConfig,
} from '../config/index.js';
import { Services } from '../services.js';
import type { Logger } from '../utils/index.js';
import { VERSION } from '../version.js';

// Create the root program
const program = new Command();

program
  .name('docr')
  .description('Crawl and ingest documentation, then search it by meaning')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('docr crawl https://docs.example.com/sitemap.xml')}  Crawl every page of a sitemap
  ${chalk.cyan('docr ingest ./docs --batch-size 20')}              Ingest local files in batches
  ${chalk.cyan('docr query "how do retries work"')}                Search everything stored
  ${chalk.cyan('docr sources')}                                    List ingested sources
  ${chalk.cyan('docr serve')}                                      Offer the tools on stdio
  ${chalk.cyan('docr config set crawl.max_depth 2')}               Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  const context: CommandContext = {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
    services: (logger: Logger = context) =>
      new Services(loadConfig(), {
        storage: getStorageSettings(),
        inference: getInferenceSettings(),
        logger,
      }),
  };
  return context;
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<GlobalOptions>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = () => createContext(getGlobalOptions());

program.addCommand(createSourcesCommand(getContext));
program.addCommand(createCrawlCommand(getContext));
program.addCommand(createIngestCommand(getContext));
program.addCommand(createQueryCommand(getContext));
program.addCommand(createRemoveCommand(getContext));
program.addCommand(createConfigCommand(getContext));
program.addCommand(createServeCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    `Run: docr --help  to see available commands`
  );
});

// Report missing storage/inference settings before commands that need them
program.hook('preAction', (_thisCommand, actionCommand) => {
  const opts = getGlobalOptions();
  const validationOptions = getValidationOptionsForCommand(actionCommand.name());

  if (validationOptions.skipStorage && validationOptions.skipInference) {
    return;
  }

  const result = validateStartupConfig(validationOptions);

  if (result.errors.length > 0 || (opts.verbose && result.warnings.length > 0)) {
    printStartupValidation(result, opts.verbose);

    if (result.errors.length > 0) {
      throw new CLIError(
        'Configuration validation failed',
        'Fix the issues above and try again'
      );
    }
  }
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
