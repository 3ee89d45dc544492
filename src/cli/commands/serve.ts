/**
 * Serve Command
 *
 * Runs the tool server on stdio for an agent host:
 *   docr serve
 *
 * Stdout carries only JSON-RPC replies; all logging goes to stderr.
 */

import { Command } from 'commander';

import type { CommandContext } from '../types.js';
import { createToolServer, serveStdio } from '../../server/index.js';
import { createStderrLogger } from '../../utils/index.js';

export function createServeCommand(getContext: () => CommandContext): Command {
  return new Command('serve')
    .description('Serve the search and ingestion tools over JSON-RPC on stdio')
    .action(async () => {
      const ctx = getContext();
      const logger = createStderrLogger(ctx.options.verbose);
      const services = ctx.services(logger);

      const server = createToolServer(services, logger);
      logger.info?.(`Serving tools on stdio (timeout ${services.config.server.tool_timeout_ms}ms per call)`);

      await serveStdio(server, { input: process.stdin, output: process.stdout }, logger);
      logger.info?.('Input closed, shutting down');
    });
}
