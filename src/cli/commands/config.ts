/**
 * Config Command
 *
 * Manages ~/.docr/config.toml via CLI:
 *   docr config get <key>         - Get a specific value
 *   docr config set <key> <value> - Set a value
 *   docr config list              - Show all configuration
 *   docr config path              - Show config file location
 *   docr config reset --force     - Restore the default file
 *
 * Credentials and endpoints live in the environment, not here.
 */

import { existsSync, unlinkSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';

import { getConfigPath, getConfigValue, listConfig, loadConfig, setConfigValue } from '../../config/index.js';
import { getErrorMessage } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/**
 * Create the config command with all subcommands
 *
 * @param resolvePath - Config file location (tests pass a temp file)
 */
export function createConfigCommand(
  getContext: () => CommandContext,
  resolvePath: () => string = getConfigPath
): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., docr config get chunking.chunk_size)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key, resolvePath());

        if (value === undefined) {
          ctx.error(`Unknown config key: ${key}`);
          ctx.log('');
          ctx.log(`Run ${chalk.cyan('docr config list')} to see all available keys.`);
          process.exitCode = 1;
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else {
          ctx.log(formatValue(value));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., docr config set crawl.max_depth 2)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      try {
        const configPath = resolvePath();
        setConfigValue(key, value, configPath);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: getConfigValue(key, configPath) }));
        } else {
          ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();

      try {
        const configPath = resolvePath();
        const entries = listConfig(configPath);

        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
          return;
        }

        ctx.log(chalk.bold('Configuration:'));
        ctx.log('');

        // Group by section for readability
        let currentGroup = '';
        for (const [key, value] of entries) {
          const group = key.split('.')[0] ?? '';
          if (group !== currentGroup) {
            if (currentGroup !== '') ctx.log('');
            currentGroup = group;
          }
          ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
        }

        ctx.log('');
        ctx.log(chalk.dim(`Config file: ${configPath}`));
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = resolvePath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      try {
        const configPath = resolvePath();
        if (existsSync(configPath)) {
          unlinkSync(configPath);
        }
        loadConfig(true, configPath);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, message: 'Configuration reset to defaults' }));
        } else {
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  return configCmd;
}

/**
 * Format a value for display
 */
function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

function handleConfigError(ctx: CommandContext, error: unknown): void {
  const message = getErrorMessage(error);

  if (ctx.options.json) {
    console.error(JSON.stringify({ error: message }));
  } else {
    ctx.error(message);
  }

  process.exitCode = 1;
}
