/**
 * Tests for config command
 *
 * Every subcommand works on a config file in a temp directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createConfigCommand } from '../config.js';
import type { CommandContext } from '../../types.js';
import { CONFIG_TEMPLATE } from '../../../config/index.js';
import { createTestServices } from '../../../test-utils/index.js';

// eslint-disable-next-line no-control-regex
const stripAnsi = (text: string) => text.replace(/\x1B\[[0-9;]*m/g, '');

describe('createConfigCommand', () => {
  let mockContext: CommandContext;
  let logOutput: string[];
  let errors: string[];
  let tempDir: string;
  let configPath: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  const run = (...args: string[]) => {
    const program = new Command();
    program.addCommand(createConfigCommand(() => mockContext, () => configPath));
    return program.parseAsync(['node', 'test', 'config', ...args]);
  };

  beforeEach(() => {
    const { services } = createTestServices();
    logOutput = [];
    errors = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: (msg: string) => errors.push(msg),
      services: () => services,
    };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    process.exitCode = undefined;

    tempDir = mkdtempSync(join(tmpdir(), 'docr-config-'));
    configPath = join(tempDir, 'config.toml');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('has get, set, list, path and reset subcommands', () => {
    const cmd = createConfigCommand(() => mockContext, () => configPath);
    expect(cmd.commands.map((sub) => sub.name())).toEqual(['get', 'set', 'list', 'path', 'reset']);
  });

  it('gets a default value', async () => {
    await run('get', 'chunking.chunk_size');

    expect(logOutput).toEqual(['1000']);
  });

  it('reports an unknown key', async () => {
    await run('get', 'chunking.nope');

    expect(errors).toEqual(['Unknown config key: chunking.nope']);
    expect(process.exitCode).toBe(1);
  });

  it('sets a value and reads it back as JSON', async () => {
    mockContext.options.json = true;

    await run('set', 'crawl.max_depth', '2');
    await run('get', 'crawl.max_depth');

    expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual({
      success: true,
      key: 'crawl.max_depth',
      value: 2,
    });
    expect(JSON.parse(String(consoleLogSpy.mock.calls[1][0]))).toEqual({ key: 'crawl.max_depth', value: 2 });
  });

  it('rejects an invalid value without writing', async () => {
    await run('set', 'search.match_count', '500');

    expect(errors[0]).toContain("Invalid value for 'search.match_count'");
    expect(existsSync(configPath)).toBe(false);
    expect(process.exitCode).toBe(1);
  });

  it('lists values grouped by section', async () => {
    await run('list');

    const lines = logOutput.map(stripAnsi);
    expect(lines).toContain('  chunking.chunk_size = 1000');
    expect(lines).toContain('  server.tool_timeout_ms = 300000');
    expect(lines[lines.length - 1]).toBe(`Config file: ${configPath}`);
  });

  it('prints the path', async () => {
    await run('path');

    expect(logOutput).toEqual([configPath]);
  });

  it('requires --force to reset', async () => {
    writeFileSync(configPath, '[crawl]\nmax_depth = 2\n');

    await run('reset');
    expect(process.exitCode).toBe(1);
    expect(readFileSync(configPath, 'utf-8')).toBe('[crawl]\nmax_depth = 2\n');

    process.exitCode = undefined;
    await run('reset', '--force');
    expect(readFileSync(configPath, 'utf-8')).toBe(CONFIG_TEMPLATE);
    expect(process.exitCode).toBeUndefined();
  });
});
