/**
 * Tests for ingest command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { basename, join } from 'node:path';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { pathToFileURL } from 'node:url';
import { createIngestCommand } from '../ingest.js';
import type { CommandContext } from '../../types.js';
import { FileNotFoundError } from '../../../errors/index.js';
import { createTestServices, type FakeStorage } from '../../../test-utils/index.js';

describe('createIngestCommand', () => {
  let mockContext: CommandContext;
  let logOutput: string[];
  let storage: FakeStorage;
  let tempDir: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  const run = (...args: string[]) => {
    const program = new Command();
    program.addCommand(createIngestCommand(() => mockContext));
    return program.parseAsync(['node', 'test', 'ingest', ...args]);
  };

  const completeEvents = () =>
    consoleLogSpy.mock.calls
      .map((call: unknown[]) => String(call[0]))
      .filter((line: string) => line.startsWith('{') && line.includes('"type":"complete"'));

  beforeEach(() => {
    const test = createTestServices();
    storage = test.storage;
    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      services: () => test.services,
    };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    process.exitCode = undefined;

    tempDir = mkdtempSync(join(tmpdir(), 'docr-ingest-'));
    writeFileSync(join(tempDir, 'a.md'), '# Alpha\n\nFirst file.');
    writeFileSync(join(tempDir, 'b.txt'), 'Second file.');
    writeFileSync(join(tempDir, 'c.txt'), 'Third file.');
    writeFileSync(join(tempDir, 'data.json'), '{}');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('ingests every matching file in one run', async () => {
    await run(tempDir);

    expect(storage.rows('crawled_pages').map((row) => row.url)).toEqual(
      expect.arrayContaining([
        pathToFileURL(join(tempDir, 'a.md')).href,
        pathToFileURL(join(tempDir, 'b.txt')).href,
        pathToFileURL(join(tempDir, 'c.txt')).href,
      ])
    );
    expect(storage.rows('crawled_pages')).toHaveLength(3);
    expect(storage.rows('sources')[0]).toMatchObject({
      source_id: `local:${basename(tempDir)}`,
      summary: `Local files from ${tempDir}`,
    });
    expect(process.exitCode).toBeUndefined();
  });

  it('honors --extensions', async () => {
    await run(tempDir, '-e', '.md');

    expect(storage.rows('crawled_pages')).toHaveLength(1);
  });

  it('stops after one batch and prints the checkpoint', async () => {
    await run(tempDir, '--batch-size', '2');

    expect(storage.rows('crawled_pages')).toHaveLength(2);
    expect(logOutput[0]).toBe('1 file remaining. Continue with:');
    expect(logOutput[1]).toContain(`--batch-size 2 --start-from "${join(tempDir, 'c.txt')}"`);
    expect(process.exitCode).toBeUndefined();
  });

  it('resumes from a checkpoint relative to the directory', async () => {
    await run(tempDir, '-b', '2', '--start-from', 'c.txt');

    expect(storage.rows('crawled_pages').map((row) => row.url)).toEqual([
      pathToFileURL(join(tempDir, 'c.txt')).href,
    ]);
    expect(logOutput[0]).toContain('Status: ALL_FILES_PROCESSED');
  });

  it('runs every batch with --all', async () => {
    mockContext.options.json = true;

    await run(tempDir, '-b', '1', '--all');

    expect(storage.rows('crawled_pages')).toHaveLength(3);
    expect(completeEvents()).toHaveLength(3);
    expect(logOutput).toEqual([]);
  });

  it('fails for a missing path', async () => {
    await expect(run(join(tempDir, 'missing'))).rejects.toThrow(FileNotFoundError);
  });
});
