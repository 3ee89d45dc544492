/**
 * Tests for query command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { createQueryCommand } from '../query.js';
import type { CommandContext } from '../../types.js';
import { CLIError, ValidationError } from '../../../errors/index.js';
import type { Services } from '../../../services.js';
import { createTestServices, fakeEmbedding, type FakeStorage } from '../../../test-utils/index.js';

describe('createQueryCommand', () => {
  let mockContext: CommandContext;
  let logOutput: string[];
  let services: Services;
  let storage: FakeStorage;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  const run = (...args: string[]) => {
    const program = new Command();
    program.addCommand(createQueryCommand(() => mockContext));
    return program.parseAsync(['node', 'test', 'query', ...args]);
  };

  beforeEach(() => {
    ({ services, storage } = createTestServices());
    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      services: () => services,
    };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    storage.seed('crawled_pages', [
      {
        url: 'https://docs.test/install',
        chunk_number: 0,
        content: 'install the package',
        metadata: { title: 'Install' },
        source_id: 'docs.test',
        embedding: fakeEmbedding('install the package', 8),
      },
      {
        url: 'https://api.test/auth',
        chunk_number: 2,
        content: 'tokens expire hourly',
        source_id: 'api.test',
        embedding: fakeEmbedding('tokens expire hourly', 8),
      },
    ]);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('has q alias and options', () => {
    const cmd = createQueryCommand(() => mockContext);
    expect(cmd.aliases()).toContain('q');
    expect(cmd.options.map((opt) => opt.long)).toEqual(['--source', '--count', '--code']);
  });

  it('prints the best match with its source', async () => {
    await run('install the package');

    expect(logOutput[0]).toContain('2 results for "install the package"');
    expect(logOutput[2]).toContain('[docs.test] https://docs.test/install#0 (Install)');
    expect(logOutput[2]).toContain('\n  install the package');
  });

  it('limits results to one source', async () => {
    await run('tokens', '--source', 'api.test');

    expect(logOutput[0]).toContain('1 result for "tokens"');
    expect(logOutput[2]).toContain('https://api.test/auth#2');
    expect(logOutput[2]).not.toContain('[api.test]');
  });

  it('explains an empty result', async () => {
    await run('anything', '-s', 'empty.test');

    expect(logOutput[0]).toContain('No results for "anything" in empty.test.');
  });

  it('outputs JSON', async () => {
    mockContext.options.json = true;

    await run('install the package', '-k', '1');

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(output).toMatchObject({
      query: 'install the package',
      source: null,
      matchCount: 1,
      count: 1,
      results: [
        {
          url: 'https://docs.test/install',
          chunkNumber: 0,
          sourceId: 'docs.test',
          content: 'install the package',
          title: 'Install',
        },
      ],
    });
    expect(output.results[0].similarity).toBeCloseTo(1);
  });

  it('searches code examples with --code', async () => {
    storage.seed('code_examples', [
      {
        url: 'https://docs.test/install',
        chunk_number: 0,
        content: 'npm install docr',
        summary: 'sh example: Install',
        source_id: 'docs.test',
        embedding: fakeEmbedding('npm install docr', 8),
      },
    ]);

    await run('npm install docr', '--code');

    expect(logOutput[0]).toContain('1 code example for "npm install docr"');
    expect(logOutput[2]).toContain('\n  sh example: Install: npm install docr');
  });

  it('rejects an empty query', async () => {
    await expect(run('   ')).rejects.toThrow(ValidationError);
  });

  it('rejects an out-of-range count', async () => {
    await expect(run('tokens', '-k', '0')).rejects.toThrow('count must be between 1 and 50');
  });

  it('turns a failed search into a CLIError', async () => {
    services = createTestServices({ provider: { unavailable: true } }).services;

    const error = await run('install').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CLIError);
    expect(error).toMatchObject({ message: 'Failed to embed query: Embedding service unavailable' });
  });
});
