/**
 * Retriever Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { DocumentStore, StorageGateway } from '../../database/index.js';
import { FakeStorage, FAKE_STORAGE_URL, createFakeProvider, fakeEmbedding } from '../../test-utils/index.js';
import { Retriever, clampMatchCount } from '../retriever.js';

describe('clampMatchCount', () => {
  it.each([
    [undefined, 5],
    [null, 5],
    ['abc', 5],
    [0, 5],
    [-3, 5],
    [0.7, 5],
    [7.9, 7],
    ['12', 12],
    [50, 50],
    [500, 50],
    [Number.POSITIVE_INFINITY, 5],
  ])('%s becomes %s', (input, expected) => {
    expect(clampMatchCount(input)).toBe(expected);
  });

  it('uses the given fallback', () => {
    expect(clampMatchCount(undefined, 8)).toBe(8);
  });
});

describe('Retriever', () => {
  let storage: FakeStorage;
  let pages: DocumentStore;
  let codeExamples: DocumentStore;

  const page = (url: string, content: string, sourceId: string, metadata: Record<string, unknown> = {}) => ({
    url,
    chunk_number: 0,
    content,
    metadata,
    source_id: sourceId,
    embedding: fakeEmbedding(content, 8),
  });

  beforeEach(() => {
    storage = new FakeStorage();
    const gateway = new StorageGateway({ url: FAKE_STORAGE_URL, fetch: storage.fetch });
    pages = new DocumentStore(gateway, 'crawled_pages');
    codeExamples = new DocumentStore(gateway, 'code_examples');

    storage.seed('crawled_pages', [
      page('https://docs.test/auth', 'oauth token exchange flow', 'docs.test'),
      page('https://docs.test/retry', 'configure retries with exponential backoff', 'docs.test', { title: 'Retries' }),
      page('file:///notes/retry.md', 'configure retries locally', 'local:notes'),
    ]);
  });

  const retriever = (embedder = createFakeProvider()) => new Retriever(embedder, pages, codeExamples);

  describe('query', () => {
    it('returns rows in similarity order', async () => {
      const outcome = await retriever().query('configure retries with exponential backoff');

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      expect(outcome.source).toBeNull();
      expect(outcome.matchCount).toBe(5);
      expect(outcome.results[0]).toMatchObject({
        url: 'https://docs.test/retry',
        chunkNumber: 0,
        sourceId: 'docs.test',
        metadata: { title: 'Retries' },
      });
      expect(outcome.results[0].similarity).toBeCloseTo(1);
      expect(outcome.results).toHaveLength(3);
    });

    it('filters by source', async () => {
      const outcome = await retriever().query('configure retries', { source: ' local:notes ' });

      expect(outcome.ok && outcome.results.map((result) => result.url)).toEqual(['file:///notes/retry.md']);
      expect(storage.requests[0].body).toMatchObject({ filter: { source: 'local:notes' } });
    });

    it('sends an empty filter without a source', async () => {
      await retriever().query('configure retries');

      expect(storage.requests[0].body).toMatchObject({ filter: {}, match_count: 5 });
    });

    it('clamps the match count before asking the backend', async () => {
      await retriever().query('configure retries', { matchCount: 500 });

      expect(storage.requests[0].body).toMatchObject({ match_count: 50 });
    });

    it('cuts content to the excerpt length', async () => {
      storage.seed('crawled_pages', [page('https://docs.test/long', 'long '.repeat(400), 'long.test')]);

      const outcome = await new Retriever(createFakeProvider(), pages, codeExamples, { excerptLength: 10 }).query(
        'long',
        { source: 'long.test' }
      );

      expect(outcome.ok && outcome.results[0].content).toBe('long long ');
    });

    it('rejects an empty query without calling anything', async () => {
      const embedder = createFakeProvider();

      const outcome = await retriever(embedder).query('   ');

      expect(outcome).toEqual({ ok: false, query: '   ', error: 'Query cannot be empty' });
      expect(embedder.calls).toEqual([]);
      expect(storage.requests).toEqual([]);
    });

    it('reports an embedding failure', async () => {
      const outcome = await retriever(createFakeProvider({ unavailable: true })).query('retries');

      expect(outcome).toEqual({
        ok: false,
        query: 'retries',
        error: 'Failed to embed query: Embedding service unavailable',
      });
    });

    it('reports a storage failure', async () => {
      storage.failNext(500, { path: '/rpc/match_crawled_pages' });

      const outcome = await retriever().query('retries');

      expect(outcome).toEqual({
        ok: false,
        query: 'retries',
        error: 'Storage request POST /rpc/match_crawled_pages returned HTTP 500',
      });
    });
  });

  describe('searchCodeExamples', () => {
    it('searches the code example table and keeps summaries', async () => {
      storage.seed('code_examples', [
        { ...page('https://docs.test/setup', 'npm install doc-retriever', 'docs.test'), summary: 'sh example: Setup' },
      ]);

      const outcome = await retriever().searchCodeExamples('npm install doc-retriever', { source: 'docs.test' });

      expect(outcome.ok && outcome.results).toEqual([
        expect.objectContaining({ url: 'https://docs.test/setup', summary: 'sh example: Setup' }),
      ]);
      expect(storage.requests[0].path).toBe('/rpc/match_code_examples');
      expect(storage.requests[0].body).toMatchObject({ source_filter: 'docs.test' });
    });
  });
});
