/**
 * Storage Gateway Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { StorageError } from '../../errors/index.js';
import { FakeStorage, FAKE_STORAGE_URL } from '../../test-utils/index.js';
import { EMPTY_RESULT, StorageGateway, isEmptyResult, resourcePath } from '../gateway.js';

describe('resourcePath', () => {
  it('returns the bare resource without params', () => {
    expect(resourcePath('sources')).toBe('/sources');
  });

  it('encodes filter values', () => {
    expect(resourcePath('sources', { source_id: 'eq.local:docs', select: '*' })).toBe(
      '/sources?source_id=eq.local%3Adocs&select=*'
    );
  });
});

describe('StorageGateway', () => {
  let storage: FakeStorage;
  let gateway: StorageGateway;

  beforeEach(() => {
    storage = new FakeStorage();
    gateway = new StorageGateway({ url: FAKE_STORAGE_URL, fetch: storage.fetch });
  });

  it('returns parsed rows', async () => {
    storage.seed('sources', [{ source_id: 'docs.example.com' }]);

    const result = await gateway.request('/sources?select=source_id');

    expect(result).toEqual([{ source_id: 'docs.example.com' }]);
  });

  it('maps an empty 201 body to EMPTY_RESULT', async () => {
    const result = await gateway.request('/sources', 'POST', { source_id: 'a' });

    expect(result).toBe(EMPTY_RESULT);
    expect(isEmptyResult(result)).toBe(true);
    expect(Object.isFrozen(EMPTY_RESULT)).toBe(true);
  });

  it('maps 204 to EMPTY_RESULT', async () => {
    storage.seed('sources', [{ source_id: 'a' }]);

    const result = await gateway.request('/sources?source_id=eq.a', 'PATCH', { summary: 'x' });

    expect(result).toBe(EMPTY_RESULT);
    expect(storage.rows('sources', { source_id: 'a' })[0].summary).toBe('x');
  });

  it('throws StorageError with status and body for other codes', async () => {
    storage.failNext(500);

    const error = await gateway.request('/sources').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({
      message: 'Storage request GET /sources returned HTTP 500',
      status: 500,
      responseText: '{"message":"injected failure 500"}',
    });
  });

  it('throws StorageError without status on network failure', async () => {
    const offline = new StorageGateway({
      url: FAKE_STORAGE_URL,
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });

    const error = await offline.request('/sources').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({
      message: 'Storage request GET /sources failed: fetch failed',
      status: undefined,
    });
  });

  it('rejects a non-JSON success body', async () => {
    const html = new StorageGateway({
      url: FAKE_STORAGE_URL,
      fetch: async () => new Response('<html></html>', { status: 200 }),
    });

    await expect(html.request('/sources')).rejects.toThrow(
      'Storage request GET /sources returned a non-JSON body'
    );
  });

  it('sends the service key and Prefer header', async () => {
    const keyed = new StorageGateway({
      url: `${FAKE_STORAGE_URL}/`,
      serviceKey: 'test-service-key',
      fetch: storage.fetch,
    });

    await keyed.request('sources', 'POST', { source_id: 'a' }, { prefer: 'return=minimal' });

    const { headers, path } = storage.requests[0];
    expect(path).toBe('/sources');
    expect(headers.get('Authorization')).toBe('Bearer test-service-key');
    expect(headers.get('apikey')).toBe('test-service-key');
    expect(headers.get('Prefer')).toBe('return=minimal');
  });

  it('omits credentials when no service key is set', async () => {
    await gateway.request('/sources');

    expect(storage.requests[0].headers.get('Authorization')).toBeNull();
  });

  describe('rows', () => {
    it('treats EMPTY_RESULT as no rows', async () => {
      expect(await gateway.rows('/sources', 'POST', { source_id: 'a' })).toEqual([]);
    });

    it('rejects a body that is not a row array', async () => {
      const odd = new StorageGateway({
        url: FAKE_STORAGE_URL,
        fetch: async () => new Response('{"count":3}', { status: 200 }),
      });

      await expect(odd.rows('/sources')).rejects.toThrow('Expected rows from GET /sources');
    });
  });
});
