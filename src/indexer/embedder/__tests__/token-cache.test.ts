import { describe, it, expect, beforeEach } from 'vitest';

import { AuthenticationError } from '../../../errors/index.js';
import {
  FakeInferenceService,
  FAKE_AUTH_URL,
  FAKE_CLIENT_ID,
  FAKE_CLIENT_SECRET,
  type FakeInferenceOptions,
} from '../../../test-utils/index.js';
import { TokenCache, type TokenCacheOptions } from '../token-cache.js';

describe('TokenCache', () => {
  let clock: number;
  let delays: number[];

  beforeEach(() => {
    clock = 0;
    delays = [];
  });

  function createCache(
    serviceOptions: FakeInferenceOptions = {},
    overrides: Partial<TokenCacheOptions> = {}
  ): { cache: TokenCache; service: FakeInferenceService } {
    const service = new FakeInferenceService(serviceOptions);
    const cache = new TokenCache({
      authUrl: FAKE_AUTH_URL,
      clientId: FAKE_CLIENT_ID,
      clientSecret: FAKE_CLIENT_SECRET,
      retry: { maxAttempts: 3, baseDelayMs: 100 },
      fetch: service.fetch,
      sleep: async (ms) => void delays.push(ms),
      now: () => clock,
      ...overrides,
    });
    return { cache, service };
  }

  it('starts without a token', () => {
    const { cache } = createCache();

    expect(cache.state()).toBe('NO_TOKEN');
  });

  it('exchanges client credentials for a token and reuses it', async () => {
    const { cache, service } = createCache();

    expect(await cache.getToken()).toBe('token-1');
    expect(await cache.getToken()).toBe('token-1');
    expect(cache.state()).toBe('TOKEN_VALID');
    expect(service.calls.token).toBe(1);
  });

  it('refreshes once 10% of the lifetime remains', async () => {
    const { cache } = createCache({ tokenTtlSeconds: 3600 });
    await cache.getToken();

    clock = 3_239_999;
    expect(cache.state()).toBe('TOKEN_VALID');

    clock = 3_240_000;
    expect(cache.state()).toBe('TOKEN_EXPIRING');
    expect(await cache.getToken()).toBe('token-2');
    expect(cache.state()).toBe('TOKEN_VALID');
  });

  it('uses a configured safety margin', async () => {
    const { cache } = createCache({ tokenTtlSeconds: 3600 }, { marginSeconds: 300 });
    await cache.getToken();

    clock = 3_299_999;
    expect(cache.state()).toBe('TOKEN_VALID');

    clock = 3_300_000;
    expect(cache.state()).toBe('TOKEN_EXPIRING');
  });

  it('caps the margin at half the lifetime', async () => {
    const { cache } = createCache({ tokenTtlSeconds: 60 }, { marginSeconds: 300 });
    await cache.getToken();

    clock = 29_999;
    expect(cache.state()).toBe('TOKEN_VALID');

    clock = 30_000;
    expect(cache.state()).toBe('TOKEN_EXPIRING');
  });

  it('assumes one hour when expires_in is missing', async () => {
    const { cache } = createCache({ tokenTtlSeconds: null });
    await cache.getToken();

    clock = 3_239_999;
    expect(cache.state()).toBe('TOKEN_VALID');

    clock = 3_600_000;
    expect(cache.state()).toBe('NO_TOKEN');
  });

  it('collapses concurrent refreshes into one exchange', async () => {
    const { cache, service } = createCache();

    const tokens = await Promise.all([cache.getToken(), cache.getToken(), cache.getToken()]);

    expect(tokens).toEqual(['token-1', 'token-1', 'token-1']);
    expect(service.calls.token).toBe(1);
  });

  it('drops the token on invalidate', async () => {
    const { cache } = createCache();
    await cache.getToken();

    cache.invalidate();

    expect(cache.state()).toBe('NO_TOKEN');
    expect(await cache.getToken()).toBe('token-2');
  });

  it('retries transient exchange failures with backoff', async () => {
    const { cache, service } = createCache();
    service.failTokenNext(503, 2);

    expect(await cache.getToken()).toBe('token-3');
    expect(delays).toEqual([100, 200]);
  });

  it('raises AuthenticationError for rejected credentials without retrying', async () => {
    const { cache, service } = createCache({}, { clientSecret: 'wrong-secret' });

    const error = await cache.getToken().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({ status: 401 });
    expect(service.calls.token).toBe(1);
  });

  it('raises AuthenticationError when retries run out', async () => {
    const { cache, service } = createCache();
    service.failTokenNext(500, 3);

    await expect(cache.getToken()).rejects.toThrow(/^Token exchange failed: HTTP 500/);
    expect(service.calls.token).toBe(3);
  });

  it('rejects a response without access_token', async () => {
    const { cache } = createCache(
      {},
      { fetch: async () => new Response(JSON.stringify({ token_type: 'bearer' }), { status: 200 }) }
    );

    await expect(cache.getToken()).rejects.toThrow('Token exchange returned no access_token');
  });

  it('lets the next caller retry after a failed exchange', async () => {
    const { cache, service } = createCache({}, { retry: { maxAttempts: 1, baseDelayMs: 100 } });
    service.failTokenNext(500);

    await expect(cache.getToken()).rejects.toBeInstanceOf(AuthenticationError);
    expect(await cache.getToken()).toBe('token-2');
  });
});
