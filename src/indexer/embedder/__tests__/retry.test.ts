import { describe, it, expect, vi } from 'vitest';

import {
  backoffDelay,
  HttpStatusError,
  isTransientFailure,
  isTransientStatus,
  sleep,
  withRetry,
} from '../retry.js';

describe('backoffDelay', () => {
  it('doubles per attempt', () => {
    expect(backoffDelay(0, 1000)).toBe(1000);
    expect(backoffDelay(1, 1000)).toBe(2000);
    expect(backoffDelay(2, 1000)).toBe(4000);
  });
});

describe('isTransientStatus', () => {
  it.each([
    [408, true],
    [429, true],
    [500, true],
    [503, true],
    [400, false],
    [401, false],
    [404, false],
    [422, false],
  ])('status %i -> %s', (status, expected) => {
    expect(isTransientStatus(status)).toBe(expected);
  });
});

describe('isTransientFailure', () => {
  it('treats network and timeout errors as transient', () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';

    expect(isTransientFailure(new TypeError('fetch failed'))).toBe(true);
    expect(isTransientFailure(timeout)).toBe(true);
  });

  it('follows the status of HTTP errors', () => {
    expect(isTransientFailure(new HttpStatusError(502, '', 'https://x.test'))).toBe(true);
    expect(isTransientFailure(new HttpStatusError(403, '', 'https://x.test'))).toBe(false);
  });

  it('rejects plain errors and non-errors', () => {
    expect(isTransientFailure(new Error('boom'))).toBe(false);
    expect(isTransientFailure('boom')).toBe(false);
  });
});

describe('HttpStatusError', () => {
  it('includes status, url and a body excerpt in the message', () => {
    const error = new HttpStatusError(500, 'internal', 'https://x.test/api');

    expect(error.message).toBe('HTTP 500 from https://x.test/api: internal');
    expect(error.status).toBe(500);
    expect(error).toBeInstanceOf(HttpStatusError);
  });
});

describe('withRetry', () => {
  const policy = { maxAttempts: 3, baseDelayMs: 10 };

  it('returns the first successful result', async () => {
    const delays: number[] = [];
    const operation = vi.fn().mockResolvedValue('ok');

    const result = await withRetry(operation, policy, { sleep: async (ms) => void delays.push(ms) });

    expect(result).toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('retries transient failures with exponential delays', async () => {
    const delays: number[] = [];
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new HttpStatusError(503, '', 'https://x.test'))
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValue('ok');

    const result = await withRetry(operation, policy, { sleep: async (ms) => void delays.push(ms) });

    expect(result).toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([10, 20]);
  });

  it('passes the 0-based attempt number to the operation', async () => {
    const attempts: number[] = [];

    await expect(
      withRetry(
        async (attempt) => {
          attempts.push(attempt);
          throw new TypeError('fetch failed');
        },
        policy,
        { sleep: async () => undefined }
      )
    ).rejects.toThrow('fetch failed');

    expect(attempts).toEqual([0, 1, 2]);
  });

  it('rethrows the last error once attempts run out', async () => {
    const last = new HttpStatusError(500, 'still down', 'https://x.test');
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new HttpStatusError(500, '', 'https://x.test'))
      .mockRejectedValueOnce(new HttpStatusError(500, '', 'https://x.test'))
      .mockRejectedValueOnce(last);

    await expect(withRetry(operation, policy, { sleep: async () => undefined })).rejects.toBe(last);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('does not retry permanent failures', async () => {
    const operation = vi.fn().mockRejectedValue(new HttpStatusError(400, 'bad', 'https://x.test'));

    await expect(withRetry(operation, policy, { sleep: async () => undefined })).rejects.toThrow(
      'HTTP 400'
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('reports each retry', async () => {
    const onRetry = vi.fn();
    const error = new TypeError('fetch failed');
    const operation = vi.fn().mockRejectedValueOnce(error).mockResolvedValue(1);

    await withRetry(operation, policy, { sleep: async () => undefined, onRetry });

    expect(onRetry).toHaveBeenCalledWith(error, 1, 10);
  });

  it('honours a custom shouldRetry', async () => {
    const operation = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValue('ok');

    const result = await withRetry(operation, policy, {
      sleep: async () => undefined,
      shouldRetry: () => true,
    });

    expect(result).toBe('ok');
  });

  it('makes at least one attempt when maxAttempts is below 1', async () => {
    const operation = vi.fn().mockResolvedValue('ok');

    await withRetry(operation, { maxAttempts: 0, baseDelayMs: 10 });

    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('sleep', () => {
  it('resolves immediately when the signal is already aborted', async () => {
    await expect(sleep(60_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});
