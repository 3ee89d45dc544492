/**
 * Retry with exponential backoff for calls to the inference service.
 */

import type { RetryPolicy } from './types.js';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
};

/**
 * Non-2xx answer from an HTTP endpoint, before it is mapped to one of the
 * public error types.
 */
export class HttpStatusError extends Error {
  public readonly status: number;
  public readonly body: string;

  constructor(status: number, body: string, url: string) {
    super(`HTTP ${status} from ${url}${body ? `: ${body.slice(0, 200)}` : ''}`);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'HttpStatusError';
    this.status = status;
    this.body = body;
  }
}

/** 408, 429 and 5xx are worth another attempt; other statuses are final */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Network failures (fetch rejects with TypeError), timeouts and transient
 * statuses.
 */
export function isTransientFailure(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return isTransientStatus(error.status);
  }
  if (error instanceof Error) {
    return error.name === 'TypeError' || error.name === 'TimeoutError' || error.name === 'AbortError';
  }
  return false;
}

export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** attempt;
}

/**
 * Resolves after `ms`, or right away once `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timeoutId = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timeoutId);
        resolve();
      },
      { once: true }
    );
  });
}

export interface RetryOptions {
  /** Defaults to isTransientFailure */
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or
 * the attempts run out. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isTransientFailure;
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts - 1 || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, policy.baseDelayMs);
      options.onRetry?.(error, attempt + 1, delayMs);
      await wait(delayMs);
    }
  }
}
