/**
 * OAuth2 client-credentials token cache
 *
 * One cache per EmbeddingClient. States:
 *
 *   NO_TOKEN ──exchange──▶ TOKEN_VALID ──(expiresAt - margin)──▶ TOKEN_EXPIRING
 *       ▲                                                             │
 *       └──────────────────────(expiresAt or invalidate)──────────────┘
 *
 * An expiring token is never handed out; the next caller refreshes it.
 * Concurrent callers share one in-flight exchange.
 */

import { z } from 'zod';

import { AuthenticationError } from '../../errors/index.js';
import type { Logger } from '../../utils/index.js';
import { DEFAULT_RETRY_POLICY, HttpStatusError, withRetry } from './retry.js';
import type { FetchFn, RetryPolicy } from './types.js';

export type TokenState = 'NO_TOKEN' | 'TOKEN_VALID' | 'TOKEN_EXPIRING';

/** Lifetime assumed when the token response omits expires_in */
export const DEFAULT_TOKEN_TTL_SECONDS = 3600;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional(),
});

interface CachedToken {
  value: string;
  expiresAt: number;
  refreshAt: number;
}

export interface TokenCacheOptions {
  authUrl: string;
  clientId: string;
  clientSecret: string;
  /** Fixed refresh margin; 10% of the declared lifetime when omitted */
  marginSeconds?: number;
  timeoutMs?: number;
  retry?: RetryPolicy;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
}

export class TokenCache {
  private token: CachedToken | undefined;
  private inflight: Promise<CachedToken> | undefined;
  private readonly tokenUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  constructor(private readonly options: TokenCacheOptions) {
    this.tokenUrl = `${options.authUrl.replace(/\/+$/, '')}/oauth/token`;
    this.fetchFn = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
  }

  state(): TokenState {
    if (this.token === undefined || this.now() >= this.token.expiresAt) {
      return 'NO_TOKEN';
    }
    return this.now() >= this.token.refreshAt ? 'TOKEN_EXPIRING' : 'TOKEN_VALID';
  }

  /**
   * A token that stays valid for at least the refresh margin.
   *
   * @throws AuthenticationError when the exchange fails after retries
   */
  async getToken(): Promise<string> {
    if (this.token !== undefined && this.state() === 'TOKEN_VALID') {
      return this.token.value;
    }

    if (this.inflight === undefined) {
      this.inflight = this.exchange().finally(() => {
        this.inflight = undefined;
      });
    }

    const token = await this.inflight;
    return token.value;
  }

  /** Drop the cached token, e.g. after the service answered 401 */
  invalidate(): void {
    this.token = undefined;
  }

  private async exchange(): Promise<CachedToken> {
    const { clientId, clientSecret, timeoutMs = 30000 } = this.options;
    this.options.logger?.debug?.(`Requesting access token from ${this.tokenUrl}`);

    let payload: unknown;
    try {
      payload = await withRetry(
        async () => {
          const response = await this.fetchFn(this.tokenUrl, {
            method: 'POST',
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            body: new URLSearchParams({
              grant_type: 'client_credentials',
              client_id: clientId,
              client_secret: clientSecret,
            }).toString(),
            signal: AbortSignal.timeout(timeoutMs),
          });
          if (!response.ok) {
            throw new HttpStatusError(response.status, await response.text(), this.tokenUrl);
          }
          const body: unknown = await response.json();
          return body;
        },
        this.options.retry ?? DEFAULT_RETRY_POLICY,
        {
          sleep: this.options.sleep,
          onRetry: (error, attempt, delayMs) =>
            this.options.logger?.warn(
              `Token request failed (attempt ${attempt}), retrying in ${delayMs}ms: ${describe(error)}`
            ),
        }
      );
    } catch (error) {
      const status = error instanceof HttpStatusError ? error.status : undefined;
      throw new AuthenticationError(`Token exchange failed: ${describe(error)}`, status);
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AuthenticationError('Token exchange returned no access_token');
    }

    const ttlMs = (parsed.data.expires_in ?? DEFAULT_TOKEN_TTL_SECONDS) * 1000;
    const configuredMargin = this.options.marginSeconds;
    // A margin longer than half the lifetime would refresh on every call
    const marginMs = Math.min(
      configuredMargin !== undefined ? configuredMargin * 1000 : ttlMs * 0.1,
      ttlMs / 2
    );
    const issuedAt = this.now();

    this.token = {
      value: parsed.data.access_token,
      expiresAt: issuedAt + ttlMs,
      refreshAt: issuedAt + ttlMs - marginMs,
    };
    return this.token;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
