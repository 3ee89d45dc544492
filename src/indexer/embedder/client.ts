/**
 * Embedding Client
 *
 * Calls the remote inference service with an OAuth2 bearer token.
 *
 * - Backend (direct or orchestration) is fixed at construction
 * - Transient failures retry with exponential backoff
 * - A 401 drops the token and re-authenticates exactly once
 * - Every vector is checked against the configured dimensionality
 */

import { AuthenticationError, CLIError, ConfigurationError, EmbeddingServiceError } from '../../errors/index.js';
import { silentLogger, type Logger } from '../../utils/index.js';
import { buildRequestBody, parseVectors, selectBackend } from './backends.js';
import { DEFAULT_RETRY_POLICY, HttpStatusError, isTransientFailure, withRetry } from './retry.js';
import { TokenCache } from './token-cache.js';
import type {
  BackendKind,
  EmbeddingBackend,
  EmbeddingClientOptions,
  EmbeddingProvider,
  EmbeddingResult,
  FetchFn,
  RetryPolicy,
} from './types.js';

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-large';
export const DEFAULT_DIMENSIONS = 1536;
const DEFAULT_BATCH_SIZE = 16;
const DEFAULT_TIMEOUT_MS = 30000;

function required(value: string | undefined, name: string): string {
  if (!value) {
    throw new ConfigurationError(
      `${name} is not set`,
      'Configure the inference service in .env (see .env.example)'
    );
  }
  return value;
}

export class EmbeddingClient implements EmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  readonly maxBatchSize: number;
  readonly backend: EmbeddingBackend;

  private readonly tokens: TokenCache;
  private readonly fetchFn: FetchFn;
  private readonly retry: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly resourceGroup: string;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError when URLs, credentials or a deployment id are missing
   */
  constructor(options: EmbeddingClientOptions) {
    const authUrl = required(options.authUrl, 'INFERENCE_AUTH_URL');
    const clientId = required(options.clientId, 'INFERENCE_CLIENT_ID');
    const clientSecret = required(options.clientSecret, 'INFERENCE_CLIENT_SECRET');
    if (!options.baseUrl && !options.orchestrationUrl) {
      required(options.baseUrl, 'INFERENCE_BASE_URL');
    }

    this.dimensions = options.dimensions ?? DEFAULT_DIMENSIONS;
    this.maxBatchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.backend = selectBackend({
      baseUrl: options.baseUrl,
      orchestrationUrl: options.orchestrationUrl,
      embeddingDeploymentId: options.embeddingDeploymentId,
      orchestrationDeploymentId: options.orchestrationDeploymentId,
      model: options.model ?? DEFAULT_EMBEDDING_MODEL,
      dimensions: this.dimensions,
    });
    this.name = `inference-${this.backend.kind}`;

    this.fetchFn = options.fetch ?? fetch;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.resourceGroup = options.resourceGroup ?? 'default';
    this.sleep = options.sleep;
    this.logger = options.logger ?? silentLogger;

    this.tokens = new TokenCache({
      authUrl,
      clientId,
      clientSecret,
      marginSeconds: options.tokenMarginSeconds,
      timeoutMs: this.timeoutMs,
      retry: this.retry,
      fetch: this.fetchFn,
      sleep: options.sleep,
      now: options.now,
      logger: this.logger,
    });
  }

  get backendKind(): BackendKind {
    return this.backend.kind;
  }

  /** Exposed for status reporting and tests */
  get tokenCache(): TokenCache {
    return this.tokens;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    const [result] = await this.embedBatch([text]);
    if (result === undefined) {
      throw new EmbeddingServiceError('No embedding returned');
    }
    return result;
  }

  /**
   * Embed texts in requests of at most `maxBatchSize`.
   *
   * @throws AuthenticationError | EmbeddingServiceError
   */
  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    const results: EmbeddingResult[] = [];
    for (let i = 0; i < texts.length; i += this.maxBatchSize) {
      const batch = texts.slice(i, i + this.maxBatchSize);
      const payload = await this.send(buildRequestBody(this.backend, batch));
      for (const vector of parseVectors(this.backend, payload, batch.length)) {
        results.push({ embedding: vector, model: this.backend.model });
      }
    }
    return results;
  }

  /**
   * True when a token can be obtained. Does not spend an embedding call.
   */
  async isAvailable(): Promise<boolean> {
    try {
      await this.tokens.getToken();
      return true;
    } catch (error) {
      this.logger.debug?.(`Inference service unavailable: ${describe(error)}`);
      return false;
    }
  }

  private async send(body: unknown): Promise<unknown> {
    let reauthenticated = false;

    for (;;) {
      const token = await this.tokens.getToken();
      try {
        return await withRetry(() => this.post(body, token), this.retry, {
          sleep: this.sleep,
          onRetry: (error, attempt, delayMs) =>
            this.logger.warn(
              `Embedding request failed (attempt ${attempt}), retrying in ${delayMs}ms: ${describe(error)}`
            ),
        });
      } catch (error) {
        if (error instanceof HttpStatusError && error.status === 401) {
          if (reauthenticated) {
            throw new AuthenticationError('Inference service rejected a freshly issued token', 401);
          }
          reauthenticated = true;
          this.tokens.invalidate();
          this.logger.debug?.('Access token rejected, re-authenticating');
          continue;
        }
        if (error instanceof CLIError) {
          throw error;
        }
        const status = error instanceof HttpStatusError ? error.status : undefined;
        throw new EmbeddingServiceError(
          `Embedding request failed: ${describe(error)}`,
          status,
          isTransientFailure(error)
        );
      }
    }
  }

  private async post(body: unknown, token: string): Promise<unknown> {
    const response = await this.fetchFn(this.backend.url, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${token}`,
        'Content-Type': 'application/json',
        'AI-Resource-Group': this.resourceGroup,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new HttpStatusError(response.status, await response.text(), this.backend.url);
    }

    const payload: unknown = await response.json();
    return payload;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
