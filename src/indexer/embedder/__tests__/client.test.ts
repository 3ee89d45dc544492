/**
 * Embedding Client Tests
 *
 * Runs the client against the in-process inference service: backend
 * routing, token handling, retry timings and response validation.
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  AuthenticationError,
  ConfigurationError,
  EmbeddingServiceError,
} from '../../../errors/index.js';
import {
  FakeInferenceService,
  fakeEmbedding,
  FAKE_AUTH_URL,
  FAKE_CLIENT_ID,
  FAKE_CLIENT_SECRET,
  FAKE_INFERENCE_URL,
} from '../../../test-utils/index.js';
import { EmbeddingClient } from '../client.js';
import { createEmbeddingProvider } from '../provider.js';
import type { EmbeddingClientOptions, FetchFn } from '../types.js';

describe('EmbeddingClient', () => {
  let service: FakeInferenceService;
  let delays: number[];

  beforeEach(() => {
    service = new FakeInferenceService();
    delays = [];
  });

  function createClient(overrides: Partial<EmbeddingClientOptions> = {}): EmbeddingClient {
    return new EmbeddingClient({
      baseUrl: FAKE_INFERENCE_URL,
      authUrl: FAKE_AUTH_URL,
      clientId: FAKE_CLIENT_ID,
      clientSecret: FAKE_CLIENT_SECRET,
      embeddingDeploymentId: 'dep-embed',
      dimensions: 8,
      batchSize: 4,
      retry: { maxAttempts: 3, baseDelayMs: 100 },
      fetch: service.fetch,
      sleep: async (ms) => void delays.push(ms),
      ...overrides,
    });
  }

  describe('configuration', () => {
    it('requires the client secret', () => {
      expect(() => createClient({ clientSecret: undefined })).toThrow(ConfigurationError);
      expect(() => createClient({ clientSecret: undefined })).toThrow(
        'INFERENCE_CLIENT_SECRET is not set'
      );
    });

    it('requires the auth URL', () => {
      expect(() => createClient({ authUrl: '' })).toThrow('INFERENCE_AUTH_URL is not set');
    });

    it('requires a base URL when no orchestration URL is given', () => {
      expect(() => createClient({ baseUrl: undefined })).toThrow('INFERENCE_BASE_URL is not set');
    });

    it('requires a deployment id', () => {
      expect(() => createClient({ embeddingDeploymentId: undefined })).toThrow(
        'No embedding deployment configured'
      );
    });
  });

  describe('direct backend', () => {
    it('posts to the deployment embeddings endpoint', async () => {
      const client = createClient();

      const result = await client.embed('hello world');

      expect(client.backendKind).toBe('direct');
      expect(client.name).toBe('inference-direct');
      expect(service.requests[0].url).toBe(
        'https://inference.test/v2/inference/deployments/dep-embed/embeddings'
      );
      expect(service.requests[0].body).toEqual({
        input: ['hello world'],
        model: 'text-embedding-3-large',
        dimensions: 8,
      });
      expect(result).toEqual({
        embedding: fakeEmbedding('hello world', 8),
        model: 'text-embedding-3-large',
      });
    });

    it('sends the bearer token and resource group', async () => {
      const client = createClient({ resourceGroup: 'docs-group' });

      await client.embed('hello');

      const headers = service.requests[0].headers;
      expect(headers.get('Authorization')).toBe('Bearer token-1');
      expect(headers.get('AI-Resource-Group')).toBe('docs-group');
    });
  });

  describe('orchestration backend', () => {
    it('is preferred when its deployment id is set', async () => {
      const client = createClient({ orchestrationDeploymentId: 'dep-orch' });

      const result = await client.embed('hello world');

      expect(client.backendKind).toBe('orchestration');
      expect(service.requests[0].url).toBe(
        'https://inference.test/v2/inference/deployments/dep-orch/v2/embeddings'
      );
      expect(service.requests[0].body).toEqual({
        input: { text: ['hello world'] },
        config: {
          modules: {
            embeddings: {
              model: { name: 'text-embedding-3-large', params: { dimensions: 8 } },
            },
          },
        },
      });
      expect(result.embedding).toEqual(fakeEmbedding('hello world', 8));
    });

    it('uses the orchestration URL when given', async () => {
      const client = createClient({
        orchestrationDeploymentId: 'dep-orch',
        orchestrationUrl: 'https://orchestration.test/',
      });

      await client.embed('hello');

      expect(service.requests[0].url).toBe(
        'https://orchestration.test/v2/inference/deployments/dep-orch/v2/embeddings'
      );
    });

    it('accepts responses without the final_result wrapper', async () => {
      service = new FakeInferenceService({ wrapOrchestration: false });
      const client = createClient({ orchestrationDeploymentId: 'dep-orch' });

      const [a, b] = await client.embedBatch(['alpha', 'beta']);

      expect(a.embedding).toEqual(fakeEmbedding('alpha', 8));
      expect(b.embedding).toEqual(fakeEmbedding('beta', 8));
    });
  });

  describe('batching', () => {
    it('splits input by the batch size and keeps order', async () => {
      const client = createClient({ batchSize: 4 });
      const texts = Array.from({ length: 10 }, (_, i) => `text number ${i}`);

      const results = await client.embedBatch(texts);

      expect(service.calls.embeddings).toBe(3);
      expect(results).toHaveLength(10);
      expect(results[9].embedding).toEqual(fakeEmbedding('text number 9', 8));
    });
  });

  describe('authentication', () => {
    it('reuses the cached token across calls', async () => {
      const client = createClient();

      await client.embed('one');
      await client.embed('two');

      expect(service.calls.token).toBe(1);
      expect(client.tokenCache.state()).toBe('TOKEN_VALID');
    });

    it('re-authenticates once after a 401', async () => {
      const client = createClient();
      await client.embed('one');
      service.revokeTokens();

      await client.embed('two');

      expect(service.calls.token).toBe(2);
      expect(service.requests[2].headers.get('Authorization')).toBe('Bearer token-2');
    });

    it('fails when a fresh token is rejected too', async () => {
      service.rejectAllTokens = true;
      const client = createClient();

      await expect(client.embed('one')).rejects.toThrow(
        'Inference service rejected a freshly issued token'
      );
      expect(service.calls.token).toBe(2);
      expect(service.calls.embeddings).toBe(2);
    });

    it('surfaces token exchange failures as AuthenticationError', async () => {
      const client = createClient({ clientSecret: 'wrong-secret' });

      await expect(client.embed('one')).rejects.toBeInstanceOf(AuthenticationError);
      expect(service.calls.embeddings).toBe(0);
    });
  });

  describe('retries', () => {
    it('retries transient statuses with exponential backoff', async () => {
      service.failNext(503, 2);
      const client = createClient();

      const result = await client.embed('hello');

      expect(result.embedding).toEqual(fakeEmbedding('hello', 8));
      expect(service.calls.embeddings).toBe(3);
      expect(delays).toEqual([100, 200]);
    });

    it('retries rate limiting', async () => {
      service.failNext(429);
      const client = createClient();

      await client.embed('hello');

      expect(delays).toEqual([100]);
    });

    it('retries network failures', async () => {
      let failures = 1;
      const flaky: FetchFn = async (input, init) => {
        if (String(input).endsWith('/embeddings') && failures-- > 0) {
          throw new TypeError('fetch failed');
        }
        return service.fetch(input, init);
      };
      const client = createClient({ fetch: flaky });

      await client.embed('hello');

      expect(delays).toEqual([100]);
    });

    it('gives up with EmbeddingServiceError after the last attempt', async () => {
      service.failNext(500, 3);
      const client = createClient();

      const error = await client.embed('hello').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EmbeddingServiceError);
      expect(error).toMatchObject({ status: 500, transient: true });
      expect(service.calls.embeddings).toBe(3);
      expect(delays).toEqual([100, 200]);
    });

    it('does not retry other client errors', async () => {
      service.failNext(400);
      const client = createClient();

      const error = await client.embed('hello').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EmbeddingServiceError);
      expect(error).toMatchObject({ status: 400, transient: false });
      expect(service.calls.embeddings).toBe(1);
      expect(delays).toEqual([]);
    });
  });

  describe('response validation', () => {
    it('rejects vectors of the wrong dimensionality', async () => {
      service.vectorLength = 4;
      const client = createClient();

      await expect(client.embed('hello')).rejects.toThrow('Embedding 0 has 4 dimensions, expected 8');
    });

    it('rejects a response with too few vectors', async () => {
      const short: FetchFn = async (input, init) => {
        if (String(input).endsWith('/embeddings')) {
          return new Response(JSON.stringify({ data: [{ embedding: fakeEmbedding('a', 8) }] }));
        }
        return service.fetch(input, init);
      };
      const client = createClient({ fetch: short });

      await expect(client.embedBatch(['a', 'b'])).rejects.toThrow(
        'Expected 2 embeddings, received 1'
      );
    });

    it('rejects an unrecognized payload', async () => {
      const odd: FetchFn = async (input, init) => {
        if (String(input).endsWith('/embeddings')) {
          return new Response(JSON.stringify({ vectors: [] }));
        }
        return service.fetch(input, init);
      };
      const client = createClient({ fetch: odd });

      await expect(client.embed('a')).rejects.toThrow('Unrecognized direct embedding response');
    });
  });

  describe('isAvailable', () => {
    it('is true when a token can be obtained', async () => {
      expect(await createClient().isAvailable()).toBe(true);
    });

    it('is false when the token exchange fails', async () => {
      expect(await createClient({ clientSecret: 'wrong-secret' }).isAvailable()).toBe(false);
    });
  });
});

describe('createEmbeddingProvider', () => {
  it('builds a client from config and inference settings', async () => {
    const service = new FakeInferenceService();

    const client = createEmbeddingProvider(
      {
        dimensions: 8,
        batch_size: 2,
        max_attempts: 3,
        base_delay_ms: 10,
        timeout_ms: 1000,
      },
      {
        baseUrl: FAKE_INFERENCE_URL,
        authUrl: FAKE_AUTH_URL,
        clientId: FAKE_CLIENT_ID,
        clientSecret: FAKE_CLIENT_SECRET,
        resourceGroup: 'default',
        embeddingDeploymentId: 'dep-embed',
        orchestrationUrl: FAKE_INFERENCE_URL,
        embeddingModel: 'text-embedding-3-small',
        chatModel: 'gpt-4o',
      },
      { fetch: service.fetch }
    );

    const [result] = await client.embedBatch(['hello']);

    expect(client.maxBatchSize).toBe(2);
    expect(result.model).toBe('text-embedding-3-small');
  });
});
