/**
 * In-process stand-in for the inference service.
 *
 * Serves the OAuth2 token endpoint and both embedding endpoint shapes
 * through an injectable `fetch`. Vectors are deterministic bag-of-words
 * hashes, so texts sharing words land close together.
 */

import { z } from 'zod';

import type { FetchFn } from '../indexer/embedder/index.js';

export const FAKE_AUTH_URL = 'https://auth.test';
export const FAKE_INFERENCE_URL = 'https://inference.test';
export const FAKE_CLIENT_ID = 'test-client';
export const FAKE_CLIENT_SECRET = 'test-secret';

/**
 * Deterministic unit vector for `text`: each lowercase word adds weight
 * to one hashed dimension.
 */
export function fakeEmbedding(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];

  for (const word of words) {
    let hash = 2166136261;
    for (let i = 0; i < word.length; i++) {
      hash ^= word.charCodeAt(i);
      hash = Math.imul(hash, 16777619) >>> 0;
    }
    vector[hash % dimensions] += 1;
  }

  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  if (norm === 0) {
    vector[0] = 1;
    return vector;
  }
  return vector.map((value) => value / norm);
}

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

export interface FakeInferenceOptions {
  /** Vector length when the request names none (default 8) */
  dimensions?: number;
  /** expires_in of issued tokens; null omits the field */
  tokenTtlSeconds?: number | null;
  /** Wrap orchestration responses in final_result (default true) */
  wrapOrchestration?: boolean;
}

const TextInput = z.union([z.string(), z.array(z.string())]);

const DirectBody = z.object({
  input: TextInput,
  model: z.string().optional(),
  dimensions: z.number().int().optional(),
});

const OrchestrationBody = z.object({
  input: z.object({ text: TextInput }),
  config: z.object({
    modules: z.object({
      embeddings: z.object({
        model: z.object({
          name: z.string(),
          params: z.object({ dimensions: z.number().int().optional() }).optional(),
        }),
      }),
    }),
  }),
});

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

export class FakeInferenceService {
  readonly calls = { token: 0, embeddings: 0 };
  /** Embedding requests in arrival order */
  readonly requests: RecordedRequest[] = [];

  /** Overrides the returned vector length (to provoke dimension errors) */
  vectorLength: number | undefined;
  /** When true every embedding call answers 401 */
  rejectAllTokens = false;

  private readonly dimensions: number;
  private readonly tokenTtlSeconds: number | null;
  private readonly wrapOrchestration: boolean;
  private readonly issued = new Set<string>();
  private readonly tokenFailures: number[] = [];
  private readonly embeddingFailures: number[] = [];
  private readonly failingTexts = new Set<string>();

  constructor(options: FakeInferenceOptions = {}) {
    this.dimensions = options.dimensions ?? 8;
    this.tokenTtlSeconds = options.tokenTtlSeconds === undefined ? 3600 : options.tokenTtlSeconds;
    this.wrapOrchestration = options.wrapOrchestration ?? true;
  }

  /** The next `times` token requests answer `status` */
  failTokenNext(status: number, times = 1): void {
    for (let i = 0; i < times; i++) this.tokenFailures.push(status);
  }

  /** The next `times` embedding requests answer `status` */
  failNext(status: number, times = 1): void {
    for (let i = 0; i < times; i++) this.embeddingFailures.push(status);
  }

  /** Any request containing `text` answers 400 */
  failOnText(text: string): void {
    this.failingTexts.add(text);
  }

  /** Forget issued tokens, so the next embedding call answers 401 */
  revokeTokens(): void {
    this.issued.clear();
  }

  readonly fetch: FetchFn = async (input, init) => {
    const url = urlOf(input);
    const method = init?.method ?? 'GET';
    const rawBody = typeof init?.body === 'string' ? init.body : '';
    const headers = new Headers(init?.headers);
    const { pathname } = new URL(url);

    if (method === 'POST' && pathname === '/oauth/token') {
      return this.token(rawBody);
    }
    if (method === 'POST' && pathname.endsWith('/v2/embeddings')) {
      return this.embeddings('orchestration', url, headers, rawBody);
    }
    if (method === 'POST' && pathname.endsWith('/embeddings')) {
      return this.embeddings('direct', url, headers, rawBody);
    }
    return json(404, { error: `No route for ${method} ${pathname}` });
  };

  private token(rawBody: string): Response {
    this.calls.token++;

    const failure = this.tokenFailures.shift();
    if (failure !== undefined) {
      return json(failure, { error: 'token service unavailable' });
    }

    const form = new URLSearchParams(rawBody);
    if (
      form.get('grant_type') !== 'client_credentials' ||
      form.get('client_id') !== FAKE_CLIENT_ID ||
      form.get('client_secret') !== FAKE_CLIENT_SECRET
    ) {
      return json(401, { error: 'invalid_client' });
    }

    const accessToken = `token-${this.calls.token}`;
    this.issued.add(accessToken);
    return json(200, {
      access_token: accessToken,
      token_type: 'bearer',
      ...(this.tokenTtlSeconds === null ? {} : { expires_in: this.tokenTtlSeconds }),
    });
  }

  private embeddings(
    kind: 'direct' | 'orchestration',
    url: string,
    headers: Headers,
    rawBody: string
  ): Response {
    this.calls.embeddings++;

    let body: unknown;
    try {
      body = JSON.parse(rawBody);
    } catch {
      body = rawBody;
    }
    this.requests.push({ url, method: 'POST', headers, body });

    const bearer = headers.get('Authorization')?.replace(/^Bearer /, '') ?? '';
    if (this.rejectAllTokens || !this.issued.has(bearer)) {
      return json(401, { error: 'invalid token' });
    }

    const failure = this.embeddingFailures.shift();
    if (failure !== undefined) {
      return json(failure, { error: `injected failure ${failure}` });
    }

    let texts: string[];
    let dimensions: number | undefined;
    if (kind === 'direct') {
      const parsed = DirectBody.safeParse(body);
      if (!parsed.success) return json(400, { error: 'malformed direct request' });
      texts = typeof parsed.data.input === 'string' ? [parsed.data.input] : parsed.data.input;
      dimensions = parsed.data.dimensions;
    } else {
      const parsed = OrchestrationBody.safeParse(body);
      if (!parsed.success) return json(400, { error: 'malformed orchestration request' });
      const text = parsed.data.input.text;
      texts = typeof text === 'string' ? [text] : text;
      dimensions = parsed.data.config.modules.embeddings.model.params?.dimensions;
    }

    if (texts.some((text) => [...this.failingTexts].some((bad) => text.includes(bad)))) {
      return json(400, { error: 'content rejected' });
    }

    const length = this.vectorLength ?? dimensions ?? this.dimensions;
    const data = texts.map((text, index) => ({
      object: 'embedding',
      embedding: fakeEmbedding(text, length),
      index,
    }));
    const tokens = texts.reduce((sum, text) => sum + text.split(/\s+/).length, 0);
    const result = { data, usage: { prompt_tokens: tokens, total_tokens: tokens } };

    if (kind === 'orchestration' && this.wrapOrchestration) {
      return json(200, { request_id: `req-${this.calls.embeddings}`, final_result: result });
    }
    return json(200, result);
  }
}
