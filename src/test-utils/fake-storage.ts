/**
 * In-process stand-in for the PostgREST endpoint.
 *
 * Supports what the storage layer uses: `eq.` filters, `select`, `order`,
 * `limit`, array inserts, PATCH and DELETE with `Prefer:
 * return=representation`, the unique `sources.source_id` constraint, and
 * the two match_* RPCs (cosine similarity, optional source filter).
 */

import { z } from 'zod';

import type { FetchFn } from '../indexer/embedder/index.js';

export const FAKE_STORAGE_URL = 'http://storage.test';

export type FakeTable = 'sources' | 'crawled_pages' | 'code_examples';

export type FakeRow = Record<string, unknown>;

export interface FakeStorageRequest {
  method: string;
  path: string;
  params: URLSearchParams;
  prefer: string | null;
  headers: Headers;
  body: unknown;
}

interface Interceptor {
  method?: string;
  path?: string;
  respond: (request: FakeStorageRequest) => Response | undefined;
  remaining: number;
}

const TABLES: readonly FakeTable[] = ['sources', 'crawled_pages', 'code_examples'];

const RESERVED_PARAMS = new Set(['select', 'order', 'limit']);

const MatchArgs = z.object({
  query_embedding: z.array(z.number()),
  match_count: z.number().int().optional(),
  filter: z.record(z.unknown()).optional(),
  source_filter: z.string().nullable().optional(),
});

function isFakeTable(value: string): value is FakeTable {
  return TABLES.some((table) => table === value);
}

function isRow(value: unknown): value is FakeRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function empty(status: number): Response {
  return new Response(null, { status });
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function numberArray(value: unknown): number[] {
  return Array.isArray(value) ? value.filter((item): item is number => typeof item === 'number') : [];
}

function project(row: FakeRow, select: string | null): FakeRow {
  if (!select || select === '*') return { ...row };
  const columns = select.split(',').map((column) => column.trim());
  return Object.fromEntries(columns.map((column) => [column, row[column]]));
}

export class FakeStorage {
  readonly tables: Record<FakeTable, FakeRow[]> = {
    sources: [],
    crawled_pages: [],
    code_examples: [],
  };
  readonly requests: FakeStorageRequest[] = [];

  private nextId = 1;
  private readonly interceptors: Interceptor[] = [];

  /**
   * Answer the next `times` requests matching `method`/`path` with `respond`.
   * Returning undefined lets the request through (after any side effects).
   */
  intercept(
    match: { method?: string; path?: string },
    respond: (request: FakeStorageRequest) => Response | undefined,
    times = 1
  ): void {
    this.interceptors.push({ ...match, respond, remaining: times });
  }

  /** The next `times` matching requests answer `status` */
  failNext(status: number, match: { method?: string; path?: string } = {}, times = 1): void {
    this.intercept(match, () => json(status, { message: `injected failure ${status}` }), times);
  }

  /** Rows of `table` whose columns equal `where` */
  rows(table: FakeTable, where: FakeRow = {}): FakeRow[] {
    return this.tables[table].filter((row) =>
      Object.entries(where).every(([key, value]) => row[key] === value)
    );
  }

  /** Insert rows directly, bypassing HTTP */
  seed(table: FakeTable, rows: object[]): void {
    for (const row of rows) {
      this.tables[table].push(this.withDefaults(table, row));
    }
  }

  readonly fetch: FetchFn = async (input, init) => {
    const url = new URL(urlOf(input));
    const headers = new Headers(init?.headers);
    const rawBody = typeof init?.body === 'string' ? init.body : '';
    let body: unknown;
    try {
      body = rawBody === '' ? undefined : JSON.parse(rawBody);
    } catch {
      return json(400, { message: 'Invalid JSON body' });
    }

    const request: FakeStorageRequest = {
      method: init?.method ?? 'GET',
      path: url.pathname,
      params: url.searchParams,
      prefer: headers.get('Prefer'),
      headers,
      body,
    };
    this.requests.push(request);

    const interceptor = this.interceptors.find(
      (candidate) =>
        candidate.remaining > 0 &&
        (candidate.method === undefined || candidate.method === request.method) &&
        (candidate.path === undefined || candidate.path === request.path)
    );
    if (interceptor) {
      interceptor.remaining--;
      const response = interceptor.respond(request);
      if (response) return response;
    }

    return this.handle(request);
  };

  private handle(request: FakeStorageRequest): Response {
    if (request.path.startsWith('/rpc/')) {
      return this.rpc(request.path.slice('/rpc/'.length), request.body);
    }

    const table = request.path.slice(1);
    if (!isFakeTable(table)) {
      return json(404, { code: '42P01', message: `relation "${table}" does not exist` });
    }

    switch (request.method) {
      case 'GET':
        return this.select(table, request.params);
      case 'POST':
        return this.insert(table, request);
      case 'PATCH':
        return this.update(table, request);
      case 'DELETE':
        return this.remove(table, request);
      default:
        return json(405, { message: `Method ${request.method} not allowed` });
    }
  }

  private matches(params: URLSearchParams): (row: FakeRow) => boolean {
    const filters: Array<[string, string]> = [];
    for (const [key, value] of params) {
      if (RESERVED_PARAMS.has(key)) continue;
      if (!value.startsWith('eq.')) {
        throw new Error(`Unsupported filter ${key}=${value}`);
      }
      filters.push([key, value.slice(3)]);
    }
    return (row) => filters.every(([key, value]) => String(row[key]) === value);
  }

  private select(table: FakeTable, params: URLSearchParams): Response {
    let rows = this.tables[table].filter(this.matches(params));

    const order = params.get('order');
    if (order) {
      const [column, direction = 'asc'] = order.split('.');
      const sign = direction === 'desc' ? -1 : 1;
      rows = [...rows].sort((a, b) => sign * String(a[column]).localeCompare(String(b[column])));
    }

    const limit = params.get('limit');
    if (limit) rows = rows.slice(0, Number(limit));

    return json(200, rows.map((row) => project(row, params.get('select'))));
  }

  private insert(table: FakeTable, request: FakeStorageRequest): Response {
    const incoming = Array.isArray(request.body) ? request.body : [request.body];
    if (!incoming.every(isRow)) {
      return json(400, { message: 'Insert body must be an object or array of objects' });
    }

    if (table === 'sources') {
      const seen = new Set(this.tables.sources.map((row) => row.source_id));
      for (const row of incoming) {
        if (seen.has(row.source_id)) {
          return json(409, {
            code: '23505',
            message: 'duplicate key value violates unique constraint "sources_source_id_key"',
          });
        }
        seen.add(row.source_id);
      }
    }

    const inserted = incoming.map((row) => this.withDefaults(table, row));
    this.tables[table].push(...inserted);

    return request.prefer?.includes('return=representation')
      ? json(201, inserted.map((row) => project(row, request.params.get('select'))))
      : empty(201);
  }

  private update(table: FakeTable, request: FakeStorageRequest): Response {
    if (!isRow(request.body)) {
      return json(400, { message: 'PATCH body must be an object' });
    }
    const patch = request.body;
    const updated = this.tables[table].filter(this.matches(request.params));
    for (const row of updated) Object.assign(row, patch);

    return request.prefer?.includes('return=representation')
      ? json(200, updated.map((row) => project(row, request.params.get('select'))))
      : empty(204);
  }

  private remove(table: FakeTable, request: FakeStorageRequest): Response {
    const matches = this.matches(request.params);
    const removed = this.tables[table].filter(matches);
    this.tables[table] = this.tables[table].filter((row) => !matches(row));

    return request.prefer?.includes('return=representation')
      ? json(200, removed.map((row) => project(row, request.params.get('select'))))
      : empty(204);
  }

  private rpc(name: string, body: unknown): Response {
    const table: FakeTable | undefined =
      name === 'match_crawled_pages'
        ? 'crawled_pages'
        : name === 'match_code_examples'
          ? 'code_examples'
          : undefined;
    if (table === undefined) {
      return json(404, { code: 'PGRST202', message: `function ${name} not found` });
    }

    const args = MatchArgs.safeParse(body);
    if (!args.success) {
      return json(400, { message: `Invalid arguments for ${name}` });
    }
    const { query_embedding, match_count = 10, filter = {}, source_filter } = args.data;
    const source = typeof filter.source === 'string' ? filter.source : undefined;

    const ranked = this.tables[table]
      .filter((row) => source === undefined || row.source_id === source)
      .filter((row) => !source_filter || row.source_id === source_filter)
      .map((row) => {
        const { embedding, created_at: _createdAt, ...rest } = row;
        return { ...rest, similarity: cosineSimilarity(query_embedding, numberArray(embedding)) };
      })
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, match_count);

    return json(200, ranked);
  }

  private withDefaults(table: FakeTable, row: object): FakeRow {
    const now = new Date().toISOString();
    if (table === 'sources') {
      return { total_word_count: 0, summary: null, created_at: now, updated_at: now, ...row };
    }
    return { id: this.nextId++, metadata: {}, created_at: now, ...row };
  }
}
