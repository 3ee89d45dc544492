/**
 * Storage Gateway
 *
 * Thin REST layer over PostgREST. Normalizes the three success codes
 * (200, 201, 204) and empty bodies, and turns everything else into
 * StorageError.
 *
 * Callers must treat EMPTY_RESULT as success, never as "no rows found".
 */

import { StorageError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/index.js';
import type { FetchFn } from '../indexer/embedder/index.js';
import type { HttpMethod, Row, StorageGatewayOptions, StorageRequestOptions } from './types.js';

/** Marker returned for successful responses without a body */
export const EMPTY_RESULT: Readonly<Record<string, never>> = Object.freeze({});

const SUCCESS_CODES: ReadonlySet<number> = new Set([200, 201, 204]);

const DEFAULT_TIMEOUT_MS = 30000;

export function isEmptyResult(value: unknown): value is typeof EMPTY_RESULT {
  return value === EMPTY_RESULT;
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build `/table?col=eq.value&...` with proper encoding.
 */
export function resourcePath(resource: string, params: Record<string, string> = {}): string {
  const query = new URLSearchParams(params).toString();
  return query ? `/${resource}?${query}` : `/${resource}`;
}

export class StorageGateway {
  private readonly baseUrl: string;
  private readonly serviceKey?: string;
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: StorageGatewayOptions) {
    this.baseUrl = options.url.replace(/\/+$/, '');
    this.serviceKey = options.serviceKey;
    this.fetchFn = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Send one request.
   *
   * @returns the parsed JSON body, or EMPTY_RESULT when the body is empty
   * @throws StorageError for non-success statuses, network failures and
   *   non-JSON bodies
   */
  async request(
    path: string,
    method: HttpMethod = 'GET',
    body?: unknown,
    options: StorageRequestOptions = {}
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (this.serviceKey) {
      headers.Authorization = `Bearer ${this.serviceKey}`;
      headers.apikey = this.serviceKey;
    }
    if (options.prefer) {
      headers.Prefer = options.prefer;
    }

    this.logger.debug?.(`${method} ${path}`);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(options.timeoutMs ?? this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StorageError(`Storage request ${method} ${path} failed: ${message}`);
    }

    const text = await response.text();

    if (!SUCCESS_CODES.has(response.status)) {
      throw new StorageError(
        `Storage request ${method} ${path} returned HTTP ${response.status}`,
        response.status,
        text
      );
    }

    if (text.trim() === '') {
      return EMPTY_RESULT;
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new StorageError(
        `Storage request ${method} ${path} returned a non-JSON body`,
        response.status,
        text
      );
    }
  }

  /**
   * Request that must answer with rows. EMPTY_RESULT counts as no rows.
   */
  async rows(
    path: string,
    method: HttpMethod = 'GET',
    body?: unknown,
    options: StorageRequestOptions = {}
  ): Promise<Row[]> {
    const result = await this.request(path, method, body, options);
    if (isEmptyResult(result)) {
      return [];
    }
    if (Array.isArray(result) && result.every(isRow)) {
      return result;
    }
    throw new StorageError(`Expected rows from ${method} ${path}`, undefined, JSON.stringify(result));
  }
}
