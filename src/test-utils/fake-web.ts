/**
 * In-process website for crawler tests.
 */

import type { FetchFn } from '../indexer/embedder/index.js';

export interface FakePage {
  body: string;
  contentType?: string;
  status?: number;
  /** Serve the page as if redirected here */
  redirectTo?: string;
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

export class FakeWeb {
  readonly requested: string[] = [];
  private readonly pages = new Map<string, FakePage>();

  page(url: string, body: string, contentType = 'text/html; charset=utf-8'): this {
    this.pages.set(url, { body, contentType });
    return this;
  }

  set(url: string, page: FakePage): this {
    this.pages.set(url, page);
    return this;
  }

  readonly fetch: FetchFn = async (input) => {
    const url = urlOf(input);
    this.requested.push(url);

    const page = this.pages.get(url);
    if (!page) {
      return new Response('not found', { status: 404, headers: { 'Content-Type': 'text/plain' } });
    }

    const response = new Response(page.body, {
      status: page.status ?? 200,
      headers: page.contentType ? { 'Content-Type': page.contentType } : {},
    });
    if (page.redirectTo) {
      Object.defineProperty(response, 'url', { value: page.redirectTo });
    }
    return response;
  };
}
