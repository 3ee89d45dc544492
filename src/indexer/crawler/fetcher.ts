/**
 * Page Fetcher
 *
 * fetch + cheerio. HTML is reduced to plain text with markdown-style
 * headings and fenced <pre> blocks, so the chunker cuts at section
 * boundaries and code examples can be extracted from web pages too.
 */

import { load } from 'cheerio';

import { CrawlError, getErrorMessage } from '../../errors/index.js';
import { extractLinks } from './links.js';
import type { CrawlerOptions, FetchedPage } from './types.js';

export const DEFAULT_USER_AGENT = 'doc-retriever/0.1';
const DEFAULT_TIMEOUT_MS = 30000;

const REMOVED_ELEMENTS = 'script, style, noscript, template, svg, iframe, nav, footer';
const BLOCK_ELEMENTS = 'p, div, section, article, main, li, tr, ul, ol, table, blockquote, dd, dt';

export interface FetchedText {
  url: string;
  contentType: string;
  body: string;
}

/**
 * Collapse whitespace outside code fences; keep code lines as they are.
 */
export function normalizeText(raw: string): string {
  const lines = raw.replace(/\r\n?/g, '\n').split('\n');
  const output: string[] = [];
  let inFence = false;

  for (const line of lines) {
    if (/^\s*```/.test(line)) {
      inFence = !inFence;
      output.push(line.trim());
    } else if (inFence) {
      output.push(line.replace(/\s+$/, ''));
    } else {
      output.push(line.replace(/\s+/g, ' ').trim());
    }
  }

  return output
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Reduce an HTML document to text.
 *
 * @example
 * ```ts
 * htmlToText('<h2>Install</h2><pre><code class="language-sh">npm i</code></pre>').text
 * // '## Install\n\n```sh\nnpm i\n```'
 * ```
 */
export function htmlToText(html: string): { title?: string; text: string } {
  const $ = load(html);
  const title = $('title').first().text().trim() || $('h1').first().text().trim() || undefined;

  $(REMOVED_ELEMENTS).remove();

  $('pre').each((_, element) => {
    const pre = $(element);
    const classes = `${pre.find('code').attr('class') ?? ''} ${pre.attr('class') ?? ''}`;
    const language = /(?:language|lang)-([\w+#-]+)/.exec(classes)?.[1] ?? '';
    const code = pre.text().replace(/\n+$/, '');
    pre.text(`\n\n\`\`\`${language}\n${code}\n\`\`\`\n\n`);
  });

  $('h1, h2, h3, h4, h5, h6').each((_, element) => {
    const heading = $(element);
    const level = Number(element.tagName.slice(1));
    const text = heading.text().replace(/\s+/g, ' ').trim();
    heading.text(`\n\n${'#'.repeat(level)} ${text}\n\n`);
  });

  $('br').replaceWith('\n');
  $('li').prepend('- ');
  $(BLOCK_ELEMENTS).append('\n');

  const body = $('body');
  const raw = body.length > 0 ? body.text() : $.root().text();
  return { title, text: normalizeText(raw) };
}

function isHtml(contentType: string, body: string): boolean {
  if (contentType.includes('html')) return true;
  return contentType === '' && /^\s*<(!doctype html|html)/i.test(body);
}

function isText(contentType: string): boolean {
  return (
    contentType === '' ||
    contentType.startsWith('text/') ||
    contentType.includes('xml') ||
    contentType.includes('json') ||
    contentType.includes('markdown')
  );
}

/**
 * GET a URL and return its body as text.
 *
 * @throws CrawlError on network failure or a non-2xx status
 */
export async function fetchText(url: string, options: CrawlerOptions = {}): Promise<FetchedText> {
  const fetchFn = options.fetch ?? fetch;

  let response: Response;
  try {
    response = await fetchFn(url, {
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: 'text/html,application/xhtml+xml,text/plain,text/markdown,application/xml;q=0.9,*/*;q=0.8',
      },
      redirect: 'follow',
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
  } catch (error) {
    throw new CrawlError(`Failed to fetch ${url}: ${getErrorMessage(error)}`, url);
  }

  if (!response.ok) {
    throw new CrawlError(`HTTP ${response.status} from ${url}`, url, response.status);
  }

  const contentType = (response.headers.get('content-type') ?? '').split(';')[0].trim().toLowerCase();
  return { url: response.url || url, contentType, body: await response.text() };
}

/**
 * Fetch one page and reduce it to text.
 *
 * @throws CrawlError on fetch failure or a binary content type
 */
export async function fetchPage(url: string, options: CrawlerOptions = {}): Promise<FetchedPage> {
  const { url: finalUrl, contentType, body } = await fetchText(url, options);
  options.logger?.debug?.(`Fetched ${finalUrl} (${contentType || 'unknown type'}, ${body.length} chars)`);

  if (isHtml(contentType, body)) {
    const { title, text } = htmlToText(body);
    return {
      url: finalUrl,
      ...(title ? { title } : {}),
      content: text,
      contentType: contentType || 'text/html',
      links: extractLinks(body, finalUrl),
    };
  }

  if (isText(contentType)) {
    return {
      url: finalUrl,
      content: body.trim(),
      contentType: contentType || 'text/plain',
      links: [],
    };
  }

  throw new CrawlError(`Unsupported content type ${contentType} at ${url}`, url);
}
