/**
 * Link extraction and URL helpers for the recursive crawl.
 */

import { load } from 'cheerio';

/**
 * Drop the fragment; everything else identifies a distinct page.
 */
export function normalizeUrl(url: string): string {
  const parsed = new URL(url);
  parsed.hash = '';
  return parsed.href;
}

/** Same host (ignoring a leading www.) */
export function isInternalLink(link: string, root: string): boolean {
  const strip = (host: string) => host.replace(/^www\./, '');
  return strip(new URL(link).hostname) === strip(new URL(root).hostname);
}

/**
 * Absolute, de-duplicated http(s) links of an HTML document, in document
 * order.
 */
export function extractLinks(html: string, baseUrl: string): string[] {
  const $ = load(html);
  const base = $('base[href]').attr('href');
  const resolveAgainst = base && URL.canParse(base, baseUrl) ? new URL(base, baseUrl).href : baseUrl;
  const links = new Set<string>();

  $('a[href]').each((_, element) => {
    const href = $(element).attr('href')?.trim();
    if (!href || href.startsWith('#') || /^(mailto|javascript|tel):/i.test(href)) {
      return;
    }
    if (!URL.canParse(href, resolveAgainst)) {
      return;
    }
    const absolute = new URL(href, resolveAgainst);
    if (absolute.protocol === 'http:' || absolute.protocol === 'https:') {
      links.add(normalizeUrl(absolute.href));
    }
  });

  return [...links];
}
