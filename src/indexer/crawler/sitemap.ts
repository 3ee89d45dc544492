/**
 * Sitemap parsing (urlset and sitemapindex) with xml2js.
 */

import { parseStringPromise } from 'xml2js';
import { z } from 'zod';

import { ValidationError, getErrorMessage } from '../../errors/index.js';

export interface SitemapEntries {
  /** Page URLs from <urlset> */
  urls: string[];
  /** Nested sitemap URLs from <sitemapindex> */
  sitemaps: string[];
}

const LocEntry = z.object({ loc: z.array(z.string()).min(1) });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function locations(document: unknown, rootKey: string, entryKey: string): string[] {
  if (!isRecord(document)) return [];
  const root = document[rootKey];
  if (!isRecord(root)) return [];
  const entries = root[entryKey];
  if (!Array.isArray(entries)) return [];

  return entries.flatMap((entry) => {
    const parsed = LocEntry.safeParse(entry);
    return parsed.success && parsed.data.loc[0] ? [parsed.data.loc[0]] : [];
  });
}

/**
 * @throws ValidationError when the document is not XML
 */
export async function parseSitemap(xml: string): Promise<SitemapEntries> {
  let document: unknown;
  try {
    document = await parseStringPromise(xml, { trim: true });
  } catch (error) {
    throw new ValidationError(`Invalid sitemap XML: ${getErrorMessage(error)}`);
  }

  return {
    urls: locations(document, 'urlset', 'url'),
    sitemaps: locations(document, 'sitemapindex', 'sitemap'),
  };
}
