/**
 * Source Registry
 *
 * One `sources` row per source key. Upsert is check-then-insert-or-patch,
 * with a 409 on insert (another writer won the race) folded into the
 * update path, and a verification read at the end.
 */

import { StorageError } from '../errors/index.js';
import { StorageGateway, resourcePath } from './gateway.js';
import type { DocumentStore } from './store.js';
import { SourceRowSchema } from './types.js';
import type { RemoveSourceResult, Row, SourceRecord, UpsertMode, UpsertResult } from './types.js';

export interface SourceRegistryOptions {
  pages: DocumentStore;
  codeExamples: DocumentStore;
  now?: () => Date;
}

function toSourceRecord(row: Row): SourceRecord {
  const parsed = SourceRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new StorageError('Unexpected row from sources', undefined, JSON.stringify(row));
  }
  const { source_id, summary, total_word_count, created_at, updated_at } = parsed.data;
  return {
    source_id,
    summary: summary ?? null,
    total_word_count: total_word_count ?? 0,
    ...(created_at ? { created_at } : {}),
    ...(updated_at ? { updated_at } : {}),
  };
}

export class SourceRegistry {
  private readonly pages: DocumentStore;
  private readonly codeExamples: DocumentStore;
  private readonly now: () => Date;

  constructor(
    private readonly gateway: StorageGateway,
    options: SourceRegistryOptions
  ) {
    this.pages = options.pages;
    this.codeExamples = options.codeExamples;
    this.now = options.now ?? (() => new Date());
  }

  async get(sourceId: string): Promise<SourceRecord | undefined> {
    const rows = await this.gateway.rows(
      resourcePath('sources', { source_id: `eq.${sourceId}`, select: '*' })
    );
    const first = rows[0];
    return first === undefined ? undefined : toSourceRecord(first);
  }

  /** All sources, ordered by source_id */
  async list(): Promise<SourceRecord[]> {
    const rows = await this.gateway.rows(
      resourcePath('sources', { select: '*', order: 'source_id.asc' })
    );
    return rows.map(toSourceRecord);
  }

  /**
   * Create the source or update it.
   *
   * `accumulate` adds `wordCount` to the stored total (resumed batches);
   * `replace` overwrites it.
   *
   * @throws StorageError when the row cannot be read back afterwards
   */
  async upsert(
    sourceId: string,
    summary: string,
    wordCount: number,
    mode: UpsertMode
  ): Promise<UpsertResult> {
    let outcome: UpsertResult['outcome'];

    const existing = await this.get(sourceId);
    if (existing) {
      await this.update(existing, summary, wordCount, mode);
      outcome = 'updated';
    } else {
      try {
        await this.gateway.request(
          resourcePath('sources'),
          'POST',
          { source_id: sourceId, summary, total_word_count: wordCount },
          { prefer: 'return=minimal' }
        );
        outcome = 'created';
      } catch (error) {
        if (!(error instanceof StorageError) || error.status !== 409) {
          throw error;
        }
        const raced = await this.get(sourceId);
        if (!raced) {
          throw new StorageError(`Could not verify source ${sourceId} after insert conflict`, 409);
        }
        await this.update(raced, summary, wordCount, mode);
        outcome = 'updated';
      }
    }

    const verified = await this.get(sourceId);
    if (!verified) {
      throw new StorageError(`Could not verify source ${sourceId} after write`);
    }
    return { outcome, source: verified };
  }

  private async update(
    existing: SourceRecord,
    summary: string,
    wordCount: number,
    mode: UpsertMode
  ): Promise<void> {
    const total = mode === 'accumulate' ? existing.total_word_count + wordCount : wordCount;
    await this.gateway.request(
      resourcePath('sources', { source_id: `eq.${existing.source_id}` }),
      'PATCH',
      {
        summary,
        total_word_count: total,
        updated_at: this.now().toISOString(),
      },
      { prefer: 'return=minimal' }
    );
  }

  /**
   * Delete a source with all of its chunks and code examples.
   */
  async remove(sourceId: string): Promise<RemoveSourceResult> {
    const chunksDeleted = await this.pages.deleteBySource(sourceId);
    const codeExamplesDeleted = await this.codeExamples.deleteBySource(sourceId);
    const rows = await this.gateway.rows(
      resourcePath('sources', { source_id: `eq.${sourceId}`, select: 'source_id' }),
      'DELETE',
      undefined,
      { prefer: 'return=representation' }
    );

    return {
      sourceId,
      chunksDeleted,
      codeExamplesDeleted,
      sourceDeleted: rows.length > 0,
    };
  }
}
