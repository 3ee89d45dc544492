/**
 * Document Store
 *
 * Chunk and code example persistence over the gateway. Both tables share
 * the same columns (code_examples adds `summary`), so one class serves
 * both, parameterized by table name.
 */

import { StorageError, getErrorMessage } from '../errors/index.js';
import { StorageGateway, resourcePath } from './gateway.js';
import { MatchRowSchema } from './types.js';
import type { ChunkRecord, DocumentTable, InsertReport, MatchRow } from './types.js';

const DEFAULT_WRITE_BATCH_SIZE = 20;

const MATCH_FUNCTIONS: Record<DocumentTable, string> = {
  crawled_pages: 'match_crawled_pages',
  code_examples: 'match_code_examples',
};

export interface DocumentStoreOptions {
  /** Rows per insert request */
  writeBatchSize?: number;
}

export class DocumentStore {
  private readonly writeBatchSize: number;

  constructor(
    private readonly gateway: StorageGateway,
    readonly table: DocumentTable,
    options: DocumentStoreOptions = {}
  ) {
    this.writeBatchSize = Math.max(1, options.writeBatchSize ?? DEFAULT_WRITE_BATCH_SIZE);
  }

  /**
   * Delete every row of one origin. Returns the number of rows removed.
   */
  async deleteByOrigin(url: string): Promise<number> {
    return this.deleteWhere({ url: `eq.${url}` });
  }

  /**
   * Delete every row of one source. Returns the number of rows removed.
   */
  async deleteBySource(sourceId: string): Promise<number> {
    return this.deleteWhere({ source_id: `eq.${sourceId}` });
  }

  private async deleteWhere(filter: Record<string, string>): Promise<number> {
    const rows = await this.gateway.rows(
      resourcePath(this.table, { ...filter, select: 'id' }),
      'DELETE',
      undefined,
      { prefer: 'return=representation' }
    );
    return rows.length;
  }

  /**
   * Insert rows in write batches. A failed batch is counted, not thrown,
   * so later batches still go out.
   */
  async insertMany(records: ChunkRecord[]): Promise<InsertReport> {
    const report: InsertReport = { stored: 0, failed: 0, errors: [] };

    for (let start = 0; start < records.length; start += this.writeBatchSize) {
      const batch = records.slice(start, start + this.writeBatchSize);
      try {
        await this.gateway.request(resourcePath(this.table), 'POST', batch, {
          prefer: 'return=minimal',
        });
        report.stored += batch.length;
      } catch (error) {
        report.failed += batch.length;
        report.errors.push(getErrorMessage(error));
      }
    }

    return report;
  }

  /**
   * Rank rows by cosine similarity through the backend RPC.
   * Result order is the backend's.
   */
  async match(embedding: number[], matchCount: number, source?: string): Promise<MatchRow[]> {
    const body: Record<string, unknown> = {
      query_embedding: embedding,
      match_count: matchCount,
      filter: source ? { source } : {},
    };
    if (this.table === 'code_examples') {
      body.source_filter = source ?? null;
    }

    const rows = await this.gateway.rows(`/rpc/${MATCH_FUNCTIONS[this.table]}`, 'POST', body);

    return rows.map((row) => {
      const parsed = MatchRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new StorageError(
          `Unexpected row from ${MATCH_FUNCTIONS[this.table]}: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
          undefined,
          JSON.stringify(row)
        );
      }
      return parsed.data;
    });
  }
}
