/**
 * Database Module
 *
 * PostgREST-backed storage for document chunks, code examples and sources.
 *
 * @example
 * ```ts
 * import { StorageGateway, DocumentStore, SourceRegistry } from './database/index.js';
 *
 * const gateway = new StorageGateway({ url: 'http://localhost:3000', serviceKey });
 * const pages = new DocumentStore(gateway, 'crawled_pages');
 * const codeExamples = new DocumentStore(gateway, 'code_examples');
 * const sources = new SourceRegistry(gateway, { pages, codeExamples });
 *
 * const all = await sources.list();
 * ```
 */

// Transport
export { StorageGateway, EMPTY_RESULT, isEmptyResult, resourcePath } from './gateway.js';

// Tables
export { DocumentStore, type DocumentStoreOptions } from './store.js';
export { SourceRegistry, type SourceRegistryOptions } from './sources.js';

// Row shapes
export { MatchRowSchema, SourceRowSchema } from './types.js';
export type {
  HttpMethod,
  Row,
  StorageGatewayOptions,
  StorageRequestOptions,
  DocumentTable,
  ChunkMetadata,
  ChunkRecord,
  MatchRow,
  SourceRecord,
  UpsertMode,
  UpsertResult,
  InsertReport,
  RemoveSourceResult,
} from './types.js';
