/**
 * CLI input schema tests
 */

import { describe, it, expect } from 'vitest';
import {
  CrawlOptionsSchema,
  IngestOptionsSchema,
  QueryArgsSchema,
  QueryOptionsSchema,
  parseInput,
  validateInput,
} from '../validation.js';
import { ValidationError } from '../../errors/index.js';

describe('CrawlOptionsSchema', () => {
  it('coerces numeric strings', () => {
    expect(CrawlOptionsSchema.parse({ depth: '2', concurrency: '5' })).toEqual({
      single: false,
      depth: 2,
      concurrency: 5,
    });
  });

  it('leaves unset limits to the config', () => {
    expect(CrawlOptionsSchema.parse({ single: true })).toEqual({ single: true });
  });

  it('rejects out-of-range and non-numeric values', () => {
    expect(validateInput(CrawlOptionsSchema, { depth: '0' })).toEqual({
      success: false,
      error: 'Validation failed:\n  depth: depth must be between 1 and 10',
    });
    expect(validateInput(CrawlOptionsSchema, { concurrency: 'many' })).toEqual({
      success: false,
      error: 'Validation failed:\n  concurrency: concurrency must be a whole number',
    });
  });
});

describe('IngestOptionsSchema', () => {
  it('defaults to a recursive single run', () => {
    expect(IngestOptionsSchema.parse({})).toEqual({ recursive: true, all: false });
  });

  it('parses batch options', () => {
    expect(IngestOptionsSchema.parse({ batchSize: '20', startFrom: 'b.md', recursive: false })).toEqual({
      recursive: false,
      all: false,
      batchSize: 20,
      startFrom: 'b.md',
    });
  });
});

describe('query schemas', () => {
  it('trims the query', () => {
    expect(QueryArgsSchema.parse({ query: '  retries  ' })).toEqual({ query: 'retries' });
  });

  it('caps the result count at 50', () => {
    expect(QueryOptionsSchema.safeParse({ count: '51' }).success).toBe(false);
    expect(QueryOptionsSchema.parse({ count: '50' })).toEqual({ count: 50, code: false });
  });
});

describe('parseInput', () => {
  it('throws ValidationError with every issue', () => {
    expect(() => parseInput(QueryArgsSchema, { query: ' ' })).toThrow(ValidationError);
    expect(() => parseInput(QueryArgsSchema, { query: ' ' })).toThrow(
      'Validation failed:\n  query: Query cannot be empty'
    );
  });
});
