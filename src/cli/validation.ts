/**
 * Zod validation schemas for CLI inputs
 *
 * Commander hands every option over as a string; these schemas coerce and
 * range-check them before a command touches the network.
 */

import { z } from 'zod';

import { ValidationError } from '../errors/index.js';

// ============================================================================
// GLOBAL OPTIONS SCHEMA
// ============================================================================

export const GlobalOptionsSchema = z.object({
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
});

export type GlobalOptionsInput = z.input<typeof GlobalOptionsSchema>;
export type GlobalOptionsOutput = z.output<typeof GlobalOptionsSchema>;

/** Integer option in [min, max], given as a string */
function intOption(name: string, min: number, max: number) {
  const range = `${name} must be between ${min} and ${max}`;
  return z
    .string()
    .regex(/^\d+$/, `${name} must be a whole number`)
    .transform((value) => parseInt(value, 10))
    .pipe(z.number().min(min, range).max(max, range));
}

// ============================================================================
// CRAWL COMMAND SCHEMA
// ============================================================================

export const CrawlOptionsSchema = z.object({
  single: z.boolean().default(false),
  depth: intOption('depth', 1, 10).optional(),
  concurrency: intOption('concurrency', 1, 50).optional(),
});

// ============================================================================
// INGEST COMMAND SCHEMA
// ============================================================================

export const IngestOptionsSchema = z.object({
  extensions: z.string().optional(),
  recursive: z.boolean().default(true),
  batchSize: intOption('batch-size', 1, 10000).optional(),
  startFrom: z.string().optional(),
  all: z.boolean().default(false),
});

// ============================================================================
// QUERY COMMAND SCHEMA
// ============================================================================

export const QueryOptionsSchema = z.object({
  source: z.string().optional(),
  count: intOption('count', 1, 50).optional(),
  code: z.boolean().default(false),
});

export const QueryArgsSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'Query cannot be empty')
    .max(1000, 'Query too long (max 1000 chars)'),
});

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema and return a formatted error message
 * if validation fails.
 *
 * @example
 * ```typescript
 * const result = validateInput(QueryOptionsSchema, options);
 * if (!result.success) {
 *   throw new ValidationError(result.error);
 * }
 * const validOptions = result.data;
 * ```
 */
export function validateInput<T extends z.ZodSchema>(
  schema: T,
  input: unknown
): { success: true; data: z.output<T> } | { success: false; error: string } {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const errors = result.error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n  ');

  return { success: false, error: `Validation failed:\n  ${errors}` };
}

/**
 * validateInput that throws ValidationError instead of returning it.
 */
export function parseInput<T extends z.ZodSchema>(schema: T, input: unknown): z.output<T> {
  const result = validateInput(schema, input);
  if (!result.success) {
    throw new ValidationError(result.error);
  }
  return result.data;
}
