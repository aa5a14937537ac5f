/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime. better-sqlite3
 * returns `unknown` rows; validating them catches schema drift (failed
 * migrations, manual edits) with a clear error instead of silent corruption.
 *
 * Usage:
 * ```ts
 * const row = db.prepare('SELECT * FROM records WHERE id = ?').get(id);
 * return row ? validateRow(RecordRowSchema, row, `records.id=${id}`) : null;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/index.js';

// ============================================================================
// Record Schemas
// ============================================================================

/**
 * Full row of the `records` table.
 *
 * `embedding` is a BLOB (Buffer via better-sqlite3) or NULL.
 */
export const RecordRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string(),
  category: z.string(),
  content_hash: z.string(),
  embedding: z.instanceof(Buffer).nullable(),
  embedding_model: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type RecordRow = z.infer<typeof RecordRowSchema>;

/** Record columns without the embedding (pattern/keyword searches) */
export const RecordSummaryRowSchema = RecordRowSchema.pick({
  id: true,
  title: true,
  content: true,
  category: true,
});

export type RecordSummaryRow = z.infer<typeof RecordSummaryRowSchema>;

/** Full-text hit: record columns plus the bm25 rank (lower is better) */
export const RankedRecordRowSchema = RecordSummaryRowSchema.extend({
  bm25_rank: z.number(),
});

/** Candidate row for exact vector scans */
export const EmbeddedRecordRowSchema = RecordSummaryRowSchema.extend({
  embedding: z.instanceof(Buffer),
});

export const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

// ============================================================================
// Index Schemas
// ============================================================================

/** Row of the `search_indexes` registry */
export const SearchIndexRowSchema = z.object({
  name: z.string(),
  kind: z.enum(['text', 'vector']),
  fields: z.string(),
  dimensions: z.number().int().positive().nullable(),
  similarity: z.enum(['cosine', 'euclidean', 'dot']).nullable(),
  algorithm: z.string().nullable(),
});

export type SearchIndexRow = z.infer<typeof SearchIndexRowSchema>;

/** Row of `PRAGMA index_list(records)`; origin 'c' = CREATE INDEX */
export const IndexListRowSchema = z.object({
  name: z.string(),
  origin: z.string(),
});

/** Row of `PRAGMA index_info(<index>)` */
export const IndexInfoRowSchema = z.object({
  name: z.string().nullable(),
});

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails Zod schema validation.
 *
 * Exit code 5: Database error (same as DatabaseError)
 */
export class SchemaValidationError extends CLIError {
  /** Individual validation issues from Zod */
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThis may indicate a database/code version mismatch.\n` +
      `Try: ragline status --verbose  to check store health`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @param context - Included in the error message (e.g., "records.id=doc-1")
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodTypeAny>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of database rows against a Zod schema.
 *
 * Throws on the first invalid row.
 */
export function validateRows<T extends z.ZodTypeAny>(
  schema: T,
  rows: unknown[],
  context: string
): z.output<T>[] {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
