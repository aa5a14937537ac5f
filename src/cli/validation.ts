/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments, then we validate with Zod for:
 * - Type coercion (string "5" -> number 5)
 * - Range checks
 * - Helpful error messages
 */

import { z } from 'zod';
import { CLIError } from '../errors/index.js';

/**
 * Positive integer option given as a string, within [1, max].
 */
function intOption(name: string, max: number) {
  return z
    .string()
    .regex(/^\d+$/, `${name} must be a positive integer`)
    .transform((val) => parseInt(val, 10))
    .refine((val) => val >= 1 && val <= max, { message: `${name} must be between 1 and ${max}` });
}

// ============================================================================
// INGEST COMMAND SCHEMA
// ============================================================================

export const IngestOptionsSchema = z.object({
  refresh: z.boolean().default(false),
  concurrency: intOption('concurrency', 32).optional(),
  indexes: z.boolean().default(true),
});

export const IngestArgsSchema = z.object({
  file: z.string().min(1, 'Input file is required'),
});

// ============================================================================
// SEARCH COMMAND SCHEMA
// ============================================================================

export const MAX_SEARCH_LIMIT = 100;

export const SearchOptionsSchema = z.object({
  limit: intOption('limit', MAX_SEARCH_LIMIT).optional(),
  trace: z.boolean().default(false),
});

export const SearchArgsSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'Search query cannot be empty')
    .max(500, 'Search query too long (max 500 chars)'),
});

// ============================================================================
// ROUTE COMMAND SCHEMA
// ============================================================================

export const RouteArgsSchema = z.object({
  text: z.string().trim().min(1, 'Text to route cannot be empty'),
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
 * const result = validateInput(SearchOptionsSchema, options);
 * if (!result.success) {
 *   throw new CLIError(result.error);
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

  // Format Zod errors into a readable message
  const errors = result.error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n  ');

  return { success: false, error: `Validation failed:\n  ${errors}` };
}

/**
 * validateInput() that throws a CLIError (with `hint`) instead of returning.
 */
export function parseInput<T extends z.ZodSchema>(schema: T, input: unknown, hint?: string): z.output<T> {
  const result = validateInput(schema, input);
  if (!result.success) {
    throw new CLIError(result.error, hint);
  }
  return result.data;
}
