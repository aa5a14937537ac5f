/**
 * JSON Utilities
 *
 * Safe JSON parsing with fallback for corrupted data.
 */

import type { z } from 'zod';

/**
 * Safely parse a JSON string with fallback on error.
 *
 * Use this when parsing JSON from the database or files, where corruption
 * is possible and a fallback is acceptable.
 *
 * @example
 * ```typescript
 * const fields = safeJsonParse(row.fields, [], (err) => logger.warn(err.message));
 * ```
 */
export function safeJsonParse<T>(
  json: string | null | undefined,
  fallback: T,
  onError?: (error: Error, rawValue: string) => void
): T {
  if (json === null || json === undefined) {
    return fallback;
  }

  try {
    return JSON.parse(json) as T;
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }
}

/**
 * Parse a JSON string and validate it against a Zod schema.
 *
 * Returns the fallback when the string is missing, malformed, or does not
 * match the schema.
 */
export function parseJsonAs<T extends z.ZodTypeAny>(
  schema: T,
  json: string | null | undefined,
  fallback: z.output<T>
): z.output<T> {
  const raw: unknown = safeJsonParse<unknown>(json, undefined);
  if (raw === undefined) {
    return fallback;
  }
  const result = schema.safeParse(raw);
  return result.success ? result.data : fallback;
}
