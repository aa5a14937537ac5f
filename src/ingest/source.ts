/**
 * Record Source Loader
 *
 * Reads content records from a JSON array file (`.json`) or a JSON Lines
 * file (`.jsonl` / `.ndjson`). Each entry needs string `id`, `title` and
 * `content`; `category` is optional and extra fields are dropped.
 *
 * Invalid entries are reported, not thrown, so one bad line doesn't block
 * the rest of the file.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';

import { FileNotFoundError, ValidationError, toError } from '../errors/index.js';
import type { ContentRecord } from '../store/index.js';

export const ContentRecordSchema = z.object({
  id: z.string().min(1, 'id must not be empty'),
  title: z.string(),
  content: z.string(),
  category: z.string().default(''),
});

/**
 * An entry that failed validation.
 */
export interface InvalidEntry {
  /** Zero-based position among the file's entries */
  index: number;
  issues: string[];
}

export interface LoadedRecords {
  records: ContentRecord[];
  invalid: InvalidEntry[];
}

const JSON_LINES_EXTENSIONS = new Set(['.jsonl', '.ndjson']);

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

/**
 * Validate parsed entries, splitting them into records and invalid entries.
 */
export function parseRecords(entries: readonly unknown[]): LoadedRecords {
  const records: ContentRecord[] = [];
  const invalid: InvalidEntry[] = [];

  entries.forEach((entry, index) => {
    const result = ContentRecordSchema.safeParse(entry);
    if (result.success) {
      records.push(result.data);
    } else {
      invalid.push({ index, issues: formatIssues(result.error) });
    }
  });

  return { records, invalid };
}

function parseJsonLines(text: string): LoadedRecords {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const entries: unknown[] = [];
  const unparsable = new Map<number, string>();

  lines.forEach((line, index) => {
    try {
      entries.push(JSON.parse(line));
    } catch (error) {
      unparsable.set(index, `Invalid JSON: ${toError(error).message}`);
      entries.push(undefined);
    }
  });

  const loaded = parseRecords(entries);
  return {
    records: loaded.records,
    invalid: loaded.invalid.map((entry) => {
      const jsonIssue = unparsable.get(entry.index);
      return jsonIssue ? { index: entry.index, issues: [jsonIssue] } : entry;
    }),
  };
}

function parseJsonArray(text: string, filePath: string): LoadedRecords {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`Invalid JSON in ${filePath}`, [toError(error).message]);
  }

  if (!Array.isArray(parsed)) {
    throw new ValidationError(`Expected a JSON array of records in ${filePath}`, [
      `Found ${parsed === null ? 'null' : typeof parsed} at the top level`,
    ]);
  }
  return parseRecords(parsed);
}

/**
 * Load records from a file.
 *
 * @throws FileNotFoundError if the file doesn't exist
 * @throws ValidationError if a `.json` file isn't a JSON array
 */
export async function loadRecords(filePath: string): Promise<LoadedRecords> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new FileNotFoundError(filePath);
    }
    throw error;
  }

  return JSON_LINES_EXTENSIONS.has(path.extname(filePath).toLowerCase())
    ? parseJsonLines(text)
    : parseJsonArray(text, filePath);
}
