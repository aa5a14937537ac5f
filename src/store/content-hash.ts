import { createHash } from 'node:crypto';
import type { ContentRecord } from './types.js';

/**
 * SHA-256 over the fields that feed the embedding.
 *
 * Refresh-mode ingestion compares this against the stored hash to decide
 * whether a record needs a new embedding.
 */
export function contentHash(record: Pick<ContentRecord, 'title' | 'content'>): string {
  return createHash('sha256').update(record.title).update('\n').update(record.content).digest('hex');
}
