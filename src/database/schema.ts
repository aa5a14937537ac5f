/**
 * Database Schema Helpers
 *
 * Conversions between the records table's storage format and the store's
 * domain types.
 */

import type { StoredRecord } from '../store/types.js';
import type { RecordRow } from './validation.js';

/**
 * Convert an embedding to a Float32 BLOB.
 *
 * 4 bytes per dimension: 1536 dimensions = 6KB per record.
 *
 * @example
 * ```ts
 * const blob = embeddingToBlob([0.1, 0.2, 0.3]);
 * db.prepare('UPDATE records SET embedding = ? WHERE id = ?').run(blob, id);
 * ```
 */
export function embeddingToBlob(embedding: readonly number[]): Buffer {
  const floats = Float32Array.from(embedding);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * Convert a BLOB back to an embedding vector.
 */
export function blobToEmbedding(blob: Buffer): number[] {
  // Copy into an aligned buffer: Buffer slices from SQLite may not be 4-byte aligned
  const aligned = new Uint8Array(blob.byteLength);
  aligned.set(blob);
  return Array.from(new Float32Array(aligned.buffer, 0, Math.floor(blob.byteLength / 4)));
}

/**
 * Map a validated `records` row to a StoredRecord.
 */
export function rowToStoredRecord(row: RecordRow): StoredRecord {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    category: row.category,
    contentHash: row.content_hash,
    embedding: row.embedding ? blobToEmbedding(row.embedding) : null,
    embeddingModel: row.embedding_model,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
