/**
 * Record Store
 *
 * The document store adapter the ingestion pipeline talks to. Thin contract
 * over a DocumentBackend: existence checks, lookups and upserts keyed by the
 * record's external id.
 */

import { DatabaseError, toError } from '../errors/index.js';
import { type Logger, silentLogger } from '../utils/index.js';
import { contentHash } from './content-hash.js';
import { LookupFailureError } from './errors.js';
import type { ContentRecord, DocumentBackend, StoredRecord } from './types.js';

export interface RecordStoreOptions {
  logger?: Logger;
  /** Clock for timestamps (tests pin it) */
  now?: () => Date;
}

/** Embedding produced for a record, with the model that produced it */
export interface RecordEmbedding {
  vector: number[];
  model: string;
}

export class RecordStore {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    readonly backend: DocumentBackend,
    options: RecordStoreOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Whether a record with this id is stored.
   *
   * Never throws. A backend failure is logged as a LookupFailureError and
   * answered with `false`, so ingestion proceeds (fail-open). The cost is a
   * possible duplicate upsert while the backend is unhealthy.
   */
  async exists(id: string): Promise<boolean> {
    try {
      return (await this.backend.findById(id)) !== null;
    } catch (error) {
      const failure = new LookupFailureError(id, error);
      this.logger.warn(`${failure.message}. ${failure.hint ?? ''}`.trim());
      return false;
    }
  }

  /**
   * @throws DatabaseError if the backend lookup fails
   */
  async get(id: string): Promise<StoredRecord | null> {
    try {
      return await this.backend.findById(id);
    } catch (error) {
      throw new DatabaseError(`Failed to read record "${id}"`, toError(error));
    }
  }

  /**
   * Insert the record, or update it if the id is already stored.
   *
   * `createdAt` of an existing record is preserved by the backend.
   *
   * @throws DatabaseError if the backend write fails
   */
  async upsert(record: ContentRecord, embedding?: RecordEmbedding): Promise<StoredRecord> {
    const timestamp = this.now().toISOString();
    const stored: StoredRecord = {
      id: record.id,
      title: record.title,
      content: record.content,
      category: record.category,
      contentHash: contentHash(record),
      embedding: embedding?.vector ?? null,
      embeddingModel: embedding?.model ?? null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    try {
      await this.backend.upsert(stored);
    } catch (error) {
      throw new DatabaseError(`Failed to upsert record "${record.id}"`, toError(error));
    }
    return stored;
  }

  async count(): Promise<number> {
    try {
      return await this.backend.count();
    } catch (error) {
      throw new DatabaseError('Failed to count records', toError(error));
    }
  }
}
