/**
 * Ingestion Pipeline
 *
 * For each input record: check existence, and only for absent ids generate
 * the embedding and upsert. Present ids are skipped without calling the
 * embedding service, so a record is embedded at most once per content value.
 *
 * Per-record failures (embedding or store) are collected in the report; one
 * bad record never aborts the batch.
 */

import { toError } from '../errors/index.js';
import { EmbeddingError, type EmbeddingService } from '../embedder/index.js';
import {
  contentHash,
  LookupFailureError,
  type ContentRecord,
  type RecordEmbedding,
  type RecordStore,
} from '../store/index.js';
import { KeyedMutex, type Logger, silentLogger } from '../utils/index.js';
import type { FailedRecord, IngestOptions, IngestOutcome, IngestReport } from './types.js';

/**
 * The parts of RecordStore the pipeline uses.
 */
export type IngestTarget = Pick<RecordStore, 'exists' | 'get' | 'upsert'>;

export interface IngestPipelineOptions {
  /** Omit (or pass null) to store records without embeddings */
  embedder?: EmbeddingService | null;
  logger?: Logger;
}

/** Text the embedding is generated from */
export function embeddingText(record: ContentRecord): string {
  return record.content;
}

export class IngestPipeline {
  private readonly embedder: EmbeddingService | null;
  private readonly logger: Logger;
  /** Serialises check-then-upsert per id, across concurrent runs too */
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly store: IngestTarget,
    options: IngestPipelineOptions = {}
  ) {
    this.embedder = options.embedder ?? null;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Ingest `records` and report what happened to each.
   *
   * Never throws for per-record problems.
   */
  async run(records: readonly ContentRecord[], options: IngestOptions = {}): Promise<IngestReport> {
    const startedAt = Date.now();
    const { refresh = false, signal, onProgress } = options;
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));

    const counts: Record<Exclude<IngestOutcome, 'failed'>, number> = { inserted: 0, updated: 0, skipped: 0 };
    const failed: FailedRecord[] = [];
    let next = 0;
    let processed = 0;

    const worker = async (): Promise<void> => {
      while (next < records.length && !signal?.aborted) {
        const index = next++;
        const record = records[index];
        if (!record) {
          continue;
        }

        let outcome: IngestOutcome;
        try {
          outcome = await this.locks.runExclusive(record.id, () => this.processRecord(record, refresh));
          counts[outcome]++;
        } catch (error) {
          const err = toError(error);
          outcome = 'failed';
          failed.push({ index, id: record.id, error: err });
          this.logger.warn(`Failed to ingest record "${record.id}": ${err.message}`);
        }

        processed++;
        try {
          onProgress?.(processed, records.length, record, outcome);
        } catch (error) {
          this.logger.warn(`Progress callback failed after record "${record.id}": ${toError(error).message}`);
        }
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, Math.max(records.length, 1)) }, () => worker()));

    failed.sort((a, b) => a.index - b.index);

    return {
      total: records.length,
      ...counts,
      failed,
      cancelled: processed < records.length && Boolean(signal?.aborted),
      durationMs: Date.now() - startedAt,
    };
  }

  private async processRecord(record: ContentRecord, refresh: boolean): Promise<Exclude<IngestOutcome, 'failed'>> {
    const present = await this.checkExists(record.id);

    if (!present) {
      await this.store.upsert(record, await this.embed(record));
      this.logger.debug?.(`Inserted ${record.id}`);
      return 'inserted';
    }

    if (!refresh) {
      this.logger.debug?.(`Skipped ${record.id} (already stored)`);
      return 'skipped';
    }

    const stored = await this.store.get(record.id);
    if (!stored) {
      await this.store.upsert(record, await this.embed(record));
      return 'inserted';
    }

    const sameContent = stored.contentHash === contentHash(record);
    const sameModel = this.embedder === null || stored.embeddingModel === this.embedder.model;
    if (sameContent && sameModel && stored.category === record.category) {
      this.logger.debug?.(`Skipped ${record.id} (unchanged)`);
      return 'skipped';
    }

    // A category-only change keeps the stored vector
    const embedding =
      sameContent && sameModel && stored.embedding && stored.embeddingModel
        ? { vector: stored.embedding, model: stored.embeddingModel }
        : await this.embed(record);

    await this.store.upsert(record, embedding);
    this.logger.debug?.(`Updated ${record.id}`);
    return 'updated';
  }

  /**
   * Existence check that never throws, even when the store adapter does.
   */
  private async checkExists(id: string): Promise<boolean> {
    try {
      return await this.store.exists(id);
    } catch (error) {
      const failure = new LookupFailureError(id, error);
      this.logger.warn(`${failure.message}. ${failure.hint ?? ''}`.trim());
      return false;
    }
  }

  private async embed(record: ContentRecord): Promise<RecordEmbedding | undefined> {
    if (!this.embedder) {
      return undefined;
    }
    try {
      const vector = await this.embedder.embed(embeddingText(record));
      return { vector, model: this.embedder.model };
    } catch (error) {
      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new EmbeddingError(
        `Embedding failed for record "${record.id}": ${toError(error).message}`,
        undefined,
        error
      );
    }
  }
}

/**
 * Ingest `records` into `store` with a one-off pipeline.
 *
 * @example
 * ```typescript
 * const report = await ingest(new RecordStore(backend), records, { embedder });
 * console.log(`${report.inserted} inserted, ${report.skipped} skipped`);
 * ```
 */
export async function ingest(
  store: IngestTarget,
  records: readonly ContentRecord[],
  options: IngestOptions & IngestPipelineOptions = {}
): Promise<IngestReport> {
  const { embedder, logger, ...runOptions } = options;
  return new IngestPipeline(store, { embedder, logger }).run(records, runOptions);
}
