/**
 * Ingestion Types
 */

import type { ContentRecord } from '../store/index.js';

/** What happened to one input record */
export type IngestOutcome = 'inserted' | 'updated' | 'skipped' | 'failed';

/**
 * A record that could not be ingested.
 */
export interface FailedRecord {
  /** Position in the input sequence */
  index: number;
  id: string;
  error: Error;
}

/**
 * Result of one ingestion run.
 *
 * Counts are sums over the input, so they don't depend on the order in
 * which concurrent workers finished.
 */
export interface IngestReport {
  total: number;
  inserted: number;
  /** Re-embedded because content changed (refresh mode only) */
  updated: number;
  skipped: number;
  /** Ordered by input index */
  failed: FailedRecord[];
  /** The run was aborted before every record was processed */
  cancelled: boolean;
  durationMs: number;
}

export type IngestProgressCallback = (
  processed: number,
  total: number,
  record: ContentRecord,
  outcome: IngestOutcome
) => void;

export interface IngestOptions {
  /**
   * Compare stored content hashes and re-embed records whose title or
   * content changed. Off by default: present ids are always skipped.
   */
  refresh?: boolean;

  /**
   * Records processed in parallel (default 1). Work on the same id is
   * always serialised.
   */
  concurrency?: number;

  /**
   * Stops the run between records. The partial report is still returned.
   */
  signal?: AbortSignal;

  onProgress?: IngestProgressCallback;
}
