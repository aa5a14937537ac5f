/**
 * Ingest Module
 *
 * Loading record files and ingesting them into a record store.
 */

export { IngestPipeline, ingest, embeddingText, type IngestTarget, type IngestPipelineOptions } from './pipeline.js';
export {
  loadRecords,
  parseRecords,
  ContentRecordSchema,
  type InvalidEntry,
  type LoadedRecords,
} from './source.js';
export type {
  IngestOutcome,
  FailedRecord,
  IngestReport,
  IngestOptions,
  IngestProgressCallback,
} from './types.js';
