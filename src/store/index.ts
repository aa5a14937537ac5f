/**
 * Store Module
 *
 * Document backends, the record store adapter and the index manager.
 */

// Types
export type {
  ContentRecord,
  StoredRecord,
  ScoredRecord,
  RecordField,
  IndexKind,
  SimilarityMetric,
  VectorAlgorithm,
  TextIndexSpec,
  KeywordIndexSpec,
  VectorIndexSpec,
  IndexSpec,
  IndexDescriptor,
  DocumentBackend,
} from './types.js';

// Errors
export { LookupFailureError, IndexSetupError, UnsupportedQueryError } from './errors.js';

// Backends
export { SqliteBackend, buildMatchExpression, type SqliteBackendOptions } from './sqlite-backend.js';
export {
  MongoBackend,
  cosmosSearchOptions,
  escapeRegExp,
  type RecordDocument,
  type MongoBackendOptions,
  type MongoBackendConnectOptions,
} from './mongo-backend.js';
export { openBackend, withBackend, expandHome, type OpenBackendOptions } from './factory.js';

// Record store adapter
export { RecordStore, type RecordStoreOptions, type RecordEmbedding } from './record-store.js';

// Index manager
export {
  ensureIndexes,
  defaultIndexSpecs,
  type IndexStatus,
  type IndexSetupResult,
  type EnsureIndexesOptions,
  type IndexSettings,
} from './index-manager.js';

// Helpers
export { contentHash } from './content-hash.js';
export { similarity, cosineSimilarity, euclideanSimilarity, dotProduct } from './similarity.js';
