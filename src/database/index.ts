/**
 * Database Module
 *
 * SQLite storage primitives used by the SQLite document backend.
 *
 * @example
 * ```ts
 * import { openDatabase, runMigrations } from './database/index.js';
 *
 * const db = openDatabase(config.store.sqlite_path);
 * runMigrations(db);
 * ```
 */

// Connection management
export { openDatabase, IN_MEMORY_PATH } from './connection.js';

// Migration utilities
export {
  runMigrations,
  getAppliedMigrations,
  getMigrationCount,
  type MigrationResult,
} from './migrate.js';

// Storage conversions
export { embeddingToBlob, blobToEmbedding, rowToStoredRecord } from './schema.js';

// Validation schemas and utilities
export {
  RecordRowSchema,
  RecordSummaryRowSchema,
  RankedRecordRowSchema,
  EmbeddedRecordRowSchema,
  CountRowSchema,
  SearchIndexRowSchema,
  IndexListRowSchema,
  IndexInfoRowSchema,
  type RecordRow,
  type RecordSummaryRow,
  type SearchIndexRow,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';
