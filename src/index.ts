/**
 * ragline - Library Entry Point
 *
 * The CLI (`ragline`) covers the common workflow:
 * ```bash
 * ragline ingest ./records.jsonl     # Load records into the store
 * ragline search "space adventure"   # Query through the strategy chain
 * ragline route "I was charged twice" # Pick an agent for a chat turn
 * ```
 *
 * The same pieces are exported for programs that embed the pipeline.
 *
 * @example Ingest and query with the SQLite backend
 * ```typescript
 * import { SqliteBackend, RecordStore, ingest, createSearchEngine } from 'ragline';
 *
 * const backend = SqliteBackend.open('./records.db');
 * const report = await ingest(new RecordStore(backend), records);
 * const results = await createSearchEngine(backend).search('space movies', 5);
 * await backend.close();
 * ```
 *
 * @packageDocumentation
 */

// Errors
export {
  CLIError,
  ConfigError,
  DatabaseError,
  ValidationError,
  FileNotFoundError,
  APIKeyError,
  formatError,
  getExitCode,
} from './errors/index.js';

// Logging
export { type Logger, consoleLogger, silentLogger } from './utils/index.js';

// Configuration
export {
  loadConfig,
  ConfigSchema,
  DEFAULT_CONFIG,
  type Config,
  type StoreConfig,
  type EmbeddingConfig,
  type RoutingConfig,
  type LoadConfigOptions,
} from './config/index.js';

// Store
export * from './store/index.js';

// Embeddings
export * from './embedder/index.js';

// Ingestion
export * from './ingest/index.js';

// Search
export * from './search/index.js';

// Agent routing
export {
  KeywordRouter,
  keywordRule,
  type AgentId,
  type RouteRule,
  type RoutePredicate,
  type RouteDecision,
} from './agent/router.js';
