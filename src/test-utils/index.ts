/**
 * Test Utilities Module
 *
 * Shared fakes for store, ingest and search tests.
 *
 * @example
 * ```typescript
 * import { FakeBackend, FakeEmbeddingService } from '../../test-utils/index.js';
 *
 * const backend = new FakeBackend().fail('findById', new Error('timeout'));
 * ```
 */

export { FakeBackend, FakeEmbeddingService, FakeIndexConflict } from './fakes.js';
