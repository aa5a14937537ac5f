/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Table formatting for CLI output
export { formatTable, type Column } from './table.js';

// Safe JSON parsing
export { safeJsonParse, parseJsonAs } from './json.js';

// Logging
export { type Logger, consoleLogger, silentLogger } from './logger.js';

// Concurrency
export { KeyedMutex } from './keyed-mutex.js';
