/**
 * Store Module Errors
 *
 * All errors extend CLIError for consistent error handling.
 */

import { CLIError } from '../errors/index.js';

/**
 * An existence check could not get a definitive answer.
 *
 * Never thrown to callers: RecordStore.exists() wraps the backend failure
 * in this error, logs it at warn level and answers "does not exist".
 */
export class LookupFailureError extends CLIError {
  public readonly recordId: string;

  constructor(recordId: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Existence check failed for record "${recordId}": ${reason}`,
      'The record is treated as new; a duplicate upsert may follow',
      5
    );
    this.name = 'LookupFailureError';
    this.recordId = recordId;
    this.cause = cause;
  }
}

/**
 * Index creation failed for a reason other than "already exists".
 *
 * Fatal to index setup only: ingestion and search can still run, with the
 * strategies that need the missing index falling through.
 *
 * Exit code 7: Index setup error
 */
export class IndexSetupError extends CLIError {
  public readonly indexName: string;

  constructor(indexName: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Failed to create index "${indexName}": ${reason}`,
      'Check that the backend supports this index kind, or remove it from [indexes] in config.toml',
      7
    );
    this.name = 'IndexSetupError';
    this.indexName = indexName;
    this.cause = cause;
  }
}

/**
 * A backend cannot run a query because the feature it needs is missing
 * (no text index, no vector index, mismatched vector dimensions).
 *
 * The query engine treats it like any other strategy failure and falls
 * through to the next strategy.
 */
export class UnsupportedQueryError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: ragline indexes  to create the configured indexes', 6);
    this.name = 'UnsupportedQueryError';
  }
}
