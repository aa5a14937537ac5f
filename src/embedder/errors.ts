/**
 * Embedding Errors
 *
 * All errors extend CLIError for consistent error handling.
 */

import { CLIError } from '../errors/index.js';

/**
 * The embedding service failed for one text.
 *
 * During ingestion this fails only the record being embedded; the batch
 * continues.
 *
 * Exit code 8: Embedding error
 */
export class EmbeddingError extends CLIError {
  constructor(message: string, hint?: string, cause?: unknown) {
    super(message, hint ?? 'Check the [embedding] section of config.toml and that the provider is reachable', 8);
    this.name = 'EmbeddingError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * An embedding call did not settle within `timeout_ms`.
 */
export class EmbeddingTimeoutError extends EmbeddingError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(
      `Embedding operation timed out after ${timeoutMs}ms`,
      'The provider may be loading the model or be unreachable. Consider increasing embedding.timeout_ms in ~/.ragline/config.toml'
    );
    this.name = 'EmbeddingTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}
