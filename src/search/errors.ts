/**
 * Search Module Errors
 *
 * All errors extend CLIError for consistent error handling.
 */

import { CLIError } from '../errors/index.js';
import type { StrategyAttempt, StrategyName } from './types.js';

/**
 * One strategy failed while running a query.
 *
 * Caught by the engine, logged, and followed by the next strategy. Only
 * surfaces (wrapped in SearchFailedError) when every strategy failed.
 */
export class QueryStrategyError extends CLIError {
  public readonly strategy: StrategyName;

  constructor(strategy: StrategyName, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${strategy} search failed: ${reason}`, undefined, 6);
    this.name = 'QueryStrategyError';
    this.strategy = strategy;
    this.cause = cause;
  }
}

/**
 * Every strategy that ran raised an error, so there is no result to return.
 *
 * Carries the last strategy error as `cause` and the full trace.
 *
 * Exit code 6: Search error
 */
export class SearchFailedError extends CLIError {
  public readonly attempts: StrategyAttempt[];

  constructor(lastError: QueryStrategyError, attempts: StrategyAttempt[]) {
    super(
      `Search failed: ${lastError.message}`,
      'Check store health with: ragline status  (run with --verbose to see each strategy)',
      6
    );
    this.name = 'SearchFailedError';
    this.cause = lastError;
    this.attempts = attempts;
  }
}
