/**
 * Query Engine
 *
 * Tries the strategies in a fixed order and returns the first non-empty
 * result set, unblended. A strategy that throws is logged and skipped; the
 * query only fails when every strategy that ran threw.
 *
 * @example
 * ```typescript
 * const engine = createSearchEngine(backend, { embedder, logger });
 * const results = await engine.search('space movies', 5);
 * // results[0].strategy === 'vector' | 'full-text' | 'pattern' | 'keyword-or'
 * ```
 */

import { ValidationError } from '../errors/index.js';
import type { EmbeddingService } from '../embedder/index.js';
import type { DocumentBackend, ScoredRecord } from '../store/index.js';
import { type Logger, silentLogger } from '../utils/index.js';
import { QueryStrategyError, SearchFailedError } from './errors.js';
import { defaultStrategies } from './strategies.js';
import type { SearchOutcome, SearchResult, SearchStrategy, StrategyAttempt } from './types.js';

export interface SearchEngineOptions {
  logger?: Logger;
}

export interface CreateSearchEngineOptions extends SearchEngineOptions {
  /** Enables the vector strategy */
  embedder?: EmbeddingService | null;
}

/**
 * Order ranked hits by score, highest first. Array.prototype.sort is
 * stable, so equal scores keep the order the backend returned.
 */
function rankByScore(hits: ScoredRecord[]): ScoredRecord[] {
  return [...hits].sort((a, b) => b.score - a.score);
}

export class SearchEngine {
  private readonly logger: Logger;

  constructor(
    private readonly strategies: readonly SearchStrategy[],
    options: SearchEngineOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /** Strategy names in the order they are tried */
  get strategyOrder(): string[] {
    return this.strategies.map((s) => s.name);
  }

  /**
   * Search and return the winning strategy's results.
   *
   * @throws ValidationError if `limit` is not a positive integer
   * @throws SearchFailedError if every strategy that ran threw
   */
  async search(query: string, limit: number): Promise<SearchResult[]> {
    return (await this.searchWithTrace(query, limit)).results;
  }

  /**
   * Like search(), but also reports what each strategy did.
   */
  async searchWithTrace(query: string, limit: number): Promise<SearchOutcome> {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new ValidationError(`Invalid limit: ${limit}`, ['limit must be a positive integer']);
    }

    const trimmed = query.trim();
    const attempts: StrategyAttempt[] = [];
    if (trimmed.length === 0) {
      return { query, results: [], strategy: null, attempts };
    }

    let lastError: QueryStrategyError | null = null;
    let ran = 0;

    for (const strategy of this.strategies) {
      if (!strategy.isAvailable()) {
        attempts.push({ strategy: strategy.name, status: 'skipped', resultCount: 0, durationMs: 0 });
        continue;
      }

      ran++;
      const startedAt = Date.now();
      let hits: ScoredRecord[];
      try {
        hits = await strategy.search(trimmed, limit);
      } catch (error) {
        lastError = new QueryStrategyError(strategy.name, error);
        attempts.push({
          strategy: strategy.name,
          status: 'error',
          resultCount: 0,
          durationMs: Date.now() - startedAt,
          error: lastError.message,
        });
        this.logger.warn(`${lastError.message}; trying the next strategy`);
        continue;
      }

      const ordered = strategy.ranked ? rankByScore(hits) : hits;
      const results = ordered.slice(0, limit).map(
        (hit): SearchResult => ({ record: hit.record, score: hit.score, strategy: strategy.name })
      );

      attempts.push({
        strategy: strategy.name,
        status: results.length > 0 ? 'hit' : 'empty',
        resultCount: results.length,
        durationMs: Date.now() - startedAt,
      });

      if (results.length > 0) {
        this.logger.debug?.(`${strategy.name} search returned ${results.length} result(s)`);
        return { query, results, strategy: strategy.name, attempts };
      }
    }

    const everyRunFailed = ran > 0 && attempts.every((a) => a.status === 'error' || a.status === 'skipped');
    if (lastError && everyRunFailed) {
      throw new SearchFailedError(lastError, attempts);
    }

    return { query, results: [], strategy: null, attempts };
  }
}

/**
 * Engine with the default strategy chain over one backend.
 */
export function createSearchEngine(backend: DocumentBackend, options: CreateSearchEngineOptions = {}): SearchEngine {
  return new SearchEngine(defaultStrategies(backend, options.embedder ?? null), { logger: options.logger });
}
