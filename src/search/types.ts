/**
 * Query Engine Types
 */

import type { ContentRecord, ScoredRecord } from '../store/index.js';

/**
 * Strategy names, in the order the engine tries them.
 *
 * `vector` and `full-text` together are the exact/semantic step; `pattern`
 * and `keyword-or` are the lower-precision fallbacks.
 */
export type StrategyName = 'vector' | 'full-text' | 'pattern' | 'keyword-or';

/**
 * A single search hit, tagged with the strategy that produced it.
 */
export interface SearchResult {
  record: ContentRecord;
  /** Similarity / relevance for ranked strategies; 0 for unscored ones */
  score: number;
  strategy: StrategyName;
}

/**
 * One step of the ordered strategy chain.
 */
export interface SearchStrategy {
  readonly name: StrategyName;

  /**
   * Whether results carry a meaningful score. The engine orders ranked
   * results by score (descending, stable); unranked results keep the
   * backend's natural order.
   */
  readonly ranked: boolean;

  /**
   * False when the strategy can't run at all in this setup (e.g. vector
   * search without an embedding service). Unavailable strategies are
   * skipped without counting as errors.
   */
  isAvailable(): boolean;

  /** Run the strategy; may throw, in which case the engine falls through */
  search(query: string, limit: number): Promise<ScoredRecord[]>;
}

export type AttemptStatus = 'hit' | 'empty' | 'error' | 'skipped';

/**
 * What happened when the engine tried one strategy.
 */
export interface StrategyAttempt {
  strategy: StrategyName;
  status: AttemptStatus;
  resultCount: number;
  durationMs: number;
  /** Error message for `error` attempts */
  error?: string;
}

/**
 * Results plus the per-strategy trace.
 */
export interface SearchOutcome {
  query: string;
  results: SearchResult[];
  /** Strategy that produced the results; null when nothing matched */
  strategy: StrategyName | null;
  attempts: StrategyAttempt[];
}

/**
 * Options for formatting search results.
 */
export interface FormatOptions {
  /** Maximum snippet length in characters (default: 200) */
  snippetLength?: number;
  /** Show the score prefix (default: true) */
  showScore?: boolean;
  /** Show the strategy tag (default: false) */
  showStrategy?: boolean;
}

/**
 * JSON output shape for one search result.
 */
export interface FormattedResultJSON {
  id: string;
  title: string;
  category: string;
  score: number;
  strategy: StrategyName;
  content: string;
}
