/**
 * Search Module
 *
 * Ordered-strategy query engine and result formatting.
 */

// Types
export type {
  StrategyName,
  SearchResult,
  SearchStrategy,
  AttemptStatus,
  StrategyAttempt,
  SearchOutcome,
  FormatOptions,
  FormattedResultJSON,
} from './types.js';

// Errors
export { QueryStrategyError, SearchFailedError } from './errors.js';

// Strategies
export {
  VectorStrategy,
  FullTextStrategy,
  PatternStrategy,
  KeywordOrStrategy,
  defaultStrategies,
  tokenize,
} from './strategies.js';

// Engine
export {
  SearchEngine,
  createSearchEngine,
  type SearchEngineOptions,
  type CreateSearchEngineOptions,
} from './engine.js';

// Formatting
export {
  formatScore,
  truncateSnippet,
  formatResult,
  formatResults,
  formatResultJSON,
  formatResultsJSON,
} from './formatter.js';
