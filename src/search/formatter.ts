/**
 * Search Result Formatter
 *
 * Formats search results for CLI display and JSON output.
 *
 * @example
 * ```typescript
 * formatResult(result, { showStrategy: true });
 * // [0.92] doc-7  Interstellar (movie) via vector
 * //   A team of explorers travel through a wormhole in space...
 * ```
 */

import type { FormatOptions, FormattedResultJSON, SearchResult } from './types.js';

/** Default maximum snippet length in characters */
const DEFAULT_SNIPPET_LENGTH = 200;

/** Indent for snippet content in text output */
const SNIPPET_INDENT = '  ';

/**
 * Format a score as a 2-decimal string.
 *
 * @example
 * ```typescript
 * formatScore(0.9234)  // "0.92"
 * formatScore(1)       // "1.00"
 * ```
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Truncate content to a maximum length with ellipsis.
 *
 * Newlines and runs of whitespace collapse to single spaces.
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();

  if (normalized.length <= maxLength) {
    return normalized;
  }

  return normalized.slice(0, maxLength) + '...';
}

/**
 * Format a single search result for text display.
 */
export function formatResult(result: SearchResult, options: FormatOptions = {}): string {
  const { snippetLength = DEFAULT_SNIPPET_LENGTH, showScore = true, showStrategy = false } = options;

  const parts: string[] = [];
  if (showScore) {
    parts.push(`[${formatScore(result.score)}]`);
  }
  parts.push(result.record.id, ` ${result.record.title}`);
  if (result.record.category) {
    parts.push(`(${result.record.category})`);
  }
  if (showStrategy) {
    parts.push(`via ${result.strategy}`);
  }

  const snippet = truncateSnippet(result.record.content, snippetLength);
  return `${parts.join(' ')}\n${SNIPPET_INDENT}${snippet}`;
}

/**
 * Format multiple search results, separated by blank lines.
 */
export function formatResults(results: SearchResult[], options: FormatOptions = {}): string {
  return results.map((result) => formatResult(result, options)).join('\n\n');
}

/**
 * Flatten a result for JSON output.
 */
export function formatResultJSON(result: SearchResult): FormattedResultJSON {
  return {
    id: result.record.id,
    title: result.record.title,
    category: result.record.category,
    score: result.score,
    strategy: result.strategy,
    content: result.record.content,
  };
}

export function formatResultsJSON(results: SearchResult[]): FormattedResultJSON[] {
  return results.map(formatResultJSON);
}
