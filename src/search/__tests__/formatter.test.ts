/**
 * Search Result Formatter Tests
 *
 * Tests for the search result formatting utilities.
 * Covers text output, JSON output, and edge cases.
 */

import { describe, it, expect } from 'vitest';

import {
  formatResult,
  formatResults,
  formatResultJSON,
  formatResultsJSON,
  formatScore,
  truncateSnippet,
} from '../formatter.js';
import type { SearchResult } from '../types.js';

// ============================================================================
// Test Fixtures
// ============================================================================

function createMockResult(overrides: Partial<SearchResult> = {}): SearchResult {
  return {
    record: {
      id: 'doc-7',
      title: 'Interstellar',
      content: 'A team of explorers travel through a wormhole in space.',
      category: 'movie',
    },
    score: 0.92,
    strategy: 'vector',
    ...overrides,
  };
}

// ============================================================================
// formatScore Tests
// ============================================================================

describe('formatScore', () => {
  it('should format score with 2 decimal places', () => {
    expect(formatScore(0.92)).toBe('0.92');
    expect(formatScore(0.9234)).toBe('0.92');
    expect(formatScore(0.9999)).toBe('1.00');
  });

  it('should pad with zeros when needed', () => {
    expect(formatScore(0.1)).toBe('0.10');
    expect(formatScore(0)).toBe('0.00');
    expect(formatScore(1)).toBe('1.00');
  });
});

// ============================================================================
// truncateSnippet Tests
// ============================================================================

describe('truncateSnippet', () => {
  it('should return short content unchanged', () => {
    expect(truncateSnippet('short text', 20)).toBe('short text');
  });

  it('should truncate long content with ellipsis', () => {
    expect(truncateSnippet('abcdefghij', 4)).toBe('abcd...');
  });

  it('should collapse whitespace and newlines', () => {
    expect(truncateSnippet('  line one\n\n  line   two  ')).toBe('line one line two');
  });
});

// ============================================================================
// Text Output Tests
// ============================================================================

describe('formatResult', () => {
  it('should show score, id, title and category', () => {
    expect(formatResult(createMockResult())).toBe(
      '[0.92] doc-7  Interstellar (movie)\n  A team of explorers travel through a wormhole in space.'
    );
  });

  it('should omit the category when empty', () => {
    const result = createMockResult({
      record: { id: 'r1', title: 'Refunds', content: 'How refunds work', category: '' },
    });
    expect(formatResult(result)).toBe('[0.92] r1  Refunds\n  How refunds work');
  });

  it('should hide the score and show the strategy on request', () => {
    expect(formatResult(createMockResult({ strategy: 'pattern' }), { showScore: false, showStrategy: true })).toBe(
      'doc-7  Interstellar (movie) via pattern\n  A team of explorers travel through a wormhole in space.'
    );
  });

  it('should respect snippetLength', () => {
    expect(formatResult(createMockResult(), { snippetLength: 6 })).toBe('[0.92] doc-7  Interstellar (movie)\n  A team...');
  });
});

describe('formatResults', () => {
  it('should separate results with blank lines', () => {
    const a = createMockResult({ record: { id: 'a', title: 'A', content: 'x', category: '' }, score: 1 });
    const b = createMockResult({ record: { id: 'b', title: 'B', content: 'y', category: '' }, score: 0.5 });
    expect(formatResults([a, b])).toBe('[1.00] a  A\n  x\n\n[0.50] b  B\n  y');
  });

  it('should return an empty string for no results', () => {
    expect(formatResults([])).toBe('');
  });
});

// ============================================================================
// JSON Output Tests
// ============================================================================

describe('formatResultJSON', () => {
  it('should flatten the record', () => {
    expect(formatResultJSON(createMockResult())).toEqual({
      id: 'doc-7',
      title: 'Interstellar',
      category: 'movie',
      score: 0.92,
      strategy: 'vector',
      content: 'A team of explorers travel through a wormhole in space.',
    });
  });

  it('should map every result', () => {
    expect(formatResultsJSON([createMockResult(), createMockResult({ score: 0.5 })]).map((r) => r.score)).toEqual([
      0.92, 0.5,
    ]);
  });
});
