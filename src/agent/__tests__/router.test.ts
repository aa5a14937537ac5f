/**
 * Keyword Router Tests
 */

import { describe, it, expect } from 'vitest';
import { KeywordRouter, keywordRule } from '../router.js';
import { DEFAULT_CONFIG } from '../../config/index.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const router = KeywordRouter.fromConfig(DEFAULT_CONFIG.routing);

// ============================================================================
// KeywordRouter Tests
// ============================================================================

describe('KeywordRouter', () => {
  it('routes billing questions to the billing agent', () => {
    expect(router.classify('Why was I charged twice?')).toEqual({ agent: 'billing', matched: true, keyword: 'charge' });
  });

  it('routes refund requests to the refund agent', () => {
    expect(router.classify('I want my money back')).toEqual({ agent: 'refund', matched: true, keyword: 'money back' });
  });

  it('matches case-insensitively', () => {
    expect(router.classify('REFUND PLEASE')).toMatchObject({ agent: 'refund', keyword: 'refund' });
  });

  it('falls back to the default agent', () => {
    expect(router.classify('Hello there')).toEqual({ agent: 'triage', matched: false });
    expect(router.classify('')).toEqual({ agent: 'triage', matched: false });
  });

  it('gives earlier rules precedence', () => {
    // "cancel" is a refund keyword, "subscription" a billing one
    expect(router.classify('cancel my subscription').agent).toBe('billing');
  });

  it('uses substring matching', () => {
    expect(router.classify('the billing page').keyword).toBe('billing');
    expect(router.classify('returned item').agent).toBe('refund');
  });

  it('lists agents in precedence order', () => {
    expect(router.agents).toEqual(['billing', 'refund']);
    expect(router.defaultAgent).toBe('triage');
  });
});

describe('keywordRule', () => {
  it('ignores empty keywords', () => {
    const rule = keywordRule('tech', ['', 'crash']);
    expect(rule.predicate('')).toBeNull();
    expect(rule.predicate('app crashed')).toBe('crash');
  });

  it('returns the first listed keyword that matches', () => {
    const rule = keywordRule('tech', ['error', 'crash']);
    expect(rule.predicate('crash with an error')).toBe('error');
  });

  it('composes into a custom router', () => {
    const custom = new KeywordRouter([keywordRule('tech', ['Crash'])], 'general');
    expect(custom.classify('It crashes')).toEqual({ agent: 'tech', matched: true, keyword: 'crash' });
  });
});
