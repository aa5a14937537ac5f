/**
 * Query Engine Tests
 *
 * Strategy order, fallthrough on errors, ranking and limits, against the
 * in-memory fake and a real SQLite store.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SearchEngine, createSearchEngine } from '../engine.js';
import { SearchFailedError } from '../errors.js';
import { KeywordOrStrategy, PatternStrategy, VectorStrategy, tokenize } from '../strategies.js';
import { ValidationError } from '../../errors/index.js';
import { SqliteBackend, type ContentRecord, type StoredRecord } from '../../store/index.js';
import { FakeBackend, FakeEmbeddingService } from '../../test-utils/index.js';

function content(id: string, title: string, body = `body of ${id}`): ContentRecord {
  return { id, title, content: body, category: '' };
}

function stored(id: string, title: string, body: string): StoredRecord {
  return {
    ...content(id, title, body),
    contentHash: `hash-${id}`,
    embedding: null,
    embeddingModel: null,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
  };
}

describe('SearchEngine', () => {
  let backend: FakeBackend;
  let warn: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    backend = new FakeBackend();
    warn = vi.fn();
  });

  it('tries strategies in order', () => {
    const engine = createSearchEngine(backend);
    expect(engine.strategyOrder).toEqual(['vector', 'full-text', 'pattern', 'keyword-or']);
  });

  it('returns vector results first when an embedder is configured', async () => {
    backend.vectorHits = [{ record: content('v', 'Vector hit'), score: 0.8 }];
    backend.textHits = [{ record: content('t', 'Text hit'), score: 0.9 }];
    const embedder = new FakeEmbeddingService();
    const engine = createSearchEngine(backend, { embedder });

    const outcome = await engine.searchWithTrace('space', 5);

    expect(outcome.strategy).toBe('vector');
    expect(outcome.results.map((r) => r.record.id)).toEqual(['v']);
    expect(embedder.calls).toEqual(['space']);
  });

  it('skips vector search without an embedder', async () => {
    backend.textHits = [{ record: content('t', 'Text hit'), score: 0.9 }];

    const outcome = await createSearchEngine(backend).searchWithTrace('space', 5);

    expect(outcome.strategy).toBe('full-text');
    expect(outcome.attempts.map((a) => [a.strategy, a.status])).toEqual([
      ['vector', 'skipped'],
      ['full-text', 'hit'],
    ]);
  });

  it('ranks scored results by descending score', async () => {
    backend.textHits = [
      { record: content('A', 'A'), score: 0.9 },
      { record: content('B', 'B'), score: 0.95 },
      { record: content('C', 'C'), score: 0.2 },
    ];

    const results = await createSearchEngine(backend).search('query', 5);

    expect(results.map((r) => r.record.id)).toEqual(['B', 'A', 'C']);
    expect(results.map((r) => r.score)).toEqual([0.95, 0.9, 0.2]);
    expect(results.every((r) => r.strategy === 'full-text')).toBe(true);
  });

  it('keeps backend order for equal scores', async () => {
    backend.textHits = [
      { record: content('first', 'x'), score: 0.5 },
      { record: content('second', 'x'), score: 0.5 },
    ];

    const results = await createSearchEngine(backend).search('x', 5);
    expect(results.map((r) => r.record.id)).toEqual(['first', 'second']);
  });

  it('falls through to pattern search and applies the limit', async () => {
    for (const id of ['1', '2', '3', '4', '5']) {
      backend.records.set(id, stored(id, `Movie ${id}`, 'a movie'));
    }

    const outcome = await createSearchEngine(backend).searchWithTrace('movie', 2);

    expect(outcome.strategy).toBe('pattern');
    expect(outcome.results.map((r) => r.record.id)).toEqual(['1', '2']);
    expect(outcome.results.map((r) => r.score)).toEqual([0, 0]);
  });

  it('falls through to keyword-or when no record contains the whole query', async () => {
    backend.records.set('1', stored('1', 'Refund policy', 'Money back within 30 days'));
    backend.records.set('2', stored('2', 'Shipping', 'Delivery times'));

    const outcome = await createSearchEngine(backend).searchWithTrace('refund delivery', 5);

    expect(outcome.strategy).toBe('keyword-or');
    expect(outcome.results.map((r) => r.record.id)).toEqual(['1', '2']);
  });

  it('continues after a strategy error and warns', async () => {
    backend.fail('vectorSearch', new Error('index offline'));
    backend.textHits = [{ record: content('t', 'Text hit'), score: 0.4 }];
    const engine = createSearchEngine(backend, { embedder: new FakeEmbeddingService(), logger: { warn } });

    const outcome = await engine.searchWithTrace('space', 5);

    expect(outcome.strategy).toBe('full-text');
    expect(outcome.attempts[0]).toMatchObject({
      strategy: 'vector',
      status: 'error',
      error: 'vector search failed: index offline',
    });
    expect(warn).toHaveBeenCalledWith('vector search failed: index offline; trying the next strategy');
  });

  it('returns an empty outcome when nothing matches', async () => {
    const outcome = await createSearchEngine(backend).searchWithTrace('nothing here', 5);

    expect(outcome.results).toEqual([]);
    expect(outcome.strategy).toBeNull();
    expect(outcome.attempts.map((a) => a.status)).toEqual(['skipped', 'empty', 'empty', 'empty']);
  });

  it('returns empty results when some strategies failed but others ran cleanly', async () => {
    backend.fail('textSearch', new Error('no index'));

    const results = await createSearchEngine(backend, { logger: { warn } }).search('nothing', 5);
    expect(results).toEqual([]);
  });

  it('throws SearchFailedError when every strategy that ran failed', async () => {
    const down = new Error('connection refused');
    backend.fail('textSearch', down).fail('patternSearch', down).fail('anyTokenSearch', down);

    const error = await createSearchEngine(backend, { logger: { warn } })
      .search('anything', 5)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SearchFailedError);
    expect(error).toMatchObject({ message: 'Search failed: keyword-or search failed: connection refused' });
    if (error instanceof SearchFailedError) {
      expect(error.attempts.map((a) => a.status)).toEqual(['skipped', 'error', 'error', 'error']);
    }
    expect(warn).toHaveBeenCalledTimes(3);
  });

  it('rejects a non-positive or fractional limit', async () => {
    const engine = createSearchEngine(backend);
    await expect(engine.search('x', 0)).rejects.toThrow(ValidationError);
    await expect(engine.search('x', -1)).rejects.toThrow('Invalid limit: -1');
    await expect(engine.search('x', 1.5)).rejects.toThrow(ValidationError);
  });

  it('returns nothing for a blank query without running strategies', async () => {
    backend.textHits = [{ record: content('t', 'Text hit'), score: 0.4 }];

    const outcome = await createSearchEngine(backend).searchWithTrace('   ', 5);
    expect(outcome).toEqual({ query: '   ', results: [], strategy: null, attempts: [] });
  });

  it('accepts a custom strategy chain', async () => {
    backend.records.set('1', stored('1', 'Billing', 'Invoice questions'));
    const engine = new SearchEngine([new KeywordOrStrategy(backend)]);

    const results = await engine.search('invoice', 3);
    expect(results.map((r) => [r.record.id, r.strategy])).toEqual([['1', 'keyword-or']]);
  });
});

describe('SearchEngine over SQLite', () => {
  it('falls through to keyword-or on a store without indexes', async () => {
    const backend = SqliteBackend.open(':memory:');
    try {
      await backend.upsert(stored('1', 'Space movie night', 'Popcorn and stars'));
      await backend.upsert(stored('2', 'Cooking show', 'A documentary about bread'));
      await backend.upsert(stored('3', 'Gardening', 'Tomatoes'));
      const warn = vi.fn();

      const outcome = await createSearchEngine(backend, { logger: { warn } }).searchWithTrace('space documentary', 5);

      expect(outcome.strategy).toBe('keyword-or');
      expect(outcome.results.map((r) => r.record.id)).toEqual(['1', '2']);
      expect(outcome.attempts.map((a) => [a.strategy, a.status])).toEqual([
        ['vector', 'skipped'],
        ['full-text', 'error'],
        ['pattern', 'empty'],
        ['keyword-or', 'hit'],
      ]);
      expect(warn).toHaveBeenCalledWith(
        'full-text search failed: Full-text search requires a text index; trying the next strategy'
      );
    } finally {
      await backend.close();
    }
  });

  it('matches accented text case-insensitively by pattern', async () => {
    const backend = SqliteBackend.open(':memory:');
    try {
      await backend.upsert(stored('1', 'Éclair recipes', 'Crème brûlée and ÉCLAIRS'));
      await backend.upsert(stored('2', 'Bread', 'Sourdough'));

      const outcome = await createSearchEngine(backend).searchWithTrace('éclair', 5);

      expect(outcome.strategy).toBe('pattern');
      expect(outcome.results.map((r) => r.record.id)).toEqual(['1']);
    } finally {
      await backend.close();
    }
  });
});

describe('strategies', () => {
  it('tokenize splits on whitespace', () => {
    expect(tokenize('  space   movies\tnight ')).toEqual(['space', 'movies', 'night']);
    expect(tokenize('   ')).toEqual([]);
  });

  it('vector strategy is unavailable without an embedder', async () => {
    const strategy = new VectorStrategy(new FakeBackend(), null);
    expect(strategy.isAvailable()).toBe(false);
    expect(await strategy.search('x', 5)).toEqual([]);
  });

  it('pattern strategy scores every hit 0', async () => {
    const backend = new FakeBackend();
    backend.records.set('1', stored('1', 'Space', 'stars'));

    expect(await new PatternStrategy(backend).search('spa', 5)).toEqual([
      { record: content('1', 'Space', 'stars'), score: 0 },
    ]);
  });
});
