/**
 * SQLite Backend Tests
 *
 * Runs against in-memory databases:
 * - Record upsert/lookup round trips
 * - Index creation, listing and conflicts
 * - Each query kind (vector, full-text, pattern, any-token)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteBackend, buildMatchExpression } from '../sqlite-backend.js';
import { UnsupportedQueryError } from '../errors.js';
import { ValidationError } from '../../errors/index.js';
import type { StoredRecord } from '../types.js';

function stored(id: string, title: string, content: string, overrides: Partial<StoredRecord> = {}): StoredRecord {
  return {
    id,
    title,
    content,
    category: '',
    contentHash: `hash-${id}`,
    embedding: null,
    embeddingModel: null,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('buildMatchExpression', () => {
  it('quotes and ORs lowercased terms', () => {
    expect(buildMatchExpression('Space  movies!')).toBe('"space" OR "movies"');
  });

  it('treats FTS5 operators as plain terms', () => {
    expect(buildMatchExpression('cats AND dogs*')).toBe('"cats" OR "and" OR "dogs"');
  });

  it('drops duplicate terms', () => {
    expect(buildMatchExpression('Refund refund REFUND')).toBe('"refund"');
  });

  it('returns null when there are no terms', () => {
    expect(buildMatchExpression('!!! ???')).toBeNull();
  });
});

describe('SqliteBackend', () => {
  let backend: SqliteBackend;

  beforeEach(() => {
    backend = SqliteBackend.open(':memory:');
  });

  afterEach(async () => {
    await backend.close();
  });

  describe('records', () => {
    it('starts empty', async () => {
      expect(await backend.count()).toBe(0);
      expect(await backend.findById('missing')).toBeNull();
    });

    it('round-trips a record with its embedding', async () => {
      const record = stored('doc-1', 'Interstellar', 'Explorers travel through a wormhole', {
        category: 'movie',
        embedding: [0.5, -0.25, 1],
        embeddingModel: 'test-model',
      });

      await backend.upsert(record);

      expect(await backend.findById('doc-1')).toEqual(record);
      expect(await backend.count()).toBe(1);
    });

    it('updates in place and keeps createdAt', async () => {
      await backend.upsert(stored('doc-1', 'Old title', 'old'));
      await backend.upsert(
        stored('doc-1', 'New title', 'new', {
          createdAt: '2024-06-01T00:00:00.000Z',
          updatedAt: '2024-06-01T00:00:00.000Z',
        })
      );

      const found = await backend.findById('doc-1');
      expect(found?.title).toBe('New title');
      expect(found?.createdAt).toBe('2024-01-01T00:00:00.000Z');
      expect(found?.updatedAt).toBe('2024-06-01T00:00:00.000Z');
      expect(await backend.count()).toBe(1);
    });

    it('close() is idempotent', async () => {
      await backend.close();
      await expect(backend.close()).resolves.toBeUndefined();
    });
  });

  describe('indexes', () => {
    it('lists created indexes of every kind', async () => {
      await backend.createIndex({ kind: 'text', name: 'records_fts', fields: ['title', 'content'] });
      await backend.createIndex({
        kind: 'vector',
        name: 'records_vector',
        dimensions: 3,
        similarity: 'cosine',
        algorithm: { type: 'ivf', numLists: 100 },
      });
      await backend.createIndex({ kind: 'keyword', name: 'category_idx', field: 'category' });

      const indexes = await backend.listIndexes();
      const byName = new Map(indexes.map((index) => [index.name, index]));

      expect(indexes).toHaveLength(3);
      expect(byName.get('records_fts')).toEqual({
        name: 'records_fts',
        kind: 'text',
        fields: ['title', 'content'],
        dimensions: undefined,
        similarity: undefined,
      });
      expect(byName.get('records_vector')).toEqual({
        name: 'records_vector',
        kind: 'vector',
        fields: [],
        dimensions: 3,
        similarity: 'cosine',
      });
      expect(byName.get('category_idx')).toEqual({ name: 'category_idx', kind: 'keyword', fields: ['category'] });
    });

    it('does not list the primary key index', async () => {
      expect(await backend.listIndexes()).toEqual([]);
    });

    it('reports a repeated index as a conflict', async () => {
      await backend.createIndex({ kind: 'keyword', name: 'category_idx', field: 'category' });

      const error = await backend
        .createIndex({ kind: 'keyword', name: 'category_idx', field: 'category' })
        .then(() => null, (e: unknown) => e);

      expect(error).toBeInstanceOf(Error);
      expect(backend.isIndexConflict(error)).toBe(true);
    });

    it('allows only one text index', async () => {
      await backend.createIndex({ kind: 'text', name: 'records_fts', fields: ['title'] });

      await expect(
        backend.createIndex({ kind: 'text', name: 'other_fts', fields: ['content'] })
      ).rejects.toThrow('A text index already exists on records: records_fts');
    });

    it('rejects index names that are not identifiers', async () => {
      await expect(
        backend.createIndex({ kind: 'keyword', name: 'bad-name; DROP TABLE records', field: 'title' })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('does not treat other errors as conflicts', () => {
      expect(backend.isIndexConflict(new Error('disk I/O error'))).toBe(false);
      expect(backend.isIndexConflict('already exists')).toBe(false);
    });
  });

  describe('vectorSearch', () => {
    beforeEach(async () => {
      await backend.upsert(stored('a', 'A', 'a', { embedding: [1, 0] }));
      await backend.upsert(stored('b', 'B', 'b', { embedding: [0, 1] }));
      await backend.upsert(stored('c', 'C', 'c', { embedding: [0.5, 0.5] }));
      await backend.upsert(stored('none', 'No vector', 'n'));
    });

    it('requires a vector index', async () => {
      await expect(backend.vectorSearch([1, 0], 5)).rejects.toBeInstanceOf(UnsupportedQueryError);
    });

    it('ranks by similarity, highest first', async () => {
      await backend.createIndex({
        kind: 'vector',
        name: 'records_vector',
        dimensions: 2,
        similarity: 'cosine',
        algorithm: { type: 'flat' },
      });

      const hits = await backend.vectorSearch([1, 0], 5);

      expect(hits.map((h) => h.record.id)).toEqual(['a', 'c', 'b']);
      expect(hits[0]?.score).toBeCloseTo(1);
      expect(hits[1]?.score).toBeCloseTo(Math.SQRT1_2);
      expect(hits[2]?.score).toBeCloseTo(0);
    });

    it('applies the limit', async () => {
      await backend.createIndex({
        kind: 'vector',
        name: 'records_vector',
        dimensions: 2,
        similarity: 'cosine',
        algorithm: { type: 'flat' },
      });

      expect((await backend.vectorSearch([1, 0], 1)).map((h) => h.record.id)).toEqual(['a']);
    });

    it('rejects a query vector of the wrong size', async () => {
      await backend.createIndex({
        kind: 'vector',
        name: 'records_vector',
        dimensions: 3,
        similarity: 'cosine',
        algorithm: { type: 'flat' },
      });

      await expect(backend.vectorSearch([1, 0], 5)).rejects.toThrow(
        'Query vector has 2 dimensions, index records_vector expects 3'
      );
    });
  });

  describe('textSearch', () => {
    it('requires a text index', async () => {
      await expect(backend.textSearch('space', 5)).rejects.toBeInstanceOf(UnsupportedQueryError);
    });

    it('finds records stored before and after the index was created', async () => {
      await backend.upsert(stored('before', 'Space opera', 'Battles among the stars'));
      await backend.createIndex({ kind: 'text', name: 'records_fts', fields: ['title', 'content'] });
      await backend.upsert(stored('after', 'Cooking', 'A space-saving kitchen'));
      await backend.upsert(stored('other', 'Gardening', 'Tomatoes and basil'));

      const hits = await backend.textSearch('space', 5);

      expect(hits.map((h) => h.record.id).sort()).toEqual(['after', 'before']);
      for (const hit of hits) {
        expect(hit.score).toBeGreaterThan(0);
      }
    });

    it('follows updates', async () => {
      await backend.createIndex({ kind: 'text', name: 'records_fts', fields: ['title', 'content'] });
      await backend.upsert(stored('doc-1', 'Refunds', 'How to request a refund'));
      await backend.upsert(stored('doc-1', 'Invoices', 'Where to find an invoice'));

      expect(await backend.textSearch('refund', 5)).toEqual([]);
      expect((await backend.textSearch('invoice', 5)).map((h) => h.record.id)).toEqual(['doc-1']);
    });

    it('returns nothing for a query without terms', async () => {
      await backend.createIndex({ kind: 'text', name: 'records_fts', fields: ['title'] });
      await backend.upsert(stored('doc-1', 'Anything', 'x'));

      expect(await backend.textSearch('???', 5)).toEqual([]);
    });
  });

  describe('patternSearch', () => {
    beforeEach(async () => {
      await backend.upsert(stored('1', 'Alien', 'A MOVIE about a ship'));
      await backend.upsert(stored('2', 'Garden tips', 'Water daily'));
      await backend.upsert(stored('3', 'Movie night', 'Popcorn'));
      await backend.upsert(stored('4', 'Heat', 'Another movie'));
    });

    it('matches title or content case-insensitively, in insertion order', async () => {
      const hits = await backend.patternSearch('Movie', 10);
      expect(hits.map((r) => r.id)).toEqual(['1', '3', '4']);
    });

    it('applies the limit', async () => {
      const hits = await backend.patternSearch('movie', 2);
      expect(hits.map((r) => r.id)).toEqual(['1', '3']);
    });

    it('matches the whole pattern, not its words', async () => {
      expect(await backend.patternSearch('about movie', 10)).toEqual([]);
      expect((await backend.patternSearch('movie about', 10)).map((r) => r.id)).toEqual(['1']);
    });

    it('returns records without scores', async () => {
      const [first] = await backend.patternSearch('garden', 10);
      expect(first).toEqual({ id: '2', title: 'Garden tips', content: 'Water daily', category: '' });
    });
  });

  describe('anyTokenSearch', () => {
    beforeEach(async () => {
      await backend.upsert(stored('1', 'Alien', 'Horror in space'));
      await backend.upsert(stored('2', 'Garden tips', 'Water daily'));
      await backend.upsert(stored('3', 'Comedy', 'Laughs'));
    });

    it('matches any token', async () => {
      const hits = await backend.anyTokenSearch(['SPACE', 'comedy', 'zebra'], 10);
      expect(hits.map((r) => r.id)).toEqual(['1', '3']);
    });

    it('returns nothing for no tokens', async () => {
      expect(await backend.anyTokenSearch([], 10)).toEqual([]);
      expect(await backend.anyTokenSearch([''], 10)).toEqual([]);
    });
  });

  describe('non-ASCII text', () => {
    beforeEach(async () => {
      await backend.upsert(stored('1', 'Éclair recipes', 'Crème brûlée and ÉCLAIRS'));
      await backend.upsert(stored('2', 'Bread', 'Sourdough'));
    });

    it('pattern search folds accented capitals', async () => {
      expect((await backend.patternSearch('éclair', 10)).map((r) => r.id)).toEqual(['1']);
      expect((await backend.patternSearch('CRÈME', 10)).map((r) => r.id)).toEqual(['1']);
    });

    it('any-token search folds accented capitals', async () => {
      expect((await backend.anyTokenSearch(['ÉCLAIR', 'rye'], 10)).map((r) => r.id)).toEqual(['1']);
    });
  });
});
