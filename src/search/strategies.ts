/**
 * Search Strategies
 *
 * Each class is one step of the engine's ordered chain and can be used (and
 * tested) on its own.
 */

import type { EmbeddingService } from '../embedder/index.js';
import type { DocumentBackend, ScoredRecord } from '../store/index.js';
import type { SearchStrategy, StrategyName } from './types.js';

/**
 * Split a query into whitespace-separated tokens.
 */
export function tokenize(query: string): string[] {
  return query.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Similarity search over stored embeddings.
 * Needs an embedding service and a vector index.
 */
export class VectorStrategy implements SearchStrategy {
  readonly name: StrategyName = 'vector';
  readonly ranked = true;

  constructor(
    private readonly backend: DocumentBackend,
    private readonly embedder: EmbeddingService | null
  ) {}

  isAvailable(): boolean {
    return this.embedder !== null;
  }

  async search(query: string, limit: number): Promise<ScoredRecord[]> {
    if (!this.embedder) {
      return [];
    }
    const vector = await this.embedder.embed(query);
    return this.backend.vectorSearch(vector, limit);
  }
}

/**
 * Backend full-text search scored by relevance. Needs a text index.
 */
export class FullTextStrategy implements SearchStrategy {
  readonly name: StrategyName = 'full-text';
  readonly ranked = true;

  constructor(private readonly backend: DocumentBackend) {}

  isAvailable(): boolean {
    return true;
  }

  async search(query: string, limit: number): Promise<ScoredRecord[]> {
    return this.backend.textSearch(query, limit);
  }
}

/**
 * Case-insensitive substring match of the whole query against title and
 * content. Unscored; natural store order.
 */
export class PatternStrategy implements SearchStrategy {
  readonly name: StrategyName = 'pattern';
  readonly ranked = false;

  constructor(private readonly backend: DocumentBackend) {}

  isAvailable(): boolean {
    return true;
  }

  async search(query: string, limit: number): Promise<ScoredRecord[]> {
    const records = await this.backend.patternSearch(query, limit);
    return records.map((record) => ({ record, score: 0 }));
  }
}

/**
 * Matches records containing ANY query token. Low precision, last resort.
 */
export class KeywordOrStrategy implements SearchStrategy {
  readonly name: StrategyName = 'keyword-or';
  readonly ranked = false;

  constructor(private readonly backend: DocumentBackend) {}

  isAvailable(): boolean {
    return true;
  }

  async search(query: string, limit: number): Promise<ScoredRecord[]> {
    const tokens = tokenize(query);
    if (tokens.length === 0) {
      return [];
    }
    const records = await this.backend.anyTokenSearch(tokens, limit);
    return records.map((record) => ({ record, score: 0 }));
  }
}

/**
 * The default chain: vector, full-text, pattern, keyword-or.
 */
export function defaultStrategies(backend: DocumentBackend, embedder: EmbeddingService | null): SearchStrategy[] {
  return [
    new VectorStrategy(backend, embedder),
    new FullTextStrategy(backend),
    new PatternStrategy(backend),
    new KeywordOrStrategy(backend),
  ];
}
