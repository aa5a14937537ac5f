/**
 * Test Utilities - In-Memory Fakes
 *
 * A DocumentBackend that keeps records in a Map and an embedding service
 * with deterministic vectors. Failures are injected per method.
 */

import type { EmbeddingService } from '../embedder/index.js';
import type {
  ContentRecord,
  DocumentBackend,
  IndexDescriptor,
  IndexKind,
  IndexSpec,
  ScoredRecord,
  StoredRecord,
} from '../store/index.js';

type FailableMethod =
  | 'findById'
  | 'upsert'
  | 'count'
  | 'listIndexes'
  | 'createIndex'
  | 'vectorSearch'
  | 'textSearch'
  | 'patternSearch'
  | 'anyTokenSearch';

/** Error thrown by FakeBackend.createIndex for a repeated name */
export class FakeIndexConflict extends Error {
  constructor(name: string) {
    super(`index ${name} already exists`);
    this.name = 'FakeIndexConflict';
  }
}

function summary(record: StoredRecord): ContentRecord {
  return { id: record.id, title: record.title, content: record.content, category: record.category };
}

function matches(record: StoredRecord, needle: string): boolean {
  return record.title.toLowerCase().includes(needle) || record.content.toLowerCase().includes(needle);
}

export class FakeBackend implements DocumentBackend {
  readonly kind = 'sqlite' as const;
  readonly singletonIndexKinds: ReadonlySet<IndexKind>;

  /** Stored records in insertion order */
  readonly records = new Map<string, StoredRecord>();
  readonly indexes: IndexDescriptor[] = [];
  /** Every upsert, in call order */
  readonly upserts: StoredRecord[] = [];

  /** Canned hits for the scored queries */
  vectorHits: ScoredRecord[] = [];
  textHits: ScoredRecord[] = [];

  closed = false;

  private readonly failures = new Map<FailableMethod, (arg: string) => boolean>();
  private readonly errors = new Map<FailableMethod, Error>();

  constructor(options: { singletonIndexKinds?: IndexKind[] } = {}) {
    this.singletonIndexKinds = new Set(options.singletonIndexKinds ?? []);
  }

  /**
   * Make `method` throw `error`, optionally only when `when(arg)` is true
   * (arg is the record id for findById/upsert, the query otherwise).
   */
  fail(method: FailableMethod, error: Error, when: (arg: string) => boolean = () => true): this {
    this.errors.set(method, error);
    this.failures.set(method, when);
    return this;
  }

  private check(method: FailableMethod, arg = ''): void {
    const when = this.failures.get(method);
    const error = this.errors.get(method);
    if (when && error && when(arg)) {
      throw error;
    }
  }

  async findById(id: string): Promise<StoredRecord | null> {
    this.check('findById', id);
    return this.records.get(id) ?? null;
  }

  async upsert(record: StoredRecord): Promise<void> {
    this.check('upsert', record.id);
    const existing = this.records.get(record.id);
    const next = existing ? { ...record, createdAt: existing.createdAt } : record;
    this.records.set(record.id, next);
    this.upserts.push(next);
  }

  async count(): Promise<number> {
    this.check('count');
    return this.records.size;
  }

  async listIndexes(): Promise<IndexDescriptor[]> {
    this.check('listIndexes');
    return [...this.indexes];
  }

  async createIndex(spec: IndexSpec): Promise<void> {
    this.check('createIndex', spec.name);
    if (this.indexes.some((index) => index.name === spec.name)) {
      throw new FakeIndexConflict(spec.name);
    }
    this.indexes.push({
      name: spec.name,
      kind: spec.kind,
      fields: spec.kind === 'text' ? spec.fields : spec.kind === 'keyword' ? [spec.field] : [],
      dimensions: spec.kind === 'vector' ? spec.dimensions : undefined,
    });
  }

  isIndexConflict(error: unknown): boolean {
    return error instanceof FakeIndexConflict;
  }

  async vectorSearch(_vector: number[], limit: number): Promise<ScoredRecord[]> {
    this.check('vectorSearch');
    return this.vectorHits.slice(0, limit);
  }

  async textSearch(query: string, limit: number): Promise<ScoredRecord[]> {
    this.check('textSearch', query);
    return this.textHits.slice(0, limit);
  }

  async patternSearch(pattern: string, limit: number): Promise<ContentRecord[]> {
    this.check('patternSearch', pattern);
    const needle = pattern.toLowerCase();
    return [...this.records.values()].filter((r) => matches(r, needle)).slice(0, limit).map(summary);
  }

  async anyTokenSearch(tokens: string[], limit: number): Promise<ContentRecord[]> {
    this.check('anyTokenSearch', tokens.join(' '));
    const needles = tokens.map((t) => t.toLowerCase()).filter((t) => t.length > 0);
    if (needles.length === 0) {
      return [];
    }
    return [...this.records.values()]
      .filter((r) => needles.some((needle) => matches(r, needle)))
      .slice(0, limit)
      .map(summary);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Embedding service whose vector is [text length, vowel count, 1].
 * Records every call; `failOn` makes matching texts throw.
 */
export class FakeEmbeddingService implements EmbeddingService {
  readonly dimensions = 3;
  readonly calls: string[] = [];
  failOn: ((text: string) => boolean) | null = null;
  /** Resolve each embedding after this many ms (0 = next microtask) */
  delayMs = 0;

  constructor(readonly model = 'fake-embedding') {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.failOn?.(text)) {
      throw new Error(`embedding backend rejected "${text}"`);
    }
    const vowels = text.match(/[aeiou]/gi)?.length ?? 0;
    return [text.length, vowels, 1];
  }
}
