/**
 * SQLite Document Backend
 *
 * The default store, built on better-sqlite3:
 * - `records` table keyed by external id (rowid = natural insertion order)
 * - text index: FTS5 external-content table kept in sync by triggers,
 *   ranked with bm25()
 * - keyword index: ordinary B-tree index on one column
 * - vector index: a registry row (dimensions, similarity, algorithm);
 *   queries scan stored embeddings exactly, so ANN parameters are recorded
 *   but not needed for correctness
 *
 * better-sqlite3 is synchronous; the async signatures exist to satisfy
 * DocumentBackend alongside the MongoDB backend.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';

import {
  openDatabase,
  runMigrations,
  embeddingToBlob,
  blobToEmbedding,
  rowToStoredRecord,
  validateRow,
  validateRows,
  RecordRowSchema,
  RecordSummaryRowSchema,
  RankedRecordRowSchema,
  EmbeddedRecordRowSchema,
  CountRowSchema,
  SearchIndexRowSchema,
  IndexListRowSchema,
  IndexInfoRowSchema,
  type RecordSummaryRow,
  type SearchIndexRow,
} from '../database/index.js';
import { DatabaseError, ValidationError } from '../errors/index.js';
import { parseJsonAs, type Logger, silentLogger } from '../utils/index.js';
import { UnsupportedQueryError } from './errors.js';
import { similarity } from './similarity.js';
import type {
  ContentRecord,
  DocumentBackend,
  IndexDescriptor,
  IndexKind,
  IndexSpec,
  KeywordIndexSpec,
  RecordField,
  ScoredRecord,
  StoredRecord,
  TextIndexSpec,
  VectorIndexSpec,
} from './types.js';

/** SQL identifiers we interpolate (index names) must match this */
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Columns of `records` an index may target */
const RecordFieldSchema = z.enum(['id', 'title', 'content', 'category']);

/** Terms FTS5 can match: letters, digits, underscore */
const MATCH_TERM_PATTERN = /[\p{L}\p{N}_]+/gu;

export interface SqliteBackendOptions {
  /** Logger for skipped rows and index maintenance */
  logger?: Logger;
}

function assertIdentifier(name: string): void {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new ValidationError(`Invalid index name: "${name}"`, [
      'Index names must start with a letter or underscore and contain only letters, digits and underscores',
    ]);
  }
}

function toContentRecord(row: RecordSummaryRow): ContentRecord {
  return { id: row.id, title: row.title, content: row.content, category: row.category };
}

/**
 * Build an FTS5 MATCH expression that ORs the query's terms.
 *
 * Each term is quoted so FTS5 operators in user input (AND, NEAR, *, ^)
 * are matched literally. Returns null when the query has no terms.
 */
export function buildMatchExpression(query: string): string | null {
  const terms = query.match(MATCH_TERM_PATTERN);
  if (!terms || terms.length === 0) {
    return null;
  }
  const unique = [...new Set(terms.map((t) => t.toLowerCase()))];
  return unique.map((t) => `"${t}"`).join(' OR ');
}

export class SqliteBackend implements DocumentBackend {
  readonly kind = 'sqlite' as const;
  readonly singletonIndexKinds: ReadonlySet<IndexKind> = new Set<IndexKind>(['text', 'vector']);

  private readonly logger: Logger;
  private closed = false;

  /**
   * Wrap an open connection. Runs pending migrations.
   *
   * @throws DatabaseError if a migration fails
   */
  constructor(
    private readonly db: Database.Database,
    options: SqliteBackendOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;

    // lower() only folds ASCII; match JS lowercasing of the needle instead
    db.function('fold_case', { deterministic: true }, (value: unknown) =>
      typeof value === 'string' ? value.toLowerCase() : value
    );

    const result = runMigrations(db);
    if (result.failed.length > 0) {
      const details = result.failed.map((f) => `${f.name}: ${f.error}`).join('; ');
      throw new DatabaseError(`Database migration failed: ${details}`);
    }
    for (const name of result.applied) {
      this.logger.debug?.(`Applied migration ${name}`);
    }
  }

  /**
   * Open (creating if needed) a database file and wrap it.
   */
  static open(path: string, options: SqliteBackendOptions = {}): SqliteBackend {
    const db = openDatabase(path);
    try {
      return new SqliteBackend(db, options);
    } catch (error) {
      db.close();
      throw error;
    }
  }

  // ==========================================================================
  // Records
  // ==========================================================================

  async findById(id: string): Promise<StoredRecord | null> {
    const row = this.db.prepare('SELECT * FROM records WHERE id = ?').get(id);
    return row ? rowToStoredRecord(validateRow(RecordRowSchema, row, `records.id=${id}`)) : null;
  }

  async upsert(record: StoredRecord): Promise<void> {
    this.db
      .prepare(
        `
      INSERT INTO records (id, title, content, category, content_hash, embedding, embedding_model, created_at, updated_at)
      VALUES (@id, @title, @content, @category, @contentHash, @embedding, @embeddingModel, @createdAt, @updatedAt)
      ON CONFLICT(id) DO UPDATE SET
        title = @title,
        content = @content,
        category = @category,
        content_hash = @contentHash,
        embedding = @embedding,
        embedding_model = @embeddingModel,
        updated_at = @updatedAt
    `
      )
      .run({
        id: record.id,
        title: record.title,
        content: record.content,
        category: record.category,
        contentHash: record.contentHash,
        embedding: record.embedding ? embeddingToBlob(record.embedding) : null,
        embeddingModel: record.embeddingModel,
        createdAt: record.createdAt,
        updatedAt: record.updatedAt,
      });
  }

  async count(): Promise<number> {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM records').get();
    return validateRow(CountRowSchema, row, 'records.count').count;
  }

  // ==========================================================================
  // Indexes
  // ==========================================================================

  async listIndexes(): Promise<IndexDescriptor[]> {
    const registry = this.registryRows().map((row) => this.describeRegistryRow(row));
    return [...registry, ...this.keywordIndexes()];
  }

  async createIndex(spec: IndexSpec): Promise<void> {
    assertIdentifier(spec.name);

    switch (spec.kind) {
      case 'text':
        this.createTextIndex(spec);
        return;
      case 'keyword':
        this.createKeywordIndex(spec);
        return;
      case 'vector':
        this.createVectorIndex(spec);
        return;
    }
  }

  isIndexConflict(error: unknown): boolean {
    return error instanceof Error && /already exists/i.test(error.message);
  }

  private registryRows(kind?: 'text' | 'vector'): SearchIndexRow[] {
    const rows = kind
      ? this.db.prepare('SELECT * FROM search_indexes WHERE kind = ? ORDER BY created_at, name').all(kind)
      : this.db.prepare('SELECT * FROM search_indexes ORDER BY created_at, name').all();
    return validateRows(SearchIndexRowSchema, rows, 'search_indexes');
  }

  private describeRegistryRow(row: SearchIndexRow): IndexDescriptor {
    const fields = parseJsonAs(z.array(RecordFieldSchema), row.fields, []);
    return {
      name: row.name,
      kind: row.kind,
      fields,
      dimensions: row.dimensions ?? undefined,
      similarity: row.similarity ?? undefined,
    };
  }

  private keywordIndexes(): IndexDescriptor[] {
    const list = validateRows(IndexListRowSchema, this.pragmaRows('index_list(records)'), 'index_list');

    return list
      .filter((entry) => entry.origin === 'c')
      .map((entry) => {
        const columns = validateRows(
          IndexInfoRowSchema,
          this.pragmaRows(`index_info(${entry.name})`),
          `index_info(${entry.name})`
        );
        const fields = columns.flatMap((c): RecordField[] => {
          const parsed = RecordFieldSchema.safeParse(c.name);
          return parsed.success ? [parsed.data] : [];
        });
        return { name: entry.name, kind: 'keyword' as const, fields };
      });
  }

  private pragmaRows(source: string): unknown[] {
    const result: unknown = this.db.pragma(source);
    return Array.isArray(result) ? result : [];
  }

  private assertNoOtherIndexOfKind(kind: 'text' | 'vector'): void {
    const existing = this.registryRows(kind)[0];
    if (existing) {
      throw new Error(`A ${kind} index already exists on records: ${existing.name}`);
    }
  }

  private createTextIndex(spec: TextIndexSpec): void {
    if (spec.fields.length === 0) {
      throw new ValidationError(`Text index "${spec.name}" needs at least one field`);
    }
    const fields = spec.fields.map((f) => RecordFieldSchema.parse(f));
    const name = spec.name;
    const cols = fields.join(', ');
    const newCols = fields.map((f) => `new.${f}`).join(', ');
    const oldCols = fields.map((f) => `old.${f}`).join(', ');

    this.db.transaction(() => {
      this.assertNoOtherIndexOfKind('text');
      // Fails with "table <name> already exists" on a repeat call
      this.db.exec(`
        CREATE VIRTUAL TABLE ${name} USING fts5(${cols}, content='records', content_rowid='rowid');
        CREATE TRIGGER ${name}_ai AFTER INSERT ON records BEGIN
          INSERT INTO ${name}(rowid, ${cols}) VALUES (new.rowid, ${newCols});
        END;
        CREATE TRIGGER ${name}_ad AFTER DELETE ON records BEGIN
          INSERT INTO ${name}(${name}, rowid, ${cols}) VALUES ('delete', old.rowid, ${oldCols});
        END;
        CREATE TRIGGER ${name}_au AFTER UPDATE ON records BEGIN
          INSERT INTO ${name}(${name}, rowid, ${cols}) VALUES ('delete', old.rowid, ${oldCols});
          INSERT INTO ${name}(rowid, ${cols}) VALUES (new.rowid, ${newCols});
        END;
        INSERT INTO ${name}(${name}) VALUES ('rebuild');
      `);
      this.db
        .prepare("INSERT INTO search_indexes (name, kind, fields) VALUES (?, 'text', ?)")
        .run(name, JSON.stringify(fields));
    })();

    this.logger.debug?.(`Created FTS5 index ${name} on (${cols})`);
  }

  private createKeywordIndex(spec: KeywordIndexSpec): void {
    const field = RecordFieldSchema.parse(spec.field);
    // Fails with "index <name> already exists" on a repeat call
    this.db.exec(`CREATE INDEX ${spec.name} ON records(${field})`);
  }

  private createVectorIndex(spec: VectorIndexSpec): void {
    if (!Number.isInteger(spec.dimensions) || spec.dimensions <= 0) {
      throw new ValidationError(`Vector index "${spec.name}" needs positive integer dimensions`);
    }

    this.db.transaction(() => {
      const sameName = this.db.prepare('SELECT name FROM search_indexes WHERE name = ?').get(spec.name);
      if (sameName) {
        throw new Error(`Index ${spec.name} already exists`);
      }
      this.assertNoOtherIndexOfKind('vector');
      this.db
        .prepare(
          `INSERT INTO search_indexes (name, kind, dimensions, similarity, algorithm)
           VALUES (?, 'vector', ?, ?, ?)`
        )
        .run(spec.name, spec.dimensions, spec.similarity, JSON.stringify(spec.algorithm));
    })();
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  async vectorSearch(vector: number[], limit: number): Promise<ScoredRecord[]> {
    const index = this.registryRows('vector')[0];
    if (!index || index.dimensions === null || index.similarity === null) {
      throw new UnsupportedQueryError('Vector search requires a vector index');
    }
    if (vector.length !== index.dimensions) {
      throw new UnsupportedQueryError(
        `Query vector has ${vector.length} dimensions, index ${index.name} expects ${index.dimensions}`,
        'Use the embedding model the vector index was created for'
      );
    }

    const stmt = this.db.prepare(
      'SELECT id, title, content, category, embedding FROM records WHERE embedding IS NOT NULL ORDER BY rowid'
    );

    const scored: ScoredRecord[] = [];
    let skipped = 0;
    for (const raw of stmt.iterate()) {
      const row = validateRow(EmbeddedRecordRowSchema, raw, 'records.embedding');
      const embedding = blobToEmbedding(row.embedding);
      if (embedding.length !== index.dimensions) {
        skipped++;
        continue;
      }
      scored.push({ record: toContentRecord(row), score: similarity(index.similarity, vector, embedding) });
    }

    if (skipped > 0) {
      this.logger.warn(`Skipped ${skipped} record(s) whose embedding dimensions differ from ${index.name}`);
    }

    // Array.prototype.sort is stable: equal scores keep rowid order
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, limit);
  }

  async textSearch(query: string, limit: number): Promise<ScoredRecord[]> {
    const index = this.registryRows('text')[0];
    if (!index) {
      throw new UnsupportedQueryError('Full-text search requires a text index');
    }

    const match = buildMatchExpression(query);
    if (!match) {
      return [];
    }

    const name = index.name;
    assertIdentifier(name);
    const rows = this.db
      .prepare(
        `
      SELECT r.id, r.title, r.content, r.category, bm25(${name}) AS bm25_rank
      FROM ${name}
      JOIN records r ON r.rowid = ${name}.rowid
      WHERE ${name} MATCH ?
      ORDER BY bm25_rank ASC, r.rowid ASC
      LIMIT ?
    `
      )
      .all(match, limit);

    // bm25() is negative with lower = better; flip so higher = better
    return validateRows(RankedRecordRowSchema, rows, name).map((row) => ({
      record: toContentRecord(row),
      score: -row.bm25_rank,
    }));
  }

  async patternSearch(pattern: string, limit: number): Promise<ContentRecord[]> {
    const needle = pattern.toLowerCase();
    const rows = this.db
      .prepare(
        `
      SELECT id, title, content, category FROM records
      WHERE instr(fold_case(title), @needle) > 0 OR instr(fold_case(content), @needle) > 0
      ORDER BY rowid
      LIMIT @limit
    `
      )
      .all({ needle, limit });
    return validateRows(RecordSummaryRowSchema, rows, 'records.pattern').map(toContentRecord);
  }

  async anyTokenSearch(tokens: string[], limit: number): Promise<ContentRecord[]> {
    const needles = [...new Set(tokens.map((t) => t.toLowerCase()).filter((t) => t.length > 0))];
    if (needles.length === 0) {
      return [];
    }

    const clauses = needles
      .map(() => '(instr(fold_case(title), ?) > 0 OR instr(fold_case(content), ?) > 0)')
      .join(' OR ');
    const params = needles.flatMap((n) => [n, n]);

    const rows = this.db
      .prepare(`SELECT id, title, content, category FROM records WHERE ${clauses} ORDER BY rowid LIMIT ?`)
      .all(...params, limit);
    return validateRows(RecordSummaryRowSchema, rows, 'records.tokens').map(toContentRecord);
  }

  async close(): Promise<void> {
    if (!this.closed) {
      this.db.close();
      this.closed = true;
    }
  }
}
