/**
 * Document Store Types
 *
 * The data model shared by the store backends, the ingestion pipeline and
 * the query engine.
 */

// ============================================================================
// Records
// ============================================================================

/**
 * A content record as it arrives from a source file.
 * Identity is the external `id`.
 */
export interface ContentRecord {
  /** Unique, stable external identifier */
  id: string;
  title: string;
  content: string;
  category: string;
}

/** Record fields that indexes and pattern searches may target */
export type RecordField = 'id' | 'title' | 'content' | 'category';

/**
 * A record as persisted by a backend.
 */
export interface StoredRecord extends ContentRecord {
  /** SHA-256 of title + content, used to detect changed content on refresh */
  contentHash: string;
  /** Embedding vector, or null when the record was stored without one */
  embedding: number[] | null;
  /** Model that produced the embedding */
  embeddingModel: string | null;
  /** ISO timestamp of first insert */
  createdAt: string;
  /** ISO timestamp of last upsert */
  updatedAt: string;
}

/**
 * A stored record with a relevance or similarity score attached.
 */
export interface ScoredRecord {
  record: ContentRecord;
  score: number;
}

// ============================================================================
// Indexes
// ============================================================================

export type IndexKind = 'text' | 'keyword' | 'vector';

export type SimilarityMetric = 'cosine' | 'euclidean' | 'dot';

/**
 * Approximate nearest-neighbour parameters.
 *
 * - ivf: inverted file with `numLists` clusters
 * - hnsw: graph index (`m` links per node, `efConstruction` build beam,
 *   `efSearch` query beam)
 * - flat: exact scan
 */
export type VectorAlgorithm =
  | { type: 'ivf'; numLists: number }
  | { type: 'hnsw'; m: number; efConstruction: number; efSearch: number }
  | { type: 'flat' };

export interface TextIndexSpec {
  kind: 'text';
  name: string;
  fields: RecordField[];
}

export interface KeywordIndexSpec {
  kind: 'keyword';
  name: string;
  field: RecordField;
}

export interface VectorIndexSpec {
  kind: 'vector';
  name: string;
  dimensions: number;
  similarity: SimilarityMetric;
  algorithm: VectorAlgorithm;
}

/** Declarative description of an index the collection needs */
export type IndexSpec = TextIndexSpec | KeywordIndexSpec | VectorIndexSpec;

/**
 * An index as reported by a backend.
 */
export interface IndexDescriptor {
  name: string;
  kind: IndexKind;
  /** Indexed fields (empty for vector indexes) */
  fields: RecordField[];
  dimensions?: number;
  similarity?: SimilarityMetric;
}

// ============================================================================
// Backend contract
// ============================================================================

/**
 * Collection-level operations a document store must provide.
 *
 * Implementations: SqliteBackend (default, better-sqlite3) and
 * MongoBackend (MongoDB / Azure Cosmos DB for MongoDB vCore).
 */
export interface DocumentBackend {
  /** Backend identifier for status output */
  readonly kind: 'sqlite' | 'mongodb';

  /**
   * Index kinds the backend allows at most one of per collection.
   * A second index of such a kind under another name is "equivalent".
   */
  readonly singletonIndexKinds: ReadonlySet<IndexKind>;

  /** Look up a record by id; null when absent */
  findById(id: string): Promise<StoredRecord | null>;

  /** Insert-if-absent-else-update keyed by `record.id` */
  upsert(record: StoredRecord): Promise<void>;

  /** Number of stored records */
  count(): Promise<number>;

  listIndexes(): Promise<IndexDescriptor[]>;

  /** Create an index; throws if it (or a conflicting one) already exists */
  createIndex(spec: IndexSpec): Promise<void>;

  /** Whether an error from createIndex means "this index already exists" */
  isIndexConflict(error: unknown): boolean;

  /** Similarity search over stored embeddings; requires a vector index */
  vectorSearch(vector: number[], limit: number): Promise<ScoredRecord[]>;

  /** Relevance-scored full-text search; requires a text index */
  textSearch(query: string, limit: number): Promise<ScoredRecord[]>;

  /** Case-insensitive substring match on title or content, natural order */
  patternSearch(pattern: string, limit: number): Promise<ContentRecord[]>;

  /** Records whose title or content contains any token (case-insensitive) */
  anyTokenSearch(tokens: string[], limit: number): Promise<ContentRecord[]>;

  /** Release the underlying connection */
  close(): Promise<void>;
}
