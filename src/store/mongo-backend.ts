/**
 * MongoDB Document Backend
 *
 * Targets MongoDB and Azure Cosmos DB for MongoDB (vCore):
 * - `_id` is the external record id
 * - text index: native text index, ranked by `textScore`
 * - keyword index: single-field ascending index
 * - vector index: Cosmos DB `cosmosSearch` index created through the
 *   `createIndexes` command, queried with the `$search` aggregation stage
 *
 * Usage:
 *   const backend = await MongoBackend.connect({
 *     uri: 'mongodb+srv://...',
 *     database: 'ragline',
 *     collection: 'records',
 *   });
 *   try { ... } finally { await backend.close(); }
 */

import {
  MongoClient,
  MongoServerError,
  type Collection,
  type Db,
  type Document,
  type Filter,
  type IndexDirection,
} from 'mongodb';
import { z } from 'zod';

import { ValidationError } from '../errors/index.js';
import { type Logger, silentLogger } from '../utils/index.js';
import type {
  ContentRecord,
  DocumentBackend,
  IndexDescriptor,
  IndexKind,
  IndexSpec,
  RecordField,
  ScoredRecord,
  SimilarityMetric,
  StoredRecord,
  VectorAlgorithm,
  VectorIndexSpec,
} from './types.js';

/**
 * Stored document shape. `_id` carries the record id.
 */
export interface RecordDocument {
  _id: string;
  title: string;
  content: string;
  category: string;
  contentHash: string;
  embedding: number[] | null;
  embeddingModel: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface MongoBackendConnectOptions {
  /** Connection string (mongodb:// or mongodb+srv://) */
  uri: string;
  database: string;
  collection: string;
  logger?: Logger;
}

export interface MongoBackendOptions {
  /** Client to close on close(); omit when the caller owns the client */
  client?: MongoClient;
  logger?: Logger;
}

/** Server error codes meaning "this index (or an equivalent one) already exists" */
const INDEX_CONFLICT_CODES = new Set([68, 85, 86]);

const NAMESPACE_NOT_FOUND = 26;

const COSMOS_SIMILARITY: Record<SimilarityMetric, 'COS' | 'L2' | 'IP'> = {
  cosine: 'COS',
  euclidean: 'L2',
  dot: 'IP',
};

const SIMILARITY_FROM_COSMOS: Record<'COS' | 'L2' | 'IP', SimilarityMetric> = {
  COS: 'cosine',
  L2: 'euclidean',
  IP: 'dot',
};

const RecordFieldSchema = z.enum(['id', 'title', 'content', 'category']);

const SummaryDocumentSchema = z.object({
  _id: z.string(),
  title: z.string(),
  content: z.string(),
  category: z.string().default(''),
});

const StoredDocumentSchema = SummaryDocumentSchema.extend({
  contentHash: z.string(),
  embedding: z.array(z.number()).nullable().default(null),
  embeddingModel: z.string().nullable().default(null),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const TextHitSchema = SummaryDocumentSchema.extend({ score: z.number() });

const VectorHitSchema = z.object({
  similarityScore: z.number(),
  document: SummaryDocumentSchema,
});

const IndexInfoSchema = z
  .object({
    name: z.string(),
    key: z.record(z.unknown()),
    weights: z.record(z.unknown()).optional(),
    cosmosSearchOptions: z
      .object({
        dimensions: z.number().int().optional(),
        similarity: z.enum(['COS', 'L2', 'IP']).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/** Map a record field to its document path */
function fieldPath(field: RecordField): string {
  return field === 'id' ? '_id' : field;
}

function pathToField(path: string): RecordField | null {
  const parsed = RecordFieldSchema.safeParse(path === '_id' ? 'id' : path);
  return parsed.success ? parsed.data : null;
}

function toContentRecord(doc: z.infer<typeof SummaryDocumentSchema>): ContentRecord {
  return { id: doc._id, title: doc.title, content: doc.content, category: doc.category };
}

/**
 * Escape a string for literal use inside a regular expression.
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Translate an algorithm into Cosmos DB `cosmosSearchOptions`.
 *
 * Cosmos has no exact-scan index kind; `flat` becomes a single-list IVF.
 */
export function cosmosSearchOptions(spec: VectorIndexSpec): Document {
  const common = { similarity: COSMOS_SIMILARITY[spec.similarity], dimensions: spec.dimensions };
  const algorithm: VectorAlgorithm = spec.algorithm;

  switch (algorithm.type) {
    case 'ivf':
      return { kind: 'vector-ivf', numLists: algorithm.numLists, ...common };
    case 'hnsw':
      return { kind: 'vector-hnsw', m: algorithm.m, efConstruction: algorithm.efConstruction, ...common };
    case 'flat':
      return { kind: 'vector-ivf', numLists: 1, ...common };
  }
}

export class MongoBackend implements DocumentBackend {
  readonly kind = 'mongodb' as const;
  readonly singletonIndexKinds: ReadonlySet<IndexKind> = new Set<IndexKind>(['text', 'vector']);

  private readonly client?: MongoClient;
  private readonly logger: Logger;

  constructor(
    private readonly db: Db,
    private readonly collection: Collection<RecordDocument>,
    options: MongoBackendOptions = {}
  ) {
    this.client = options.client;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Connect a client and wrap the configured collection.
   * The returned backend owns the client and closes it on close().
   */
  static async connect(options: MongoBackendConnectOptions): Promise<MongoBackend> {
    const client = new MongoClient(options.uri);
    try {
      await client.connect();
    } catch (error) {
      await client.close();
      throw error;
    }
    const db = client.db(options.database);
    return new MongoBackend(db, db.collection<RecordDocument>(options.collection), {
      client,
      logger: options.logger,
    });
  }

  // ==========================================================================
  // Records
  // ==========================================================================

  async findById(id: string): Promise<StoredRecord | null> {
    const doc = await this.collection.findOne({ _id: id });
    if (!doc) {
      return null;
    }
    const parsed = StoredDocumentSchema.parse(doc);
    return {
      ...toContentRecord(parsed),
      contentHash: parsed.contentHash,
      embedding: parsed.embedding,
      embeddingModel: parsed.embeddingModel,
      createdAt: parsed.createdAt,
      updatedAt: parsed.updatedAt,
    };
  }

  async upsert(record: StoredRecord): Promise<void> {
    await this.collection.updateOne(
      { _id: record.id },
      {
        $set: {
          title: record.title,
          content: record.content,
          category: record.category,
          contentHash: record.contentHash,
          embedding: record.embedding,
          embeddingModel: record.embeddingModel,
          updatedAt: record.updatedAt,
        },
        $setOnInsert: { createdAt: record.createdAt },
      },
      { upsert: true }
    );
  }

  async count(): Promise<number> {
    return this.collection.countDocuments();
  }

  // ==========================================================================
  // Indexes
  // ==========================================================================

  async listIndexes(): Promise<IndexDescriptor[]> {
    let raw: unknown[];
    try {
      raw = await this.collection.listIndexes().toArray();
    } catch (error) {
      // A collection that was never written to has no indexes yet
      if (error instanceof MongoServerError && error.code === NAMESPACE_NOT_FOUND) {
        return [];
      }
      throw error;
    }
    const descriptors: IndexDescriptor[] = [];

    for (const entry of raw) {
      const parsed = IndexInfoSchema.safeParse(entry);
      if (!parsed.success) {
        this.logger.debug?.(`Ignoring unrecognised index entry: ${JSON.stringify(entry)}`);
        continue;
      }
      const info = parsed.data;
      if (info.name === '_id_') {
        continue;
      }

      const keyValues = Object.values(info.key);
      if (keyValues.includes('cosmosSearch')) {
        const options = info.cosmosSearchOptions;
        descriptors.push({
          name: info.name,
          kind: 'vector',
          fields: [],
          dimensions: options?.dimensions,
          similarity: options?.similarity ? SIMILARITY_FROM_COSMOS[options.similarity] : undefined,
        });
      } else if (keyValues.includes('text') || '_fts' in info.key) {
        const paths = info.weights ? Object.keys(info.weights) : Object.keys(info.key);
        descriptors.push({ name: info.name, kind: 'text', fields: this.toFields(paths) });
      } else {
        descriptors.push({ name: info.name, kind: 'keyword', fields: this.toFields(Object.keys(info.key)) });
      }
    }

    return descriptors;
  }

  async createIndex(spec: IndexSpec): Promise<void> {
    switch (spec.kind) {
      case 'text': {
        if (spec.fields.length === 0) {
          throw new ValidationError(`Text index "${spec.name}" needs at least one field`);
        }
        const keys: Record<string, IndexDirection> = {};
        for (const field of spec.fields) {
          keys[fieldPath(field)] = 'text';
        }
        await this.collection.createIndex(keys, { name: spec.name });
        return;
      }
      case 'keyword':
        await this.collection.createIndex({ [fieldPath(spec.field)]: 1 }, { name: spec.name });
        return;
      case 'vector':
        await this.db.command({
          createIndexes: this.collection.collectionName,
          indexes: [
            {
              name: spec.name,
              key: { embedding: 'cosmosSearch' },
              cosmosSearchOptions: cosmosSearchOptions(spec),
            },
          ],
        });
        return;
    }
  }

  isIndexConflict(error: unknown): boolean {
    if (!(error instanceof MongoServerError)) {
      return false;
    }
    return (
      (typeof error.code === 'number' && INDEX_CONFLICT_CODES.has(error.code)) ||
      /already exists|only one text index/i.test(error.message)
    );
  }

  private toFields(paths: string[]): RecordField[] {
    return paths.flatMap((path): RecordField[] => {
      const field = pathToField(path);
      return field ? [field] : [];
    });
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  async vectorSearch(vector: number[], limit: number): Promise<ScoredRecord[]> {
    const cursor = this.collection.aggregate<Document>([
      {
        $search: {
          cosmosSearch: { vector, path: 'embedding', k: limit },
          returnStoredSource: true,
        },
      },
      { $project: { similarityScore: { $meta: 'searchScore' }, document: '$$ROOT' } },
    ]);
    const hits = (await cursor.toArray()).map((doc) => VectorHitSchema.parse(doc));

    const scored = hits.map((hit) => ({ record: toContentRecord(hit.document), score: hit.similarityScore }));
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, limit);
  }

  async textSearch(query: string, limit: number): Promise<ScoredRecord[]> {
    const docs = await this.collection
      .find<Document>(
        { $text: { $search: query } },
        { projection: { title: 1, content: 1, category: 1, score: { $meta: 'textScore' } } }
      )
      .sort({ score: { $meta: 'textScore' } })
      .limit(limit)
      .toArray();

    return docs.map((doc) => {
      const hit = TextHitSchema.parse(doc);
      return { record: toContentRecord(hit), score: hit.score };
    });
  }

  async patternSearch(pattern: string, limit: number): Promise<ContentRecord[]> {
    const regex = { $regex: escapeRegExp(pattern), $options: 'i' };
    return this.findSummaries({ $or: [{ title: regex }, { content: regex }] }, limit);
  }

  async anyTokenSearch(tokens: string[], limit: number): Promise<ContentRecord[]> {
    const needles = [...new Set(tokens.filter((t) => t.length > 0))];
    if (needles.length === 0) {
      return [];
    }

    const clauses: Filter<RecordDocument>[] = needles.flatMap((token) => {
      const regex = { $regex: escapeRegExp(token), $options: 'i' };
      return [{ title: regex }, { content: regex }];
    });
    return this.findSummaries({ $or: clauses }, limit);
  }

  private async findSummaries(filter: Filter<RecordDocument>, limit: number): Promise<ContentRecord[]> {
    const docs = await this.collection
      .find<Document>(filter, { projection: { title: 1, content: 1, category: 1 } })
      .sort({ $natural: 1 })
      .limit(limit)
      .toArray();
    return docs.map((doc) => toContentRecord(SummaryDocumentSchema.parse(doc)));
  }

  async close(): Promise<void> {
    await this.client?.close();
  }
}
