/**
 * Configuration Schema
 *
 * Defines the shape of ~/.ragline/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/** Record fields an index may target */
export const RecordFieldSchema = z.enum(['id', 'title', 'content', 'category']);

/**
 * Document store configuration
 */
export const StoreConfigSchema = z.object({
  backend: z.enum(['sqlite', 'mongodb']).describe('Document store backend'),
  sqlite_path: z.string().min(1).describe('SQLite database file (":memory:" for a throwaway store)'),
  mongo_database: z.string().min(1).describe('MongoDB / Cosmos DB database name'),
  mongo_collection: z.string().min(1).describe('MongoDB / Cosmos DB collection name'),
});

/**
 * Embedding provider configuration
 * `none` stores records without embeddings; vector search is then skipped.
 */
export const EmbeddingConfigSchema = z.object({
  provider: z.enum(['openai', 'ollama', 'none']).describe('Embedding provider'),
  model: z.string().min(1).describe('Embedding model name'),
  dimensions: z.number().int().min(1).max(8192).describe('Vector length the model produces'),
  base_url: z
    .string()
    .url()
    .optional()
    .describe('API base URL (OpenAI-compatible / Azure OpenAI endpoint, or Ollama host)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout in milliseconds for one embedding call (1000-600000)'),
  cache: z.boolean().describe('Reuse embeddings of repeated texts within one process'),
});

/**
 * Index configuration
 * Used by `ragline indexes` and before ingestion.
 */
export const IndexesConfigSchema = z.object({
  text_name: z.string().min(1),
  text_fields: z.array(RecordFieldSchema),
  keyword_fields: z.array(RecordFieldSchema),
  vector_name: z.string().min(1),
  similarity: z.enum(['cosine', 'euclidean', 'dot']),
  algorithm: z.enum(['ivf', 'hnsw', 'flat']).describe('Approximate nearest-neighbour algorithm'),
  num_lists: z.number().int().min(1).describe('IVF cluster count'),
  hnsw_m: z.number().int().min(2).max(100).describe('HNSW links per node'),
  hnsw_ef_construction: z.number().int().min(4).max(1000).describe('HNSW build beam width'),
  hnsw_ef_search: z.number().int().min(1).max(1000).describe('HNSW query beam width'),
});

/**
 * Search configuration
 */
export const SearchConfigSchema = z.object({
  limit: z.number().int().min(1).max(100).describe('Default number of results to return'),
});

/**
 * Ingestion configuration
 */
export const IngestConfigSchema = z.object({
  concurrency: z.number().int().min(1).max(32).describe('Records processed in parallel'),
  ensure_indexes: z.boolean().describe('Create configured indexes before ingesting'),
});

/**
 * One routing rule: turns containing any keyword go to `agent`
 */
export const RouteRuleSchema = z.object({
  agent: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
});

/**
 * Agent routing configuration
 * Rules are tried in order; the first match wins.
 */
export const RoutingConfigSchema = z.object({
  default_agent: z.string().min(1),
  rules: z.array(RouteRuleSchema),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  store: StoreConfigSchema,
  embedding: EmbeddingConfigSchema,
  indexes: IndexesConfigSchema,
  search: SearchConfigSchema,
  ingest: IngestConfigSchema,
  routing: RoutingConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type IndexesConfig = z.infer<typeof IndexesConfigSchema>;
export type RoutingConfig = z.infer<typeof RoutingConfigSchema>;
export type RouteRuleConfig = z.infer<typeof RouteRuleSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
