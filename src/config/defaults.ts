/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import { DB_PATH } from './paths.js';
import type { Config } from './schema.js';

/**
 * Default configuration
 * Local SQLite store, OpenAI-compatible embeddings
 */
export const DEFAULT_CONFIG: Config = {
  store: {
    backend: 'sqlite',
    sqlite_path: DB_PATH,
    mongo_database: 'ragline',
    mongo_collection: 'records',
  },

  // text-embedding-3-small produces 1536-dimensional vectors
  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small',
    dimensions: 1536,
    timeout_ms: 30000,
    cache: true,
  },

  indexes: {
    text_name: 'records_fts',
    text_fields: ['title', 'content'],
    keyword_fields: ['category'],
    vector_name: 'records_vector',
    similarity: 'cosine',
    algorithm: 'ivf',
    num_lists: 100,
    hnsw_m: 16,
    hnsw_ef_construction: 64,
    hnsw_ef_search: 40,
  },

  search: {
    limit: 5,
  },

  ingest: {
    concurrency: 1,
    ensure_indexes: true,
  },

  routing: {
    default_agent: 'triage',
    rules: [
      { agent: 'billing', keywords: ['billing', 'charge', 'payment', 'fee', 'bill', 'invoice', 'subscription'] },
      { agent: 'refund', keywords: ['refund', 'return', 'money back', 'reimburse', 'cancel'] },
    ],
  },
};

function tomlList(values: readonly string[]): string {
  return `[${values.map((v) => `"${v}"`).join(', ')}]`;
}

const routeRulesToml = DEFAULT_CONFIG.routing.rules
  .map((rule) => `[[routing.rules]]\nagent = "${rule.agent}"\nkeywords = ${tomlList(rule.keywords)}`)
  .join('\n\n');

/**
 * Config file template (TOML format)
 * Written to ~/.ragline/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# ragline Configuration
# Location: ~/.ragline/config.toml

# Document Store
# backend = "mongodb" reads the connection string from MONGODB_URI
[store]
backend = "${DEFAULT_CONFIG.store.backend}"
sqlite_path = '${DEFAULT_CONFIG.store.sqlite_path}'
mongo_database = "${DEFAULT_CONFIG.store.mongo_database}"
mongo_collection = "${DEFAULT_CONFIG.store.mongo_collection}"

# Embedding Settings
# provider: "openai" (OPENAI_API_KEY; set base_url for Azure OpenAI or other
# compatible endpoints), "ollama" (local), or "none" (no vector search)
# IMPORTANT: dimensions must match the model, and the vector index
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
dimensions = ${DEFAULT_CONFIG.embedding.dimensions}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}
cache = ${DEFAULT_CONFIG.embedding.cache}
# base_url = "https://my-resource.openai.azure.com/openai/deployments/my-embeddings"

# Index Settings
# algorithm: "ivf" (num_lists), "hnsw" (hnsw_*), or "flat"
[indexes]
text_name = "${DEFAULT_CONFIG.indexes.text_name}"
text_fields = ${tomlList(DEFAULT_CONFIG.indexes.text_fields)}
keyword_fields = ${tomlList(DEFAULT_CONFIG.indexes.keyword_fields)}
vector_name = "${DEFAULT_CONFIG.indexes.vector_name}"
similarity = "${DEFAULT_CONFIG.indexes.similarity}"
algorithm = "${DEFAULT_CONFIG.indexes.algorithm}"
num_lists = ${DEFAULT_CONFIG.indexes.num_lists}
hnsw_m = ${DEFAULT_CONFIG.indexes.hnsw_m}
hnsw_ef_construction = ${DEFAULT_CONFIG.indexes.hnsw_ef_construction}
hnsw_ef_search = ${DEFAULT_CONFIG.indexes.hnsw_ef_search}

# Search Settings
[search]
limit = ${DEFAULT_CONFIG.search.limit}

# Ingestion Settings
[ingest]
concurrency = ${DEFAULT_CONFIG.ingest.concurrency}
ensure_indexes = ${DEFAULT_CONFIG.ingest.ensure_indexes}

# Agent Routing
# Rules are tried in order; a turn containing any keyword goes to that agent
[routing]
default_agent = "${DEFAULT_CONFIG.routing.default_agent}"

${routeRulesToml}
`;
