/**
 * Index Manager
 *
 * Makes sure a collection has the indexes querying needs. Safe to run on
 * every start: indexes that already exist (by name, or an equivalent one on
 * backends that allow a single index of a kind) are reported, not recreated.
 */

import { type Logger, silentLogger } from '../utils/index.js';
import { IndexSetupError } from './errors.js';
import type {
  DocumentBackend,
  IndexDescriptor,
  IndexKind,
  IndexSpec,
  RecordField,
  SimilarityMetric,
  VectorAlgorithm,
} from './types.js';

export type IndexStatus = 'created' | 'exists' | 'equivalent';

export interface IndexSetupResult {
  name: string;
  kind: IndexKind;
  status: IndexStatus;
  /** For `equivalent`: the index already covering this kind */
  existingName?: string;
}

export interface EnsureIndexesOptions {
  logger?: Logger;
}

/**
 * Index settings, as found under `[indexes]` in config.toml.
 */
export interface IndexSettings {
  text_name: string;
  text_fields: RecordField[];
  keyword_fields: RecordField[];
  vector_name: string;
  similarity: SimilarityMetric;
  algorithm: 'ivf' | 'hnsw' | 'flat';
  num_lists: number;
  hnsw_m: number;
  hnsw_ef_construction: number;
  hnsw_ef_search: number;
}

/**
 * Create each index in `specs` unless it is already present.
 *
 * Specs are processed in order. An "already exists" error from the backend
 * (as classified by `backend.isIndexConflict`) counts as `exists`.
 *
 * @throws IndexSetupError for any other backend error
 */
export async function ensureIndexes(
  backend: DocumentBackend,
  specs: IndexSpec[],
  options: EnsureIndexesOptions = {}
): Promise<IndexSetupResult[]> {
  const logger = options.logger ?? silentLogger;
  let existing: IndexDescriptor[];
  try {
    existing = await backend.listIndexes();
  } catch (error) {
    throw new IndexSetupError(specs[0]?.name ?? '(all)', error);
  }

  const results: IndexSetupResult[] = [];

  for (const spec of specs) {
    if (existing.some((index) => index.name === spec.name)) {
      logger.debug?.(`Index ${spec.name} already exists`);
      results.push({ name: spec.name, kind: spec.kind, status: 'exists' });
      continue;
    }

    const sameKind = existing.find((index) => index.kind === spec.kind);
    if (sameKind && backend.singletonIndexKinds.has(spec.kind)) {
      logger.debug?.(`A ${spec.kind} index already exists as ${sameKind.name}; not creating ${spec.name}`);
      results.push({ name: spec.name, kind: spec.kind, status: 'equivalent', existingName: sameKind.name });
      continue;
    }

    try {
      await backend.createIndex(spec);
    } catch (error) {
      if (backend.isIndexConflict(error)) {
        logger.debug?.(`Index ${spec.name} reported as already existing`);
        results.push({ name: spec.name, kind: spec.kind, status: 'exists' });
        continue;
      }
      throw new IndexSetupError(spec.name, error);
    }

    logger.info?.(`Created ${spec.kind} index ${spec.name}`);
    results.push({ name: spec.name, kind: spec.kind, status: 'created' });
    existing = [...existing, { name: spec.name, kind: spec.kind, fields: [] }];
  }

  return results;
}

function vectorAlgorithm(settings: IndexSettings): VectorAlgorithm {
  switch (settings.algorithm) {
    case 'ivf':
      return { type: 'ivf', numLists: settings.num_lists };
    case 'hnsw':
      return {
        type: 'hnsw',
        m: settings.hnsw_m,
        efConstruction: settings.hnsw_ef_construction,
        efSearch: settings.hnsw_ef_search,
      };
    case 'flat':
      return { type: 'flat' };
  }
}

/**
 * The text, keyword and vector indexes described by configuration.
 *
 * Keyword index names are derived as `<field>_idx`. The vector index is
 * sized to the embedding model and omitted when there is none.
 */
export function defaultIndexSpecs(settings: IndexSettings, vectorDimensions?: number): IndexSpec[] {
  const specs: IndexSpec[] = [];

  if (settings.text_fields.length > 0) {
    specs.push({ kind: 'text', name: settings.text_name, fields: settings.text_fields });
  }

  for (const field of settings.keyword_fields) {
    specs.push({ kind: 'keyword', name: `${field}_idx`, field });
  }

  if (vectorDimensions !== undefined) {
    specs.push({
      kind: 'vector',
      name: settings.vector_name,
      dimensions: vectorDimensions,
      similarity: settings.similarity,
      algorithm: vectorAlgorithm(settings),
    });
  }

  return specs;
}
