/**
 * Provider Adapter
 *
 * Exposes a `@contextaisdk/rag` EmbeddingProvider as an EmbeddingService:
 * checks the vector length against the configured dimensions and turns
 * provider failures into EmbeddingError.
 */

import type { EmbeddingProvider, EmbeddingResult } from '@contextaisdk/rag';

import { toError } from '../errors/index.js';
import { EmbeddingError } from './errors.js';
import type { EmbeddingService } from './types.js';

export interface ProviderEmbeddingOptions {
  model: string;
  dimensions: number;
  /** Provider name used in error messages, e.g. "Ollama" */
  label: string;
  /** Hint attached to request failures */
  hint?: string;
}

/**
 * Check a returned vector against the configured dimensions.
 */
export function assertDimensions(vector: number[], dimensions: number, model: string): number[] {
  if (vector.length !== dimensions) {
    throw new EmbeddingError(
      `Model ${model} returned ${vector.length} dimensions, expected ${dimensions}`,
      'Set embedding.dimensions in config.toml to match the model'
    );
  }
  return vector;
}

export class ProviderEmbeddingService implements EmbeddingService {
  readonly model: string;
  readonly dimensions: number;
  private readonly label: string;
  private readonly hint: string | undefined;

  constructor(
    private readonly provider: EmbeddingProvider,
    options: ProviderEmbeddingOptions
  ) {
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.label = options.label;
    this.hint = options.hint;
  }

  async embed(text: string): Promise<number[]> {
    let result: EmbeddingResult;
    try {
      result = await this.provider.embed(text);
    } catch (error) {
      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new EmbeddingError(
        `${this.label} embedding request failed: ${toError(error).message}`,
        this.hint,
        error
      );
    }

    if (result.embedding.length === 0) {
      throw new EmbeddingError(`${this.label} returned no embedding for model ${this.model}`, this.hint);
    }
    return assertDimensions(result.embedding, this.dimensions, this.model);
  }
}
