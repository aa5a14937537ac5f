/**
 * Embedding Service Types
 */

/**
 * Turns text into a fixed-length vector.
 *
 * `ProviderEmbeddingService` adapts any `@contextaisdk/rag` EmbeddingProvider
 * to this interface; `TimeoutEmbeddingService` bounds each call.
 */
export interface EmbeddingService {
  /** Model name recorded next to each stored embedding */
  readonly model: string;
  /** Vector length the model produces */
  readonly dimensions: number;
  /**
   * Embed one text.
   *
   * @throws EmbeddingError on transport, API or shape failures
   */
  embed(text: string): Promise<number[]>;
}
