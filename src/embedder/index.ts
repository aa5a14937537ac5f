/**
 * Embedder Module
 *
 * Text-to-vector services used by ingestion and vector search.
 */

export type { EmbeddingService } from './types.js';
export { EmbeddingError, EmbeddingTimeoutError } from './errors.js';
export { ProviderEmbeddingService, assertDimensions, type ProviderEmbeddingOptions } from './service.js';
export { createOllamaProvider, OLLAMA_HOST } from './ollama.js';
export {
  OpenAIEmbeddingProvider,
  createOpenAIClient,
  isAzureEndpoint,
  OPENAI_BASE_URL,
  AZURE_API_VERSION,
  type EmbeddingsClient,
  type OpenAIEmbeddingOptions,
} from './openai.js';
export { TimeoutEmbeddingService } from './timeout.js';
export { createEmbeddingService, type EmbeddingEnv } from './factory.js';
