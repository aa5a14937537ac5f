/**
 * Embedding Service Factory
 *
 * Creates the configured `@contextaisdk/rag` provider, wraps it with the
 * SDK's CachedEmbeddingProvider, and adapts it to EmbeddingService with a
 * per-call timeout.
 */

import { CachedEmbeddingProvider, type EmbeddingProvider } from '@contextaisdk/rag';

import type { EmbeddingConfig, EnvVars } from '../config/index.js';
import { createOllamaProvider, ollamaHint } from './ollama.js';
import { OpenAIEmbeddingProvider } from './openai.js';
import { ProviderEmbeddingService } from './service.js';
import { TimeoutEmbeddingService } from './timeout.js';
import type { EmbeddingService } from './types.js';

/** Environment values the providers need */
export type EmbeddingEnv = Pick<EnvVars, 'OPENAI_API_KEY' | 'OPENAI_BASE_URL' | 'OLLAMA_HOST'>;

interface ProviderSetup {
  provider: EmbeddingProvider;
  label: string;
  hint: string;
}

function createProvider(config: EmbeddingConfig, env: EmbeddingEnv): ProviderSetup | null {
  switch (config.provider) {
    case 'none':
      return null;
    case 'ollama': {
      const host = config.base_url ?? env.OLLAMA_HOST;
      return {
        provider: createOllamaProvider(config.model, host),
        label: 'Ollama',
        hint: ollamaHint(config.model, host),
      };
    }
    case 'openai': {
      const provider = new OpenAIEmbeddingProvider({
        model: config.model,
        dimensions: config.dimensions,
        apiKey: env.OPENAI_API_KEY,
        baseUrl: config.base_url ?? env.OPENAI_BASE_URL,
      });
      return {
        provider,
        label: 'OpenAI',
        hint: `Check OPENAI_API_KEY and that ${provider.baseUrl} is reachable`,
      };
    }
  }
}

/**
 * Create an embedding service from configuration.
 *
 * Returns null for `provider = "none"`: records are stored without
 * embeddings and vector search is skipped.
 *
 * @throws APIKeyError if the OpenAI provider has no key
 */
export function createEmbeddingService(config: EmbeddingConfig, env: EmbeddingEnv): EmbeddingService | null {
  const setup = createProvider(config, env);
  if (!setup) {
    return null;
  }

  // CachedEmbeddingProvider deduplicates identical text inputs
  const provider = config.cache ? new CachedEmbeddingProvider({ provider: setup.provider }) : setup.provider;

  const service = new ProviderEmbeddingService(provider, {
    model: config.model,
    dimensions: config.dimensions,
    label: setup.label,
    hint: setup.hint,
  });
  return new TimeoutEmbeddingService(service, config.timeout_ms);
}
