/**
 * Ollama Embedding Provider
 *
 * Requires an Ollama server (default http://localhost:11434) with the model
 * pulled. No API key required.
 */

import { OllamaEmbeddingProvider } from '@contextaisdk/rag';

export const OLLAMA_HOST = 'http://localhost:11434';

export function createOllamaProvider(model: string, host: string = OLLAMA_HOST): OllamaEmbeddingProvider {
  return new OllamaEmbeddingProvider({
    model,
    baseUrl: host.replace(/\/+$/, ''),
    normalize: true,
  });
}

export function ollamaHint(model: string, host: string = OLLAMA_HOST): string {
  return `Make sure Ollama is running at ${host} and the model is pulled. Run: ollama pull ${model}`;
}
