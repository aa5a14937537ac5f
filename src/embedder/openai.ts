/**
 * OpenAI-Compatible Embedding Provider
 *
 * Implements the `@contextaisdk/rag` EmbeddingProvider contract on the
 * official `openai` client, so the SDK's caching wrapper applies to it like
 * any other provider. Azure OpenAI resources (`*.openai.azure.com`,
 * `*.cognitiveservices.azure.com`) are detected from the base URL and get an
 * `AzureOpenAI` client.
 *
 * SECURITY: the key is handed to the client only and never logged.
 */

import OpenAI, { AzureOpenAI } from 'openai';
import type { EmbeddingProvider, EmbeddingResult } from '@contextaisdk/rag';

import { APIKeyError } from '../errors/index.js';

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';
export const AZURE_API_VERSION = '2024-02-01';

/** The slice of the `openai` client this provider calls */
export interface EmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string[] }): PromiseLike<{
      data: Array<{ embedding: number[]; index: number }>;
      usage?: { prompt_tokens: number };
    }>;
  };
}

export interface OpenAIEmbeddingOptions {
  model: string;
  dimensions: number;
  apiKey: string | undefined;
  /** @default 'https://api.openai.com/v1' */
  baseUrl?: string;
  /** Azure `api-version` */
  apiVersion?: string;
  /** Preconfigured client (tests) */
  client?: EmbeddingsClient;
}

const AZURE_HOST_PATTERN = /\.(openai|cognitiveservices)\.azure\.com$/i;

/** Whether a base URL points at an Azure OpenAI resource */
export function isAzureEndpoint(baseUrl: string): boolean {
  return AZURE_HOST_PATTERN.test(new URL(baseUrl).hostname);
}

/**
 * Build the client for a base URL.
 *
 * Azure base URLs should include the deployment path, e.g.
 * `https://my-resource.openai.azure.com/openai/deployments/my-embeddings`.
 */
export function createOpenAIClient(apiKey: string, baseUrl: string = OPENAI_BASE_URL, apiVersion = AZURE_API_VERSION): OpenAI {
  const baseURL = baseUrl.replace(/\/+$/, '');
  return isAzureEndpoint(baseURL)
    ? new AzureOpenAI({ apiKey, baseURL, apiVersion })
    : new OpenAI({ apiKey, baseURL });
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'OpenAI';
  readonly maxBatchSize = 2048;
  readonly dimensions: number;
  readonly baseUrl: string;
  private readonly model: string;
  private readonly client: EmbeddingsClient;

  /**
   * @throws APIKeyError if no key is configured
   */
  constructor(options: OpenAIEmbeddingOptions) {
    const apiKey = options.apiKey?.trim();
    if (!apiKey) {
      throw new APIKeyError('OpenAI', 'OPENAI_API_KEY');
    }
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.baseUrl = options.baseUrl ?? OPENAI_BASE_URL;
    this.client = options.client ?? createOpenAIClient(apiKey, this.baseUrl, options.apiVersion);
  }

  async embed(text: string): Promise<EmbeddingResult> {
    const [result] = await this.embedBatch([text]);
    return result ?? { embedding: [], tokenCount: 0, model: this.model };
  }

  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.client.embeddings.create({ model: this.model, input: texts });
    const tokensEach = Math.ceil((response.usage?.prompt_tokens ?? 0) / texts.length);

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => ({ embedding: item.embedding, tokenCount: tokensEach, model: this.model }));
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}
