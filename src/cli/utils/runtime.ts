/**
 * Command Runtime Helpers
 *
 * The pieces every data command builds first: config, embedding service
 * and store connection options. Environment values are read here, at the
 * CLI edge, and handed to the library through constructors.
 */

import { loadConfig, loadEnv, type Config } from '../../config/index.js';
import { createEmbeddingService, type EmbeddingService } from '../../embedder/index.js';
import { APIKeyError } from '../../errors/index.js';
import type { OpenBackendOptions } from '../../store/index.js';
import type { CommandContext } from '../types.js';

/**
 * Load config for a command.
 * The default file is created on first run; an explicit --config must exist.
 */
export function loadCommandConfig(ctx: CommandContext): Config {
  const configPath = ctx.options.config;
  const config = loadConfig({ configPath, createIfMissing: configPath === undefined });
  ctx.debug(`Store: ${config.store.backend}, embedding: ${config.embedding.provider}/${config.embedding.model}`);
  return config;
}

export interface CommandEmbedderOptions {
  /**
   * Continue without embeddings when the provider is missing credentials.
   * Search does this (the lexical strategies still work); ingest does not.
   */
  optional?: boolean;
}

/**
 * Create the configured embedding service, or null for provider "none".
 *
 * @throws APIKeyError when credentials are missing and `optional` is not set
 */
export function createCommandEmbedder(
  config: Config,
  ctx: CommandContext,
  options: CommandEmbedderOptions = {}
): EmbeddingService | null {
  try {
    return createEmbeddingService(config.embedding, loadEnv());
  } catch (error) {
    if (options.optional && error instanceof APIKeyError) {
      ctx.warn(`${error.message}; vector search disabled`);
      return null;
    }
    throw error;
  }
}

/**
 * Connection options for openBackend(), with the command context as logger.
 */
export function backendOptions(ctx: CommandContext): OpenBackendOptions {
  return { mongoUri: loadEnv().MONGODB_URI, logger: ctx };
}
