/**
 * Backend Factory
 *
 * Opens the configured document backend. `withBackend` is the scoped form:
 * the connection is closed on every exit path, including thrown errors.
 *
 * @example
 * ```typescript
 * const count = await withBackend(config.store, { mongoUri }, (backend) => backend.count());
 * ```
 */

import * as os from 'node:os';
import * as path from 'node:path';

import type { StoreConfig } from '../config/index.js';
import { ConfigError, DatabaseError, toError } from '../errors/index.js';
import { type Logger, silentLogger } from '../utils/index.js';
import { MongoBackend } from './mongo-backend.js';
import { SqliteBackend } from './sqlite-backend.js';
import type { DocumentBackend } from './types.js';

export interface OpenBackendOptions {
  /** Connection string for the mongodb backend (from MONGODB_URI) */
  mongoUri?: string;
  logger?: Logger;
}

/** Expand a leading `~/` to the home directory */
export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return os.homedir();
  }
  return filePath.startsWith('~/') ? path.join(os.homedir(), filePath.slice(2)) : filePath;
}

/**
 * Open the backend named by `config.backend`.
 *
 * @throws ConfigError if the mongodb backend has no connection string
 * @throws DatabaseError if the connection cannot be established
 */
export async function openBackend(config: StoreConfig, options: OpenBackendOptions = {}): Promise<DocumentBackend> {
  const logger = options.logger ?? silentLogger;

  switch (config.backend) {
    case 'sqlite': {
      const dbPath = expandHome(config.sqlite_path);
      try {
        return SqliteBackend.open(dbPath, { logger });
      } catch (error) {
        if (error instanceof DatabaseError) {
          throw error;
        }
        throw new DatabaseError(`Failed to open SQLite store at ${dbPath}`, toError(error));
      }
    }
    case 'mongodb': {
      const uri = options.mongoUri?.trim();
      if (!uri) {
        throw new ConfigError(
          'store.backend is "mongodb" but no connection string is configured',
          'Set the MONGODB_URI environment variable (or add it to .env)'
        );
      }
      try {
        return await MongoBackend.connect({
          uri,
          database: config.mongo_database,
          collection: config.mongo_collection,
          logger,
        });
      } catch (error) {
        // Never echo the URI: it usually carries credentials
        throw new DatabaseError(
          `Failed to connect to MongoDB database "${config.mongo_database}"`,
          toError(error)
        );
      }
    }
  }
}

/**
 * Run `fn` with an open backend and close it afterwards.
 */
export async function withBackend<T>(
  config: StoreConfig,
  options: OpenBackendOptions,
  fn: (backend: DocumentBackend) => Promise<T>
): Promise<T> {
  const backend = await openBackend(config, options);
  try {
    return await fn(backend);
  } finally {
    await backend.close();
  }
}
