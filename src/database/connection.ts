/**
 * Database Connection Module
 *
 * Opens SQLite connections with better-sqlite3. The path comes from the
 * [store] section of config.toml; there is no process-wide singleton, the
 * caller owns the handle and closes it (see store/factory.ts).
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

/** Path that selects a private in-memory database */
export const IN_MEMORY_PATH = ':memory:';

/**
 * Open a database connection with the settings the store relies on.
 *
 * Creates the parent directory on first use.
 *
 * @example
 * ```ts
 * const db = openDatabase('/home/me/.ragline/ragline.db');
 * const count = db.prepare('SELECT COUNT(*) AS count FROM records').get();
 * db.close();
 * ```
 */
export function openDatabase(path: string): Database.Database {
  if (path !== IN_MEMORY_PATH) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(path);

  // Enable foreign keys (OFF by default in SQLite!)
  db.pragma('foreign_keys = ON');

  // WAL mode gives concurrent readers while an ingestion batch writes
  if (path !== IN_MEMORY_PATH) {
    db.pragma('journal_mode = WAL');
  }

  return db;
}
