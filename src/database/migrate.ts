/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied.
 * Migrations are idempotent - safe to run multiple times.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { validateRows } from './validation.js';

// ============================================================================
// Migration State Tracking
// ============================================================================

/**
 * Connections whose migrations have already been checked this process.
 *
 * Keyed by connection rather than held in a single flag because tests and
 * the CLI may open several databases (files and :memory:) side by side.
 */
const initializedConnections = new WeakSet<Database.Database>();

/**
 * Result of running migrations.
 *
 * Explicit success/failure information instead of throwing.
 */
export interface MigrationResult {
  /** Names of migrations that were successfully applied */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// ============================================================================
// Embedded Migrations
// ============================================================================

// SQL is embedded as strings so the compiled output has no file-system dependency
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-records.sql',
    sql: `
-- Migration 001: Content records
-- One row per external record id; rowid gives the natural insertion order
CREATE TABLE IF NOT EXISTS records (
  id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  content TEXT NOT NULL,
  category TEXT NOT NULL DEFAULT '',
  content_hash TEXT NOT NULL,
  embedding BLOB,
  embedding_model TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
    `.trim(),
  },
  {
    name: '002-search-indexes.sql',
    sql: `
-- Migration 002: Search index registry
-- Describes the full-text (FTS5) and vector indexes created by ensureIndexes.
-- Keyword indexes are plain SQLite indexes and are read from sqlite_master.
CREATE TABLE IF NOT EXISTS search_indexes (
  name TEXT PRIMARY KEY,
  kind TEXT NOT NULL CHECK (kind IN ('text', 'vector')),
  fields TEXT NOT NULL DEFAULT '[]',
  dimensions INTEGER,
  similarity TEXT,
  algorithm TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);
    `.trim(),
  },
];

const MigrationNameRowSchema = z.object({ name: z.string() });

/**
 * Run all pending migrations against a connection.
 *
 * Failed migrations do not stop subsequent migrations from being attempted.
 *
 * @example
 * ```ts
 * const result = runMigrations(db);
 * for (const { name, error } of result.failed) {
 *   console.error(`  - ${name}: ${error}`);
 * }
 * ```
 */
export function runMigrations(db: Database.Database): MigrationResult {
  // Fast path: already checked for this connection
  if (initializedConnections.has(db)) {
    return { applied: [], failed: [] };
  }

  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  // Ensure migrations table exists (bootstrap)
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const appliedMigrations = new Set<string>(
    validateRows(
      MigrationNameRowSchema,
      db.prepare('SELECT name FROM _migrations').all(),
      '_migrations'
    ).map((row) => row.name)
  );

  for (const migration of MIGRATIONS) {
    if (appliedMigrations.has(migration.name)) {
      continue;
    }

    try {
      // Run migration in transaction for atomicity
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();

      applied.push(migration.name);
      appliedMigrations.add(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // Only remember the connection if no failures, so the next call retries
  if (failed.length === 0) {
    initializedConnections.add(db);
  }

  return { applied, failed };
}

/**
 * Get the names of applied migrations, oldest first.
 */
export function getAppliedMigrations(db: Database.Database): string[] {
  const tableExists = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();

  if (!tableExists) {
    return [];
  }

  return validateRows(
    MigrationNameRowSchema,
    db.prepare('SELECT name FROM _migrations ORDER BY id').all(),
    '_migrations'
  ).map((row) => row.name);
}

/**
 * Get count of available migrations.
 */
export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
