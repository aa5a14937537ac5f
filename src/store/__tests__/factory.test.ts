/**
 * Backend Factory Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'node:fs';
import { tmpdir, homedir } from 'node:os';
import { join } from 'node:path';
import { openBackend, withBackend, expandHome } from '../factory.js';
import { ConfigError } from '../../errors/index.js';
import type { StoreConfig } from '../../config/index.js';
import type { DocumentBackend } from '../types.js';

describe('expandHome', () => {
  it('expands a leading ~/', () => {
    expect(expandHome('~/data/ragline.db')).toBe(join(homedir(), 'data/ragline.db'));
    expect(expandHome('~')).toBe(homedir());
  });

  it('leaves other paths alone', () => {
    expect(expandHome('/var/lib/ragline.db')).toBe('/var/lib/ragline.db');
    expect(expandHome('data/~/x.db')).toBe('data/~/x.db');
  });
});

describe('openBackend', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ragline-factory-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function sqliteConfig(path: string): StoreConfig {
    return { backend: 'sqlite', sqlite_path: path, mongo_database: 'ragline', mongo_collection: 'records' };
  }

  it('opens a SQLite store, creating the directory', async () => {
    const dbPath = join(dir, 'nested', 'ragline.db');

    const backend = await openBackend(sqliteConfig(dbPath));
    try {
      expect(backend.kind).toBe('sqlite');
      expect(await backend.count()).toBe(0);
      expect(existsSync(dbPath)).toBe(true);
    } finally {
      await backend.close();
    }
  });

  it('requires a connection string for mongodb', async () => {
    const config: StoreConfig = { ...sqliteConfig(''), backend: 'mongodb' };

    await expect(openBackend(config, { mongoUri: '  ' })).rejects.toBeInstanceOf(ConfigError);
    await expect(openBackend(config)).rejects.toThrow('store.backend is "mongodb" but no connection string is configured');
  });

  it('withBackend closes the store after the callback', async () => {
    const dbPath = join(dir, 'ragline.db');

    const count = await withBackend(sqliteConfig(dbPath), {}, async (backend) => {
      await backend.upsert({
        id: 'doc-1',
        title: 'T',
        content: 'C',
        category: '',
        contentHash: 'h',
        embedding: null,
        embeddingModel: null,
        createdAt: '2024-01-01T00:00:00.000Z',
        updatedAt: '2024-01-01T00:00:00.000Z',
      });
      return backend.count();
    });

    expect(count).toBe(1);

    // Data persisted and the file can be reopened
    const reopened = await openBackend(sqliteConfig(dbPath));
    try {
      expect(await reopened.count()).toBe(1);
    } finally {
      await reopened.close();
    }
  });

  it('withBackend closes the store when the callback throws', async () => {
    const dbPath = join(dir, 'ragline.db');
    const opened: DocumentBackend[] = [];

    await expect(
      withBackend(sqliteConfig(dbPath), {}, async (backend) => {
        opened.push(backend);
        throw new Error('callback failed');
      })
    ).rejects.toThrow('callback failed');

    expect(opened).toHaveLength(1);
    // better-sqlite3 refuses queries on a closed connection
    await expect(opened[0]?.count()).rejects.toThrow();
  });
});
