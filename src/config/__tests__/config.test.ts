/**
 * Config Module Tests
 *
 * Tests the configuration loading, validation, and merging logic.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ConfigSchema, PartialConfigSchema } from '../schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from '../defaults.js';
import { loadConfig, getConfigValue, listConfig, deepMerge } from '../loader.js';
import { ConfigError } from '../../errors/index.js';

describe('Config Schema', () => {
  it('validates the default config', () => {
    expect(ConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('rejects an unknown store backend', () => {
    const invalid = { ...DEFAULT_CONFIG, store: { ...DEFAULT_CONFIG.store, backend: 'postgres' } };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('rejects search.limit outside valid range', () => {
    const invalid = { ...DEFAULT_CONFIG, search: { limit: 200 } };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('rejects a routing rule without keywords', () => {
    const invalid = {
      ...DEFAULT_CONFIG,
      routing: { default_agent: 'triage', rules: [{ agent: 'billing', keywords: [] }] },
    };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('allows deeply partial config with PartialConfigSchema', () => {
    expect(PartialConfigSchema.safeParse({ embedding: { model: 'nomic-embed-text' } }).success).toBe(true);
  });
});

describe('deepMerge', () => {
  it('merges nested objects with source values winning', () => {
    expect(deepMerge({ a: { x: 1, y: 2 }, b: 1 }, { a: { y: 3 } })).toEqual({ a: { x: 1, y: 3 }, b: 1 });
  });

  it('replaces arrays instead of concatenating', () => {
    expect(deepMerge({ list: [1, 2] }, { list: [3] })).toEqual({ list: [3] });
  });

  it('ignores undefined source values', () => {
    expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
  });
});

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ragline-config-'));
    configPath = path.join(dir, 'config.toml');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the template and returns defaults when asked to create the file', () => {
    const nested = path.join(dir, 'nested', 'config.toml');

    const config = loadConfig({ configPath: nested, createIfMissing: true });

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(fs.readFileSync(nested, 'utf-8')).toBe(CONFIG_TEMPLATE);
  });

  it('reads back the written template as the defaults', () => {
    fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    expect(loadConfig({ configPath })).toEqual(DEFAULT_CONFIG);
  });

  it('throws ConfigError for an explicit path that does not exist', () => {
    expect(() => loadConfig({ configPath })).toThrow(ConfigError);
    expect(() => loadConfig({ configPath })).toThrow(`Config file not found: ${configPath}`);
  });

  it('merges user overrides on top of defaults', () => {
    fs.writeFileSync(
      configPath,
      ['[embedding]', 'provider = "ollama"', 'model = "nomic-embed-text"', 'dimensions = 768', '', '[search]', 'limit = 10'].join(
        '\n'
      )
    );

    const config = loadConfig({ configPath });

    expect(config.embedding).toEqual({ ...DEFAULT_CONFIG.embedding, provider: 'ollama', model: 'nomic-embed-text', dimensions: 768 });
    expect(config.search.limit).toBe(10);
    expect(config.store).toEqual(DEFAULT_CONFIG.store);
  });

  it('replaces the routing rules list', () => {
    fs.writeFileSync(
      configPath,
      ['[routing]', 'default_agent = "general"', '', '[[routing.rules]]', 'agent = "tech"', 'keywords = ["error", "crash"]'].join('\n')
    );

    expect(loadConfig({ configPath }).routing).toEqual({
      default_agent: 'general',
      rules: [{ agent: 'tech', keywords: ['error', 'crash'] }],
    });
  });

  it('throws ConfigError for invalid TOML', () => {
    fs.writeFileSync(configPath, '[store\nbackend = ');

    expect(() => loadConfig({ configPath })).toThrow(/^Invalid TOML in config file: /);
  });

  it('reports schema issues with their dotted path', () => {
    fs.writeFileSync(configPath, '[search]\nlimit = 0\n');

    expect(() => loadConfig({ configPath })).toThrow(
      `Invalid configuration in ${configPath}:\n  - search.limit: Number must be greater than or equal to 1`
    );
  });
});

describe('getConfigValue', () => {
  it('reads dotted paths', () => {
    expect(getConfigValue(DEFAULT_CONFIG, 'embedding.model')).toBe('text-embedding-3-small');
    expect(getConfigValue(DEFAULT_CONFIG, 'indexes.text_fields')).toEqual(['title', 'content']);
  });

  it('returns undefined for unknown keys', () => {
    expect(getConfigValue(DEFAULT_CONFIG, 'embedding.nope')).toBeUndefined();
    expect(getConfigValue(DEFAULT_CONFIG, 'search.limit.deeper')).toBeUndefined();
  });
});

describe('listConfig', () => {
  it('flattens the config into dotted entries', () => {
    const entries = new Map(listConfig(DEFAULT_CONFIG));

    expect(entries.get('store.backend')).toBe('sqlite');
    expect(entries.get('search.limit')).toBe(5);
    expect(entries.get('routing.default_agent')).toBe('triage');
    expect(entries.get('routing.rules')).toEqual(DEFAULT_CONFIG.routing.rules);
  });
});
