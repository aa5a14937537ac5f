/**
 * Command Tests
 *
 * Runs the commands end to end against a throwaway SQLite store configured
 * through a temp config.toml (embedding provider "none", so nothing leaves
 * the process).
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import chalk from 'chalk';
import type { Command } from 'commander';
import { createIngestCommand } from '../ingest.js';
import { createSearchCommand } from '../search.js';
import { createStatusCommand } from '../status.js';
import { createIndexesCommand } from '../indexes.js';
import { createRouteCommand } from '../route.js';
import { createConfigCommand, formatValue } from '../config.js';
import type { CommandContext, GlobalOptions } from '../../types.js';

const RECORDS = [
  { id: 'r1', title: 'Refund policy', content: 'Refunds are issued within 30 days', category: 'refund' },
  { id: 'r2', title: 'Billing cycle', content: 'You are charged monthly', category: 'billing' },
  { id: 'r3', title: 'Shipping', content: 'Orders ship in two days', category: 'shipping' },
  { id: 'r4', title: 'Broken' },
];

describe('commands', () => {
  let dir: string;
  let recordsFile: string;
  let options: GlobalOptions;
  let logs: string[];
  let warnings: string[];
  let errors: string[];
  let consoleLog: string[];
  let consoleWarn: string[];

  const getContext = (): CommandContext => ({
    options,
    log: (message) => logs.push(message),
    debug: () => {},
    warn: (message) => warnings.push(message),
    error: (message) => errors.push(message),
  });

  async function run(command: Command, args: string[]): Promise<void> {
    await command.parseAsync(args, { from: 'user' });
  }

  function lastJson(): unknown {
    const last = consoleLog.at(-1);
    if (last === undefined) {
      throw new Error('nothing was printed');
    }
    return JSON.parse(last);
  }

  beforeEach(() => {
    chalk.level = 0;
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ragline-cli-'));
    const configPath = path.join(dir, 'config.toml');
    fs.writeFileSync(
      configPath,
      [`[store]`, `sqlite_path = '${path.join(dir, 'store.db')}'`, '', '[embedding]', 'provider = "none"'].join('\n')
    );
    recordsFile = path.join(dir, 'records.jsonl');
    fs.writeFileSync(recordsFile, RECORDS.map((r) => JSON.stringify(r)).join('\n'));

    options = { verbose: false, json: false, config: configPath };
    logs = [];
    warnings = [];
    errors = [];
    consoleLog = [];
    consoleWarn = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      consoleLog.push(args.map(String).join(' '));
    });
    vi.spyOn(console, 'warn').mockImplementation((...args: unknown[]) => {
      consoleWarn.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('ingest', () => {
    it('ingests valid records and warns about invalid ones', async () => {
      await run(createIngestCommand(getContext), [recordsFile]);

      expect(consoleWarn).toContain('Warning: Skipping invalid entry #3: content: Required');
      expect(consoleLog).toContain('Ingestion Complete');
      expect(consoleLog).toContain('  Inserted:      3');
      expect(consoleLog).toContain('  Failed:        0');
      expect(process.exitCode).toBeUndefined();
    });

    it('skips records on a second run', async () => {
      await run(createIngestCommand(getContext), [recordsFile]);
      consoleLog = [];

      await run(createIngestCommand(getContext), [recordsFile]);

      expect(consoleLog).toContain('  Inserted:      0');
      expect(consoleLog).toContain('  Skipped:       3');
    });

    it('emits NDJSON events in JSON mode', async () => {
      options.json = true;

      await run(createIngestCommand(getContext), [recordsFile]);

      const events = consoleLog.map((line) => JSON.parse(line) as { type: string; data: Record<string, unknown> });
      expect(events[0]?.type).toBe('warning');
      expect(events[1]?.type).toBe('start');
      expect(events.at(-2)).toMatchObject({ type: 'progress', data: { processed: 3, total: 3 } });
      expect(events.at(-1)?.type).toBe('complete');
      expect(events.at(-1)?.data['report']).toMatchObject({ total: 3, inserted: 3, skipped: 0, failed: [], cancelled: false });
    });

    it('rejects an invalid concurrency', async () => {
      await expect(run(createIngestCommand(getContext), [recordsFile, '--concurrency', '0'])).rejects.toThrow(
        'concurrency: concurrency must be between 1 and 32'
      );
    });
  });

  describe('search', () => {
    beforeEach(async () => {
      await run(createIngestCommand(getContext), [recordsFile]);
      consoleLog = [];
      logs = [];
    });

    it('answers from the full-text index', async () => {
      options.json = true;

      await run(createSearchCommand(getContext), ['refund']);

      expect(lastJson()).toEqual({
        query: 'refund',
        count: 1,
        strategy: 'full-text',
        results: [
          {
            id: 'r1',
            title: 'Refund policy',
            category: 'refund',
            score: expect.any(Number),
            strategy: 'full-text',
            content: 'Refunds are issued within 30 days',
          },
        ],
      });
    });

    it('includes the strategy trace with --trace', async () => {
      options.json = true;

      await run(createSearchCommand(getContext), ['days', '--trace']);

      const output = lastJson();
      expect(output).toMatchObject({
        strategy: 'full-text',
        count: 2,
        attempts: [
          { strategy: 'vector', status: 'skipped' },
          { strategy: 'full-text', status: 'hit', resultCount: 2 },
        ],
      });
    });

    it('prints a friendly message when nothing matches', async () => {
      await run(createSearchCommand(getContext), ['zebra']);

      expect(logs[0]).toBe('No results found for "zebra"');
    });

    it('prints text results with the winning strategy', async () => {
      await run(createSearchCommand(getContext), ['refund', '--limit', '3']);

      expect(logs[0]).toBe('Found 1 result for "refund" via full-text');
    });
  });

  describe('status', () => {
    it('reports record and index counts', async () => {
      await run(createIngestCommand(getContext), [recordsFile]);
      options.json = true;
      consoleLog = [];

      await run(createStatusCommand(getContext), []);

      expect(lastJson()).toMatchObject({
        records: 3,
        store: { backend: 'sqlite', location: path.join(dir, 'store.db') },
        indexes: [
          { name: 'records_fts', kind: 'text' },
          { name: 'category_idx', kind: 'keyword' },
        ],
        embedding: { provider: 'none' },
      });
    });
  });

  describe('indexes', () => {
    it('creates the configured indexes once', async () => {
      options.json = true;

      await run(createIndexesCommand(getContext), []);
      expect(lastJson()).toMatchObject({
        backend: 'sqlite',
        results: [
          { name: 'records_fts', status: 'created' },
          { name: 'category_idx', status: 'created' },
        ],
      });

      await run(createIndexesCommand(getContext), []);
      expect(lastJson()).toMatchObject({
        results: [
          { name: 'records_fts', status: 'exists' },
          { name: 'category_idx', status: 'exists' },
        ],
      });
    });

    it('lists nothing on a fresh store', async () => {
      await run(createIndexesCommand(getContext), ['--list']);

      expect(logs).toEqual(['No indexes found', 'Run: ragline indexes  to create the configured indexes']);
    });
  });

  describe('route', () => {
    it('prints the matched agent', async () => {
      await run(createRouteCommand(getContext), ['I', 'was', 'charged', 'twice']);

      expect(logs).toEqual(['billing (matched "charge")']);
    });

    it('prints the default agent in JSON mode', async () => {
      options.json = true;

      await run(createRouteCommand(getContext), ['hello']);

      expect(lastJson()).toEqual({ text: 'hello', agent: 'triage', matched: false });
    });
  });

  describe('config', () => {
    it('gets a single value', async () => {
      await run(createConfigCommand(getContext), ['get', 'embedding.provider']);

      expect(logs).toEqual(['none']);
    });

    it('reports unknown keys', async () => {
      await run(createConfigCommand(getContext), ['get', 'embedding.nope']);

      expect(errors).toEqual(['Unknown config key: embedding.nope']);
      expect(process.exitCode).toBe(1);
    });

    it('prints the config path', async () => {
      await run(createConfigCommand(getContext), ['path']);

      expect(logs).toEqual([options.config]);
    });
  });
});

describe('formatValue', () => {
  it('formats scalars and structures', () => {
    expect(formatValue('text')).toBe('text');
    expect(formatValue(true)).toBe('true');
    expect(formatValue(5)).toBe('5');
    expect(formatValue(['a', 'b'])).toBe('["a","b"]');
  });
});
