/**
 * Ingest Command
 *
 * Loads records from a JSON array or JSONL file, makes sure the store's
 * indexes exist, and ingests every record that isn't stored yet.
 *
 *   ragline ingest ./records.jsonl
 *   ragline ingest ./records.json --refresh --concurrency 4
 *   ragline ingest ./records.jsonl --json     # NDJSON progress events
 *
 * Per-record failures never abort the run; they are listed in the summary
 * and make the command exit with code 1. Ctrl+C stops between records and
 * still prints the partial report.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { loadRecords, IngestPipeline, type IngestReport } from '../../ingest/index.js';
import {
  defaultIndexSpecs,
  ensureIndexes,
  IndexSetupError,
  RecordStore,
  withBackend,
} from '../../store/index.js';
import { ProgressReporter } from '../utils/progress.js';
import { backendOptions, createCommandEmbedder, loadCommandConfig } from '../utils/runtime.js';
import { IngestArgsSchema, IngestOptionsSchema, parseInput } from '../validation.js';

interface IngestCommandOptions {
  refresh?: boolean;
  concurrency?: string;
  indexes: boolean;
}

/** Invalid entries listed individually before collapsing to a count */
const MAX_INVALID_SHOWN = 5;

/**
 * Create the ingest command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .argument('<file>', 'JSON array or JSONL file of records')
    .description('Ingest records into the document store')
    .option('-r, --refresh', 'Re-embed stored records whose title or content changed')
    .option('-c, --concurrency <number>', 'Records processed in parallel')
    .option('--no-indexes', 'Skip index creation')
    .action(async (file: string, cmdOptions: IngestCommandOptions) => {
      const ctx = getContext();
      const args = parseInput(IngestArgsSchema, { file });
      const options = parseInput(IngestOptionsSchema, cmdOptions, 'Run: ragline ingest --help');

      ctx.debug(`Options: ${JSON.stringify(options)}`);

      // ─────────────────────────────────────────────────────────────────────
      // 1. Load and validate the input
      // ─────────────────────────────────────────────────────────────────────
      const config = loadCommandConfig(ctx);
      const { records, invalid } = await loadRecords(args.file);

      const reporter = new ProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
        isInteractive: Boolean(process.stdout.isTTY),
      });

      for (const entry of invalid.slice(0, MAX_INVALID_SHOWN)) {
        reporter.warn(`Skipping invalid entry #${entry.index}: ${entry.issues.join('; ')}`);
      }
      if (invalid.length > MAX_INVALID_SHOWN) {
        reporter.warn(`... and ${invalid.length - MAX_INVALID_SHOWN} more invalid entries`);
      }

      if (records.length === 0) {
        ctx.log(chalk.yellow(`No valid records in ${args.file}`));
        if (ctx.options.json) {
          console.log(JSON.stringify({ type: 'complete', data: { total: 0, invalid: invalid.length } }));
        }
        return;
      }

      // ─────────────────────────────────────────────────────────────────────
      // 2. Embedding service (null for provider "none")
      // ─────────────────────────────────────────────────────────────────────
      const embedder = createCommandEmbedder(config, ctx);
      if (!embedder) {
        ctx.debug('Embedding provider is "none"; records are stored without vectors');
      }

      // ─────────────────────────────────────────────────────────────────────
      // 3. Ingest
      // ─────────────────────────────────────────────────────────────────────
      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once('SIGINT', onInterrupt);

      let report: IngestReport;
      try {
        report = await withBackend(config.store, backendOptions(ctx), async (backend) => {
          if (options.indexes && config.ingest.ensure_indexes) {
            const specs = defaultIndexSpecs(config.indexes, embedder?.dimensions);
            try {
              const results = await ensureIndexes(backend, specs, { logger: ctx });
              for (const result of results) {
                ctx.debug(`Index ${result.name}: ${result.status}`);
              }
            } catch (error) {
              // Lookups still work without indexes (the search falls back)
              if (!(error instanceof IndexSetupError)) {
                throw error;
              }
              reporter.warn(`${error.message}. ${error.hint ?? ''}`.trim());
            }
          }

          const store = new RecordStore(backend, { logger: ctx });
          const pipeline = new IngestPipeline(store, { embedder, logger: { warn: (m) => reporter.warn(m), debug: ctx.debug } });

          reporter.start(records.length, args.file);
          return pipeline.run(records, {
            refresh: options.refresh,
            concurrency: options.concurrency ?? config.ingest.concurrency,
            signal: controller.signal,
            onProgress: (processed, total, record, outcome) => reporter.update(processed, total, record, outcome),
          });
        });
      } catch (error) {
        reporter.stop();
        throw error;
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }

      reporter.showSummary(report);

      if (report.failed.length > 0 || report.cancelled) {
        process.exitCode = 1;
      }
    });
}
