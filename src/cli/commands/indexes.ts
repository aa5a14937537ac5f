/**
 * Indexes Command
 *
 * Creates the text, keyword and vector indexes configured under [indexes],
 * skipping any that already exist. Safe to run repeatedly.
 *
 *   ragline indexes           # ensure configured indexes
 *   ragline indexes --list    # only show what the store has
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import {
  defaultIndexSpecs,
  ensureIndexes,
  withBackend,
  type IndexDescriptor,
  type IndexSetupResult,
} from '../../store/index.js';
import { formatTable } from '../../utils/index.js';
import { backendOptions, loadCommandConfig } from '../utils/runtime.js';

interface IndexesCommandOptions {
  list?: boolean;
}

const STATUS_LABELS: Record<IndexSetupResult['status'], string> = {
  created: chalk.green('created'),
  exists: chalk.dim('exists'),
  equivalent: chalk.yellow('equivalent'),
};

function formatSetupResults(results: IndexSetupResult[]): string {
  return formatTable<IndexSetupResult>(
    [
      { header: 'Index', value: (r) => r.name },
      { header: 'Kind', value: (r) => r.kind },
      { header: 'Status', value: (r) => STATUS_LABELS[r.status] },
      { header: 'Covered By', value: (r) => r.existingName },
    ],
    results
  );
}

export function formatIndexList(indexes: IndexDescriptor[]): string {
  return formatTable<IndexDescriptor>(
    [
      { header: 'Index', value: (i) => i.name },
      { header: 'Kind', value: (i) => i.kind },
      { header: 'Fields', value: (i) => i.fields.join(', ') },
      { header: 'Dimensions', value: (i) => i.dimensions, align: 'right' },
    ],
    indexes
  );
}

/**
 * Create the indexes command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createIndexesCommand(getContext: () => CommandContext): Command {
  return new Command('indexes')
    .description('Create the configured search indexes')
    .option('-l, --list', 'List existing indexes without creating any')
    .action(async (cmdOptions: IndexesCommandOptions) => {
      const ctx = getContext();
      const config = loadCommandConfig(ctx);

      await withBackend(config.store, backendOptions(ctx), async (backend) => {
        if (cmdOptions.list) {
          const indexes = await backend.listIndexes();
          if (ctx.options.json) {
            console.log(JSON.stringify({ backend: backend.kind, indexes }, null, 2));
          } else if (indexes.length === 0) {
            ctx.log(chalk.yellow('No indexes found'));
            ctx.log(chalk.dim('Run: ragline indexes  to create the configured indexes'));
          } else {
            ctx.log(formatIndexList(indexes));
          }
          return;
        }

        // No vector index without an embedding model to size it
        const dimensions = config.embedding.provider === 'none' ? undefined : config.embedding.dimensions;
        const results = await ensureIndexes(backend, defaultIndexSpecs(config.indexes, dimensions), {
          logger: ctx,
        });

        if (ctx.options.json) {
          console.log(JSON.stringify({ backend: backend.kind, results }, null, 2));
          return;
        }

        const created = results.filter((r) => r.status === 'created').length;
        ctx.log(formatSetupResults(results));
        ctx.log('');
        ctx.log(
          created > 0
            ? `${chalk.green('✓')} Created ${created} index${created === 1 ? '' : 'es'}`
            : chalk.dim('All configured indexes already exist')
        );
      });
    });
}
