/**
 * Search Command
 *
 * Runs a query through the strategy chain (vector → full-text → pattern →
 * keyword-or) and prints the first strategy's non-empty results.
 *
 *   ragline search "space adventure"
 *   ragline search "refund policy" --limit 10 --json
 *   ragline search "invoice" --trace     # Show what each strategy did
 *
 * Without embedding credentials the vector strategy is skipped and the
 * lexical strategies still answer.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { withBackend } from '../../store/index.js';
import {
  createSearchEngine,
  formatResults,
  formatResultsJSON,
  type StrategyAttempt,
} from '../../search/index.js';
import { formatTable } from '../../utils/index.js';
import { backendOptions, createCommandEmbedder, loadCommandConfig } from '../utils/runtime.js';
import { parseInput, SearchArgsSchema, SearchOptionsSchema } from '../validation.js';

// ============================================================================
// Types
// ============================================================================

interface SearchCommandOptions {
  /** Maximum results (default: search.limit from config) */
  limit?: string;
  /** Print the per-strategy trace */
  trace?: boolean;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Display empty results message with helpful tips.
 */
function displayEmptyResults(ctx: CommandContext, query: string): void {
  ctx.log(chalk.yellow(`No results found for "${query}"`));
  ctx.log('');
  ctx.log(chalk.dim('Tips:'));
  ctx.log(chalk.dim('  - Try different keywords or phrasing'));
  ctx.log(chalk.dim('  - Check that records were ingested: ragline status'));
}

/**
 * Render the strategy trace as a table.
 */
export function formatAttempts(attempts: StrategyAttempt[]): string {
  return formatTable<StrategyAttempt>(
    [
      { header: 'Strategy', value: (a) => a.strategy },
      { header: 'Status', value: (a) => a.status },
      { header: 'Results', value: (a) => a.resultCount, align: 'right' },
      { header: 'Time', value: (a) => `${a.durationMs}ms`, align: 'right' },
      { header: 'Error', value: (a) => a.error, maxWidth: 60 },
    ],
    attempts
  );
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the search command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<query>', 'Search query text')
    .description('Search stored records')
    .option('-k, --limit <number>', 'Maximum number of results')
    .option('-t, --trace', 'Show what each search strategy did')
    .action(async (query: string, cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();

      const { query: trimmedQuery } = parseInput(
        SearchArgsSchema,
        { query },
        'Provide a search term, e.g.: ragline search "refund policy"'
      );
      const options = parseInput(SearchOptionsSchema, cmdOptions);

      const config = loadCommandConfig(ctx);
      const limit = options.limit ?? config.search.limit;
      ctx.debug(`Query: "${trimmedQuery}", limit: ${limit}`);

      const embedder = createCommandEmbedder(config, ctx, { optional: true });

      const outcome = await withBackend(config.store, backendOptions(ctx), async (backend) => {
        const engine = createSearchEngine(backend, { embedder, logger: ctx });
        ctx.debug(`Strategies: ${engine.strategyOrder.join(' → ')}`);
        return engine.searchWithTrace(trimmedQuery, limit);
      });

      const { results } = outcome;

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              query: trimmedQuery,
              count: results.length,
              strategy: outcome.strategy,
              results: formatResultsJSON(results),
              ...(options.trace ? { attempts: outcome.attempts } : {}),
            },
            null,
            2
          )
        );
        return;
      }

      if (options.trace || ctx.options.verbose) {
        ctx.log(formatAttempts(outcome.attempts));
        ctx.log('');
      }

      if (results.length === 0) {
        displayEmptyResults(ctx, trimmedQuery);
        return;
      }

      ctx.log(
        chalk.bold(`Found ${results.length} result${results.length === 1 ? '' : 's'}`) +
          chalk.dim(` for "${trimmedQuery}" via ${outcome.strategy ?? 'none'}`)
      );
      ctx.log('');
      ctx.log(formatResults(results, { snippetLength: 200 }));
    });
}
