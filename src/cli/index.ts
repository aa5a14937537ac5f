#!/usr/bin/env node
/**
 * ragline CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { readFileSync, existsSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import type { GlobalOptions, CommandContext } from './types.js';
import { createConfigCommand } from './commands/config.js';
import { createIngestCommand } from './commands/ingest.js';
import { createIndexesCommand } from './commands/indexes.js';
import { createRouteCommand } from './commands/route.js';
import { createSearchCommand } from './commands/search.js';
import { createStatusCommand } from './commands/status.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import { parseJsonAs } from '../utils/index.js';

/**
 * Version from package.json (two levels up from both src/cli and dist/cli)
 */
function readVersion(): string {
  const packageJsonUrl = new URL('../../package.json', import.meta.url);
  if (!existsSync(packageJsonUrl)) {
    return '0.0.0';
  }
  const pkg = parseJsonAs(z.object({ version: z.string() }), readFileSync(packageJsonUrl, 'utf-8'), {
    version: '0.0.0',
  });
  return pkg.version;
}

// Create the root program
const program = new Command();

// Configure the program
program
  .name('ragline')
  .description('Ingest content records into a document store and search them for RAG')
  .version(readVersion(), '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)
  .option('--config <path>', 'Use this config file instead of ~/.ragline/config.toml')

  // Custom help formatting
  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('ragline ingest ./records.jsonl')}        Ingest records (skips ids already stored)
  ${chalk.cyan('ragline search "space adventure"')}      Search stored records
  ${chalk.cyan('ragline route "I was charged twice"')}   Show which agent handles a message
  ${chalk.cyan('ragline indexes')}                       Create the configured indexes
  ${chalk.cyan('ragline status')}                        Show store statistics
  ${chalk.cyan('ragline config list')}                   Show all configuration
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
    config: opts.config,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

// ============================================================================
// COMMANDS
// ============================================================================

// Ingest command - load records from JSON/JSONL into the store
program.addCommand(createIngestCommand(getContext));

// Search command - ordered strategy chain over the store
program.addCommand(createSearchCommand(getContext));

// Indexes command - create text/keyword/vector indexes
program.addCommand(createIndexesCommand(getContext));

// Route command - keyword agent routing
program.addCommand(createRouteCommand(getContext));

// Status command - store statistics and health
program.addCommand(createStatusCommand(getContext));

// Config command - inspect ~/.ragline/config.toml
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

// Handle unknown commands gracefully
program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0] ?? ''}`, 'Run: ragline --help  to see available commands');
});

// Parse arguments and execute
async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

await main();
