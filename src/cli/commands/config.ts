/**
 * Config Command
 *
 * Inspects ~/.ragline/config.toml (or the file given with --config):
 *   ragline config get <key>     - Get a specific value
 *   ragline config list          - Show all configuration
 *   ragline config path          - Show config file location
 *
 * Edit the TOML file directly to change settings.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigPath, getConfigValue, listConfig } from '../../config/index.js';
import type { CommandContext } from '../types.js';
import { loadCommandConfig } from '../utils/runtime.js';

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Show configuration settings');

  // ragline config get <key>
  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., ragline config get embedding.model)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(loadCommandConfig(ctx), key);

      if (value === undefined) {
        ctx.error(`Unknown config key: ${key}`);
        ctx.log('');
        ctx.log(`Run ${chalk.cyan('ragline config list')} to see all available keys.`);
        process.exitCode = 1;
        return;
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatValue(value));
      }
    });

  // ragline config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig(loadCommandConfig(ctx));

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');

      // Group by top-level key for readability
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';

        if (group !== currentGroup) {
          if (currentGroup !== '') ctx.log('');
          currentGroup = group;
        }

        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }

      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${ctx.options.config ?? getConfigPath()}`));
    });

  // ragline config path
  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = ctx.options.config ?? getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  return configCmd;
}
