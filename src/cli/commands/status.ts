/**
 * Status Command
 *
 * Displays storage statistics and system health:
 *   ragline status         - Show system status
 *   ragline status --json  - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { statSync, existsSync } from 'node:fs';
import type { CommandContext } from '../types.js';
import { getConfigPath, hasSecret, type Config } from '../../config/index.js';
import { expandHome, withBackend, type IndexDescriptor } from '../../store/index.js';
import { backendOptions, loadCommandConfig } from '../utils/runtime.js';

interface StoreStats {
  recordCount: number;
  indexes: IndexDescriptor[];
}

/**
 * Format bytes to human-readable size (e.g., "127.4 MB")
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.floor(Math.log(bytes) / Math.log(k));

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i] ?? 'TB'}`;
}

/**
 * Format a path with ~ for home directory
 */
export function formatPath(filePath: string): string {
  const homeDir = process.env['HOME'] ?? process.env['USERPROFILE'] ?? '';
  if (homeDir && filePath.startsWith(homeDir)) {
    return '~' + filePath.slice(homeDir.length);
  }
  return filePath;
}

function getFileSize(filePath: string): number {
  return existsSync(filePath) ? statSync(filePath).size : 0;
}

/**
 * Where the records live, for display
 */
function describeLocation(config: Config): string {
  if (config.store.backend === 'sqlite') {
    const dbPath = expandHome(config.store.sqlite_path);
    return `${formatBytes(getFileSize(dbPath))} (${formatPath(dbPath)})`;
  }
  return `${config.store.mongo_database}.${config.store.mongo_collection}`;
}

function embeddingCredentials(config: Config): string {
  switch (config.embedding.provider) {
    case 'openai':
      return hasSecret('OPENAI_API_KEY') ? chalk.green('key set') : chalk.red('OPENAI_API_KEY missing');
    case 'ollama':
      return chalk.dim('local');
    case 'none':
      return chalk.dim('vector search disabled');
  }
}

/**
 * Create the status command
 */
export function createStatusCommand(getContext: () => CommandContext): Command {
  return new Command('status')
    .description('Show storage statistics and system health')
    .action(async () => {
      const ctx = getContext();
      ctx.debug('Fetching system status...');

      const config = loadCommandConfig(ctx);
      const configPath = ctx.options.config ?? getConfigPath();

      const stats = await withBackend(
        config.store,
        backendOptions(ctx),
        async (backend): Promise<StoreStats> => ({
          recordCount: await backend.count(),
          indexes: await backend.listIndexes(),
        })
      );

      ctx.debug(`Records: ${stats.recordCount}, indexes: ${stats.indexes.length}`);

      if (ctx.options.json) {
        const jsonOutput = {
          records: stats.recordCount,
          store: {
            backend: config.store.backend,
            location: config.store.backend === 'sqlite'
              ? expandHome(config.store.sqlite_path)
              : `${config.store.mongo_database}.${config.store.mongo_collection}`,
          },
          indexes: stats.indexes.map((index) => ({ name: index.name, kind: index.kind })),
          embedding: {
            provider: config.embedding.provider,
            model: config.embedding.model,
            dimensions: config.embedding.dimensions,
          },
          config: {
            path: configPath,
          },
        };
        console.log(JSON.stringify(jsonOutput, null, 2));
        return;
      }

      const lines: string[] = [];

      lines.push(chalk.bold('ragline Status'));
      lines.push(chalk.dim('─'.repeat(35)));

      lines.push(`${chalk.cyan('Records:')}      ${stats.recordCount.toLocaleString()}`);
      lines.push(`${chalk.cyan('Store:')}        ${config.store.backend} ${describeLocation(config)}`);
      lines.push(
        `${chalk.cyan('Indexes:')}      ${
          stats.indexes.length > 0
            ? stats.indexes.map((index) => `${index.name} (${index.kind})`).join(', ')
            : chalk.yellow('none')
        }`
      );

      lines.push('');
      lines.push(
        `${chalk.cyan('Embeddings:')}   ${config.embedding.model} (${config.embedding.provider}, ${config.embedding.dimensions}d) ${embeddingCredentials(config)}`
      );
      lines.push(`${chalk.cyan('Config:')}       ${formatPath(configPath)}`);

      if (stats.recordCount === 0) {
        lines.push('');
        lines.push(chalk.yellow('No records stored.'));
        lines.push(`Run ${chalk.cyan('ragline ingest <file>')} to get started.`);
      }

      ctx.log(lines.join('\n'));
    });
}
