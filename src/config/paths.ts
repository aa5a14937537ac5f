/**
 * Centralized Path Definitions
 *
 * Single source of truth for all ragline directory paths.
 *
 * Directory structure:
 * ~/.ragline/
 * ├── ragline.db     (SQLite document store)
 * └── config.toml    (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const RAGLINE_DIR = join(homedir(), '.ragline');
export const DB_PATH = join(RAGLINE_DIR, 'ragline.db');
export const CONFIG_PATH = join(RAGLINE_DIR, 'config.toml');

/**
 * Get the ragline directory path (~/.ragline)
 */
export function getRaglineDir(): string {
  return RAGLINE_DIR;
}

/**
 * Get the default config file path (~/.ragline/config.toml)
 */
export function getConfigPath(): string {
  return CONFIG_PATH;
}
