/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config file (~/.ragline/config.toml, or --config)
 * 2. Parse the TOML
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

export interface LoadConfigOptions {
  /** Config file to read (defaults to ~/.ragline/config.toml) */
  configPath?: string;
  /** Write the commented template when the file is missing */
  createIfMissing?: boolean;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source values overriding target.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Load and parse the config file.
 * Returns the merged config (defaults + user overrides).
 *
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const configPath = options.configPath ?? getConfigPath();
  const createIfMissing = options.createIfMissing ?? false;

  if (!fs.existsSync(configPath)) {
    if (options.configPath && !createIfMissing) {
      throw new ConfigError(`Config file not found: ${configPath}`, 'Check the --config path');
    }
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: PlainObject;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(`Invalid TOML in config file: ${message}`, `Fix the syntax in ${configPath}`);
  }

  // Validate the user's file on its own first so issue paths match what they wrote
  const partial = PartialConfigSchema.safeParse(parsed);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration in ${configPath}:\n${formatIssues(partial.error.issues)}`,
      'Run: ragline config list  to see the effective values'
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(structuredClone(DEFAULT_CONFIG), parsed));
  if (!merged.success) {
    throw new ConfigError(`Invalid configuration in ${configPath}:\n${formatIssues(merged.error.issues)}`);
  }

  return merged.data;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue(config, 'embedding.model') => 'text-embedding-3-small'
 */
export function getConfigValue(config: Config, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * List all config values in a flat format
 * Returns entries like ['store.backend', 'sqlite']
 */
export function listConfig(config: Config): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}
