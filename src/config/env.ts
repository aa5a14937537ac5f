/**
 * Environment Variable Handler
 *
 * Loads secrets and endpoints from the environment.
 * Supports .env files for local development via dotenv.
 *
 * Only the CLI edge reads these; library modules receive the values through
 * their constructors.
 *
 * SECURITY NOTES:
 * - Keys and connection strings are NEVER logged, even in verbose mode
 * - Only presence/absence is reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

/**
 * Environment variable schema.
 * Nothing is required at load time; a value is checked when the component
 * that needs it is constructed.
 */
export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().optional(),
  OLLAMA_HOST: z.string().default('http://localhost:11434'),
  MONGODB_URI: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/**
 * Cached environment variables (loaded once at first access).
 * Cleared with _clearEnvCache() in tests.
 */
let _envCache: EnvVars | null = null;

/**
 * Load environment variables (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OPENAI_BASE_URL: process.env.OPENAI_BASE_URL,
    OLLAMA_HOST: process.env.OLLAMA_HOST,
    MONGODB_URI: process.env.MONGODB_URI,
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Whether a secret is configured (non-empty), without exposing it.
 */
export function hasSecret(key: 'OPENAI_API_KEY' | 'MONGODB_URI'): boolean {
  return Boolean(loadEnv()[key]?.trim());
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
