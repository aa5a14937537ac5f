/**
 * Error handling module for ragline
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Unknown store backend', 'Use sqlite or mongodb');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  toError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  collectCauses,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
