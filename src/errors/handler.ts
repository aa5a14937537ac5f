/**
 * Error handler for CLI error formatting and display
 *
 * - Colored error output for terminal
 * - JSON output for programmatic use
 * - Verbose mode with stack traces and the `cause` chain
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces and underlying causes */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  name: string;
  code: number;
  hint?: string;
  causes?: string[];
  stack?: string;
}

/** Maximum depth when walking `error.cause` */
const MAX_CAUSE_DEPTH = 5;

/**
 * Collect the messages of an error's cause chain, outermost first.
 */
export function collectCauses(error: Error): string[] {
  const causes: string[] = [];
  let current: unknown = error.cause;

  while (current !== undefined && current !== null && causes.length < MAX_CAUSE_DEPTH) {
    if (current instanceof Error) {
      causes.push(`${current.name}: ${current.message}`);
      current = current.cause;
    } else {
      causes.push(String(current));
      break;
    }
  }

  return causes;
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so formatting can be tested without process.exit.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;

  if (!(error instanceof Error)) {
    if (json) {
      return JSON.stringify({ error: String(error), name: 'Error', code: 1 }, null, 2);
    }
    return chalk.red('Error: ') + String(error);
  }

  const code = getExitCode(error);
  const hint = error instanceof CLIError ? error.hint : undefined;
  const causes = collectCauses(error);

  if (json) {
    const output: ErrorOutput = {
      error: error.message,
      name: error.name,
      code,
      hint,
      causes: causes.length > 0 ? causes : undefined,
      stack: verbose ? error.stack : undefined,
    };
    return JSON.stringify(output, null, 2);
  }

  const lines: string[] = [chalk.red('Error: ') + error.message];

  if (hint) {
    lines.push(chalk.dim('Hint: ') + hint);
  } else if (!verbose) {
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  if (verbose) {
    for (const cause of causes) {
      lines.push(chalk.dim('Caused by: ') + cause);
    }
    if (error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    }
  }

  return lines.join('\n');
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Handle an error by formatting it to stderr and exiting.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a global error handler for process events.
 *
 * Usage:
 *   const handler = createGlobalErrorHandler({ verbose: true });
 *   process.on('uncaughtException', handler);
 *   process.on('unhandledRejection', handler);
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
