/**
 * Logger Interface for Library Code
 *
 * Library modules (store, ingest, search) accept a Logger via their options.
 * The CLI passes its CommandContext (which satisfies Logger), tests pass
 * silentLogger or a vi.fn()-backed mock.
 */

/**
 * Generic logger interface for library code
 *
 * Compatible with CommandContext so the CLI can pass ctx directly.
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log an informational message (optional) */
  info?: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  info: (message: string) => console.log(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  info: () => {},
  debug: () => {},
};
