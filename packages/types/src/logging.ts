/**
 * Logging Types - shared by core, importers and the CLI
 */

// === LOG LEVEL ===
/**
 * Log level for controlling verbosity.
 * Levels are ordered by verbosity: silent < errors < warnings < info < debug
 */
export const LOG_LEVELS = ['silent', 'errors', 'warnings', 'info', 'debug'] as const;
const LOG_LEVELS_LIST: readonly string[] = LOG_LEVELS;

export type LogLevel = typeof LOG_LEVELS[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS_LIST.includes(value);
}

// === LOGGER INTERFACE ===
/**
 * Logger interface for structured logging.
 * Library code takes a Logger instead of writing to the console directly.
 */
export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
}
