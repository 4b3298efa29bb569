/**
 * Logger - Lightweight logging for Lexigram
 *
 * Every console line goes to stderr: stdout is reserved for the report,
 * which may be a JSON document piped into another tool.
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Words loaded', { count: 74286 });
 *
 *   // Also keep a full debug log on disk:
 *   const logger = createLogger('warnings', { logFile: 'lexigram.log' });
 */

import { createWriteStream, writeFileSync, mkdirSync, statSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import type { Logger, LogLevel } from '@lexigram/types';

export type { Logger, LogLevel };

/**
 * Log level priorities (higher = more verbose)
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

type LogMethod = keyof Logger;

/**
 * Minimum level required for each method
 */
const METHOD_LEVELS: Record<LogMethod, number> = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

const METHOD_TAGS: Record<LogMethod, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

/**
 * Safe JSON stringify that handles circular references
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

/**
 * Format log message with optional context
 */
export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Base class: level filtering shared by every sink.
 */
abstract class LevelLogger implements Logger {
  private readonly priority: number;

  constructor(readonly level: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  protected abstract writeLine(tag: string, message: string, context?: Record<string, unknown>): void;

  private log(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    if (this.priority < METHOD_LEVELS[method]) return;
    this.writeLine(METHOD_TAGS[method], message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }
}

/**
 * Console Logger - writes `[LEVEL] message {context}` lines to stderr.
 */
export class ConsoleLogger extends LevelLogger {
  private readonly write: (line: string) => void;

  constructor(logLevel: LogLevel = 'info', write?: (line: string) => void) {
    super(logLevel);
    this.write = write ?? ((line) => process.stderr.write(line + '\n'));
  }

  protected writeLine(tag: string, message: string, context?: Record<string, unknown>): void {
    this.write(formatMessage(`[${tag}] ${message}`, context));
  }
}

/**
 * File-based Logger
 *
 * Writes log messages with ISO timestamps through a write stream. The file is
 * truncated on construction and parent directories are created.
 * Throws if the path points to a directory.
 */
export class FileLogger extends LevelLogger {
  private readonly stream: WriteStream;
  private streamError: Error | null = null;

  constructor(logLevel: LogLevel, filePath: string) {
    super(logLevel);
    const resolvedPath = resolve(filePath);

    mkdirSync(dirname(resolvedPath), { recursive: true });

    const existing = statSync(resolvedPath, { throwIfNoEntry: false });
    if (existing?.isDirectory()) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    // Truncate synchronously so an unwritable path fails here, not mid-run
    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err) => {
      // Keep the first failure; further writes are dropped
      if (!this.streamError) {
        this.streamError = err;
        process.stderr.write(`[WARN] Log file write failed: ${err.message}\n`);
      }
    });
  }

  protected writeLine(tag: string, message: string, context?: Record<string, unknown>): void {
    if (this.streamError) return;
    const timestamp = new Date().toISOString();
    this.stream.write(formatMessage(`${timestamp} [${tag}] ${message}`, context) + '\n');
  }

  /** Flush and close the write stream. Resolves when all data is written. */
  close(): Promise<void> {
    return new Promise((resolve) => {
      this.stream.end(resolve);
    });
  }
}

/**
 * Delegates to several loggers; each applies its own level filter.
 */
export class MultiLogger implements Logger {
  constructor(private readonly loggers: Logger[]) {}

  error(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.trace(message, context);
  }

  /** Close every inner FileLogger. */
  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Logger that drops everything. Default for library entry points.
 */
export const NULL_LOGGER: Logger = new ConsoleLogger('silent', () => undefined);

/**
 * Create a Logger with the given console level.
 *
 * With `logFile`, returns a MultiLogger whose file side always records at
 * 'debug' regardless of the console level.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    const fileLogger = new FileLogger('debug', options.logFile);
    return new MultiLogger([consoleLogger, fileLogger]);
  }

  return consoleLogger;
}

/**
 * Close a logger returned by createLogger, flushing any file output.
 */
export async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof MultiLogger || logger instanceof FileLogger) {
    await logger.close();
  }
}
