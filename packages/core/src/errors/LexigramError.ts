/**
 * LexigramError - Error hierarchy for Lexigram
 *
 * All errors extend the native JavaScript Error class so callers can keep
 * using `instanceof Error` and plain try/catch.
 *
 * Error types:
 * - ConfigError: config.yaml parsing/validation errors (fatal)
 * - FileAccessError: dataset file missing or unreadable (fatal)
 * - DatasetError: malformed dataset header, row or value (fatal)
 * - InvalidWordError: a word outside [a-z]+ reached the aggregator (error)
 * - InvalidParameterError: caller-supplied parameter out of range (error)
 */

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  lineNumber?: number;
  column?: string;
  word?: string;
  [key: string]: unknown;
}

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * JSON representation of LexigramError
 */
export interface LexigramErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all Lexigram errors.
 */
export abstract class LexigramError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): LexigramErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - config.yaml structure or values
 *
 * Codes: ERR_CONFIG_INVALID, ERR_CONFIG_VERSION
 */
export class ConfigError extends LexigramError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * File access error - dataset path missing, unreadable or a directory
 *
 * Codes: ERR_FILE_UNREADABLE
 */
export class FileAccessError extends LexigramError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Dataset error - the file was read but its contents are malformed
 *
 * Codes: ERR_DATASET_EMPTY, ERR_DATASET_COLUMNS, ERR_DATASET_ROW,
 * ERR_INVALID_WORD, ERR_DUPLICATE_WORD, ERR_VALUE_PARSE,
 * ERR_COLUMN_UNKNOWN, ERR_COLUMN_NOT_NUMERIC
 */
export class DatasetError extends LexigramError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * A word that is empty or not made of lowercase ASCII letters reached the core.
 * Importers reject such words first, so this signals a caller bug.
 */
export class InvalidWordError extends LexigramError {
  readonly code = 'ERR_INVALID_WORD';
  readonly severity = 'error' as const;

  constructor(word: string) {
    super(
      `Invalid word "${word}": expected one or more lowercase letters a-z`,
      { word },
      'Load words through SubtlexImporter or WordListImporter, which validate them'
    );
  }
}

/**
 * Caller-supplied parameter outside its allowed range.
 *
 * Codes: ERR_TOPK_OUT_OF_RANGE, ERR_FORMAT_UNKNOWN
 */
export class InvalidParameterError extends LexigramError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}
