/**
 * @lexigram/core - N-gram frequency engine
 */

// Error types
export {
  LexigramError,
  ConfigError,
  FileAccessError,
  DatasetError,
  InvalidWordError,
  InvalidParameterError,
} from './errors/LexigramError.js';
export type { ErrorContext, ErrorSeverity, LexigramErrorJSON } from './errors/LexigramError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  NULL_LOGGER,
  createLogger,
  closeLogger,
  formatMessage,
} from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Config
export {
  loadConfig,
  DEFAULT_CONFIG,
  CONFIG_DIR,
  CONFIG_FILE,
  validateVersion,
  validateDataset,
  validateReport,
  validateLogLevel,
} from './config/index.js';
export type { LexigramConfig } from './config/index.js';

// Version
export { LEXIGRAM_VERSION, getSchemaVersion } from './version.js';

// Alphabet
export {
  Q_SYMBOL,
  Y_SYMBOL,
  W_SYMBOL,
  VOWEL_SYMBOLS,
  CONSONANT_SYMBOLS,
  VOWELS,
  CONSONANTS,
  isSyntheticSymbol,
  describeSymbol,
} from './alphabet.js';
export type { SyntheticSymbol } from './alphabet.js';

// Pipeline stages
export { normalize, mergePair } from './normalize/SequenceNormalizer.js';
export { NGramAggregator, isValidWord, PROGRESS_INTERVAL } from './aggregation/NGramAggregator.js';
export type { NGramAggregatorOptions } from './aggregation/NGramAggregator.js';
export { classify, isVowelGram, isConsonantGram } from './classification/AlphabetClassifier.js';
export { ReportBuilder, formatNumber, assertTopK } from './report/ReportBuilder.js';

// Entry points
export { analyze, render } from './analyze.js';
export type { AnalyzeOptions } from './analyze.js';

// Importers
export { SubtlexImporter, SUBTLEX_COLUMNS, WORD_COLUMN, validateColumnNames, parseValue } from './importers/SubtlexImporter.js';
export { WordListImporter, WORD_LIST_COLUMNS, DEFAULT_WORD_WEIGHT } from './importers/WordListImporter.js';
export type { WordListImporterOptions } from './importers/WordListImporter.js';
export { openDataset, toWordWeights, DEFAULT_COLUMNS } from './importers/loadDataset.js';

// Shared types
export type {
  AnalysisResult,
  ClassifiedTables,
  FrequencyTable,
  FrequencyTables,
  WordWeight,
  WordWeightSource,
  RankedNGram,
  StructuredReport,
  ReportFormat,
  DatasetImporter,
  DatasetValue,
  DatasetFormat,
  ColumnType,
} from '@lexigram/types';
