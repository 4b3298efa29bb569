/**
 * Analyze command action - loads the dataset, runs the analysis and writes
 * the report.
 *
 * Kept apart from analyze.ts so the steps can run without spawning the CLI.
 */

import { resolve } from 'path';
import {
  analyze,
  render,
  createLogger,
  closeLogger,
  loadConfig,
  openDataset,
  toWordWeights,
  ConfigError,
  InvalidParameterError,
  DEFAULT_COLUMNS,
  type LexigramConfig,
  type Logger,
} from '@lexigram/core';
import type { DatasetFormat, LogLevel, ReportFormat } from '@lexigram/types';
import { isLogLevel, LOG_LEVELS, TOP_K_MIN, TOP_K_MAX } from '@lexigram/types';
import { describeError } from '../utils/errorFormatter.js';

export interface AnalyzeOptions {
  subtlex?: string;
  words?: string;
  column?: string;
  top?: string;
  json?: boolean;
  project?: string;
  quiet?: boolean;
  verbose?: boolean;
  logLevel?: string;
  logFile?: string;
}

export interface AnalyzeSettings {
  datasetFormat: DatasetFormat;
  datasetPath: string;
  column: string;
  topK: number;
  reportFormat: ReportFormat;
}

/**
 * Output sinks. Defaults write to process.stdout / process.stderr.
 */
export interface CommandIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

export const processIO: CommandIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

export function exitWithCode(code: number, exitFn: (code: number) => void = process.exit): void {
  exitFn(code);
}

/**
 * Determine log level.
 * Priority: --log-level > --quiet > --verbose > config logLevel
 */
export function getLogLevel(
  options: Pick<AnalyzeOptions, 'quiet' | 'verbose' | 'logLevel'>,
  configLevel: LogLevel
): LogLevel {
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw new InvalidParameterError(
        `Unknown log level "${options.logLevel}"`,
        'ERR_LOG_LEVEL_UNKNOWN',
        { logLevel: options.logLevel },
        `Use one of: ${LOG_LEVELS.join(', ')}`
      );
    }
    return options.logLevel;
  }
  if (options.quiet) return 'silent';
  if (options.verbose) return 'debug';
  return configLevel;
}

/**
 * Parse the -k/--top value. Out-of-range values are rejected, not clamped.
 */
export function parseTopK(value: string): number {
  const topK = Number(value);
  if (!/^\d+$/.test(value.trim()) || topK < TOP_K_MIN || topK > TOP_K_MAX) {
    throw new InvalidParameterError(
      `-k must be an integer between ${TOP_K_MIN} and ${TOP_K_MAX}, got "${value}"`,
      'ERR_TOPK_OUT_OF_RANGE',
      { topK: value }
    );
  }
  return topK;
}

/**
 * Merge command-line flags over the loaded config.
 */
export function resolveAnalyzeSettings(options: AnalyzeOptions, config: LexigramConfig): AnalyzeSettings {
  if (options.subtlex !== undefined && options.words !== undefined) {
    throw new ConfigError(
      'Use either --subtlex or --words, not both',
      'ERR_DATASET_AMBIGUOUS',
      {},
      'Pass a single dataset per run'
    );
  }

  let datasetFormat: DatasetFormat;
  let datasetPath: string;
  if (options.subtlex !== undefined) {
    datasetFormat = 'subtlex';
    datasetPath = resolve(options.subtlex);
  } else if (options.words !== undefined) {
    datasetFormat = 'wordlist';
    datasetPath = resolve(options.words);
  } else if (config.dataset.path !== undefined) {
    datasetFormat = config.dataset.format;
    datasetPath = config.dataset.path;
  } else {
    throw new ConfigError(
      'No dataset specified',
      'ERR_DATASET_MISSING',
      {},
      'Run: lexigram analyze --subtlex <file.csv>  (or --words <file.txt>, or set dataset.path in .lexigram/config.yaml)'
    );
  }

  // A column from config only applies when the config's dataset is used
  const configColumn = options.subtlex === undefined && options.words === undefined
    ? config.dataset.column
    : undefined;

  return {
    datasetFormat,
    datasetPath,
    column: options.column ?? configColumn ?? DEFAULT_COLUMNS[datasetFormat],
    topK: options.top !== undefined ? parseTopK(options.top) : config.report.topK,
    reportFormat: options.json ? 'json' : config.report.format,
  };
}

/**
 * Load, analyze and write the report. Never throws: every failure is printed
 * to `io.err` and reported through the returned exit code.
 *
 * @returns 0 on success, 1 on any failure
 */
export async function runAnalyze(options: AnalyzeOptions, io: CommandIO = processIO, injectedLogger?: Logger): Promise<number> {
  const printError = (err: unknown): number => {
    io.err(describeError(err).join('\n') + '\n');
    return 1;
  };

  const projectPath = resolve(options.project ?? '.');
  const configWarnings: string[] = [];

  let config: LexigramConfig;
  let logger: Logger;
  try {
    config = loadConfig(projectPath, { warn: (msg) => configWarnings.push(msg) });
    logger = injectedLogger ?? createLogger(getLogLevel(options, config.logLevel), {
      logFile: options.logFile ? resolve(options.logFile) : undefined,
    });
  } catch (err) {
    return printError(err);
  }

  for (const warning of configWarnings) {
    logger.warn(warning);
  }

  try {
    const settings = resolveAnalyzeSettings(options, config);

    const importer = openDataset(settings.datasetFormat, settings.datasetPath, logger);
    logger.info(
      settings.datasetFormat === 'subtlex'
        ? `Loaded SUBTLEX file: ${settings.datasetPath}`
        : `Loaded word list: ${settings.datasetPath}`
    );

    const weights = toWordWeights(importer, settings.column);
    logger.info(`Words loaded: ${weights.size}`, { column: settings.column });

    const result = analyze(weights, { logger });

    if (settings.reportFormat === 'json') {
      io.out(JSON.stringify(render(result, settings.topK, 'json'), null, 2) + '\n');
    } else {
      io.out(render(result, settings.topK, 'text'));
    }
    return 0;
  } catch (err) {
    logger.debug('Analysis failed', { error: err instanceof Error ? err.stack : String(err) });
    return printError(err);
  } finally {
    if (!injectedLogger) {
      await closeLogger(logger);
    }
  }
}
