import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { parse as parseYAML } from 'yaml';
import type { DatasetFormat, LogLevel, ReportFormat } from '@lexigram/types';
import {
  isDatasetFormat,
  isLogLevel,
  isReportFormat,
  DATASET_FORMATS,
  LOG_LEVELS,
  REPORT_FORMATS,
  TOP_K_MIN,
  TOP_K_MAX,
} from '@lexigram/types';
import { ConfigError } from '../errors/LexigramError.js';
import { LEXIGRAM_VERSION, getSchemaVersion } from '../version.js';

/**
 * Lexigram configuration schema.
 *
 * YAML Location: .lexigram/config.yaml
 *
 * Example config.yaml:
 *
 * ```yaml
 * version: "0.1.0"
 * dataset:
 *   format: subtlex          # subtlex | wordlist
 *   path: data/subtlex.csv   # relative to the project directory
 *   column: SUBTLWF
 * report:
 *   topK: 10
 *   format: text             # text | json
 * logLevel: info
 * ```
 *
 * Every key is optional; missing keys fall back to DEFAULT_CONFIG.
 * Command-line flags take precedence over the file.
 */
export interface LexigramConfig {
  /**
   * Config schema version (major.minor.patch, no pre-release tag).
   * If omitted, no version check is performed.
   */
  version?: string;

  dataset: {
    format: DatasetFormat;
    /** Absolute once loaded; relative paths are resolved against the project */
    path?: string;
    /** Column used as the word weight; defaults per format */
    column?: string;
  };

  report: {
    topK: number;
    format: ReportFormat;
  };

  logLevel: LogLevel;
}

export const CONFIG_DIR = '.lexigram';
export const CONFIG_FILE = 'config.yaml';

export const DEFAULT_CONFIG: LexigramConfig = {
  version: getSchemaVersion(LEXIGRAM_VERSION),
  dataset: {
    format: 'subtlex',
  },
  report: {
    topK: 10,
    format: 'text',
  },
  logLevel: 'info',
};

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string, key: string): ConfigError {
  return new ConfigError(`Config error: ${message}`, 'ERR_CONFIG_INVALID', { key });
}

/**
 * Load config from `<projectPath>/.lexigram/config.yaml`.
 *
 * - No file: returns DEFAULT_CONFIG
 * - Unparseable YAML: warns and returns DEFAULT_CONFIG
 * - Empty or comment-only file: returns DEFAULT_CONFIG
 * - Structurally invalid values: THROWS ConfigError
 *
 * @param projectPath - Directory holding .lexigram/
 * @param logger - Receives warnings (defaults to console)
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): LexigramConfig {
  const yamlPath = join(projectPath, CONFIG_DIR, CONFIG_FILE);

  if (!existsSync(yamlPath)) {
    return cloneConfig(DEFAULT_CONFIG);
  }

  let parsed: unknown;
  try {
    parsed = parseYAML(readFileSync(yamlPath, 'utf-8'));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to parse config.yaml: ${error.message}`);
    logger.warn('Using default configuration');
    return cloneConfig(DEFAULT_CONFIG);
  }

  // Empty file or only comments
  if (parsed === null || parsed === undefined) {
    return cloneConfig(DEFAULT_CONFIG);
  }

  // Validation is outside the try: config errors MUST throw
  if (!isRecord(parsed)) {
    throw invalid(`config.yaml must contain a mapping, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`, '');
  }

  validateVersion(parsed.version);
  const dataset = validateDataset(parsed.dataset);
  const report = validateReport(parsed.report);
  const logLevel = validateLogLevel(parsed.logLevel);

  return {
    version: typeof parsed.version === 'string' ? parsed.version : DEFAULT_CONFIG.version,
    dataset: {
      format: dataset.format ?? DEFAULT_CONFIG.dataset.format,
      path: dataset.path !== undefined ? resolve(projectPath, dataset.path) : undefined,
      column: dataset.column,
    },
    report: {
      topK: report.topK ?? DEFAULT_CONFIG.report.topK,
      format: report.format ?? DEFAULT_CONFIG.report.format,
    },
    logLevel: logLevel ?? DEFAULT_CONFIG.logLevel,
  };
}

function cloneConfig(config: LexigramConfig): LexigramConfig {
  return {
    ...config,
    dataset: { ...config.dataset },
    report: { ...config.report },
  };
}

/**
 * Validate config version compatibility with the running version.
 * A missing version is accepted.
 *
 * @param currentVersion - Override for testing (defaults to LEXIGRAM_VERSION)
 */
export function validateVersion(configVersion: unknown, currentVersion?: string): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw invalid(`version must be a string, got ${typeof configVersion}`, 'version');
  }

  if (!configVersion.trim()) {
    throw invalid('version cannot be empty', 'version');
  }

  const current = currentVersion ?? LEXIGRAM_VERSION;
  const configSchema = getSchemaVersion(configVersion);
  const currentSchema = getSchemaVersion(current);

  if (configSchema !== currentSchema) {
    throw new ConfigError(
      `Config error: config version "${configVersion}" is not compatible with Lexigram ${current}. Expected "${currentSchema}".`,
      'ERR_CONFIG_VERSION',
      { key: 'version' },
      `Set version: "${currentSchema}" in ${CONFIG_DIR}/${CONFIG_FILE}`
    );
  }
}

function optionalString(value: unknown, key: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw invalid(`${key} must be a string, got ${typeof value}`, key);
  }
  if (!value.trim()) {
    throw invalid(`${key} cannot be empty`, key);
  }
  return value;
}

export function validateDataset(dataset: unknown): Partial<LexigramConfig['dataset']> {
  if (dataset === undefined || dataset === null) return {};
  if (!isRecord(dataset)) {
    throw invalid('dataset must be a mapping', 'dataset');
  }

  const { format } = dataset;
  if (format !== undefined && format !== null && !isDatasetFormat(format)) {
    throw invalid(`dataset.format must be one of ${DATASET_FORMATS.join(', ')}, got ${String(format)}`, 'dataset.format');
  }

  return {
    format: isDatasetFormat(format) ? format : undefined,
    path: optionalString(dataset.path, 'dataset.path'),
    column: optionalString(dataset.column, 'dataset.column'),
  };
}

export function validateReport(report: unknown): Partial<LexigramConfig['report']> {
  if (report === undefined || report === null) return {};
  if (!isRecord(report)) {
    throw invalid('report must be a mapping', 'report');
  }

  const { topK, format } = report;
  if (topK !== undefined && topK !== null) {
    if (typeof topK !== 'number' || !Number.isInteger(topK) || topK < TOP_K_MIN || topK > TOP_K_MAX) {
      throw invalid(`report.topK must be an integer between ${TOP_K_MIN} and ${TOP_K_MAX}, got ${String(topK)}`, 'report.topK');
    }
  }
  if (format !== undefined && format !== null && !isReportFormat(format)) {
    throw invalid(`report.format must be one of ${REPORT_FORMATS.join(', ')}, got ${String(format)}`, 'report.format');
  }

  return {
    topK: typeof topK === 'number' ? topK : undefined,
    format: isReportFormat(format) ? format : undefined,
  };
}

export function validateLogLevel(logLevel: unknown): LogLevel | undefined {
  if (logLevel === undefined || logLevel === null) return undefined;
  if (!isLogLevel(logLevel)) {
    throw invalid(`logLevel must be one of ${LOG_LEVELS.join(', ')}, got ${String(logLevel)}`, 'logLevel');
  }
  return logLevel;
}
