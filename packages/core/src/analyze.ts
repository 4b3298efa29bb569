/**
 * Analysis entry points: analyze() builds every table in one pass,
 * render() formats the result.
 */

import type {
  AnalysisResult,
  Logger,
  ReportFormat,
  StructuredReport,
  WordWeightSource,
} from '@lexigram/types';
import { isReportFormat } from '@lexigram/types';
import { NGramAggregator } from './aggregation/NGramAggregator.js';
import { classify } from './classification/AlphabetClassifier.js';
import { ReportBuilder, assertTopK } from './report/ReportBuilder.js';
import { InvalidParameterError } from './errors/LexigramError.js';
import { NULL_LOGGER } from './logging/Logger.js';

export interface AnalyzeOptions {
  logger?: Logger;
}

/**
 * Aggregate every n-gram of every word in `source`, then derive the vowel
 * and consonant tables. Consumes the source exactly once.
 */
export function analyze(source: WordWeightSource, options: AnalyzeOptions = {}): AnalysisResult {
  const logger = options.logger ?? NULL_LOGGER;
  const aggregator = new NGramAggregator({ logger });

  aggregator.addAll(source);
  logger.debug('Aggregation complete', {
    words: aggregator.wordCount,
    maxLength: aggregator.maxLength,
  });

  const classified = classify(aggregator.tables());
  logger.debug('Classification complete', {
    vowels: classified.vowels.size,
    consonants: classified.consonants.size,
  });

  return {
    wordCount: aggregator.wordCount,
    tables: aggregator.tables(),
    totals: aggregator.totals(),
    ...classified,
  };
}

export function render(result: AnalysisResult, topK: number, format: 'text'): string;
export function render(result: AnalysisResult, topK: number, format: 'json'): StructuredReport;
export function render(result: AnalysisResult, topK: number, format: ReportFormat): string | StructuredReport;
export function render(result: AnalysisResult, topK: number, format: ReportFormat): string | StructuredReport {
  if (!isReportFormat(format)) {
    throw new InvalidParameterError(
      `Unknown report format "${String(format)}"`,
      'ERR_FORMAT_UNKNOWN',
      { format }
    );
  }

  const builder = new ReportBuilder(result);
  if (format === 'json') {
    // json ignores topK but still rejects an out-of-range value
    assertTopK(topK);
    return builder.toStructured();
  }
  return builder.toText(topK);
}
