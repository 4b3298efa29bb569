/**
 * ReportBuilder - turns an AnalysisResult into a text or structured report
 *
 * Text layout, one section per non-empty length:
 *
 *   Total words processed: 2
 *   Total 1-grams counted: 4
 *   Top 10 1-grams:
 *   c: 15 (50%)
 *   ...
 *
 *   Total weight of n-grams processed: 75
 */

import type { AnalysisResult, RankedNGram, StructuredReport } from '@lexigram/types';
import { TOP_K_MIN, TOP_K_MAX } from '@lexigram/types';
import { InvalidParameterError } from '../errors/LexigramError.js';

/**
 * Print a number with at most six significant digits, trailing zeros dropped.
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  if (value === 0) return '0';
  return String(Number(value.toPrecision(6)));
}

/**
 * Throws InvalidParameterError unless topK is an integer in [1, 100].
 * Callers that want clamping must clamp before calling.
 */
export function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK < TOP_K_MIN || topK > TOP_K_MAX) {
    throw new InvalidParameterError(
      `topK must be an integer between ${TOP_K_MIN} and ${TOP_K_MAX}, got ${topK}`,
      'ERR_TOPK_OUT_OF_RANGE',
      { topK }
    );
  }
}

export class ReportBuilder {
  constructor(private readonly result: AnalysisResult) {}

  /**
   * All tables in full, no truncation and no percentages.
   */
  toStructured(): StructuredReport {
    return {
      ngrams: this.result.tables.map((table) => Object.fromEntries(table)),
      vowels: Object.fromEntries(this.result.vowels),
      consonants: Object.fromEntries(this.result.consonants),
    };
  }

  /**
   * Top `topK` n-grams of length `n` by descending weight.
   *
   * Ties keep the table's insertion order (Array.prototype.sort is stable),
   * i.e. the order in which the n-grams were first seen in the source.
   */
  rank(n: number, topK: number): RankedNGram[] {
    assertTopK(topK);
    const table = this.result.tables[n];
    if (!table) return [];

    const total = this.result.totals[n] ?? 0;
    return [...table]
      .sort((a, b) => b[1] - a[1])
      .slice(0, topK)
      .map(([ngram, weight]) => ({
        ngram,
        weight,
        // Zero total (e.g. every weight is 0) reports 0% instead of NaN
        percent: total === 0 ? 0 : (weight / total) * 100,
      }));
  }

  /** Sum of every per-length total */
  grandTotal(): number {
    let sum = 0;
    for (const total of this.result.totals) {
      sum += total;
    }
    return sum;
  }

  toText(topK: number): string {
    assertTopK(topK);
    const lines: string[] = [`Total words processed: ${this.result.wordCount}`];

    this.result.tables.forEach((table, n) => {
      if (table.size === 0) return;

      lines.push(`Total ${n}-grams counted: ${table.size}`);
      lines.push(`Top ${topK} ${n}-grams:`);
      for (const { ngram, weight, percent } of this.rank(n, topK)) {
        lines.push(`${ngram}: ${formatNumber(weight)} (${formatNumber(percent)}%)`);
      }
      lines.push('');
    });

    lines.push(`Total weight of n-grams processed: ${formatNumber(this.grandTotal())}`);
    return lines.join('\n') + '\n';
  }
}
