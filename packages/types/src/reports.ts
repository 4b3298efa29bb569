/**
 * Report Types
 */

export const REPORT_FORMATS = ['text', 'json'] as const;
const REPORT_FORMATS_LIST: readonly string[] = REPORT_FORMATS;

export type ReportFormat = typeof REPORT_FORMATS[number];

export function isReportFormat(value: unknown): value is ReportFormat {
  return typeof value === 'string' && REPORT_FORMATS_LIST.includes(value);
}

/** Inclusive bounds for the number of ranked n-grams shown per length */
export const TOP_K_MIN = 1;
export const TOP_K_MAX = 100;

export interface RankedNGram {
  ngram: string;
  weight: number;
  /** Share of the per-length total, 0-100. Zero when the total is zero. */
  percent: number;
}

/**
 * Machine-readable report. Tables are emitted in full, without percentages.
 */
export interface StructuredReport {
  /** ngrams[n] holds the length-n table; ngrams[0] is always empty */
  ngrams: Record<string, number>[];
  vowels: Record<string, number>;
  consonants: Record<string, number>;
}
