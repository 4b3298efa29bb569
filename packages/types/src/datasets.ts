/**
 * Dataset Types - word frequency files consumed by the importers
 */

/** A parsed cell: int and double columns are numbers, the rest strings */
export type DatasetValue = number | string;

export type ColumnType = 'int' | 'double' | 'string';

export const DATASET_FORMATS = ['subtlex', 'wordlist'] as const;
const DATASET_FORMATS_LIST: readonly string[] = DATASET_FORMATS;

export type DatasetFormat = typeof DATASET_FORMATS[number];

export function isDatasetFormat(value: unknown): value is DatasetFormat {
  return typeof value === 'string' && DATASET_FORMATS_LIST.includes(value);
}

/**
 * Common interface for word datasets where each row holds a word and
 * typed column values.
 */
export interface DatasetImporter {
  /** Number of words loaded */
  readonly size: number;
  /** Column names in file order */
  columns(): string[];
  /**
   * Value of `column` for every word.
   * Returns an empty map when the column does not exist.
   */
  get(column: string): Map<string, DatasetValue>;
}
