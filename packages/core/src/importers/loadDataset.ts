/**
 * Open a dataset by format and turn one of its columns into word weights.
 */

import type { DatasetFormat, DatasetImporter, Logger } from '@lexigram/types';
import { DatasetError } from '../errors/LexigramError.js';
import { SubtlexImporter } from './SubtlexImporter.js';
import { WordListImporter } from './WordListImporter.js';

/** Column used when none is requested */
export const DEFAULT_COLUMNS: Record<DatasetFormat, string> = {
  subtlex: 'SUBTLWF',
  wordlist: 'Weight',
};

export function openDataset(format: DatasetFormat, path: string, logger?: Logger): DatasetImporter {
  switch (format) {
    case 'subtlex':
      return new SubtlexImporter(path);
    case 'wordlist':
      return new WordListImporter(path, { logger });
  }
}

/**
 * Numeric values of `column` keyed by word.
 *
 * @throws DatasetError ERR_COLUMN_UNKNOWN if the dataset has no such column
 * @throws DatasetError ERR_COLUMN_NOT_NUMERIC if any value is a string
 */
export function toWordWeights(importer: DatasetImporter, column: string): Map<string, number> {
  const columns = importer.columns();
  if (!columns.includes(column)) {
    throw new DatasetError(
      `Unknown column: ${column}`,
      'ERR_COLUMN_UNKNOWN',
      { column },
      `Available columns: ${columns.join(', ')}`
    );
  }

  const weights = new Map<string, number>();
  for (const [word, value] of importer.get(column)) {
    if (typeof value !== 'number') {
      throw new DatasetError(
        `Column ${column} is not numeric (word "${word}" has value "${value}")`,
        'ERR_COLUMN_NOT_NUMERIC',
        { column, word }
      );
    }
    weights.set(word, value);
  }
  return weights;
}
