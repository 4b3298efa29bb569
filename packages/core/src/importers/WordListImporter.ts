/**
 * WordListImporter - loads a flat word list
 *
 * One entry per line: `word` or `word <weight>`, separated by whitespace.
 * A missing weight counts as 1; a given weight must be a finite number.
 * Blank lines and lines starting with "#" are ignored. Words are lowercased;
 * a repeated word keeps its first weight and the repeat is logged as a
 * warning.
 */

import type { DatasetImporter, DatasetValue, Logger } from '@lexigram/types';
import { DatasetError } from '../errors/LexigramError.js';
import { NULL_LOGGER } from '../logging/Logger.js';
import { readDatasetLines, toDatasetWord } from './datasetFile.js';

export const WORD_LIST_COLUMNS = ['Word', 'Weight'] as const;

export const DEFAULT_WORD_WEIGHT = 1;

export interface WordListImporterOptions {
  logger?: Logger;
}

export class WordListImporter implements DatasetImporter {
  private readonly weights = new Map<string, number>();
  /** Repeated words that were skipped */
  readonly duplicates: string[] = [];

  constructor(readonly path: string, options: WordListImporterOptions = {}) {
    const logger = options.logger ?? NULL_LOGGER;
    const lines = readDatasetLines(path);

    lines.forEach((line, index) => {
      const trimmed = line.trim();
      if (trimmed === '' || trimmed.startsWith('#')) return;

      const lineNumber = index + 1;
      const fields = trimmed.split(/\s+/);
      if (fields.length > 2) {
        throw new DatasetError(
          `Expected "word" or "word weight", got ${fields.length} fields`,
          'ERR_DATASET_ROW',
          { filePath: path, lineNumber }
        );
      }

      const word = toDatasetWord(fields[0], path, lineNumber);
      const weight = fields.length === 2 ? Number(fields[1]) : DEFAULT_WORD_WEIGHT;
      if (!Number.isFinite(weight)) {
        throw new DatasetError(
          `Failed to parse weight '${fields[1]}' for word '${word}'`,
          'ERR_VALUE_PARSE',
          { filePath: path, lineNumber, word, column: 'Weight' }
        );
      }

      if (this.weights.has(word)) {
        this.duplicates.push(word);
        logger.warn(`Duplicate word skipped: ${word}`, { lineNumber });
        return;
      }
      this.weights.set(word, weight);
    });
  }

  get size(): number {
    return this.weights.size;
  }

  columns(): string[] {
    return [...WORD_LIST_COLUMNS];
  }

  get(column: string): Map<string, DatasetValue> {
    const result = new Map<string, DatasetValue>();
    if (column === 'Word') {
      for (const word of this.weights.keys()) result.set(word, word);
    } else if (column === 'Weight') {
      for (const [word, weight] of this.weights) result.set(word, weight);
    }
    return result;
  }
}
