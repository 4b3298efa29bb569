/**
 * Shared helpers for dataset importers: reading the file and checking words.
 */

import { readFileSync, statSync } from 'fs';
import { resolve } from 'path';
import { FileAccessError, DatasetError } from '../errors/LexigramError.js';
import { isValidWord } from '../aggregation/NGramAggregator.js';

/**
 * Read a dataset file as lines. `\r\n` endings are accepted.
 * Throws FileAccessError when the path is missing, a directory or unreadable.
 */
export function readDatasetLines(path: string): string[] {
  const filePath = resolve(path);
  const stats = statSync(filePath, { throwIfNoEntry: false });

  if (!stats) {
    throw new FileAccessError(`Cannot open file: ${path}`, 'ERR_FILE_UNREADABLE', { filePath }, 'Check the dataset path');
  }
  if (stats.isDirectory()) {
    throw new FileAccessError(`Cannot open file: ${path} is a directory`, 'ERR_FILE_UNREADABLE', { filePath });
  }

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FileAccessError(`Cannot read file: ${path} (${message})`, 'ERR_FILE_UNREADABLE', { filePath });
  }

  if (content.length === 0) {
    throw new DatasetError(`File is empty: ${path}`, 'ERR_DATASET_EMPTY', { filePath });
  }

  return content.split(/\r?\n/);
}

/**
 * Lowercase a raw word and check that it is one or more letters a-z.
 */
export function toDatasetWord(raw: string, filePath: string, lineNumber: number): string {
  const word = raw.toLowerCase();
  if (!isValidWord(word)) {
    throw new DatasetError(`Invalid word in data: ${word}`, 'ERR_INVALID_WORD', { filePath, lineNumber, word });
  }
  return word;
}
