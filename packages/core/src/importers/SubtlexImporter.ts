/**
 * SubtlexImporter - loads a SUBTLEX word-frequency CSV with typed columns
 *
 * The header must name exactly the SUBTLEX columns, in any order. Each row
 * is parsed by column type, words are lowercased, and empty, non-alphabetic
 * or repeated words are rejected.
 *
 * Fields are split on "," with no quoting support.
 *
 * Usage:
 *   const subtlex = new SubtlexImporter('SUBTLEXus.csv');
 *   const perMillion = subtlex.get('SUBTLWF'); // Map<word, number>
 */

import type { ColumnType, DatasetImporter, DatasetValue } from '@lexigram/types';
import { DatasetError } from '../errors/LexigramError.js';
import { readDatasetLines, toDatasetWord } from './datasetFile.js';

/**
 * | Column               | Meaning                                                        |
 * |----------------------|----------------------------------------------------------------|
 * | FREQcount            | Occurrences in the subtitle corpus                             |
 * | CDcount              | Number of films (documents) containing the word                |
 * | FREQlow / Cdlow      | Same two counts restricted to the lowercase form               |
 * | SUBTLWF              | Frequency per million words                                    |
 * | Lg10WF               | log10(FREQcount + 1)                                           |
 * | SUBTLCD              | Percentage of films containing the word                        |
 * | Lg10CD               | log10(CDcount + 1)                                             |
 * | Dom_PoS_SUBTLEX      | Dominant part of speech                                        |
 * | Freq_dom_PoS_SUBTLEX | Count for the dominant part of speech                          |
 * | Percentage_dom_PoS   | Share of occurrences in the dominant part of speech            |
 * | All_PoS_SUBTLEX      | Every part of speech the word takes                            |
 * | All_freqs_SUBTLEX    | Counts matching All_PoS_SUBTLEX                                |
 * | Zipf-value           | Zipf-scale frequency                                           |
 */
export const SUBTLEX_COLUMNS: Readonly<Record<string, ColumnType>> = {
  Word: 'string',
  FREQcount: 'int',
  CDcount: 'int',
  FREQlow: 'int',
  Cdlow: 'int',
  SUBTLWF: 'double',
  Lg10WF: 'double',
  SUBTLCD: 'double',
  Lg10CD: 'double',
  Dom_PoS_SUBTLEX: 'string',
  Freq_dom_PoS_SUBTLEX: 'int',
  Percentage_dom_PoS: 'double',
  All_PoS_SUBTLEX: 'string',
  All_freqs_SUBTLEX: 'string',
  'Zipf-value': 'double',
};

export const WORD_COLUMN = 'Word';

const INT_PATTERN = /^[+-]?\d+$/;

/** int columns hold signed 32-bit values */
const INT_MIN = -(2 ** 31);
const INT_MAX = 2 ** 31 - 1;

function splitCSVLine(line: string): string[] {
  return line.split(',');
}

/**
 * Check the header names exactly the SUBTLEX columns.
 */
export function validateColumnNames(names: string[], filePath: string): void {
  const expected = Object.keys(SUBTLEX_COLUMNS);
  const context = { filePath, lineNumber: 1 };

  if (names.length !== expected.length) {
    throw new DatasetError(
      `CSV header has incorrect number of columns: expected ${expected.length}, got ${names.length}`,
      'ERR_DATASET_COLUMNS',
      context
    );
  }

  const nameSet = new Set(names);
  for (const key of expected) {
    if (!nameSet.has(key)) {
      throw new DatasetError(`Missing required column: ${key}`, 'ERR_DATASET_COLUMNS', { ...context, column: key });
    }
  }
  for (const name of names) {
    if (!Object.hasOwn(SUBTLEX_COLUMNS, name)) {
      throw new DatasetError(`Unexpected column in CSV: ${name}`, 'ERR_DATASET_COLUMNS', { ...context, column: name });
    }
  }
}

/**
 * Parse one cell by its column type. Numbers that are malformed, infinite or
 * (for int columns) outside the 32-bit range come back as NaN.
 */
export function parseValue(value: string, type: ColumnType): DatasetValue {
  switch (type) {
    case 'int': {
      const trimmed = value.trim();
      if (!INT_PATTERN.test(trimmed)) return Number.NaN;
      const parsed = Number.parseInt(trimmed, 10);
      return parsed >= INT_MIN && parsed <= INT_MAX ? parsed : Number.NaN;
    }
    case 'double': {
      const trimmed = value.trim();
      const parsed = trimmed === '' ? Number.NaN : Number(trimmed);
      return Number.isFinite(parsed) ? parsed : Number.NaN;
    }
    case 'string':
      return value;
  }
}

export class SubtlexImporter implements DatasetImporter {
  private readonly columnNames: string[];
  private readonly columnIndices = new Map<string, number>();
  private readonly table: DatasetValue[][] = [];

  /**
   * @throws FileAccessError if the file cannot be opened
   * @throws DatasetError if the header, a row, a word or a value is invalid
   */
  constructor(readonly path: string) {
    const lines = readDatasetLines(path);

    this.columnNames = splitCSVLine(lines[0]);
    validateColumnNames(this.columnNames, path);
    this.columnNames.forEach((name, index) => this.columnIndices.set(name, index));

    const wordIdx = this.columnIndex(WORD_COLUMN);
    const seenWords = new Set<string>();

    for (let i = 1; i < lines.length; i++) {
      const line = lines[i];
      if (line === '') continue;

      const lineNumber = i + 1;
      const rawRow = splitCSVLine(line);
      if (rawRow.length !== this.columnNames.length) {
        throw new DatasetError(
          `Row has incorrect number of columns: expected ${this.columnNames.length}, got ${rawRow.length}`,
          'ERR_DATASET_ROW',
          { filePath: path, lineNumber }
        );
      }

      const word = toDatasetWord(rawRow[wordIdx], path, lineNumber);
      if (seenWords.has(word)) {
        throw new DatasetError(`Duplicate word in data: ${word}`, 'ERR_DUPLICATE_WORD', { filePath: path, lineNumber, word });
      }
      seenWords.add(word);
      rawRow[wordIdx] = word;

      this.table.push(rawRow.map((raw, col) => this.parseCell(raw, col, lineNumber)));
    }
  }

  get size(): number {
    return this.table.length;
  }

  columns(): string[] {
    return [...this.columnNames];
  }

  get(column: string): Map<string, DatasetValue> {
    const result = new Map<string, DatasetValue>();
    const colIdx = this.columnIndices.get(column);
    if (colIdx === undefined) {
      return result;
    }

    const wordIdx = this.columnIndex(WORD_COLUMN);
    for (const row of this.table) {
      result.set(String(row[wordIdx]), row[colIdx]);
    }
    return result;
  }

  private columnIndex(name: string): number {
    const index = this.columnIndices.get(name);
    if (index === undefined) {
      // validateColumnNames guarantees every SUBTLEX column is present
      throw new Error(`Column index missing for ${name}`);
    }
    return index;
  }

  private parseCell(raw: string, col: number, lineNumber: number): DatasetValue {
    const column = this.columnNames[col];
    const value = parseValue(raw, SUBTLEX_COLUMNS[column]);
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new DatasetError(
        `Failed to parse value '${raw}' for column '${column}'`,
        'ERR_VALUE_PARSE',
        { filePath: this.path, lineNumber, column }
      );
    }
    return value;
  }
}
