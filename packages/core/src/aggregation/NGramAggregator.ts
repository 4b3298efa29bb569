/**
 * NGramAggregator - accumulates weighted n-gram counts per length
 *
 * For each (word, weight) the word is normalized, then every contiguous
 * substring of the normalized word adds `weight` to its entry in the table
 * for its length, and to that length's running total.
 *
 * Totals are summed in the same order entries are updated, so the same
 * input order always gives bit-identical tables and totals. A different
 * input order (or merging shards) may differ by floating-point rounding.
 */

import type { FrequencyTables, Logger, WordWeightSource } from '@lexigram/types';
import { normalize } from '../normalize/SequenceNormalizer.js';
import { InvalidWordError } from '../errors/LexigramError.js';
import { NULL_LOGGER } from '../logging/Logger.js';

const WORD_PATTERN = /^[a-z]+$/;

/** Words between two progress log lines */
export const PROGRESS_INTERVAL = 10_000;

export function isValidWord(word: string): boolean {
  return WORD_PATTERN.test(word);
}

export interface NGramAggregatorOptions {
  logger?: Logger;
}

export class NGramAggregator {
  // Index 0 is never filled: there are no 0-grams
  private readonly ngramTables: Map<string, number>[] = [new Map()];
  private readonly ngramTotals: number[] = [0];
  private readonly logger: Logger;
  private words = 0;

  constructor(options: NGramAggregatorOptions = {}) {
    this.logger = options.logger ?? NULL_LOGGER;
  }

  get wordCount(): number {
    return this.words;
  }

  /** Longest normalized word seen so far */
  get maxLength(): number {
    return this.ngramTables.length - 1;
  }

  add(word: string, weight: number): void {
    if (!isValidWord(word)) {
      throw new InvalidWordError(word);
    }

    const symbols = normalize(word);
    const length = symbols.length;
    this.ensureLength(length);

    for (let n = 1; n <= length; n++) {
      const table = this.ngramTables[n];
      for (let i = 0; i <= length - n; i++) {
        const gram = symbols.slice(i, i + n);
        table.set(gram, (table.get(gram) ?? 0) + weight);
        this.ngramTotals[n] += weight;
      }
    }

    this.words++;
    if (this.words % PROGRESS_INTERVAL === 0) {
      this.logger.debug(`Processed ${this.words} words...`);
    }
  }

  addAll(source: WordWeightSource): void {
    for (const [word, weight] of source) {
      this.add(word, weight);
    }
  }

  /**
   * Add another aggregator's tables into this one, key by key.
   * Used to combine shards aggregated separately.
   */
  merge(other: NGramAggregator): void {
    const otherTables = other.tables();
    const otherTotals = other.totals();
    this.ensureLength(otherTables.length - 1);

    for (let n = 1; n < otherTables.length; n++) {
      const table = this.ngramTables[n];
      for (const [gram, weight] of otherTables[n]) {
        table.set(gram, (table.get(gram) ?? 0) + weight);
      }
      this.ngramTotals[n] += otherTotals[n];
    }
    this.words += other.wordCount;
  }

  tables(): FrequencyTables {
    return this.ngramTables;
  }

  totals(): readonly number[] {
    return this.ngramTotals;
  }

  private ensureLength(length: number): void {
    while (this.ngramTables.length <= length) {
      this.ngramTables.push(new Map());
      this.ngramTotals.push(0);
    }
  }
}
