/**
 * N-gram Types - tables produced by a single analysis pass
 */

// === SOURCE ===
/**
 * One entry of a weighted lexicon.
 * Words are lowercase ASCII letters; the weight sign is not constrained.
 */
export type WordWeight = readonly [word: string, weight: number];

/**
 * Anything that yields (word, weight) pairs once, in a stable order.
 * A `Map<string, number>` satisfies it.
 */
export type WordWeightSource = Iterable<WordWeight>;

// === TABLES ===
/**
 * N-gram (symbol string) → accumulated weight.
 */
export type FrequencyTable = ReadonlyMap<string, number>;

/**
 * Tables indexed by n-gram length. Index 0 is always an empty table.
 */
export type FrequencyTables = readonly FrequencyTable[];

/**
 * Vowel-only and consonant-only n-grams pooled across every length.
 */
export interface ClassifiedTables {
  vowels: FrequencyTable;
  vowelTotal: number;
  consonants: FrequencyTable;
  consonantTotal: number;
}

// === RESULT ===
export interface AnalysisResult extends ClassifiedTables {
  /** Number of (word, weight) pairs consumed */
  wordCount: number;
  tables: FrequencyTables;
  /** totals[n] is the summed weight of every entry in tables[n] */
  totals: readonly number[];
}
