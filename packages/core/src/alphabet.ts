/**
 * Symbol alphabet for normalized words.
 *
 * Plain symbols are the lowercase letters a-z. Synthetic symbols are single
 * uppercase characters, so they never collide with a letter:
 *
 *   Q = "qu"
 *   Y = a "y" merged with the character before it
 *   W = a "w" merged with the vowel before it
 */

export const Q_SYMBOL = 'Q';
export const Y_SYMBOL = 'Y';
export const W_SYMBOL = 'W';

export type SyntheticSymbol = typeof Q_SYMBOL | typeof Y_SYMBOL | typeof W_SYMBOL;

/** Vowels in order of frequency in English, then the synthetic vowels */
export const VOWEL_SYMBOLS = 'eoaiu' + Y_SYMBOL + W_SYMBOL;

/** Consonants in order of frequency in English, then the synthetic consonant */
export const CONSONANT_SYMBOLS = 'tnhsrldymwgcfbpkvjxzq' + Q_SYMBOL;

export const VOWELS: ReadonlySet<string> = new Set(VOWEL_SYMBOLS);
export const CONSONANTS: ReadonlySet<string> = new Set(CONSONANT_SYMBOLS);

/** Vowels that merge with a following "y" */
export const Y_TRIGGER_VOWELS: ReadonlySet<string> = new Set('aeou');

/** Vowels that merge with a following "w" */
export const W_TRIGGER_VOWELS: ReadonlySet<string> = new Set('aeo');

const SYNTHETIC_SPELLING: Record<SyntheticSymbol, string> = {
  [Q_SYMBOL]: 'qu',
  [Y_SYMBOL]: '_y',
  [W_SYMBOL]: '_w',
};

export function isSyntheticSymbol(symbol: string): symbol is SyntheticSymbol {
  return symbol === Q_SYMBOL || symbol === Y_SYMBOL || symbol === W_SYMBOL;
}

/**
 * Human-readable spelling of a symbol: plain letters as-is, synthetic
 * symbols as the raw sequence they replace ("_" marks the absorbed
 * preceding character).
 */
export function describeSymbol(symbol: string): string {
  return isSyntheticSymbol(symbol) ? SYNTHETIC_SPELLING[symbol] : symbol;
}
