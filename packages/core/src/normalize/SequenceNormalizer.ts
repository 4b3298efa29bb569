/**
 * SequenceNormalizer - collapses two-character sequences into synthetic symbols
 *
 * Single left-to-right scan with one character of lookahead. At each
 * position the first matching rule wins and consumes both characters:
 *
 *   1. "q" + "u"                         → Q
 *   2. (a | e | o | u | consonant) + "y" → Y
 *   3. (a | e | o) + "w"                 → W
 *
 * Otherwise the current character is copied and the scan moves on by one.
 *
 * @example
 *   normalize('quit') // 'Qit'
 *   normalize('cry')  // 'cY'
 *   normalize('cow')  // 'cW'
 */

import {
  Q_SYMBOL,
  Y_SYMBOL,
  W_SYMBOL,
  CONSONANTS,
  Y_TRIGGER_VOWELS,
  W_TRIGGER_VOWELS,
} from '../alphabet.js';

/**
 * Synthetic symbol for the pair (c0, c1), or null when no rule applies.
 */
export function mergePair(c0: string, c1: string): string | null {
  if (c0 === 'q' && c1 === 'u') {
    return Q_SYMBOL;
  }
  if (c1 === 'y' && (Y_TRIGGER_VOWELS.has(c0) || CONSONANTS.has(c0))) {
    return Y_SYMBOL;
  }
  if (c1 === 'w' && W_TRIGGER_VOWELS.has(c0)) {
    return W_SYMBOL;
  }
  return null;
}

/**
 * Normalize a lowercase word into its symbol string.
 * The result is never longer than the input.
 */
export function normalize(word: string): string {
  let result = '';
  let i = 0;

  while (i < word.length) {
    const c0 = word[i];
    const merged = i + 1 < word.length ? mergePair(c0, word[i + 1]) : null;

    if (merged !== null) {
      result += merged;
      i += 2;
    } else {
      result += c0;
      i += 1;
    }
  }

  return result;
}
