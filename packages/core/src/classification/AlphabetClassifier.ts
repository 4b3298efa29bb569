/**
 * AlphabetClassifier - splits aggregated n-grams into vowel-only and
 * consonant-only tables.
 *
 * Tables are walked in ascending length. A qualifying n-gram is assigned,
 * not added, into its derived table, so if the same key were reached twice
 * the later length would win. Totals are summed from the final tables.
 */

import type { ClassifiedTables, FrequencyTables } from '@lexigram/types';
import { VOWELS, CONSONANTS } from '../alphabet.js';

function allIn(gram: string, alphabet: ReadonlySet<string>): boolean {
  if (gram.length === 0) return false;
  for (const symbol of gram) {
    if (!alphabet.has(symbol)) return false;
  }
  return true;
}

export function isVowelGram(gram: string): boolean {
  return allIn(gram, VOWELS);
}

export function isConsonantGram(gram: string): boolean {
  return allIn(gram, CONSONANTS);
}

function sumValues(table: ReadonlyMap<string, number>): number {
  let total = 0;
  for (const weight of table.values()) {
    total += weight;
  }
  return total;
}

export function classify(tables: FrequencyTables): ClassifiedTables {
  const vowels = new Map<string, number>();
  const consonants = new Map<string, number>();

  for (const table of tables) {
    for (const [gram, weight] of table) {
      if (isVowelGram(gram)) {
        vowels.set(gram, weight);
      } else if (isConsonantGram(gram)) {
        consonants.set(gram, weight);
      }
    }
  }

  return {
    vowels,
    vowelTotal: sumValues(vowels),
    consonants,
    consonantTotal: sumValues(consonants),
  };
}
