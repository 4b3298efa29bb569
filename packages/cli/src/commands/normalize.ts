/**
 * Normalize command - show how words collapse into symbols
 *
 * Helps when reading a report: "Q", "Y" and "W" in n-grams are synthetic
 * symbols, and this prints which raw sequences produced them.
 */

import { Command } from 'commander';
import { normalize, describeSymbol, isSyntheticSymbol, isValidWord, InvalidWordError } from '@lexigram/core';
import { exitWithError } from '../utils/errorFormatter.js';

export interface NormalizedWord {
  word: string;
  normalized: string;
}

/**
 * Lowercase and normalize each word.
 * @throws InvalidWordError for a word that is not made of letters a-z
 */
export function normalizeWords(words: string[]): NormalizedWord[] {
  return words.map((raw) => {
    const word = raw.toLowerCase();
    if (!isValidWord(word)) {
      throw new InvalidWordError(raw);
    }
    return { word, normalized: normalize(word) };
  });
}

/**
 * `quit → Qit  [qu i t]` - the bracketed spelling appears only when a
 * synthetic symbol is present.
 */
export function formatNormalizedLine({ word, normalized }: NormalizedWord): string {
  const symbols = [...normalized];
  const line = `${word} → ${normalized}`;
  if (!symbols.some(isSyntheticSymbol)) {
    return line;
  }
  return `${line}  [${symbols.map(describeSymbol).join(' ')}]`;
}

export function formatNormalized(entries: NormalizedWord[], json: boolean): string {
  if (json) {
    const mapping = Object.fromEntries(entries.map(({ word, normalized }) => [word, normalized]));
    return JSON.stringify(mapping, null, 2) + '\n';
  }
  return entries.map((entry) => formatNormalizedLine(entry) + '\n').join('');
}

export const normalizeCommand = new Command('normalize')
  .description('Show the normalized symbol form of words')
  .argument('<words...>', 'Words to normalize')
  .option('-j, --json', 'Output as JSON')
  .addHelpText('after', `
Symbols:
  Q  "qu"
  Y  "y" after a, e, o, u or a consonant (the pair becomes one symbol)
  W  "w" after a, e or o

Examples:
  lexigram normalize quit boy cow     quit → Qit, boy → bY, cow → cW
`)
  .action((words: string[], options: { json?: boolean }) => {
    let entries: NormalizedWord[];
    try {
      entries = normalizeWords(words);
    } catch (err) {
      if (err instanceof InvalidWordError) {
        exitWithError(err.message, ['Words may only contain the letters a-z']);
      }
      throw err;
    }
    process.stdout.write(formatNormalized(entries, options.json ?? false));
  });
