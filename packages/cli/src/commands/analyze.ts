/**
 * Analyze command - n-gram frequency report for a word dataset
 */

import { Command } from 'commander';
import { runAnalyze, exitWithCode, type AnalyzeOptions } from './analyzeAction.js';

export const analyzeCommand = new Command('analyze')
  .description('Count weighted n-grams in a word dataset')
  .option('--subtlex <path>', 'SUBTLEX CSV file to load')
  .option('--words <path>', 'Word list file to load ("word" or "word weight" per line)')
  .option('--column <name>', 'Column used as word weight (default: SUBTLWF, or Weight for word lists)')
  .option('-k, --top <k>', 'Top K n-grams to display per length (1-100)')
  .option('-j, --json', 'Output all tables as JSON')
  .option('-p, --project <path>', 'Directory holding .lexigram/config.yaml', '.')
  .option('-q, --quiet', 'Suppress log output')
  .option('-v, --verbose', 'Show debug logging')
  .option('--log-level <level>', 'Set log level (silent, errors, warnings, info, debug)')
  .option('--log-file <path>', 'Write all log output to a file')
  .addHelpText('after', `
Examples:
  lexigram analyze --subtlex SUBTLEXus.csv          Top 10 n-grams per length
  lexigram analyze --subtlex SUBTLEXus.csv -k 25    Top 25 n-grams per length
  lexigram analyze --subtlex SUBTLEXus.csv --json   Full tables as JSON
  lexigram analyze --words words.txt                Analyze a plain word list
  lexigram analyze --subtlex data.csv --column FREQcount

Logs go to stderr; the report is the only thing written to stdout.
`)
  .action(async (options: AnalyzeOptions) => {
    exitWithCode(await runAnalyze(options));
  });
