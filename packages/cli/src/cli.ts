#!/usr/bin/env node
/**
 * @lexigram/cli - CLI for the Lexigram n-gram toolkit
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { analyzeCommand } from './commands/analyze.js';
import { normalizeCommand } from './commands/normalize.js';

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: { version?: unknown } = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));

const program = new Command();

program
  .name('lexigram')
  .description('Weighted n-gram frequency analysis for word lists')
  .version(typeof pkg.version === 'string' ? pkg.version : '0.0.0');

program.addCommand(analyzeCommand);
program.addCommand(normalizeCommand);

await program.parseAsync();
