/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { LexigramError } from '@lexigram/core';

/**
 * Lines for an error title and its next steps.
 */
export function formatErrorLines(title: string, nextSteps?: string[]): string[] {
  const lines = [`✗ ${title}`];

  if (nextSteps && nextSteps.length > 0) {
    lines.push('');
    for (const step of nextSteps) {
      lines.push(`→ ${step}`);
    }
  }

  return lines;
}

/**
 * Lines for any thrown value. LexigramErrors contribute their location and
 * suggestion; anything else is reported as an unexpected failure.
 */
export function describeError(err: unknown): string[] {
  if (err instanceof LexigramError) {
    const steps: string[] = [];
    const { filePath, lineNumber } = err.context;
    if (filePath !== undefined) {
      steps.push(lineNumber !== undefined ? `At ${filePath}:${lineNumber}` : `In ${filePath}`);
    }
    if (err.suggestion) {
      steps.push(err.suggestion);
    }
    return formatErrorLines(`${err.message} [${err.code}]`, steps);
  }

  const message = err instanceof Error ? err.message : String(err);
  return formatErrorLines(`Analysis failed: ${message}`, ['Run with --log-level debug for details']);
}

/**
 * Print a standardized error message and exit.
 *
 * @param title - Main error message (should be under 80 chars)
 * @param nextSteps - Optional array of actionable suggestions
 *
 * @example
 * exitWithError('No dataset specified', [
 *   'Run: lexigram analyze --subtlex SUBTLEXus.csv'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  for (const line of formatErrorLines(title, nextSteps)) {
    console.error(line);
  }
  process.exit(1);
}
