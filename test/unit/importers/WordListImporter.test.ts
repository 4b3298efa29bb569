/**
 * WordListImporter Tests
 *
 * Tests:
 * - "word" and "word weight" lines, comments, blank lines
 * - Repeated words keep the first weight and are logged
 * - Malformed lines fail with their line number
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
  WordListImporter,
  DEFAULT_WORD_WEIGHT,
  openDataset,
  toWordWeights,
  DatasetError,
  type Logger,
} from '@lexigram/core';

interface LoggedWarning {
  message: string;
  context?: Record<string, unknown>;
}

function createLoggerMock(): Logger & { warnings: LoggedWarning[] } {
  const warnings: LoggedWarning[] = [];
  return {
    warnings,
    error: () => undefined,
    warn: (message, context) => {
      warnings.push({ message, context });
    },
    info: () => undefined,
    debug: () => undefined,
    trace: () => undefined,
  };
}

describe('WordListImporter', () => {
  let testDir: string;
  let listPath: string;

  const writeList = (lines: string[]): void => {
    writeFileSync(listPath, lines.join('\n'));
  };

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'lexigram-words-'));
    listPath = join(testDir, 'words.txt');
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should load weighted and unweighted words', () => {
    writeList(['# sample list', 'cat 10', 'Can\t5', '', 'dog', '']);

    const words = new WordListImporter(listPath);

    assert.equal(words.size, 3);
    assert.deepEqual(words.get('Weight'), new Map([['cat', 10], ['can', 5], ['dog', DEFAULT_WORD_WEIGHT]]));
    assert.deepEqual(words.duplicates, []);
  });

  it('should parse fractional and exponent weights', () => {
    writeList(['owl 0.25', 'elk 1e2', 'yak -3']);

    assert.deepEqual(new WordListImporter(listPath).get('Weight'), new Map([['owl', 0.25], ['elk', 100], ['yak', -3]]));
  });

  it('should expose Word and Weight columns', () => {
    writeList(['cat 2']);
    const words = new WordListImporter(listPath);

    assert.deepEqual(words.columns(), ['Word', 'Weight']);
    assert.deepEqual(words.get('Word'), new Map([['cat', 'cat']]));
    assert.equal(words.get('Frequency').size, 0);
  });

  it('should keep the first weight of a repeated word and warn', () => {
    writeList(['cat 10', 'dog', 'Cat 3']);
    const logger = createLoggerMock();

    const words = new WordListImporter(listPath, { logger });

    assert.deepEqual(words.get('Weight'), new Map([['cat', 10], ['dog', 1]]));
    assert.deepEqual(words.duplicates, ['cat']);
    assert.deepEqual(logger.warnings, [
      { message: 'Duplicate word skipped: cat', context: { lineNumber: 3 } },
    ]);
  });

  it('should reject a line with too many fields', () => {
    writeList(['cat 1', 'ice cream 4']);

    assert.throws(() => new WordListImporter(listPath), (err: unknown) => {
      assert.ok(err instanceof DatasetError);
      assert.equal(err.code, 'ERR_DATASET_ROW');
      assert.equal(err.context.lineNumber, 2);
      return true;
    });
  });

  it('should reject an unparseable weight', () => {
    writeList(['cat lots']);

    assert.throws(() => new WordListImporter(listPath), {
      code: 'ERR_VALUE_PARSE',
      message: "Failed to parse weight 'lots' for word 'cat'",
    });
  });

  for (const weight of ['Infinity', '-Infinity', '1e999']) {
    it(`should reject the non-finite weight ${weight}`, () => {
      writeList(['dog 2', `cat ${weight}`]);

      assert.throws(() => new WordListImporter(listPath), (err: unknown) => {
        assert.ok(err instanceof DatasetError);
        assert.equal(err.code, 'ERR_VALUE_PARSE');
        assert.equal(err.context.lineNumber, 2);
        assert.equal(err.message, `Failed to parse weight '${weight}' for word 'cat'`);
        return true;
      });
    });
  }

  it('should reject a word with non-letters', () => {
    writeList(['# header', 'cafe2 1']);

    assert.throws(() => new WordListImporter(listPath), (err: unknown) => {
      assert.ok(err instanceof DatasetError);
      assert.equal(err.code, 'ERR_INVALID_WORD');
      assert.equal(err.context.lineNumber, 2);
      assert.equal(err.context.word, 'cafe2');
      return true;
    });
  });

  it('should reject an empty file', () => {
    writeFileSync(listPath, '');

    assert.throws(() => new WordListImporter(listPath), { code: 'ERR_DATASET_EMPTY' });
  });

  it('should feed toWordWeights through openDataset', () => {
    writeList(['quit 2', 'boy']);

    const weights = toWordWeights(openDataset('wordlist', listPath), 'Weight');

    assert.deepEqual(weights, new Map([['quit', 2], ['boy', 1]]));
  });

  it('should reject the Word column as a weight', () => {
    writeList(['cat 2']);

    assert.throws(() => toWordWeights(openDataset('wordlist', listPath), 'Word'), {
      code: 'ERR_COLUMN_NOT_NUMERIC',
    });
  });
});
