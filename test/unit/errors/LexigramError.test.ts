/**
 * LexigramError Hierarchy Tests
 *
 * Tests:
 * - Every concrete error extends Error and LexigramError
 * - code, severity, message, context and suggestion are set
 * - toJSON() returns the serializable form
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  LexigramError,
  ConfigError,
  FileAccessError,
  DatasetError,
  InvalidWordError,
  InvalidParameterError,
  type ErrorContext,
} from '@lexigram/core';

// =============================================================================
// TESTS: LexigramError Base Class
// =============================================================================

describe('LexigramError', () => {
  it('should sit between Error and the concrete classes', () => {
    const error = new DatasetError('File is empty: words.txt', 'ERR_DATASET_EMPTY');

    assert.ok(error instanceof Error);
    assert.ok(error instanceof LexigramError);
    assert.equal(error.name, 'DatasetError');
    assert.ok(error.stack?.includes('File is empty: words.txt'));
  });

  it('should default to an empty context and no suggestion', () => {
    const error = new ConfigError('Config error: logLevel must be a string', 'ERR_CONFIG_INVALID');

    assert.deepEqual(error.context, {});
    assert.equal(error.suggestion, undefined);
  });

  // ===========================================================================
  // TESTS: Concrete errors
  // ===========================================================================

  it('ConfigError should be fatal', () => {
    const error = new ConfigError('Config error: report.topK must be an integer', 'ERR_CONFIG_INVALID', { key: 'report.topK' });

    assert.equal(error.code, 'ERR_CONFIG_INVALID');
    assert.equal(error.severity, 'fatal');
    assert.deepEqual(error.context, { key: 'report.topK' });
  });

  it('FileAccessError should be fatal and keep its suggestion', () => {
    const error = new FileAccessError(
      'Cannot open file: data.csv',
      'ERR_FILE_UNREADABLE',
      { filePath: '/tmp/data.csv' },
      'Check the dataset path'
    );

    assert.equal(error.severity, 'fatal');
    assert.equal(error.context.filePath, '/tmp/data.csv');
    assert.equal(error.suggestion, 'Check the dataset path');
  });

  it('DatasetError should carry file position', () => {
    const context: ErrorContext = { filePath: 'data.csv', lineNumber: 7, column: 'SUBTLWF' };
    const error = new DatasetError("Failed to parse value 'x' for column 'SUBTLWF'", 'ERR_VALUE_PARSE', context);

    assert.equal(error.severity, 'fatal');
    assert.equal(error.context.lineNumber, 7);
    assert.equal(error.context.column, 'SUBTLWF');
  });

  it('InvalidWordError should name the word', () => {
    const error = new InvalidWordError('Paris');

    assert.equal(error.code, 'ERR_INVALID_WORD');
    assert.equal(error.severity, 'error');
    assert.equal(error.message, 'Invalid word "Paris": expected one or more lowercase letters a-z');
    assert.deepEqual(error.context, { word: 'Paris' });
    assert.equal(error.suggestion, 'Load words through SubtlexImporter or WordListImporter, which validate them');
  });

  it('InvalidParameterError should be an error, not fatal', () => {
    const error = new InvalidParameterError('topK must be an integer between 1 and 100, got 0', 'ERR_TOPK_OUT_OF_RANGE', { topK: 0 });

    assert.equal(error.code, 'ERR_TOPK_OUT_OF_RANGE');
    assert.equal(error.severity, 'error');
  });

  // ===========================================================================
  // TESTS: toJSON
  // ===========================================================================

  describe('toJSON', () => {
    it('should return code, severity, message, context and suggestion', () => {
      const error = new DatasetError(
        'Unknown column: Frequency',
        'ERR_COLUMN_UNKNOWN',
        { column: 'Frequency' },
        'Available columns: Word, Weight'
      );

      assert.deepEqual(error.toJSON(), {
        code: 'ERR_COLUMN_UNKNOWN',
        severity: 'fatal',
        message: 'Unknown column: Frequency',
        context: { column: 'Frequency' },
        suggestion: 'Available columns: Word, Weight',
      });
    });

    it('should be used by JSON.stringify', () => {
      const error = new InvalidWordError('x1');

      assert.deepEqual(JSON.parse(JSON.stringify(error)), {
        code: 'ERR_INVALID_WORD',
        severity: 'error',
        message: 'Invalid word "x1": expected one or more lowercase letters a-z',
        context: { word: 'x1' },
        suggestion: 'Load words through SubtlexImporter or WordListImporter, which validate them',
      });
    });
  });
});
