/**
 * ReportBuilder Tests
 *
 * Tests:
 * - Structured report emits every table in full
 * - Ranking: descending weight, percentages, topK larger than the table
 * - Text layout, skipped empty lengths, grand total
 * - Zero totals and out-of-range topK
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  analyze,
  ReportBuilder,
  formatNumber,
  InvalidParameterError,
  type AnalysisResult,
} from '@lexigram/core';

const catCan = (): AnalysisResult => analyze(new Map([['cat', 10], ['can', 5]]));

describe('formatNumber', () => {
  it('should print integers without a fraction', () => {
    assert.equal(formatNumber(15), '15');
    assert.equal(formatNumber(0), '0');
    assert.equal(formatNumber(-4), '-4');
  });

  it('should keep six significant digits', () => {
    assert.equal(formatNumber(100 / 3), '33.3333');
    assert.equal(formatNumber(0.5), '0.5');
    assert.equal(formatNumber(1234567), '1234570');
    assert.equal(formatNumber(0.000123456789), '0.000123457');
  });

  it('should print non-finite values as-is', () => {
    assert.equal(formatNumber(Number.NaN), 'NaN');
    assert.equal(formatNumber(Number.POSITIVE_INFINITY), 'Infinity');
  });
});

describe('ReportBuilder', () => {
  describe('toStructured', () => {
    it('should emit every table without truncation', () => {
      const report = new ReportBuilder(analyze(new Map([['boy', 1]]))).toStructured();

      assert.deepEqual(report, {
        ngrams: [{}, { b: 1, Y: 1 }, { bY: 1 }],
        vowels: { Y: 1 },
        consonants: { b: 1 },
      });
    });

    it('should survive a JSON round trip', () => {
      const report = new ReportBuilder(catCan()).toStructured();
      const parsed: unknown = JSON.parse(JSON.stringify(report));

      assert.deepEqual(parsed, {
        ngrams: [{}, { c: 15, a: 15, t: 10, n: 5 }, { ca: 15, at: 10, an: 5 }, { cat: 10, can: 5 }],
        vowels: { a: 15 },
        consonants: { c: 15, t: 10, n: 5 },
      });
    });
  });

  describe('rank', () => {
    it('should sort by descending weight with percentages of the length total', () => {
      const ranked = new ReportBuilder(catCan()).rank(3, 10);

      assert.deepEqual(ranked.map((r) => r.ngram), ['cat', 'can']);
      assert.deepEqual(ranked.map((r) => r.weight), [10, 5]);
      assert.equal(formatNumber(ranked[0].percent), '66.6667');
      assert.equal(formatNumber(ranked[1].percent), '33.3333');
    });

    it('should return only what exists when topK exceeds the table', () => {
      const ranked = new ReportBuilder(catCan()).rank(3, 10);
      assert.equal(ranked.length, 2);
    });

    it('should truncate to topK', () => {
      const ranked = new ReportBuilder(catCan()).rank(2, 2);
      assert.deepEqual(ranked.map((r) => r.ngram), ['ca', 'at']);
    });

    it('should give percentages summing to 100 across a whole length', () => {
      const result = analyze(new Map([['quietly', 3.5], ['window', 1.25], ['rhythm', 0.4], ['eye', 2]]));
      const builder = new ReportBuilder(result);

      for (let n = 1; n < result.tables.length; n++) {
        const sum = builder.rank(n, 100).reduce((acc, r) => acc + r.percent, 0);
        if (result.tables[n].size <= 100) {
          assert.ok(Math.abs(sum - 100) < 1e-9, `length ${n}: ${sum}`);
        }
      }
    });

    it('should report 0% when the length total is zero', () => {
      const ranked = new ReportBuilder(analyze(new Map([['ab', 0]]))).rank(1, 5);
      // Both entries tie at 0; compare independent of tie order
      ranked.sort((x, y) => x.ngram.localeCompare(y.ngram));

      assert.deepEqual(ranked, [
        { ngram: 'a', weight: 0, percent: 0 },
        { ngram: 'b', weight: 0, percent: 0 },
      ]);
    });

    it('should return nothing for a length beyond the longest word', () => {
      assert.deepEqual(new ReportBuilder(catCan()).rank(9, 5), []);
    });
  });

  describe('toText', () => {
    it('should render every non-empty length with the grand total', () => {
      // Distinct weights at every length, so the order is fully determined
      const result = analyze(new Map([['cat', 10], ['at', 4], ['t', 1]]));

      const text = new ReportBuilder(result).toText(10);

      assert.equal(text, [
        'Total words processed: 3',
        'Total 1-grams counted: 3',
        'Top 10 1-grams:',
        't: 15 (38.4615%)',
        'a: 14 (35.8974%)',
        'c: 10 (25.641%)',
        '',
        'Total 2-grams counted: 2',
        'Top 10 2-grams:',
        'at: 14 (58.3333%)',
        'ca: 10 (41.6667%)',
        '',
        'Total 3-grams counted: 1',
        'Top 10 3-grams:',
        'cat: 10 (100%)',
        '',
        'Total weight of n-grams processed: 73',
        '',
      ].join('\n'));
    });

    it('should truncate each length to topK', () => {
      const result = analyze(new Map([['cat', 10], ['at', 4], ['t', 1]]));

      const lines = new ReportBuilder(result).toText(1).split('\n');

      assert.deepEqual(lines.filter((line) => line.includes('%')), [
        't: 15 (38.4615%)',
        'at: 14 (58.3333%)',
        'cat: 10 (100%)',
      ]);
    });

    it('should skip empty lengths but keep their numbering', () => {
      const result: AnalysisResult = {
        wordCount: 1,
        tables: [new Map(), new Map(), new Map([['ab', 2]])],
        totals: [0, 0, 2],
        vowels: new Map(),
        vowelTotal: 0,
        consonants: new Map(),
        consonantTotal: 0,
      };

      const text = new ReportBuilder(result).toText(1);

      assert.equal(text, [
        'Total words processed: 1',
        'Total 2-grams counted: 1',
        'Top 1 2-grams:',
        'ab: 2 (100%)',
        '',
        'Total weight of n-grams processed: 2',
        '',
      ].join('\n'));
    });

    it('should render an empty analysis', () => {
      const text = new ReportBuilder(analyze([])).toText(5);

      assert.equal(text, 'Total words processed: 0\nTotal weight of n-grams processed: 0\n');
    });
  });

  describe('topK validation', () => {
    for (const topK of [0, 101, 2.5, -1, Number.NaN]) {
      it(`should reject topK ${topK}`, () => {
        const builder = new ReportBuilder(catCan());
        assert.throws(() => builder.toText(topK), (err: unknown) => {
          assert.ok(err instanceof InvalidParameterError);
          assert.equal(err.code, 'ERR_TOPK_OUT_OF_RANGE');
          return true;
        });
        assert.throws(() => builder.rank(1, topK), InvalidParameterError);
      });
    }

    it('should accept both bounds', () => {
      const builder = new ReportBuilder(catCan());
      assert.equal(builder.rank(1, 1).length, 1);
      assert.equal(builder.rank(1, 100).length, 4);
    });
  });
});
