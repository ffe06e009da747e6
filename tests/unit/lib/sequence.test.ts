/**
 * Unit tests for sequence parsing
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { formatSequence, parseSequence } from '../../../src/lib/sequence.js';
import { SequenceError } from '../../../src/core/errors.js';

describe('parseSequence', () => {
  it('should parse single numbers', () => {
    assert.deepStrictEqual(parseSequence('4'), [4]);
  });

  it('should parse a comma separated list in sorted order', () => {
    assert.deepStrictEqual(parseSequence('5,1,3'), [1, 3, 5]);
  });

  it('should expand ranges written with .., : and -', () => {
    assert.deepStrictEqual(parseSequence('1..3'), [1, 2, 3]);
    assert.deepStrictEqual(parseSequence('2:4'), [2, 3, 4]);
    assert.deepStrictEqual(parseSequence('7-8'), [7, 8]);
  });

  it('should merge overlapping tokens without duplicates', () => {
    assert.deepStrictEqual(parseSequence('1..3, 2, 3..5'), [1, 2, 3, 4, 5]);
  });

  it('should ignore whitespace and empty tokens', () => {
    assert.deepStrictEqual(parseSequence(' 1 , , 2 .. 3 ,'), [1, 2, 3]);
  });

  it('should return an empty list for empty input', () => {
    assert.deepStrictEqual(parseSequence(''), []);
  });

  it('should accept a single-element range', () => {
    assert.deepStrictEqual(parseSequence('3..3'), [3]);
  });

  it('should reject a descending range naming the token', () => {
    assert.throws(
      () => parseSequence('1,5..2'),
      (error: unknown) => {
        assert.ok(error instanceof SequenceError);
        assert.strictEqual(error.token, '5..2');
        assert.strictEqual(error.message, "Invalid sequence token '5..2'");
        return true;
      }
    );
  });

  it('should reject words', () => {
    assert.throws(() => parseSequence('1,two'), SequenceError);
  });

  it('should reject negative numbers', () => {
    assert.throws(() => parseSequence('-1'), SequenceError);
  });
});

describe('formatSequence', () => {
  it('should collapse runs of three or more into ranges', () => {
    assert.strictEqual(formatSequence([1, 2, 3, 5]), '1..3,5');
  });

  it('should list short runs', () => {
    assert.strictEqual(formatSequence([1, 2, 4, 6, 7, 8, 9]), '1,2,4,6..9');
  });

  it('should sort and de-duplicate its input', () => {
    assert.strictEqual(formatSequence(new Set([9, 3, 4, 5])), '3..5,9');
    assert.strictEqual(formatSequence([2, 2, 1]), '1,2');
  });

  it('should render an empty list as an empty string', () => {
    assert.strictEqual(formatSequence([]), '');
  });

  it('should be read back by parseSequence', () => {
    const numbers = [0, 1, 2, 7, 10, 11, 12, 13];

    assert.strictEqual(formatSequence(numbers), '0..2,7,10..13');
    assert.deepStrictEqual(parseSequence(formatSequence(numbers)), numbers);
  });
});
