/**
 * Tests for the lazy combinatorics helpers
 */

import { describe, it, expect } from 'vitest';
import { arrangements, combinations, permutations } from '../src/utils/combinatorics.js';

describe('combinations', () => {
  it('should yield k-subsets in index order', () => {
    expect(Array.from(combinations([1, 2, 3, 4], 2))).toEqual([
      [1, 2],
      [1, 3],
      [1, 4],
      [2, 3],
      [2, 4],
      [3, 4],
    ]);
  });

  it('should yield nothing for sizes outside 1..length', () => {
    expect(Array.from(combinations(['a', 'b'], 0))).toEqual([]);
    expect(Array.from(combinations(['a', 'b'], 3))).toEqual([]);
  });

  it('should yield the whole list once when size equals length', () => {
    expect(Array.from(combinations(['a', 'b', 'c'], 3))).toEqual([['a', 'b', 'c']]);
  });
});

describe('permutations', () => {
  it('should yield every ordering', () => {
    const result = Array.from(permutations(['a', 'b', 'c'])).map((p) => p.join(''));
    expect(result).toEqual(['abc', 'acb', 'bac', 'bca', 'cab', 'cba']);
  });

  it('should yield a single copy for one item', () => {
    expect(Array.from(permutations(['x']))).toEqual([['x']]);
  });
});

describe('arrangements', () => {
  const words = ['admin', 'api', 'web', 'app', 'dev', 'test'];

  it('should count ordered pairs of a six-word vocabulary', () => {
    expect(Array.from(arrangements(words, 2, 2))).toHaveLength(30);
  });

  it('should count ordered triples of a six-word vocabulary', () => {
    expect(Array.from(arrangements(words, 3, 3))).toHaveLength(120);
  });

  it('should cap the size at the vocabulary length', () => {
    expect(Array.from(arrangements(['a', 'b'], 2, 10))).toEqual([
      ['a', 'b'],
      ['b', 'a'],
    ]);
  });

  it('should produce values lazily', () => {
    const big = Array.from({ length: 50 }, (_, i) => i);
    const iterator = arrangements(big, 2, 50);

    expect(iterator.next().value).toEqual([0, 1]);
    expect(iterator.next().value).toEqual([1, 0]);
  });
});
