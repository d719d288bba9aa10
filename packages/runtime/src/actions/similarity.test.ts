// Tests for name similarity

import { describe, it, expect } from 'vitest';
import { jaroSimilarity, suggestName } from './similarity.js';

describe('jaroSimilarity', () => {
  it('is 1 for equal strings and 0 when nothing matches', () => {
    expect(jaroSimilarity('reset', 'reset')).toBe(1);
    expect(jaroSimilarity('', '')).toBe(1);
    expect(jaroSimilarity('abc', '')).toBe(0);
    expect(jaroSimilarity('abc', 'xyz')).toBe(0);
  });

  it('scores a dropped letter highly', () => {
    // 8 matches, no transpositions: (8/9 + 8/8 + 8/8) / 3
    expect(jaroSimilarity('increment', 'incremnt')).toBeCloseTo(0.963, 3);
  });

  it('counts transpositions', () => {
    // 6 matches, 1 transposition: (6/6 + 6/6 + 5/6) / 3
    expect(jaroSimilarity('martha', 'marhta')).toBeCloseTo(0.944, 3);
  });
});

describe('suggestName', () => {
  it('returns the closest candidate above the threshold', () => {
    expect(suggestName('incremnt', ['reset', 'increment_by', 'increment'])).toBe('increment');
  });

  it('returns nothing when no candidate is close enough', () => {
    expect(suggestName('frobnicate', ['increment', 'reset'])).toBeUndefined();
  });

  it('breaks ties by candidate order', () => {
    expect(suggestName('abcx', ['abcd', 'abce'])).toBe('abcd');
  });
});
