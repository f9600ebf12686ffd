import { describe, it, expect } from 'vitest';
import { closestMatch, findClosestMatches, levenshteinDistance } from '../../src/utils/string-distance';

describe('levenshteinDistance', () => {
  it.each([
    ['', 'abc', 3],
    ['abc', '', 3],
    ['result', 'result', 0],
    ['resul', 'result', 1],
    ['kitten', 'sitting', 3],
    ['reslut', 'result', 2],
  ])('%s -> %s is %i', (a, b, expected) => {
    expect(levenshteinDistance(a, b)).toBe(expected);
  });
});

describe('findClosestMatches', () => {
  it('orders by distance, ignores case and skips exact matches', () => {
    expect(findClosestMatches('Data', ['date', 'data', 'datum', 'dat'], 2)).toEqual(['date', 'dat', 'datum']);
  });

  it('returns nothing beyond the distance', () => {
    expect(findClosestMatches('output', ['input'], 1)).toEqual([]);
  });
});

describe('closestMatch', () => {
  it('returns the first closest candidate', () => {
    expect(closestMatch('respons', ['result', 'response', 'responses'], 1)).toBe('response');
    expect(closestMatch('zzz', ['result'], 1)).toBeUndefined();
  });
});
