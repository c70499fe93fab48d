import { describe, expect, it } from 'vitest';
import { chunk } from './batch';

describe('chunk', () => {
  it('splits pages into pairs, keeping the last short group', () => {
    expect(chunk([0, 1, 2, 3, 4], 2)).toEqual([[0, 1], [2, 3], [4]]);
  });

  it('returns a single group when the list fits', () => {
    expect(chunk(['a', 'b'], 2)).toEqual([['a', 'b']]);
  });

  it('returns no groups for an empty list', () => {
    expect(chunk([], 2)).toEqual([]);
  });

  it('rejects sizes that are not positive integers', () => {
    expect(() => chunk([1, 2], 0)).toThrow(RangeError);
    expect(() => chunk([1, 2], 1.5)).toThrow('Batch size must be a positive integer, got 1.5');
  });
});
