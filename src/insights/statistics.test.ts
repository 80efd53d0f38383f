import { describe, it, expect } from 'vitest';
import {
  mean,
  median,
  populationStdDev,
  coefficientOfVariation,
  describeValues,
} from './statistics.js';

describe('statistics', () => {
  it('computes mean and population standard deviation', () => {
    const values = [2, 4, 4, 4, 5, 5, 7, 9];
    expect(mean(values)).toBe(5);
    expect(populationStdDev(values)).toBe(2);
  });

  it('takes the middle value for odd counts and the midpoint for even counts', () => {
    expect(median([9, 1, 5])).toBe(5);
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });

  it('returns a null coefficient of variation for a zero mean', () => {
    expect(coefficientOfVariation(3, 0)).toBeNull();
    expect(coefficientOfVariation(2, 5)).toBe(40);
  });

  describe('describeValues', () => {
    it('returns null when there are no values', () => {
      expect(describeValues([])).toBeNull();
    });

    it('describes a single value with zero spread', () => {
      expect(describeValues([42])).toEqual({
        mean: 42,
        median: 42,
        stdDev: 0,
        min: 42,
        max: 42,
        range: 0,
        coefficientOfVariation: 0,
        count: 1,
      });
    });

    it('describes a full series', () => {
      const stats = describeValues([2, 4, 4, 4, 5, 5, 7, 9]);

      expect(stats).toEqual({
        mean: 5,
        median: 4.5,
        stdDev: 2,
        min: 2,
        max: 9,
        range: 7,
        coefficientOfVariation: 40,
        count: 8,
      });
    });

    it('keeps statistics but drops the CV when values cancel out', () => {
      const stats = describeValues([-5, 5]);

      expect(stats?.mean).toBe(0);
      expect(stats?.stdDev).toBe(5);
      expect(stats?.coefficientOfVariation).toBeNull();
    });
  });
});
