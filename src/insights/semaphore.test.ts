import { describe, it, expect } from 'vitest';
import { classifySemaphore } from './semaphore.js';

describe('semaphore', () => {
  const levels = { satisfactoryThreshold: 85, criticalThreshold: 70 };

  it('is Green at or above the satisfactory level', () => {
    expect(classifySemaphore({ obtained: 90, ...levels })).toBe('Green');
    expect(classifySemaphore({ obtained: 85, ...levels })).toBe('Green');
  });

  it('is Yellow between the critical and satisfactory levels', () => {
    expect(classifySemaphore({ obtained: 75, ...levels })).toBe('Yellow');
    expect(classifySemaphore({ obtained: 70, ...levels })).toBe('Yellow');
  });

  it('is Red below the critical level', () => {
    expect(classifySemaphore({ obtained: 60, ...levels })).toBe('Red');
  });

  it('is Gray without an obtained value', () => {
    expect(classifySemaphore({ obtained: null, ...levels })).toBe('Gray');
  });

  it('is Gray when either threshold is missing', () => {
    expect(classifySemaphore({ obtained: 90, satisfactoryThreshold: 85 })).toBe('Gray');
    expect(classifySemaphore({ obtained: 10, criticalThreshold: 70 })).toBe('Gray');
    expect(
      classifySemaphore({ obtained: 90, satisfactoryThreshold: null, criticalThreshold: null })
    ).toBe('Gray');
  });

  it('is Gray when a threshold is not a finite number', () => {
    expect(
      classifySemaphore({ obtained: 90, satisfactoryThreshold: Number.NaN, criticalThreshold: 70 })
    ).toBe('Gray');
  });

  it('applies the fixed rule order whatever the threshold order', () => {
    const crossed = { satisfactoryThreshold: 85, criticalThreshold: 95 };
    expect(classifySemaphore({ obtained: 90, ...crossed })).toBe('Green');
    expect(classifySemaphore({ obtained: 85, ...crossed })).toBe('Green');
    expect(classifySemaphore({ obtained: 80, ...crossed })).toBe('Red');
  });

  describe('declared lower-is-better indicators', () => {
    const inverted = {
      satisfactoryThreshold: 5,
      criticalThreshold: 10,
      polarity: 'lower-is-better' as const,
    };

    it('is Green at or below the satisfactory level', () => {
      expect(classifySemaphore({ obtained: 3, ...inverted })).toBe('Green');
      expect(classifySemaphore({ obtained: 5, ...inverted })).toBe('Green');
    });

    it('is Yellow up to the critical level', () => {
      expect(classifySemaphore({ obtained: 8, ...inverted })).toBe('Yellow');
      expect(classifySemaphore({ obtained: 10, ...inverted })).toBe('Yellow');
    });

    it('is Red above the critical level', () => {
      expect(classifySemaphore({ obtained: 12, ...inverted })).toBe('Red');
    });

    it('is Gray without thresholds', () => {
      expect(classifySemaphore({ obtained: 3, polarity: 'lower-is-better' })).toBe('Gray');
    });
  });

  it('treats an explicit higher-is-better like the default', () => {
    expect(
      classifySemaphore({ obtained: 8, ...levels, polarity: 'higher-is-better' })
    ).toBe('Red');
  });
});
