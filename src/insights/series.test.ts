import { describe, it, expect } from 'vitest';
import { normalizeSeries } from './series.js';
import { InputError } from './errors.js';
import type { IndicatorSeries } from '../types/indicator.js';

function makeSeries(overrides: Partial<IndicatorSeries> = {}): IndicatorSeries {
  return {
    id: 1,
    name: 'Complaints answered on time',
    values: [],
    ...overrides,
  };
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return null;
}

describe('series', () => {
  it('returns present points in chronological order', () => {
    const points = normalizeSeries(
      makeSeries({
        values: [
          ['Mar', 30],
          ['Jan', 10],
          ['Feb', null],
        ],
      })
    );

    expect(points).toEqual([
      { period: 'Jan', ordinal: 0, value: 10 },
      { period: 'Mar', ordinal: 2, value: 30 },
    ]);
  });

  it('returns no points for an all-missing series', () => {
    const points = normalizeSeries(
      makeSeries({
        values: [
          ['Jan', null],
          ['Feb', null],
        ],
      })
    );
    expect(points).toEqual([]);
  });

  it('rejects NaN and infinite values', () => {
    expect(() => normalizeSeries(makeSeries({ values: [['Jan', Number.NaN]] }))).toThrow(
      'Indicator 1: value for "Jan" is not a finite number'
    );
    expect(() =>
      normalizeSeries(makeSeries({ values: [['Jan', Number.POSITIVE_INFINITY]] }))
    ).toThrow(InputError);
  });

  it('rejects duplicate labels', () => {
    expect(() =>
      normalizeSeries(
        makeSeries({
          values: [
            ['Jan', 1],
            ['Jan', 2],
          ],
        })
      )
    ).toThrow(/duplicate period/);
  });

  it('rejects a blank name', () => {
    expect(() => normalizeSeries(makeSeries({ name: '   ' }))).toThrow(
      'Indicator 1: name must be a non-empty string'
    );
  });

  it('rejects a non-integer id without prefixing it', () => {
    const error = catchError(() => normalizeSeries(makeSeries({ id: 1.5 })));

    expect(error).toBeInstanceOf(InputError);
    expect(error).toHaveProperty('indicatorId', null);
    expect(error).toHaveProperty('message', 'indicator id must be an integer, got 1.5');
  });

  it('rejects non-finite thresholds', () => {
    expect(() => normalizeSeries(makeSeries({ criticalThreshold: Number.NaN }))).toThrow(
      'Indicator 1: criticalThreshold must be a finite number'
    );
  });

  it('carries the indicator id on the error', () => {
    const error = catchError(() => normalizeSeries(makeSeries({ id: 42, values: [['Smarch', 1]] })));

    expect(error).toBeInstanceOf(InputError);
    expect(error).toHaveProperty('indicatorId', 42);
  });
});
