import { describe, it, expect } from 'vitest';
import { generateInterpretation } from './interpretation.js';
import type { InterpretationInput } from './interpretation.js';

function makeInput(overrides: Partial<InterpretationInput> = {}): InterpretationInput {
  return {
    name: 'Requests answered on time',
    periodicity: 'Monthly',
    trend: 'Growth',
    slope: 2,
    semaphore: 'Green',
    polarity: 'higher-is-better',
    statistics: {
      mean: 84,
      median: 84,
      stdDev: 2.8284271247461903,
      min: 80,
      max: 88,
      range: 8,
      coefficientOfVariation: 3.3671751485073695,
      count: 5,
    },
    latestValue: 88,
    target: 90,
    anomalyCount: 0,
    ...overrides,
  };
}

describe('interpretation', () => {
  it('assembles every sentence in a fixed order', () => {
    expect(generateInterpretation(makeInput())).toBe(
      'Indicator "Requests answered on time" is reported with monthly periodicity. ' +
        'Values show a growing trend (slope 2.00 per period). ' +
        'The current status is SATISFACTORY, meeting the established levels. ' +
        'The latest value is 88.00 against a target of 90.00. ' +
        'The mean value is 84.00 over 5 periods.'
    );
  });

  it('describes an empty series', () => {
    expect(
      generateInterpretation(
        makeInput({
          periodicity: 'Unknown',
          trend: 'InsufficientData',
          slope: null,
          semaphore: 'Gray',
          statistics: null,
          latestValue: null,
          target: null,
        })
      )
    ).toBe(
      'Indicator "Requests answered on time" is reported with an undetermined periodicity. ' +
        'There are not enough measurements to establish a trend. ' +
        'No compliance status could be determined for lack of a value or thresholds.'
    );
  });

  it('quotes the coefficient of variation for volatile series', () => {
    const text = generateInterpretation(
      makeInput({
        trend: 'Volatile',
        statistics: {
          mean: 30,
          median: 30,
          stdDev: 20,
          min: 10,
          max: 50,
          range: 40,
          coefficientOfVariation: 66.66666666666666,
          count: 4,
        },
      })
    );
    expect(text).toContain(
      'Values vary widely (coefficient of variation 66.67%), indicating volatile behaviour.'
    );
  });

  it('mentions a declared lower-is-better polarity', () => {
    const text = generateInterpretation(makeInput({ polarity: 'lower-is-better', semaphore: 'Red' }));
    expect(text).toContain(
      'The current status is CRITICAL, falling short of the minimum expected level. ' +
        'Lower values are better for this indicator.'
    );
  });

  it('omits the target clause when there is no target', () => {
    const text = generateInterpretation(makeInput({ target: null }));
    expect(text).toContain('The latest value is 88.00.');
  });

  it('uses singular and plural anomaly sentences', () => {
    expect(generateInterpretation(makeInput({ anomalyCount: 1 }))).toContain(
      '1 anomalous value was detected and should be reviewed.'
    );
    expect(generateInterpretation(makeInput({ anomalyCount: 3 }))).toContain(
      '3 anomalous values were detected and should be reviewed.'
    );
  });

  it('names four-monthly and decline cases', () => {
    const text = generateInterpretation(
      makeInput({ periodicity: 'Four-monthly', trend: 'Decline', slope: -1.25 })
    );
    expect(text).toContain('is reported with four-monthly periodicity.');
    expect(text).toContain('Values show a declining trend that requires attention (slope -1.25 per period).');
  });

  it('is deterministic', () => {
    expect(generateInterpretation(makeInput())).toBe(generateInterpretation(makeInput()));
  });
});
