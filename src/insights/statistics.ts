/**
 * Descriptive Statistics
 *
 * Pure helpers shared by the trend analyzer, the anomaly detector and the
 * statistics block of an analysis. All of them use the population standard
 * deviation (divisor n) so that CV, z-scores and reported spread agree.
 */

import type { DescriptiveStatistics } from '../types/indicator.js';

export function mean(values: readonly number[]): number {
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function populationStdDev(values: readonly number[], mu = mean(values)): number {
  let squares = 0;
  for (const v of values) squares += (v - mu) ** 2;
  return Math.sqrt(squares / values.length);
}

export function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? Number.NaN;
  if (sorted.length % 2 === 1) return upper;
  const lower = sorted[mid - 1] ?? Number.NaN;
  return (lower + upper) / 2;
}

/** stdDev / mean × 100, or null when the mean is zero. */
export function coefficientOfVariation(stdDev: number, mu: number): number | null {
  if (mu === 0) return null;
  return (stdDev / mu) * 100;
}

/**
 * Compute the statistics block for the present values of a series.
 * Returns null when there is no value at all.
 */
export function describeValues(values: readonly number[]): DescriptiveStatistics | null {
  if (values.length === 0) return null;

  const mu = mean(values);
  const stdDev = populationStdDev(values, mu);
  const min = Math.min(...values);
  const max = Math.max(...values);

  return {
    mean: mu,
    median: median(values),
    stdDev,
    min,
    max,
    range: max - min,
    coefficientOfVariation: coefficientOfVariation(stdDev, mu),
    count: values.length,
  };
}
