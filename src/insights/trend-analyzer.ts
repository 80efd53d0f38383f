/**
 * Trend Analyzer
 *
 * Fits an ordinary least-squares line through the present values of a series
 * and labels the direction of travel. Present points are indexed 1..n in
 * chronological order; gaps left by missing periods do not stretch the axis.
 * Pure functions — no I/O, all data passed in, results returned.
 */

import type { Trend } from '../types/indicator.js';
import type { AnalysisThresholds } from '../config/thresholds.js';
import { DEFAULT_THRESHOLDS } from '../config/thresholds.js';
import { mean, populationStdDev, coefficientOfVariation } from './statistics.js';

export interface TrendAnalysis {
  trend: Trend;
  /** null when fewer than two values are present */
  slope: number | null;
}

/**
 * Analyze the trend of chronologically ordered present values.
 *
 * Volatility is checked before slope: a series whose coefficient of variation
 * exceeds the threshold is Volatile whatever its slope. A zero mean leaves the
 * CV undefined and falls through to the slope checks.
 */
export function analyzeTrend(
  values: readonly number[],
  thresholds?: AnalysisThresholds
): TrendAnalysis {
  if (values.length < 2) {
    return { trend: 'InsufficientData', slope: null };
  }

  const t = thresholds ?? DEFAULT_THRESHOLDS;
  const slope = regressionSlope(values);

  const mu = mean(values);
  const cv = coefficientOfVariation(populationStdDev(values, mu), mu);

  let trend: Trend;
  if (cv !== null && cv > t.volatilityCvPercent) {
    trend = 'Volatile';
  } else if (slope > t.growthSlope) {
    trend = 'Growth';
  } else if (slope < t.declineSlope) {
    trend = 'Decline';
  } else {
    trend = 'Stability';
  }

  return { trend, slope };
}

/**
 * Least-squares slope of values against x = 1..n.
 * Requires at least two values (x variance is then non-zero).
 */
export function regressionSlope(values: readonly number[]): number {
  const n = values.length;
  const xMean = (n + 1) / 2;
  const yMean = mean(values);

  let covariance = 0;
  let xVariance = 0;
  values.forEach((y, i) => {
    const dx = i + 1 - xMean;
    covariance += dx * (y - yMean);
    xVariance += dx * dx;
  });

  return covariance / xVariance;
}
