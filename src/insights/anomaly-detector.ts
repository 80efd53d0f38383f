/**
 * Anomaly Detector
 *
 * Flags statistically atypical values of an indicator with a z-score test.
 * Pure functions — no I/O, all data passed in.
 */

import type { IndicatorAnomaly } from '../types/indicator.js';
import type { AnalysisThresholds } from '../config/thresholds.js';
import { DEFAULT_THRESHOLDS } from '../config/thresholds.js';
import type { SeriesPoint } from './series.js';
import { mean, populationStdDev } from './statistics.js';

/** Fewer present values than this can never hold an anomaly. */
const MIN_POINTS = 2;

/**
 * Detect anomalies among the present points of a series.
 * Returns anomalies in the order of the points given (chronological when fed
 * from normalizeSeries), not by magnitude.
 *
 * A constant series (σ = 0) or a single point has no anomalies.
 */
export function detectAnomalies(
  points: readonly SeriesPoint[],
  thresholds?: AnalysisThresholds
): IndicatorAnomaly[] {
  if (points.length < MIN_POINTS) return [];

  const t = thresholds ?? DEFAULT_THRESHOLDS;
  const values = points.map((p) => p.value);
  const mu = mean(values);
  const sigma = populationStdDev(values, mu);

  if (sigma === 0) return [];

  const anomalies: IndicatorAnomaly[] = [];
  for (const point of points) {
    const zScore = (point.value - mu) / sigma;
    if (Math.abs(zScore) <= t.zScoreThreshold) continue;

    anomalies.push({
      period: point.period,
      value: point.value,
      zScore,
      direction: zScore > 0 ? 'High' : 'Low',
      percentDeviation: mu === 0 ? null : ((point.value - mu) / mu) * 100,
    });
  }

  return anomalies;
}
