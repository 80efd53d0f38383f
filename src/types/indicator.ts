/**
 * Indicator Types
 *
 * Input series handed over by the data loader and the analysis records
 * produced for report, chart and dashboard consumers.
 */

/** A raw period label and its value; null marks a missing measurement. */
export type PeriodValue = readonly [period: string, value: number | null];

/** Direction in which an indicator improves. */
export type Polarity = 'higher-is-better' | 'lower-is-better';

/** One indicator as delivered by the loader, already cleaned. */
export interface IndicatorSeries {
  id: number;
  name: string;
  target?: number | null;
  satisfactoryThreshold?: number | null;
  criticalThreshold?: number | null;
  /** Defaults to higher-is-better; never inferred from the thresholds. */
  polarity?: Polarity;
  values: readonly PeriodValue[];
}

export type Periodicity =
  | 'Monthly'
  | 'Bimonthly'
  | 'Quarterly'
  | 'Four-monthly'
  | 'Semiannual'
  | 'Annual'
  | 'Unknown';

export type Trend = 'Growth' | 'Stability' | 'Decline' | 'Volatile' | 'InsufficientData';

export type Semaphore = 'Green' | 'Yellow' | 'Red' | 'Gray';

export type AnomalyDirection = 'High' | 'Low';

export interface DescriptiveStatistics {
  readonly mean: number;
  readonly median: number;
  /** Population standard deviation (divisor n). */
  readonly stdDev: number;
  readonly min: number;
  readonly max: number;
  readonly range: number;
  /** stdDev / mean × 100; null when the mean is zero. */
  readonly coefficientOfVariation: number | null;
  readonly count: number;
}

export interface IndicatorAnomaly {
  readonly period: string;
  readonly value: number;
  readonly zScore: number;
  readonly direction: AnomalyDirection;
  /** (value − mean) / mean × 100; null when the mean is zero. */
  readonly percentDeviation: number | null;
}

/** Immutable analysis record for a single indicator. */
export interface AnalysisResult {
  readonly indicatorId: number;
  readonly name: string;
  readonly periodicity: Periodicity;
  readonly trend: Trend;
  readonly slope: number | null;
  readonly semaphore: Semaphore;
  readonly latestValue: number | null;
  readonly target: number | null;
  readonly statistics: DescriptiveStatistics | null;
  readonly anomalies: readonly IndicatorAnomaly[];
  readonly interpretation: string;
}
