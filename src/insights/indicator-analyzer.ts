/**
 * Indicator Analyzer
 *
 * Entry point of the analysis engine. Runs every classifier over one
 * indicator series and assembles an immutable AnalysisResult.
 * Stateless — no I/O, no shared state between indicators.
 */

import type { AnalysisResult, IndicatorSeries } from '../types/indicator.js';
import type { AnalysisThresholds } from '../config/thresholds.js';
import { DEFAULT_THRESHOLDS } from '../config/thresholds.js';
import { InputError } from './errors.js';
import { normalizeSeries } from './series.js';
import { classifyPeriodicity } from './periodicity.js';
import { analyzeTrend } from './trend-analyzer.js';
import { detectAnomalies } from './anomaly-detector.js';
import { describeValues } from './statistics.js';
import { classifySemaphore } from './semaphore.js';
import { generateInterpretation } from './interpretation.js';

export { InputError } from './errors.js';

/**
 * Analyze a single indicator.
 * Throws InputError (carrying the indicator id) when the series is malformed;
 * a series with too little data is analyzed, not rejected.
 */
export function analyzeIndicator(
  series: IndicatorSeries,
  thresholds?: AnalysisThresholds
): AnalysisResult {
  const t = thresholds ?? DEFAULT_THRESHOLDS;
  const points = normalizeSeries(series);
  const values = points.map((p) => p.value);

  const periodicity = classifyPeriodicity(
    points.map((p) => p.ordinal),
    t
  );
  const { trend, slope } = analyzeTrend(values, t);
  const statistics = describeValues(values);
  const anomalies = detectAnomalies(points, t);

  const latestValue = points[points.length - 1]?.value ?? null;
  const target = series.target ?? null;
  const semaphore = classifySemaphore({
    obtained: latestValue,
    satisfactoryThreshold: series.satisfactoryThreshold,
    criticalThreshold: series.criticalThreshold,
    polarity: series.polarity,
  });

  const interpretation = generateInterpretation({
    name: series.name,
    periodicity,
    trend,
    slope,
    semaphore,
    polarity: series.polarity ?? 'higher-is-better',
    statistics,
    latestValue,
    target,
    anomalyCount: anomalies.length,
  });

  return Object.freeze({
    indicatorId: series.id,
    name: series.name,
    periodicity,
    trend,
    slope,
    semaphore,
    latestValue,
    target,
    statistics: statistics ? Object.freeze(statistics) : null,
    anomalies: Object.freeze(anomalies.map((a) => Object.freeze(a))),
    interpretation,
  });
}

// ─── Batch ──────────────────────────────────────────────────

export interface AnalysisFailure {
  indicatorId: number | null;
  name: string;
  message: string;
}

export interface BatchAnalysis {
  results: AnalysisResult[];
  failures: AnalysisFailure[];
}

export interface AnalyzeIndicatorsOptions {
  thresholds?: AnalysisThresholds;
  /** 'skip' records malformed indicators and continues; 'abort' rethrows. Default 'skip'. */
  onError?: 'skip' | 'abort';
}

/**
 * Analyze a batch of indicators independently.
 * Results keep the input order. Only InputError is caught in 'skip' mode;
 * anything else is a defect and propagates.
 */
export function analyzeIndicators(
  batch: readonly IndicatorSeries[],
  options: AnalyzeIndicatorsOptions = {}
): BatchAnalysis {
  const onError = options.onError ?? 'skip';
  const results: AnalysisResult[] = [];
  const failures: AnalysisFailure[] = [];

  for (const series of batch) {
    try {
      results.push(analyzeIndicator(series, options.thresholds));
    } catch (error) {
      if (!(error instanceof InputError) || onError === 'abort') throw error;
      failures.push({
        indicatorId: error.indicatorId,
        name: series.name,
        message: error.message,
      });
    }
  }

  return { results, failures };
}
