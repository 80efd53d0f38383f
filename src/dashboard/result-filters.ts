/**
 * Dashboard Helpers
 *
 * Filtering, sorting and summary counts over collections of analysis
 * results. Results are read-only here; every function returns new arrays.
 */

import type {
  AnalysisResult,
  Periodicity,
  Semaphore,
  Trend,
} from '../types/indicator.js';

export interface ResultFilter {
  periodicity?: Periodicity;
  semaphore?: Semaphore;
  trend?: Trend;
  /** Case-insensitive substring of the indicator name. */
  search?: string;
}

export type SortKey = 'name' | 'semaphore' | 'anomalies' | 'slope';

export interface ResultSummary {
  total: number;
  bySemaphore: Record<Semaphore, number>;
  byTrend: Record<Trend, number>;
  byPeriodicity: Record<Periodicity, number>;
  totalAnomalies: number;
  /** Share of Green indicators, 0-100. */
  greenPercent: number;
}

/** Worst first. */
const SEMAPHORE_ORDER: Record<Semaphore, number> = {
  Red: 0,
  Yellow: 1,
  Green: 2,
  Gray: 3,
};

const COMPARATORS: Record<SortKey, (a: AnalysisResult, b: AnalysisResult) => number> = {
  name: (a, b) => a.name.localeCompare(b.name),
  semaphore: (a, b) => SEMAPHORE_ORDER[a.semaphore] - SEMAPHORE_ORDER[b.semaphore],
  anomalies: (a, b) => b.anomalies.length - a.anomalies.length,
  slope: (a, b) => {
    if (a.slope === null) return b.slope === null ? 0 : 1;
    if (b.slope === null) return -1;
    return a.slope - b.slope;
  },
};

/** Keep results matching every supplied criterion. */
export function filterResults(
  results: readonly AnalysisResult[],
  filter: ResultFilter
): AnalysisResult[] {
  const search = filter.search?.trim().toLowerCase();

  return results.filter((r) => {
    if (filter.periodicity && r.periodicity !== filter.periodicity) return false;
    if (filter.semaphore && r.semaphore !== filter.semaphore) return false;
    if (filter.trend && r.trend !== filter.trend) return false;
    if (search && !r.name.toLowerCase().includes(search)) return false;
    return true;
  });
}

/**
 * Sort results without mutating the input.
 *   name:      alphabetical
 *   semaphore: Red, Yellow, Green, Gray
 *   anomalies: most anomalies first
 *   slope:     steepest decline first, missing slopes last
 */
export function sortResults(results: readonly AnalysisResult[], key: SortKey): AnalysisResult[] {
  return [...results].sort(COMPARATORS[key]);
}

export function summarizeResults(results: readonly AnalysisResult[]): ResultSummary {
  const summary: ResultSummary = {
    total: results.length,
    bySemaphore: { Green: 0, Yellow: 0, Red: 0, Gray: 0 },
    byTrend: { Growth: 0, Stability: 0, Decline: 0, Volatile: 0, InsufficientData: 0 },
    byPeriodicity: {
      Monthly: 0,
      Bimonthly: 0,
      Quarterly: 0,
      'Four-monthly': 0,
      Semiannual: 0,
      Annual: 0,
      Unknown: 0,
    },
    totalAnomalies: 0,
    greenPercent: 0,
  };

  for (const r of results) {
    summary.bySemaphore[r.semaphore]++;
    summary.byTrend[r.trend]++;
    summary.byPeriodicity[r.periodicity]++;
    summary.totalAnomalies += r.anomalies.length;
  }

  if (results.length > 0) {
    summary.greenPercent = (summary.bySemaphore.Green / results.length) * 100;
  }

  return summary;
}
