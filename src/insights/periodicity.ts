/**
 * Periodicity Classifier
 *
 * Infers the reporting cadence of an indicator from the calendar positions
 * that carry a value, in three steps:
 *
 *   1. Regular fit: each candidate cadence is tested against the gaps between
 *      consecutive present periods. Among cadences assuming at most
 *      maxAssumedMissing empty slots, the fewest assumed wins, higher
 *      frequency first on ties.
 *   2. Coverage: a series holding values in at least monthlyCoveragePercent
 *      of the months between its first and last value is Monthly.
 *   3. Mean interval: otherwise the average gap picks the nearest cadence.
 *
 * Only a series without values is Unknown. Pure function — no I/O.
 */

import type { Periodicity } from '../types/indicator.js';
import type { AnalysisThresholds } from '../config/thresholds.js';
import { DEFAULT_THRESHOLDS } from '../config/thresholds.js';

interface Cadence {
  periodicity: Exclude<Periodicity, 'Unknown'>;
  intervalMonths: number;
}

/** Highest frequency first; order doubles as the tie-break. */
const CADENCES: readonly Cadence[] = [
  { periodicity: 'Monthly', intervalMonths: 1 },
  { periodicity: 'Bimonthly', intervalMonths: 2 },
  { periodicity: 'Quarterly', intervalMonths: 3 },
  { periodicity: 'Four-monthly', intervalMonths: 4 },
  { periodicity: 'Semiannual', intervalMonths: 6 },
  { periodicity: 'Annual', intervalMonths: 12 },
];

/**
 * Classify the cadence of a series from the month ordinals of its present
 * values (see ResolvedPeriod.ordinal). Ordinals must be sorted and unique.
 *
 * Zero periods is Unknown, a single period is Annual.
 */
export function classifyPeriodicity(
  ordinals: readonly number[],
  thresholds?: AnalysisThresholds
): Periodicity {
  const t = thresholds ?? DEFAULT_THRESHOLDS;

  const first = ordinals[0];
  const last = ordinals[ordinals.length - 1];
  if (first === undefined || last === undefined) return 'Unknown';
  if (ordinals.length === 1) return 'Annual';

  const gaps: number[] = [];
  for (let i = 1; i < ordinals.length; i++) {
    gaps.push((ordinals[i] ?? 0) - (ordinals[i - 1] ?? 0));
  }

  return (
    fitRegularCadence(gaps, last - first, ordinals.length, t) ??
    (coversMonths(last - first, ordinals.length, t) ? 'Monthly' : nearestCadence(gaps))
  );
}

// ─── Internals ──────────────────────────────────────────────

/** Upper bound of the mean gap (months) for each cadence. */
const MEAN_INTERVAL_BANDS: ReadonlyArray<[maxMean: number, periodicity: Periodicity]> = [
  [1.5, 'Monthly'],
  [2.5, 'Bimonthly'],
  [3.5, 'Quarterly'],
  [5, 'Four-monthly'],
  [7, 'Semiannual'],
];

function fitRegularCadence(
  gaps: readonly number[],
  span: number,
  present: number,
  t: AnalysisThresholds
): Periodicity | null {
  let best: { periodicity: Periodicity; missing: number } | null = null;

  for (const cadence of CADENCES) {
    if (!gaps.every((gap) => gap % cadence.intervalMonths === 0)) continue;

    const missing = span / cadence.intervalMonths + 1 - present;
    if (missing > t.maxAssumedMissing) continue;

    // Strict comparison keeps the earlier (higher-frequency) cadence on ties
    if (!best || missing < best.missing) {
      best = { periodicity: cadence.periodicity, missing };
    }
  }

  return best?.periodicity ?? null;
}

function coversMonths(span: number, present: number, t: AnalysisThresholds): boolean {
  return (present / (span + 1)) * 100 >= t.monthlyCoveragePercent;
}

function nearestCadence(gaps: readonly number[]): Periodicity {
  const meanGap = gaps.reduce((sum, gap) => sum + gap, 0) / gaps.length;
  for (const [maxMean, periodicity] of MEAN_INTERVAL_BANDS) {
    if (meanGap <= maxMean) return periodicity;
  }
  return 'Annual';
}
