/**
 * Series Normalization
 *
 * Checks an indicator series against the input contract and reduces it
 * to its present points in chronological order.
 * Pure function — no I/O.
 */

import type { IndicatorSeries } from '../types/indicator.js';
import { InputError } from './errors.js';
import { resolveSeriesPeriods } from './periods.js';

/** A period holding a numeric measurement. */
export interface SeriesPoint {
  period: string;
  ordinal: number;
  value: number;
}

/**
 * Validate a series and return its present points, oldest first.
 * Missing values (null) are dropped; everything else must be finite.
 */
export function normalizeSeries(series: IndicatorSeries): SeriesPoint[] {
  const id = series.id;

  if (!Number.isInteger(id)) {
    throw new InputError(`indicator id must be an integer, got ${String(id)}`);
  }
  if (typeof series.name !== 'string' || !series.name.trim()) {
    throw new InputError('name must be a non-empty string', id);
  }

  checkOptionalNumber(series.target, 'target', id);
  checkOptionalNumber(series.satisfactoryThreshold, 'satisfactoryThreshold', id);
  checkOptionalNumber(series.criticalThreshold, 'criticalThreshold', id);

  const valueByLabel = new Map<string, number | null>();
  for (const [label, value] of series.values) {
    if (value !== null && !Number.isFinite(value)) {
      throw new InputError(`value for "${label}" is not a finite number`, id);
    }
    valueByLabel.set(label, value);
  }

  const periods = resolveSeriesPeriods(
    series.values.map(([label]) => label),
    id
  );

  const points: SeriesPoint[] = [];
  for (const period of periods) {
    const value = valueByLabel.get(period.label);
    if (value === null || value === undefined) continue;
    points.push({ period: period.label, ordinal: period.ordinal, value });
  }
  return points;
}

function checkOptionalNumber(
  value: number | null | undefined,
  field: string,
  id: number
): void {
  if (value === null || value === undefined) return;
  if (!Number.isFinite(value)) {
    throw new InputError(`${field} must be a finite number`, id);
  }
}
