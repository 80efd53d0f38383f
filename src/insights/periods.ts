/**
 * Period Labels
 *
 * Resolves the period labels of a series to calendar positions.
 * Two vocabularies are accepted, never mixed within one series:
 *   - month of year: "Jan", "January" or the Spanish "Enero" (any case)
 *   - dated horizon: "YYYY-MM", for series spanning several years
 */

import { InputError } from './errors.js';

export interface ResolvedPeriod {
  label: string;
  /** null for month-of-year labels */
  year: number | null;
  /** 1-12 */
  month: number;
  /** Months since year 0; sorting by ordinal is chronological. */
  ordinal: number;
}

const MONTH_NAMES: ReadonlyArray<readonly [short: string, long: string, spanish: string]> = [
  ['jan', 'january', 'enero'],
  ['feb', 'february', 'febrero'],
  ['mar', 'march', 'marzo'],
  ['apr', 'april', 'abril'],
  ['may', 'may', 'mayo'],
  ['jun', 'june', 'junio'],
  ['jul', 'july', 'julio'],
  ['aug', 'august', 'agosto'],
  ['sep', 'september', 'septiembre'],
  ['oct', 'october', 'octubre'],
  ['nov', 'november', 'noviembre'],
  ['dec', 'december', 'diciembre'],
];

const MONTH_LOOKUP = new Map<string, number>();
MONTH_NAMES.forEach((names, index) => {
  for (const name of names) MONTH_LOOKUP.set(name, index + 1);
});
// Common alternate spellings in exported sheets
MONTH_LOOKUP.set('sept', 9);
MONTH_LOOKUP.set('setiembre', 9);

const DATED_LABEL = /^(\d{4})-(\d{2})$/;

/** Canonical short month labels, January first. */
export const MONTH_LABELS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
] as const;

/**
 * Resolve a single label. Returns null when the label belongs to
 * neither vocabulary.
 */
export function resolvePeriod(label: string): ResolvedPeriod | null {
  const trimmed = label.trim();

  const dated = DATED_LABEL.exec(trimmed);
  if (dated) {
    const year = Number(dated[1]);
    const month = Number(dated[2]);
    if (month < 1 || month > 12) return null;
    return { label, year, month, ordinal: year * 12 + (month - 1) };
  }

  const month = MONTH_LOOKUP.get(trimmed.toLowerCase());
  if (month === undefined) return null;
  return { label, year: null, month, ordinal: month - 1 };
}

/**
 * Resolve every label of a series and return them in chronological order.
 * Throws InputError on unknown labels, mixed vocabularies or labels that
 * resolve to the same period ("Jan" and "January").
 */
export function resolveSeriesPeriods(
  labels: readonly string[],
  indicatorId: number | null = null
): ResolvedPeriod[] {
  const resolved: ResolvedPeriod[] = [];
  const seen = new Map<number, string>();
  let dated: boolean | null = null;

  for (const label of labels) {
    const period = resolvePeriod(label);
    if (!period) {
      throw new InputError(`unknown period label "${label}"`, indicatorId);
    }

    const isDated = period.year !== null;
    if (dated === null) {
      dated = isDated;
    } else if (dated !== isDated) {
      throw new InputError(
        `period "${label}" mixes month-of-year and YYYY-MM labels`,
        indicatorId
      );
    }

    const previous = seen.get(period.ordinal);
    if (previous !== undefined) {
      throw new InputError(
        `duplicate period "${label}" (already given as "${previous}")`,
        indicatorId
      );
    }
    seen.set(period.ordinal, label);
    resolved.push(period);
  }

  return resolved.sort((a, b) => a.ordinal - b.ordinal);
}
