/**
 * Interpretation Generator
 *
 * Assembles the human-readable summary of an analysis from decisions already
 * taken by the classifiers. Same inputs always give the same string.
 */

import type {
  DescriptiveStatistics,
  Periodicity,
  Polarity,
  Semaphore,
  Trend,
} from '../types/indicator.js';

export interface InterpretationInput {
  name: string;
  periodicity: Periodicity;
  trend: Trend;
  slope: number | null;
  semaphore: Semaphore;
  polarity: Polarity;
  statistics: DescriptiveStatistics | null;
  latestValue: number | null;
  target: number | null;
  anomalyCount: number;
}

const SEMAPHORE_SENTENCES: Record<Semaphore, string> = {
  Green: 'The current status is SATISFACTORY, meeting the established levels.',
  Yellow: 'The current status is ACCEPTABLE but needs follow-up to avoid deterioration.',
  Red: 'The current status is CRITICAL, falling short of the minimum expected level.',
  Gray: 'No compliance status could be determined for lack of a value or thresholds.',
};

export function generateInterpretation(input: InterpretationInput): string {
  const parts: string[] = [];

  parts.push(
    `Indicator "${input.name}" is reported with ${describePeriodicity(input.periodicity)}.`
  );
  parts.push(describeTrend(input.trend, input.slope, input.statistics));
  parts.push(SEMAPHORE_SENTENCES[input.semaphore]);

  if (input.semaphore !== 'Gray' && input.polarity === 'lower-is-better') {
    parts.push('Lower values are better for this indicator.');
  }

  if (input.latestValue !== null) {
    const target = input.target !== null ? ` against a target of ${fmt(input.target)}` : '';
    parts.push(`The latest value is ${fmt(input.latestValue)}${target}.`);
  }

  if (input.statistics) {
    const { mean, count } = input.statistics;
    parts.push(`The mean value is ${fmt(mean)} over ${count} ${plural(count, 'period')}.`);
  }

  if (input.anomalyCount === 1) {
    parts.push('1 anomalous value was detected and should be reviewed.');
  } else if (input.anomalyCount > 1) {
    parts.push(`${input.anomalyCount} anomalous values were detected and should be reviewed.`);
  }

  return parts.join(' ');
}

// ─── Internals ──────────────────────────────────────────────

function describePeriodicity(periodicity: Periodicity): string {
  return periodicity === 'Unknown'
    ? 'an undetermined periodicity'
    : `${periodicity.toLowerCase()} periodicity`;
}

function describeTrend(
  trend: Trend,
  slope: number | null,
  statistics: DescriptiveStatistics | null
): string {
  const perPeriod = slope !== null ? ` (slope ${fmt(slope)} per period)` : '';

  switch (trend) {
    case 'Growth':
      return `Values show a growing trend${perPeriod}.`;
    case 'Decline':
      return `Values show a declining trend that requires attention${perPeriod}.`;
    case 'Stability':
      return `Values remain stable over the analyzed period${perPeriod}.`;
    case 'Volatile': {
      const cv = statistics?.coefficientOfVariation;
      const spread =
        cv !== null && cv !== undefined ? ` (coefficient of variation ${fmt(cv)}%)` : '';
      return `Values vary widely${spread}, indicating volatile behaviour.`;
    }
    case 'InsufficientData':
      return 'There are not enough measurements to establish a trend.';
  }
}

function fmt(value: number): string {
  return value.toFixed(2);
}

function plural(count: number, word: string): string {
  return count === 1 ? word : `${word}s`;
}
