/**
 * Report Generator
 *
 * Transforms analysis results into a structured Markdown report.
 * All functions are synchronous — no I/O.
 */

import type { AnalysisResult, IndicatorAnomaly, Semaphore } from '../types/indicator.js';
import type { AnalysisFailure } from '../insights/indicator-analyzer.js';
import type { ResultSummary } from '../dashboard/result-filters.js';
import { sortResults, summarizeResults } from '../dashboard/result-filters.js';

export interface IndicatorReportOptions {
  title?: string;
  failures?: readonly AnalysisFailure[];
}

const SEMAPHORE_LABELS: Record<Semaphore, string> = {
  Green: 'Satisfactory',
  Yellow: 'Alert',
  Red: 'Critical',
  Gray: 'No data',
};

/**
 * Generate the full indicator report.
 * Structured as: Summary / Overview table / Indicator details / Skipped indicators
 */
export function generateIndicatorReport(
  results: readonly AnalysisResult[],
  options: IndicatorReportOptions = {}
): string {
  const parts: string[] = [];
  parts.push(`# ${options.title ?? 'Indicator Analysis Report'}`);
  parts.push('');

  const summary = summarizeResults(results);
  parts.push(...formatSummary(summary));

  if (results.length > 0) {
    parts.push('## Overview');
    parts.push('');
    parts.push('| # | Indicator | Periodicity | Trend | Slope | Status | Anomalies |');
    parts.push('|---|-----------|-------------|-------|-------|--------|-----------|');
    for (const r of sortResults(results, 'semaphore')) {
      parts.push(
        `| ${r.indicatorId} | ${escapeCell(r.name)} | ${r.periodicity} | ${r.trend} | ${formatNumber(r.slope)} | ${r.semaphore} | ${r.anomalies.length} |`
      );
    }
    parts.push('');

    parts.push('## Indicator Details');
    parts.push('');
    for (const r of results) {
      parts.push(...formatIndicator(r));
    }
  }

  const failures = options.failures ?? [];
  if (failures.length > 0) {
    parts.push('## Skipped Indicators');
    parts.push('');
    for (const f of failures) {
      const id = f.indicatorId !== null ? `#${f.indicatorId} ` : '';
      parts.push(`- ${id}${f.name}: ${f.message}`);
    }
    parts.push('');
  }

  return parts.join('\n').trimEnd() + '\n';
}

/** Summary counts as a Markdown section. */
export function formatSummary(summary: ResultSummary): string[] {
  const parts: string[] = [];
  parts.push('## Summary');
  parts.push('');
  parts.push(`- **Indicators analyzed:** ${summary.total}`);
  for (const color of ['Green', 'Yellow', 'Red', 'Gray'] as const) {
    parts.push(`- **${color} (${SEMAPHORE_LABELS[color]}):** ${summary.bySemaphore[color]}`);
  }
  parts.push(`- **Satisfactory share:** ${summary.greenPercent.toFixed(1)}%`);
  parts.push(`- **Anomalies detected:** ${summary.totalAnomalies}`);
  parts.push('');
  return parts;
}

// ─── Internals ──────────────────────────────────────────────

function formatIndicator(r: AnalysisResult): string[] {
  const parts: string[] = [];
  parts.push(`### ${r.indicatorId}. ${r.name}`);
  parts.push('');
  parts.push(`**Status:** ${r.semaphore} · **Trend:** ${r.trend} · **Periodicity:** ${r.periodicity}`);
  parts.push('');
  parts.push(r.interpretation);
  parts.push('');

  if (r.statistics) {
    const s = r.statistics;
    parts.push(
      `Mean ${formatNumber(s.mean)} · Median ${formatNumber(s.median)} · Std dev ${formatNumber(s.stdDev)} · Range ${formatNumber(s.min)}–${formatNumber(s.max)} · CV ${formatPercent(s.coefficientOfVariation)}`
    );
    parts.push('');
  }

  if (r.anomalies.length > 0) {
    parts.push('**Anomalies:**');
    for (const a of r.anomalies) {
      parts.push(formatAnomaly(a));
    }
    parts.push('');
  }

  return parts;
}

function formatAnomaly(a: IndicatorAnomaly): string {
  const deviation =
    a.percentDeviation !== null ? `, ${signed(a.percentDeviation)}% vs mean` : '';
  return `- ${a.period}: ${formatNumber(a.value)} (${a.direction}, z = ${a.zScore.toFixed(2)}${deviation})`;
}

function formatNumber(value: number | null): string {
  return value === null ? 'N/A' : value.toFixed(2);
}

function formatPercent(value: number | null): string {
  return value === null ? 'N/A' : `${value.toFixed(2)}%`;
}

function signed(value: number): string {
  const fixed = value.toFixed(1);
  return value > 0 ? `+${fixed}` : fixed;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}
