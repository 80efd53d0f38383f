/**
 * indicators analyze / summary — Batch Analysis Commands
 *
 * Load an indicator file, run the engine over every indicator and render
 * the outcome. Returns the output text; printing is left to the caller.
 * The MCP tools reuse analyzeBatch and the renderers on inline data.
 */

import { readIndicatorFile } from '../loader/indicator-file.js';
import { analyzeIndicators } from '../insights/indicator-analyzer.js';
import type { AnalysisFailure, BatchAnalysis } from '../insights/indicator-analyzer.js';
import { generateIndicatorReport, formatSummary } from '../generators/report-generator.js';
import { summarizeResults } from '../dashboard/result-filters.js';
import type { ResultSummary } from '../dashboard/result-filters.js';
import type { AnalysisConfig } from '../config/analysis-config.js';
import type { AnalysisThresholds } from '../config/thresholds.js';
import type { IndicatorSeries } from '../types/indicator.js';

export type OutputFormat = 'markdown' | 'json';

export interface AnalyzeCommandOptions {
  format?: OutputFormat;
  /** Abort on the first malformed indicator instead of skipping it. */
  strict?: boolean;
}

export function parseFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === 'markdown') return 'markdown';
  if (value === 'json') return 'json';
  throw new Error(`Unknown format "${value}" (expected markdown or json)`);
}

/** Analyze every indicator in a file and render a report. */
export function runAnalyze(
  filePath: string,
  config: AnalysisConfig,
  options: AnalyzeCommandOptions = {}
): string {
  const batch = analyzeBatch(readIndicatorFile(filePath), config.thresholds, options);
  return renderAnalysis(batch, config.reportTitle, options.format);
}

/** Semaphore, trend and periodicity counts for a file. */
export function runSummary(
  filePath: string,
  config: AnalysisConfig,
  options: AnalyzeCommandOptions = {}
): string {
  const batch = analyzeBatch(readIndicatorFile(filePath), config.thresholds, options);
  return renderSummary(batch, config.reportTitle, options.format);
}

/**
 * Run the engine over a batch, logging every skipped indicator to stderr.
 * In strict mode the first malformed indicator aborts the batch.
 */
export function analyzeBatch(
  indicators: readonly IndicatorSeries[],
  thresholds: AnalysisThresholds,
  options: Pick<AnalyzeCommandOptions, 'strict'> = {}
): BatchAnalysis {
  const batch = analyzeIndicators(indicators, {
    thresholds,
    onError: options.strict ? 'abort' : 'skip',
  });

  for (const failure of batch.failures) {
    console.error(`[indicators] Skipped indicator: ${failure.message}`);
  }
  return batch;
}

export function renderAnalysis(
  batch: BatchAnalysis,
  title: string,
  format: OutputFormat = 'markdown'
): string {
  if (format === 'json') {
    return JSON.stringify(batch, null, 2);
  }
  return generateIndicatorReport(batch.results, { title, failures: batch.failures });
}

export function renderSummary(
  batch: BatchAnalysis,
  title: string,
  format: OutputFormat = 'markdown'
): string {
  const summary = summarizeResults(batch.results);
  if (format === 'json') {
    return JSON.stringify({ ...summary, skipped: batch.failures.length }, null, 2);
  }
  return formatSummaryText(title, summary, batch.failures);
}

// ─── Internals ──────────────────────────────────────────────

function formatSummaryText(
  title: string,
  summary: ResultSummary,
  failures: readonly AnalysisFailure[]
): string {
  const parts: string[] = [];
  parts.push(`# ${title}`);
  parts.push('');
  parts.push(...formatSummary(summary));

  parts.push('## Trends');
  parts.push('');
  for (const [trend, count] of Object.entries(summary.byTrend)) {
    parts.push(`- ${trend}: ${count}`);
  }
  parts.push('');

  parts.push('## Periodicity');
  parts.push('');
  for (const [periodicity, count] of Object.entries(summary.byPeriodicity)) {
    if (count > 0) parts.push(`- ${periodicity}: ${count}`);
  }
  parts.push('');

  if (failures.length > 0) {
    parts.push(`${failures.length} indicator(s) skipped because of invalid data.`);
  }

  return parts.join('\n').trimEnd() + '\n';
}
