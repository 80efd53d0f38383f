/**
 * Indicator File Loader
 *
 * Reads a JSON export of indicator records from disk and hands the engine
 * validated IndicatorSeries. Spreadsheet cell markers are normalized by the
 * schemas in validators.ts.
 */

import { readFileSync, existsSync } from 'node:fs';
import type { IndicatorSeries } from '../types/indicator.js';
import { IndicatorFileSchema, formatIssues } from '../validators.js';

export class IndicatorFileError extends Error {
  constructor(
    message: string,
    public filePath: string
  ) {
    super(message);
    this.name = 'IndicatorFileError';
  }
}

/**
 * Read and validate an indicator file.
 * Throws IndicatorFileError when the file is missing, not JSON, or does not
 * match the schema.
 */
export function readIndicatorFile(filePath: string): IndicatorSeries[] {
  if (!existsSync(filePath)) {
    throw new IndicatorFileError(`Indicator file not found: ${filePath}`, filePath);
  }

  const raw = readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new IndicatorFileError(`Invalid JSON in ${filePath}: ${reason}`, filePath);
  }

  return parseIndicators(parsed, filePath);
}

/**
 * Validate already-parsed JSON (e.g. MCP tool arguments).
 * `source` names the origin in error messages.
 */
export function parseIndicators(data: unknown, source: string): IndicatorSeries[] {
  const result = IndicatorFileSchema.safeParse(data);
  if (!result.success) {
    throw new IndicatorFileError(
      `Invalid indicator data in ${source}:\n${formatIssues(result.error)}`,
      source
    );
  }

  const seen = new Set<number>();
  for (const series of result.data) {
    if (seen.has(series.id)) {
      throw new IndicatorFileError(
        `Invalid indicator data in ${source}: duplicate indicator id ${series.id}`,
        source
      );
    }
    seen.add(series.id);
  }

  return result.data;
}
