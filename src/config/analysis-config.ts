/**
 * Analysis Configuration
 *
 * Reads the optional indicators.config.json.
 * Validates with Zod on read; missing thresholds fall back to defaults.
 */

import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import { resolveThresholds } from './thresholds.js';
import type { AnalysisThresholds } from './thresholds.js';
import { resolveConfigPath } from './paths.js';
import { ThresholdOverridesSchema, formatIssues } from '../validators.js';

// ─── Zod Schemas ─────────────────────────────────────────────

const ReportSettingsSchema = z.object({
  title: z.string().min(1).default('Indicator Analysis Report'),
});

const AnalysisConfigSchema = z.object({
  version: z.literal(1),
  thresholds: ThresholdOverridesSchema.default({}),
  report: ReportSettingsSchema.default({}),
});

export { AnalysisConfigSchema };

export type AnalysisConfigFile = z.infer<typeof AnalysisConfigSchema>;

/** Config with thresholds merged onto defaults. */
export interface AnalysisConfig {
  thresholds: AnalysisThresholds;
  reportTitle: string;
  /** Path the config was read from, or null when defaults are in effect. */
  source: string | null;
}

export class AnalysisConfigError extends Error {
  constructor(
    message: string,
    public filePath: string
  ) {
    super(message);
    this.name = 'AnalysisConfigError';
  }
}

// ─── Read ────────────────────────────────────────────────────

/**
 * Read and validate the config file.
 * Returns null if the file doesn't exist.
 * Throws AnalysisConfigError on invalid JSON or schema validation failure.
 */
export function readAnalysisConfig(filePath = resolveConfigPath()): AnalysisConfigFile | null {
  if (!existsSync(filePath)) {
    return null;
  }

  const raw = readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AnalysisConfigError(`Invalid JSON in ${filePath}: ${reason}`, filePath);
  }

  const result = AnalysisConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new AnalysisConfigError(
      `Invalid config in ${filePath}:\n${formatIssues(result.error)}`,
      filePath
    );
  }
  return result.data;
}

/**
 * Load the effective configuration: the file when present, defaults otherwise.
 */
export function loadAnalysisConfig(filePath = resolveConfigPath()): AnalysisConfig {
  const file = readAnalysisConfig(filePath);
  if (!file) {
    return {
      thresholds: resolveThresholds(),
      reportTitle: ReportSettingsSchema.parse({}).title,
      source: null,
    };
  }

  return {
    thresholds: resolveThresholds(file.thresholds),
    reportTitle: file.report.title,
    source: filePath,
  };
}
