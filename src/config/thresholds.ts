/**
 * Configurable Thresholds
 *
 * Defines all analysis cutoffs in one place.
 * Callers can override any subset per call or via indicators.config.json.
 * Missing overrides fall back to defaults.
 */

export interface ThresholdConfig {
  /** |z| above which a value is reported as an anomaly. */
  zScoreThreshold?: number;
  /** Coefficient of variation (%) above which a series is Volatile. */
  volatilityCvPercent?: number;
  /** Regression slope above which a series is Growth. */
  growthSlope?: number;
  /** Regression slope below which a series is Decline. */
  declineSlope?: number;
  /** Empty cadence slots tolerated when a regular cadence is fitted. */
  maxAssumedMissing?: number;
  /** Share of months (%) between first and last value that makes a series Monthly. */
  monthlyCoveragePercent?: number;
}

export type AnalysisThresholds = Required<ThresholdConfig>;

export const DEFAULT_THRESHOLDS: AnalysisThresholds = {
  zScoreThreshold: 2.5,
  volatilityCvPercent: 15,
  growthSlope: 0.5,
  declineSlope: -0.5,
  maxAssumedMissing: 1,
  monthlyCoveragePercent: 75,
};

const THRESHOLD_KEYS = [
  'zScoreThreshold',
  'volatilityCvPercent',
  'growthSlope',
  'declineSlope',
  'maxAssumedMissing',
  'monthlyCoveragePercent',
] as const satisfies ReadonlyArray<keyof ThresholdConfig>;

/**
 * Merge user overrides onto defaults.
 * Returns a fully-resolved config with no optional fields.
 */
export function resolveThresholds(overrides?: ThresholdConfig): AnalysisThresholds {
  const resolved = { ...DEFAULT_THRESHOLDS };
  if (!overrides) return resolved;

  // An explicit undefined keeps the default
  for (const key of THRESHOLD_KEYS) {
    const value = overrides[key];
    if (value !== undefined) resolved[key] = value;
  }
  return resolved;
}
