/**
 * MCP Tool Handlers
 *
 * Tool definitions and handlers for the stdio server in index.ts.
 * Handlers are synchronous and take the loaded config explicitly so they
 * can be exercised without a transport.
 */

import { z } from 'zod';
import { parseIndicators } from '../loader/indicator-file.js';
import { ThresholdOverridesSchema, formatIssues } from '../validators.js';
import { resolveThresholds, DEFAULT_THRESHOLDS } from '../config/thresholds.js';
import type { AnalysisThresholds } from '../config/thresholds.js';
import type { AnalysisConfig } from '../config/analysis-config.js';
import { analyzeBatch, renderAnalysis, renderSummary } from '../commands/analyze.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
};

const INDICATORS_PROPERTY = {
  description:
    'Indicator records: [{ id, name, target?, satisfactoryThreshold?, criticalThreshold?, polarity?: "higher-is-better" | "lower-is-better", values: { "Jan": 80, ... } }]. Values may also be [["Jan", 80], ...]. Period labels are month names (English or Spanish) or YYYY-MM.',
};

const THRESHOLDS_PROPERTY = {
  type: 'object' as const,
  description: 'Optional overrides of the analysis cutoffs for this call',
  properties: {
    zScoreThreshold: {
      type: 'number' as const,
      description: '|z| above which a value is an anomaly (default 2.5)',
    },
    volatilityCvPercent: {
      type: 'number' as const,
      description: 'CV % above which a series is Volatile (default 15)',
    },
    growthSlope: {
      type: 'number' as const,
      description: 'Slope above which a series is Growth (default 0.5)',
    },
    declineSlope: {
      type: 'number' as const,
      description: 'Slope below which a series is Decline (default -0.5)',
    },
    maxAssumedMissing: {
      type: 'number' as const,
      description: 'Empty cadence slots tolerated for periodicity (default 1)',
    },
    monthlyCoveragePercent: {
      type: 'number' as const,
      description: 'Share of months (%) with values that makes a series Monthly (default 75)',
    },
  },
};

export const TOOL_DEFINITIONS = [
  {
    name: 'analyze_indicators',
    description:
      'Analyze management indicators: periodicity, trend, semaphore status, anomalies and a written interpretation per indicator. Malformed indicators are skipped and listed.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        indicators: INDICATORS_PROPERTY,
        thresholds: THRESHOLDS_PROPERTY,
        format: {
          type: 'string' as const,
          enum: ['markdown', 'json'],
          description: 'Output format (default: markdown)',
        },
      },
      required: ['indicators'],
    },
  },
  {
    name: 'summarize_indicators',
    description:
      'Count indicators by semaphore status, trend and periodicity. Use for a quick overview of many indicators.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        indicators: INDICATORS_PROPERTY,
        thresholds: THRESHOLDS_PROPERTY,
      },
      required: ['indicators'],
    },
  },
  {
    name: 'get_capabilities',
    description: 'Show the thresholds in effect, the config file status and the available tools.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },
];

const ToolArgsSchema = z.object({
  indicators: z.unknown().refine((value) => value !== undefined, 'Required'),
  thresholds: ThresholdOverridesSchema.optional(),
  format: z.enum(['markdown', 'json']).optional(),
});

type ToolArgs = z.infer<typeof ToolArgsSchema>;

// ─── Handlers ───────────────────────────────────────────────

export function handleAnalyzeIndicators(
  args: Record<string, unknown> | undefined,
  config: AnalysisConfig
): ToolResult {
  const parsed = parseToolArgs(args);
  const batch = analyzeBatch(
    parseIndicators(parsed.indicators, 'tool arguments'),
    effectiveThresholds(config, parsed)
  );
  return text(renderAnalysis(batch, config.reportTitle, parsed.format));
}

export function handleSummarizeIndicators(
  args: Record<string, unknown> | undefined,
  config: AnalysisConfig
): ToolResult {
  const parsed = parseToolArgs(args);
  const batch = analyzeBatch(
    parseIndicators(parsed.indicators, 'tool arguments'),
    effectiveThresholds(config, parsed)
  );
  return text(renderSummary(batch, config.reportTitle));
}

export function handleGetCapabilities(config: AnalysisConfig): ToolResult {
  const t = config.thresholds;
  const parts: string[] = [];
  parts.push('# Indicator Analysis MCP');
  parts.push('');

  parts.push('## Status');
  parts.push('');
  parts.push('| Component | Status |');
  parts.push('|-----------|--------|');
  parts.push(
    `| Config file | ${config.source ? `\`${config.source}\`` : 'Not found (defaults in use)'} |`
  );
  parts.push(`| Report title | ${config.reportTitle} |`);
  parts.push('');

  parts.push('## Analysis Thresholds');
  parts.push('');
  parts.push('| Threshold | Value | Default |');
  parts.push('|-----------|-------|---------|');
  parts.push(`| Anomaly z-score | ${t.zScoreThreshold} | ${DEFAULT_THRESHOLDS.zScoreThreshold} |`);
  parts.push(
    `| Volatility CV | ${t.volatilityCvPercent}% | ${DEFAULT_THRESHOLDS.volatilityCvPercent}% |`
  );
  parts.push(`| Growth slope | ${t.growthSlope} | ${DEFAULT_THRESHOLDS.growthSlope} |`);
  parts.push(`| Decline slope | ${t.declineSlope} | ${DEFAULT_THRESHOLDS.declineSlope} |`);
  parts.push(
    `| Max assumed missing periods | ${t.maxAssumedMissing} | ${DEFAULT_THRESHOLDS.maxAssumedMissing} |`
  );
  parts.push(
    `| Monthly coverage | ${t.monthlyCoveragePercent}% | ${DEFAULT_THRESHOLDS.monthlyCoveragePercent}% |`
  );
  parts.push('');

  parts.push('## Available Tools');
  parts.push('');
  parts.push('- **analyze_indicators** — Full analysis with interpretation per indicator');
  parts.push('- **summarize_indicators** — Counts by status, trend and periodicity');
  parts.push('- **get_capabilities** — This overview');

  return text(parts.join('\n'));
}

// ─── Internals ──────────────────────────────────────────────

function parseToolArgs(args: Record<string, unknown> | undefined): ToolArgs {
  const result = ToolArgsSchema.safeParse(args ?? {});
  if (!result.success) {
    throw new Error(`Invalid arguments:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

/** Per-call overrides win over the config file. */
function effectiveThresholds(config: AnalysisConfig, args: ToolArgs): AnalysisThresholds {
  return resolveThresholds({ ...config.thresholds, ...args.thresholds });
}

function text(body: string): ToolResult {
  return { content: [{ type: 'text', text: body }] };
}
