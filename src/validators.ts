/**
 * Zod schemas for indicator records arriving from JSON exports and MCP calls.
 *
 * Cells exported from the control-panel spreadsheet can still carry text:
 * percentages ("85%"), decimal commas ("85,5") and error markers ("#DIV/0!").
 * These are normalized here so the engine only ever sees numbers or null.
 */

import { z } from 'zod';
import type { IndicatorSeries, PeriodValue } from './types/indicator.js';

/** Spreadsheet markers that stand for "no measurement". */
const MISSING_MARKERS = new Set(['', '-', 'na', 'n/a', '#n/a', '#div/0!', '#div/0', '#value!']);

const NUMERIC_TEXT = /^[-+]?(\d+([.,]\d*)?|[.,]\d+)$/;

/** "1,234" reads as a thousands group as easily as a decimal comma. */
const GROUPED_THOUSANDS = /^[-+]?[1-9]\d{0,2},\d{3}$/;

/**
 * Parse a raw cell into a number or null.
 * A comma is a decimal separator. Returns undefined when the text is neither
 * numeric nor a known marker, or when it could be a thousands group.
 */
export function parseCell(raw: number | string | null): number | null | undefined {
  if (raw === null) return null;
  if (typeof raw === 'number') return raw;

  const text = raw.trim();
  if (MISSING_MARKERS.has(text.toLowerCase())) return null;

  const withoutPercent = text.endsWith('%') ? text.slice(0, -1).trim() : text;
  if (!NUMERIC_TEXT.test(withoutPercent)) return undefined;
  if (GROUPED_THOUSANDS.test(withoutPercent)) return undefined;
  return Number(withoutPercent.replace(',', '.'));
}

const CellSchema = z
  .union([z.number(), z.string(), z.null()])
  .transform((raw, ctx) => {
    const value = parseCell(raw);
    if (value === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${String(raw)}" is not a number` });
      return z.NEVER;
    }
    return value;
  });

const OptionalCellSchema = CellSchema.optional().transform((v) => v ?? null);

const ValuesSchema = z
  .union([
    z.record(z.string(), CellSchema),
    z.array(z.tuple([z.string(), CellSchema])),
  ])
  .transform((values): PeriodValue[] =>
    Array.isArray(values)
      ? values.map(([period, value]) => [period, value] as const)
      : Object.entries(values).map(([period, value]) => [period, value] as const)
  );

export const IndicatorRecordSchema = z
  .object({
    id: z.number().int(),
    name: z.string().trim().min(1),
    target: OptionalCellSchema,
    satisfactoryThreshold: OptionalCellSchema,
    criticalThreshold: OptionalCellSchema,
    polarity: z.enum(['higher-is-better', 'lower-is-better']).optional(),
    values: ValuesSchema.default([]),
  })
  .transform(
    (record): IndicatorSeries => ({
      id: record.id,
      name: record.name,
      target: record.target,
      satisfactoryThreshold: record.satisfactoryThreshold,
      criticalThreshold: record.criticalThreshold,
      polarity: record.polarity,
      values: record.values,
    })
  );

/** A file holds either { indicators: [...] } or a bare array. */
export const IndicatorFileSchema = z
  .union([
    z.object({ indicators: z.array(IndicatorRecordSchema) }),
    z.array(IndicatorRecordSchema),
  ])
  .transform((file) => (Array.isArray(file) ? file : file.indicators));

export const ThresholdOverridesSchema = z.object({
  zScoreThreshold: z.number().positive().optional(),
  volatilityCvPercent: z.number().positive().optional(),
  growthSlope: z.number().optional(),
  declineSlope: z.number().optional(),
  maxAssumedMissing: z.number().int().nonnegative().optional(),
  monthlyCoveragePercent: z.number().positive().max(100).optional(),
});

/** Render zod issues as "path: message" lines. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('\n');
}
