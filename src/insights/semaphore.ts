/**
 * Semaphore Classifier
 *
 * Maps the latest obtained value of an indicator onto a compliance color
 * using its per-indicator satisfactory and critical thresholds. First match
 * wins:
 *
 *   Gray:   no value, or thresholds missing — never guessed
 *   Green:  meets the satisfactory level
 *   Yellow: between the critical and satisfactory levels
 *   Red:    beyond the critical level
 *
 * Indicators declared lower-is-better (overdue requests, absenteeism) mirror
 * the comparisons. The threshold order alone never flips them.
 */

import type { Polarity, Semaphore } from '../types/indicator.js';

export interface SemaphoreInput {
  obtained: number | null;
  satisfactoryThreshold?: number | null;
  criticalThreshold?: number | null;
  /** Default higher-is-better. */
  polarity?: Polarity;
}

export function classifySemaphore(input: SemaphoreInput): Semaphore {
  const { obtained } = input;
  const satisfactory = usable(input.satisfactoryThreshold);
  const critical = usable(input.criticalThreshold);

  if (obtained === null || !Number.isFinite(obtained)) return 'Gray';
  if (satisfactory === null || critical === null) return 'Gray';

  if (input.polarity === 'lower-is-better') {
    if (obtained <= satisfactory) return 'Green';
    if (obtained <= critical) return 'Yellow';
    return 'Red';
  }

  if (obtained >= satisfactory) return 'Green';
  if (obtained >= critical) return 'Yellow';
  return 'Red';
}

function usable(value: number | null | undefined): number | null {
  return value !== null && value !== undefined && Number.isFinite(value) ? value : null;
}
