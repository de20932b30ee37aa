/**
 * Threshold Ladders
 *
 * One evaluator for every threshold table in the system: score ladders,
 * the subgroup ratio ladder and the drift severity ladder.
 */

import { METRIC_DEFAULTS } from './fairness.config.js';
import type { Ladder } from './fairness.config.js';

/**
 * Round a value before comparing it against a boundary, so that
 * 0.20 − 0.05 lands on 0.15 instead of 0.15000000000000002.
 */
export function roundForComparison(
  value: number,
  precision: number = METRIC_DEFAULTS.boundaryPrecision,
): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

/**
 * Evaluate a ladder: the first rung (in descending order) whose
 * inclusive lower bound the value reaches determines the outcome.
 */
export function evaluateLadder<T>(value: number, ladder: Ladder<T>): T {
  if (Number.isNaN(value)) {
    throw new RangeError('Cannot place NaN on a threshold ladder');
  }

  const rounded = roundForComparison(value);
  for (const step of ladder) {
    if (rounded >= step.lowerBound) {
      return step.outcome;
    }
  }

  const floor = ladder[ladder.length - 1];
  if (floor === undefined) {
    throw new RangeError('Threshold ladder has no rungs');
  }
  return floor.outcome;
}
