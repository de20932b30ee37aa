/**
 * Drift Severity
 *
 * One severity function for all three detection methods, so a given
 * absolute change always means the same thing whichever method saw it.
 */

import type { DriftSeverity } from '../types/drift.js';
import { DRIFT_SEVERITY_RANK } from '../types/drift.js';
import { DRIFT_RECOMMENDATIONS, DRIFT_SEVERITY_LADDER } from '../fairness/fairness.config.js';
import { evaluateLadder } from '../fairness/ladder.js';

/** change < 0.03 → none, [0.03, 0.15) → minor, ≥ 0.15 → major */
export function classifyDriftSeverity(absoluteChange: number): DriftSeverity {
  return evaluateLadder(Math.abs(absoluteChange), DRIFT_SEVERITY_LADDER);
}

export function maxSeverity(severities: Iterable<DriftSeverity>): DriftSeverity {
  let worst: DriftSeverity = 'none';
  for (const severity of severities) {
    if (DRIFT_SEVERITY_RANK[severity] > DRIFT_SEVERITY_RANK[worst]) {
      worst = severity;
    }
  }
  return worst;
}

/** Fixed per-severity template, null when there is nothing to recommend */
export function recommendationFor(metric: string, severity: DriftSeverity): string | null {
  const template = DRIFT_RECOMMENDATIONS[severity];
  return template === null ? null : template(metric);
}
