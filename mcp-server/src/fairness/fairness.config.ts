/**
 * Fairness Configuration
 *
 * All tunable parameters for metric scoring and drift monitoring.
 * Override these to customize the evaluation for your domain.
 *
 * Every threshold table is an ordered list of (lowerBound, outcome)
 * steps in descending order. The first step whose lower bound the value
 * reaches wins, so a value sitting exactly on a bound belongs to the
 * step that bound opens.
 */

import type { MetricDirection, MetricName, NormalizedScore } from '../types/metrics.js';
import type { DriftSeverity } from '../types/drift.js';

/** One rung of a threshold ladder */
export interface LadderStep<T> {
  /** Inclusive lower bound of this rung */
  lowerBound: number;
  outcome: T;
}

/** Rungs ordered by descending lower bound; the last rung catches everything */
export type Ladder<T> = readonly LadderStep<T>[];

// ---------------------------------------------------------------------------
// Score Ladders: raw metric value → normalized score
// ---------------------------------------------------------------------------

/**
 * Gap ladder, shared by the five pairwise metrics.
 *   gap < 0.05 → 1.0, [0.05, 0.10) → 0.7, [0.10, 0.15) → 0.5, ≥ 0.15 → 0.2
 */
export const GAP_SCORE_LADDER: Ladder<NormalizedScore> = [
  { lowerBound: 0.15, outcome: 0.2 },
  { lowerBound: 0.10, outcome: 0.5 },
  { lowerBound: 0.05, outcome: 0.7 },
  { lowerBound: -Infinity, outcome: 1 },
];

/**
 * Subgroup accuracy ratio ladder (min / max accuracy).
 *   ratio ≥ 0.90 → 1.0, [0.85, 0.90) → 0.7, [0.80, 0.85) → 0.5, < 0.80 → 0.2
 */
export const RATIO_SCORE_LADDER: Ladder<NormalizedScore> = [
  { lowerBound: 0.90, outcome: 1 },
  { lowerBound: 0.85, outcome: 0.7 },
  { lowerBound: 0.80, outcome: 0.5 },
  { lowerBound: -Infinity, outcome: 0.2 },
];

/** Which ladder and direction each metric uses */
export const METRIC_DIRECTION: Record<MetricName, MetricDirection> = {
  demographic_parity:   'lower',
  equal_opportunity:    'lower',
  equalized_odds:       'lower',
  predictive_parity:    'lower',
  calibration:          'lower',
  subgroup_performance: 'higher',
};

// ---------------------------------------------------------------------------
// Drift Severity Ladder: absolute change → severity
// ---------------------------------------------------------------------------

/**
 * Shared by the delta, statistical and control-chart methods.
 *   change < 0.03 → none, [0.03, 0.15) → minor, ≥ 0.15 → major
 */
export const DRIFT_SEVERITY_LADDER: Ladder<DriftSeverity> = [
  { lowerBound: 0.15, outcome: 'major' },
  { lowerBound: 0.03, outcome: 'minor' },
  { lowerBound: -Infinity, outcome: 'none' },
];

// ---------------------------------------------------------------------------
// Computation Constants
// ---------------------------------------------------------------------------

export const METRIC_DEFAULTS = {
  /** Equal-width probability bins for calibration */
  calibrationBins: 10,
  /** Groups smaller than this mark a metric as unreliable */
  minGroupSize: 10,
  /** Scores below this raise a critical issue */
  criticalScoreThreshold: 0.5,
  /** Length of the worst-group and largest-gap lists */
  topN: 5,
  /** Boundary comparisons round to this many decimal places */
  boundaryPrecision: 9,
} as const;

export const DRIFT_DEFAULTS = {
  /** Points per window; baseline and current each take this many */
  windowSize: 5,
  /** Smallest window the t-test can work with */
  minWindowSize: 2,
  /** Significance level for the statistical method */
  alpha: 0.05,
  /** Control limits at mean ± sigmaLimit · std */
  sigmaLimit: 2,
} as const;

// ---------------------------------------------------------------------------
// Fixed Text Tables
// ---------------------------------------------------------------------------

/** Generic mitigation hint per metric, a lookup table */
export const MITIGATION_HINTS: Record<MetricName, string> = {
  demographic_parity:
    'Review training data representation and consider reweighing or group-aware decision thresholds.',
  equal_opportunity:
    'Collect more positive examples for under-served groups and consider post-processing to equalize true positive rates.',
  equalized_odds:
    'Apply an equalized-odds post-processing step or constrained training to align TPR and FPR across groups.',
  predictive_parity:
    'Recalibrate decision thresholds per group so positive predictions carry comparable precision.',
  calibration:
    'Fit per-group calibration (Platt scaling or isotonic regression) and monitor reliability diagrams.',
  subgroup_performance:
    'Audit intersectional subgroups with low accuracy, augment their data and evaluate targeted model capacity.',
};

/** Human-readable metric names used in text output */
export const METRIC_LABELS: Record<MetricName, string> = {
  demographic_parity:   'Demographic Parity',
  equal_opportunity:    'Equal Opportunity',
  equalized_odds:       'Equalized Odds',
  predictive_parity:    'Predictive Parity',
  calibration:          'Calibration',
  subgroup_performance: 'Subgroup Performance',
};

/** Recommendation template per drift severity; none produces no recommendation */
export const DRIFT_RECOMMENDATIONS: Record<DriftSeverity, ((metric: string) => string) | null> = {
  none: null,
  minor: (metric) =>
    `Minor drift in ${metric}. Continue monitoring for escalation.`,
  major: (metric) =>
    `URGENT: Major drift detected in ${metric}. Immediate investigation and potential model retraining required.`,
};
