/**
 * Fairness Metric Types
 *
 * Every metric follows one pattern: compute a disparity statistic across
 * groups, then map it onto a normalized score through a threshold ladder.
 * A metric that cannot be computed for a batch is an explicit result
 * state ('undefined'), not an exception and not a numeric placeholder.
 */

import type { SubgroupKey } from './batch.js';

/** The six metrics, in declaration order */
export type MetricName =
  | 'demographic_parity'
  | 'equal_opportunity'
  | 'equalized_odds'
  | 'predictive_parity'
  | 'calibration'
  | 'subgroup_performance';

/** Declaration order, used for tie-breaking and report layout */
export const METRIC_NAMES: readonly MetricName[] = [
  'demographic_parity',
  'equal_opportunity',
  'equalized_odds',
  'predictive_parity',
  'calibration',
  'subgroup_performance',
];

/** The only values a ladder can produce */
export type NormalizedScore = 1 | 0.7 | 0.5 | 0.2;

/**
 * Which way "fairer" goes for a metric's raw value.
 * - lower: a gap, 0 is perfect parity
 * - higher: a ratio, 1 is perfect parity
 */
export type MetricDirection = 'lower' | 'higher';

/** The per-group statistic a metric compares */
export type RateComponent =
  | 'selection_rate'
  | 'tpr'
  | 'fpr'
  | 'precision'
  | 'ece'
  | 'accuracy';

/** Why a metric could not be computed */
export type UndefinedReason =
  | 'no_samples'          // Batch was empty
  | 'no_scores'           // Calibration without predicted probabilities
  | 'insufficient_groups'; // Fewer than two groups with a defined rate

/** One group's value for one component of a metric */
export interface GroupMetricValue {
  key: SubgroupKey;
  label: string;
  component: RateComponent;
  /** null = undefined for this group (excluded from the gap) */
  value: number | null;
  sampleCount: number;
}

/** A group at one end of a gap */
export interface GroupExtreme {
  label: string;
  value: number;
}

/** The group pair responsible for a metric's gap */
export interface GapDriver {
  /** Attribute whose groups produce the gap; null for intersectional metrics */
  attribute: string | null;
  component: RateComponent;
  highest: GroupExtreme;
  lowest: GroupExtreme;
}

/** Gap of one metric component computed within one attribute */
export interface AttributeGap {
  attribute: string;
  component: RateComponent;
  /** null when fewer than two groups had a defined value */
  gap: number | null;
}

interface MetricResultBase {
  metric: MetricName;
  direction: MetricDirection;
  /** Per-group breakdown for every component the metric uses */
  groups: readonly GroupMetricValue[];
  /** Per-attribute gaps (empty for subgroup_performance) */
  attributeGaps: readonly AttributeGap[];
  /** Some contributing group is below the minimum group size */
  unreliable: boolean;
  /** Labels of the contributing groups below the minimum group size */
  smallGroups: readonly string[];
  /** Human-readable one-line summary */
  explanation: string;
}

export interface DefinedMetricResult extends MetricResultBase {
  status: 'defined';
  /** Gap (direction 'lower') or ratio (direction 'higher') */
  gap: number;
  /** Gap-form disparity: the gap itself, or 1 − ratio */
  disparity: number;
  score: NormalizedScore;
  driver: GapDriver;
}

export interface UndefinedMetricResult extends MetricResultBase {
  status: 'undefined';
  reason: UndefinedReason;
}

export type MetricResult = DefinedMetricResult | UndefinedMetricResult;

export type MetricResults = Readonly<Record<MetricName, MetricResult>>;

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

/** A metric whose score fell below the critical threshold */
export interface CriticalIssue {
  metric: MetricName;
  score: NormalizedScore;
  gap: number;
  attribute: string | null;
  /** [highest, lowest] group labels driving the gap */
  groupPair: readonly [string, string];
  description: string;
  /** Generic mitigation hint, fixed per metric */
  mitigation: string;
  unreliable: boolean;
}

/** A subgroup ranked by accuracy */
export interface WorstGroup {
  key: SubgroupKey;
  label: string;
  accuracy: number;
  /** TPR; null without positive ground truth */
  sensitivity: number | null;
  /** 1 − FPR; null without negative ground truth */
  specificity: number | null;
  size: number;
}

/** A metric ranked by disparity */
export interface LargestGap {
  metric: MetricName;
  gap: number;
  disparity: number;
  attribute: string | null;
}

/** Category-level verdict for one batch */
export interface BiasAssessment {
  /** Mean of defined metric scores; null when no metric is defined */
  categoryScore: number | null;
  definedMetricCount: number;
  criticalIssues: readonly CriticalIssue[];
  worstPerformingGroups: readonly WorstGroup[];
  largestGaps: readonly LargestGap[];
  explanations: readonly string[];
}

/** Immutable record of one evaluation, handed to the persistence layer */
export interface FairnessSnapshot {
  snapshotId: string;
  systemId: string;
  modelVersion: string;
  /** ISO-8601 */
  timestamp: string;
  sampleCount: number;
  metrics: MetricResults;
  assessment: BiasAssessment;
}
