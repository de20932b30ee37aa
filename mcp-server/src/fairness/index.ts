/**
 * Fairness Metric Engine
 *
 * Unified entry point for metric computation: group statistics,
 * the six disparity metrics, aggregation and snapshots.
 */

export {
  sampleBatchSchema,
  parseSampleBatch,
  formatSubgroupKey,
  attributeCombinations,
  enumerateSubgroupKeys,
  expectedCalibrationError,
  buildGroupStats,
  subgroupId,
} from './group-stats.js';
export type { SampleBatchInput } from './group-stats.js';

export {
  computePairwiseMetric,
  computeSubgroupPerformance,
  computeMetrics,
} from './metric-computer.js';
export type { MetricComputerOptions, MetricComputation } from './metric-computer.js';

export {
  computeCategoryScore,
  extractCriticalIssues,
  identifyWorstPerformingGroups,
  identifyLargestGaps,
  aggregateBias,
} from './bias-aggregator.js';
export type { AggregatorOptions } from './bias-aggregator.js';

export { evaluateFairness } from './evaluate.js';
export type { EvaluationOptions } from './evaluate.js';

export { evaluateLadder, roundForComparison } from './ladder.js';

export {
  GAP_SCORE_LADDER,
  RATIO_SCORE_LADDER,
  DRIFT_SEVERITY_LADDER,
  METRIC_DIRECTION,
  METRIC_DEFAULTS,
  DRIFT_DEFAULTS,
  MITIGATION_HINTS,
  METRIC_LABELS,
  DRIFT_RECOMMENDATIONS,
} from './fairness.config.js';
export type { Ladder, LadderStep } from './fairness.config.js';
