/**
 * Bias Aggregator
 *
 * Folds the six metric results into the category verdict: one score,
 * the critical issues, the worst-performing subgroups and the largest
 * gaps.
 */

import type { GroupStats } from '../types/batch.js';
import type {
  BiasAssessment,
  CriticalIssue,
  DefinedMetricResult,
  LargestGap,
  MetricResults,
  WorstGroup,
} from '../types/metrics.js';
import { METRIC_NAMES } from '../types/metrics.js';
import { METRIC_DEFAULTS, METRIC_LABELS, MITIGATION_HINTS } from './fairness.config.js';
import { roundForComparison } from './ladder.js';
import type { MetricComputation } from './metric-computer.js';

export interface AggregatorOptions {
  /** Scores strictly below this raise a critical issue (default 0.5) */
  criticalScoreThreshold?: number;
  /** Length of the worst-group and largest-gap lists (default 5) */
  topN?: number;
}

function definedMetrics(metrics: MetricResults): DefinedMetricResult[] {
  return METRIC_NAMES.flatMap((name) => {
    const result = metrics[name];
    return result.status === 'defined' ? [result] : [];
  });
}

/**
 * Mean (not sum) of defined metric scores. An undefined metric shrinks
 * the denominator instead of counting as zero.
 */
export function computeCategoryScore(metrics: MetricResults): number | null {
  const defined = definedMetrics(metrics);
  if (defined.length === 0) return null;
  return defined.reduce((sum, result) => sum + result.score, 0) / defined.length;
}

function describeIssue(result: DefinedMetricResult): string {
  const { driver } = result;
  const scope = driver.attribute === null ? 'across subgroups' : `across ${driver.attribute} groups`;
  const measure = result.direction === 'higher' ? 'ratio' : 'gap';

  let description =
    `${METRIC_LABELS[result.metric]} ${measure} of ${result.gap.toFixed(4)} ${scope} ` +
    `(${driver.component}: ${driver.highest.label} ${driver.highest.value.toFixed(4)} vs ` +
    `${driver.lowest.label} ${driver.lowest.value.toFixed(4)}), score ${result.score}.`;

  if (result.unreliable) {
    description +=
      ` Estimate is unreliable: small groups (${result.smallGroups.join(', ')}) contribute to this result.`;
  }
  return description;
}

export function extractCriticalIssues(
  metrics: MetricResults,
  threshold: number = METRIC_DEFAULTS.criticalScoreThreshold,
): CriticalIssue[] {
  return definedMetrics(metrics)
    .filter((result) => result.score < threshold)
    .map((result) => ({
      metric: result.metric,
      score: result.score,
      gap: result.gap,
      attribute: result.driver.attribute,
      groupPair: [result.driver.highest.label, result.driver.lowest.label] as const,
      description: describeIssue(result),
      mitigation: MITIGATION_HINTS[result.metric],
      unreliable: result.unreliable,
    }));
}

/**
 * Lowest-accuracy subgroups. On equal accuracy the larger group ranks
 * worse, then labels break the tie.
 */
export function identifyWorstPerformingGroups(
  subgroupStats: readonly GroupStats[],
  topN: number = METRIC_DEFAULTS.topN,
): WorstGroup[] {
  return [...subgroupStats]
    .sort((a, b) => {
      const byAccuracy = roundForComparison(a.accuracy) - roundForComparison(b.accuracy);
      if (byAccuracy !== 0) return byAccuracy;
      const bySize = b.sampleCount - a.sampleCount;
      if (bySize !== 0) return bySize;
      return a.label < b.label ? -1 : a.label > b.label ? 1 : 0;
    })
    .slice(0, topN)
    .map((stats) => ({
      key: stats.key,
      label: stats.label,
      accuracy: stats.accuracy,
      sensitivity: stats.truePositiveRate,
      specificity: stats.falsePositiveRate === null ? null : 1 - stats.falsePositiveRate,
      size: stats.sampleCount,
    }));
}

/** Defined metrics by descending disparity; ties keep declaration order */
export function identifyLargestGaps(
  metrics: MetricResults,
  topN: number = METRIC_DEFAULTS.topN,
): LargestGap[] {
  // Array.prototype.sort is stable, and definedMetrics is in declaration order
  return definedMetrics(metrics)
    .sort((a, b) => roundForComparison(b.disparity) - roundForComparison(a.disparity))
    .slice(0, topN)
    .map((result) => ({
      metric: result.metric,
      gap: result.gap,
      disparity: result.disparity,
      attribute: result.driver.attribute,
    }));
}

/** Build the category verdict for one metric computation */
export function aggregateBias(
  computation: MetricComputation,
  options: AggregatorOptions = {},
): BiasAssessment {
  const { metrics, subgroupStats } = computation;
  const topN = options.topN ?? METRIC_DEFAULTS.topN;

  return {
    categoryScore: computeCategoryScore(metrics),
    definedMetricCount: definedMetrics(metrics).length,
    criticalIssues: extractCriticalIssues(metrics, options.criticalScoreThreshold),
    worstPerformingGroups: identifyWorstPerformingGroups(subgroupStats, topN),
    largestGaps: identifyLargestGaps(metrics, topN),
    explanations: METRIC_NAMES.map((name) => metrics[name].explanation),
  };
}
