/**
 * Metric Computer
 *
 * Computes the six disparity metrics from group statistics:
 *
 *   demographic_parity   — max − min P(pred = 1)
 *   equal_opportunity    — max − min TPR
 *   equalized_odds       — max(TPR gap, FPR gap)
 *   predictive_parity    — max − min precision
 *   calibration          — max − min per-group ECE
 *   subgroup_performance — min / max accuracy over intersectional subgroups
 *
 * Pairwise metrics are computed within each attribute; the metric
 * reports its worst attribute. Groups whose rate is undefined are left
 * out of that gap, and a gap with fewer than two defined groups is
 * undefined, unless the attribute only ever had one group, which is
 * parity by construction (gap 0).
 */

import type { GroupStats, SampleBatch } from '../types/batch.js';
import type {
  AttributeGap,
  DefinedMetricResult,
  GapDriver,
  GroupMetricValue,
  MetricName,
  MetricResult,
  MetricResults,
  RateComponent,
  UndefinedMetricResult,
  UndefinedReason,
} from '../types/metrics.js';
import {
  GAP_SCORE_LADDER,
  METRIC_DEFAULTS,
  METRIC_DIRECTION,
  METRIC_LABELS,
  RATIO_SCORE_LADDER,
} from './fairness.config.js';
import { collectGroupStats, parseSampleBatch } from './group-stats.js';
import { evaluateLadder, roundForComparison } from './ladder.js';

export interface MetricComputerOptions {
  /** Groups below this size mark a metric unreliable (default 10) */
  minGroupSize?: number;
  /** Deepest attribute conjunction for subgroup performance (default: all attributes) */
  intersectionDepth?: number;
}

/** Everything the aggregator needs from one computation */
export interface MetricComputation {
  metrics: MetricResults;
  /** Single-attribute groups */
  groupStats: readonly GroupStats[];
  /** Every observed intersectional subgroup, singles included */
  subgroupStats: readonly GroupStats[];
  sampleCount: number;
  minGroupSize: number;
}

/** A per-group statistic a pairwise metric compares */
interface ComponentReader {
  component: RateComponent;
  read: (stats: GroupStats) => number | null;
}

const SELECTION_RATE: ComponentReader = { component: 'selection_rate', read: (s) => s.selectionRate };
const TPR: ComponentReader = { component: 'tpr', read: (s) => s.truePositiveRate };
const FPR: ComponentReader = { component: 'fpr', read: (s) => s.falsePositiveRate };
const PRECISION: ComponentReader = { component: 'precision', read: (s) => s.precision };
const ECE: ComponentReader = { component: 'ece', read: (s) => s.expectedCalibrationError };

/** Components per pairwise metric; equalized odds takes the larger of two */
const PAIRWISE_COMPONENTS: Record<Exclude<MetricName, 'subgroup_performance'>, readonly ComponentReader[]> = {
  demographic_parity: [SELECTION_RATE],
  equal_opportunity:  [TPR],
  equalized_odds:     [TPR, FPR],
  predictive_parity:  [PRECISION],
  calibration:        [ECE],
};

interface ComponentGap {
  gap: AttributeGap;
  driver: GapDriver | null;
  contributing: readonly GroupStats[];
}

/** Gap of one component among one attribute's groups */
function componentGap(
  attribute: string,
  groups: readonly GroupStats[],
  reader: ComponentReader,
): ComponentGap {
  const defined = groups.flatMap((stats) => {
    const value = reader.read(stats);
    return value === null ? [] : [{ stats, value }];
  });

  const single = groups.length === 1 && defined.length === 1;
  if (defined.length < 2 && !single) {
    return { gap: { attribute, component: reader.component, gap: null }, driver: null, contributing: [] };
  }

  let highest = defined[0];
  let lowest = defined[0];
  for (const entry of defined) {
    if (highest === undefined || entry.value > highest.value) highest = entry;
    if (lowest === undefined || entry.value < lowest.value) lowest = entry;
  }
  if (highest === undefined || lowest === undefined) {
    return { gap: { attribute, component: reader.component, gap: null }, driver: null, contributing: [] };
  }

  return {
    gap: { attribute, component: reader.component, gap: highest.value - lowest.value },
    driver: {
      attribute,
      component: reader.component,
      highest: { label: highest.stats.label, value: highest.value },
      lowest: { label: lowest.stats.label, value: lowest.value },
    },
    contributing: defined.map((entry) => entry.stats),
  };
}

function groupByAttribute(groupStats: readonly GroupStats[]): Map<string, GroupStats[]> {
  const byAttribute = new Map<string, GroupStats[]>();
  for (const stats of groupStats) {
    const attribute = stats.key[0]?.[0];
    if (attribute === undefined) continue;
    const bucket = byAttribute.get(attribute);
    if (bucket) bucket.push(stats);
    else byAttribute.set(attribute, [stats]);
  }
  return byAttribute;
}

function breakdown(
  groupStats: readonly GroupStats[],
  readers: readonly ComponentReader[],
): GroupMetricValue[] {
  return readers.flatMap((reader) =>
    groupStats.map((stats) => ({
      key: stats.key,
      label: stats.label,
      component: reader.component,
      value: reader.read(stats),
      sampleCount: stats.sampleCount,
    })),
  );
}

function smallGroupLabels(contributing: readonly GroupStats[], minGroupSize: number): string[] {
  const labels = new Set<string>();
  for (const stats of contributing) {
    if (stats.sampleCount < minGroupSize) labels.add(stats.label);
  }
  return [...labels];
}

function formatDriver(driver: GapDriver): string {
  const scope = driver.attribute === null ? driver.component : `${driver.component} on ${driver.attribute}`;
  return (
    `${scope}: max ${driver.highest.label} ${driver.highest.value.toFixed(4)}, ` +
    `min ${driver.lowest.label} ${driver.lowest.value.toFixed(4)}`
  );
}

function explainDefined(
  metric: MetricName,
  gap: number,
  score: number,
  driver: GapDriver,
  smallGroups: readonly string[],
  minGroupSize: number,
): string {
  const measure = METRIC_DIRECTION[metric] === 'higher' ? 'ratio' : 'gap';
  const caveat =
    smallGroups.length > 0
      ? ` [unreliable: ${smallGroups.length} group(s) below ${minGroupSize} samples]`
      : '';
  return `${METRIC_LABELS[metric]}: ${measure} ${gap.toFixed(4)} (${formatDriver(driver)}) → ${score}${caveat}`;
}

function undefinedResult(
  metric: MetricName,
  reason: UndefinedReason,
  groups: readonly GroupMetricValue[],
  attributeGaps: readonly AttributeGap[],
): UndefinedMetricResult {
  return {
    metric,
    status: 'undefined',
    reason,
    direction: METRIC_DIRECTION[metric],
    groups,
    attributeGaps,
    unreliable: false,
    smallGroups: [],
    explanation: `${METRIC_LABELS[metric]}: undefined (${reason.replace(/_/g, ' ')})`,
  };
}

/**
 * Compute one pairwise metric across every attribute.
 * The reported gap is the largest defined attribute gap; equalized odds
 * takes the larger of its TPR and FPR components within each attribute.
 */
export function computePairwiseMetric(
  metric: Exclude<MetricName, 'subgroup_performance'>,
  groupStats: readonly GroupStats[],
  minGroupSize: number,
): MetricResult {
  const readers = PAIRWISE_COMPONENTS[metric];
  const groups = breakdown(groupStats, readers);

  if (groupStats.length === 0) {
    return undefinedResult(metric, 'no_samples', groups, []);
  }

  const attributeGaps: AttributeGap[] = [];
  const contributing: GroupStats[] = [];
  let worst: { gap: number; driver: GapDriver } | null = null;

  for (const [attribute, attributeGroups] of groupByAttribute(groupStats)) {
    let attributeWorst: { gap: number; driver: GapDriver } | null = null;

    for (const reader of readers) {
      const result = componentGap(attribute, attributeGroups, reader);
      attributeGaps.push(result.gap);
      contributing.push(...result.contributing);

      if (result.gap.gap !== null && result.driver !== null) {
        if (attributeWorst === null || roundForComparison(result.gap.gap) > roundForComparison(attributeWorst.gap)) {
          attributeWorst = { gap: result.gap.gap, driver: result.driver };
        }
      }
    }

    if (attributeWorst !== null && (worst === null || roundForComparison(attributeWorst.gap) > roundForComparison(worst.gap))) {
      worst = attributeWorst;
    }
  }

  if (worst === null) {
    return undefinedResult(metric, 'insufficient_groups', groups, attributeGaps);
  }

  const score = evaluateLadder(worst.gap, GAP_SCORE_LADDER);
  const smallGroups = smallGroupLabels(contributing, minGroupSize);

  const result: DefinedMetricResult = {
    metric,
    status: 'defined',
    direction: METRIC_DIRECTION[metric],
    gap: worst.gap,
    disparity: worst.gap,
    score,
    driver: worst.driver,
    groups,
    attributeGaps,
    unreliable: smallGroups.length > 0,
    smallGroups,
    explanation: explainDefined(metric, worst.gap, score, worst.driver, smallGroups, minGroupSize),
  };
  return result;
}

/**
 * Subgroup performance: min / max accuracy across all intersectional
 * subgroups. The ratio is 1.0 exactly when every accuracy is equal.
 */
export function computeSubgroupPerformance(
  subgroupStats: readonly GroupStats[],
  minGroupSize: number,
): MetricResult {
  const metric = 'subgroup_performance';
  const groups = breakdown(subgroupStats, [{ component: 'accuracy', read: (s) => s.accuracy }]);

  let highest: GroupStats | undefined;
  let lowest: GroupStats | undefined;
  for (const stats of subgroupStats) {
    if (highest === undefined || stats.accuracy > highest.accuracy) highest = stats;
    if (lowest === undefined || stats.accuracy < lowest.accuracy) lowest = stats;
  }

  if (highest === undefined || lowest === undefined) {
    return undefinedResult(metric, 'no_samples', groups, []);
  }

  // All-zero accuracy is still "all equal"
  const ratio = highest.accuracy > 0 ? lowest.accuracy / highest.accuracy : 1;
  const score = evaluateLadder(ratio, RATIO_SCORE_LADDER);
  const driver: GapDriver = {
    attribute: null,
    component: 'accuracy',
    highest: { label: highest.label, value: highest.accuracy },
    lowest: { label: lowest.label, value: lowest.accuracy },
  };
  const smallGroups = smallGroupLabels(subgroupStats, minGroupSize);

  return {
    metric,
    status: 'defined',
    direction: METRIC_DIRECTION[metric],
    gap: ratio,
    disparity: 1 - ratio,
    score,
    driver,
    groups,
    attributeGaps: [],
    unreliable: smallGroups.length > 0,
    smallGroups,
    explanation: explainDefined(metric, ratio, score, driver, smallGroups, minGroupSize),
  };
}

/**
 * Compute all six metrics for a batch.
 * Pure: the same batch always yields the same results.
 */
export function computeMetrics(
  batch: SampleBatch,
  options: MetricComputerOptions = {},
): MetricComputation {
  const validated = parseSampleBatch(batch);
  const minGroupSize = options.minGroupSize ?? METRIC_DEFAULTS.minGroupSize;

  const groupStats = [...collectGroupStats(validated, { kind: 'per_attribute' }).values()];
  const subgroupStats = [
    ...collectGroupStats(validated, {
      kind: 'intersectional',
      maxDepth: options.intersectionDepth,
    }).values(),
  ];

  const calibration: MetricResult = validated.scores === undefined
    ? undefinedResult('calibration', 'no_scores', breakdown(groupStats, [ECE]), [])
    : computePairwiseMetric('calibration', groupStats, minGroupSize);

  const metrics: MetricResults = {
    demographic_parity: computePairwiseMetric('demographic_parity', groupStats, minGroupSize),
    equal_opportunity: computePairwiseMetric('equal_opportunity', groupStats, minGroupSize),
    equalized_odds: computePairwiseMetric('equalized_odds', groupStats, minGroupSize),
    predictive_parity: computePairwiseMetric('predictive_parity', groupStats, minGroupSize),
    calibration,
    subgroup_performance: computeSubgroupPerformance(subgroupStats, minGroupSize),
  };

  return {
    metrics,
    groupStats,
    subgroupStats,
    sampleCount: validated.labels.length,
    minGroupSize,
  };
}
