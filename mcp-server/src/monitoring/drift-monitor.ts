/**
 * Fairness Drift Monitor
 *
 * Watches each (system, metric) history for degradation. A check reads
 * the latest 2N points: the last N are the current window, the N before
 * them the baseline. Three independent methods look at the windows:
 *
 *   delta         |mean(current) − mean(baseline)|
 *   statistical   Welch t-test between the windows, flagged at p < α
 *   control chart latest value against baseline mean ± 2σ
 *
 * All three grade severity with the same function of absolute
 * change. The metric's verdict is the worst of the three.
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import type {
  ControlChartDriftEvent,
  DeltaDriftEvent,
  DriftEvent,
  DriftReport,
  EvaluatedDriftVerdict,
  MetricDriftVerdict,
  StatisticalDriftEvent,
} from '../types/drift.js';
import type { HistoryReader } from '../bridge/history-store.js';
import { InvalidInputError } from '../errors.js';
import { DRIFT_DEFAULTS } from '../fairness/fairness.config.js';
import { roundForComparison } from '../fairness/ladder.js';
import { logger as rootLogger, withSystemId } from '../logger.js';
import { mean, populationStd, welchTTest } from './statistics.js';
import { classifyDriftSeverity, maxSeverity, recommendationFor } from './severity.js';

const driftMonitorOptionsSchema = z.object({
  windowSize: z.number().int().min(DRIFT_DEFAULTS.minWindowSize).default(DRIFT_DEFAULTS.windowSize),
  alpha: z.number().gt(0).lt(1).default(DRIFT_DEFAULTS.alpha),
  sigmaLimit: z.number().positive().default(DRIFT_DEFAULTS.sigmaLimit),
});

export type DriftMonitorOptions = z.infer<typeof driftMonitorOptionsSchema>;

// ---------------------------------------------------------------------------
// Detection methods
// ---------------------------------------------------------------------------

function changeFields(baseline: number, current: number) {
  const change = current - baseline;
  return {
    baseline,
    current,
    change,
    absoluteChange: Math.abs(change),
    changePct: baseline !== 0 ? (change / baseline) * 100 : null,
  };
}

/**
 * Delta method. Takes windows or single values. A single-value window
 * reduces to the plain absolute difference.
 */
export function detectDeltaDrift(
  metric: string,
  baseline: readonly number[],
  current: readonly number[],
): DeltaDriftEvent {
  const fields = changeFields(mean(baseline), mean(current));
  const severity = classifyDriftSeverity(fields.absoluteChange);

  return {
    metric,
    method: 'delta',
    ...fields,
    severity,
    flagged: severity !== 'none',
  };
}

/**
 * Statistical method. The p-value corroborates; severity still comes
 * from the size of the mean difference.
 */
export function detectStatisticalDrift(
  metric: string,
  baseline: readonly number[],
  current: readonly number[],
  alpha: number = DRIFT_DEFAULTS.alpha,
): StatisticalDriftEvent {
  const test = welchTTest(current, baseline);
  const fields = changeFields(mean(baseline), mean(current));

  return {
    metric,
    method: 'statistical',
    ...fields,
    severity: classifyDriftSeverity(fields.absoluteChange),
    flagged: test.pValue < alpha,
    pValue: test.pValue,
    tStatistic: test.tStatistic,
    degreesOfFreedom: test.degreesOfFreedom,
    alpha,
  };
}

/**
 * Control-chart method. Limits are the baseline mean ± sigmaLimit · std.
 * A flat baseline (std = 0) cannot be scaled: any movement is out of
 * control and graded major.
 */
export function detectControlChartDrift(
  metric: string,
  baseline: readonly number[],
  latest: number,
  sigmaLimit: number = DRIFT_DEFAULTS.sigmaLimit,
): ControlChartDriftEvent {
  const center = mean(baseline);
  const std = populationStd(baseline);
  const fields = changeFields(center, latest);
  const moved = roundForComparison(fields.absoluteChange) > 0;
  const flat = roundForComparison(std) === 0;

  const distance = flat ? (moved ? Infinity : 0) : fields.absoluteChange / std;
  const severity = flat && moved ? 'major' : classifyDriftSeverity(fields.absoluteChange);

  return {
    metric,
    method: 'control_chart',
    ...fields,
    severity,
    flagged: distance > sigmaLimit,
    distance,
    lowerLimit: center - sigmaLimit * std,
    upperLimit: center + sigmaLimit * std,
    sigmaLimit,
  };
}

/** Worst severity across methods, and the recommendation that goes with it */
export function reconcileDriftEvents(
  metric: string,
  baseline: readonly number[],
  current: readonly number[],
  events: readonly DriftEvent[],
): EvaluatedDriftVerdict {
  const severity = maxSeverity(events.map((event) => event.severity));

  return {
    status: 'evaluated',
    metric,
    severity,
    driftDetected: severity !== 'none',
    baselineMean: mean(baseline),
    currentMean: mean(current),
    events,
    recommendation: recommendationFor(metric, severity),
  };
}

/** Roll per-metric verdicts into one report */
export function buildDriftReport(
  systemId: string,
  verdicts: readonly MetricDriftVerdict[],
  timestamp: string,
): DriftReport {
  const evaluated = verdicts.filter(
    (verdict): verdict is EvaluatedDriftVerdict => verdict.status === 'evaluated',
  );
  const overallSeverity = maxSeverity(evaluated.map((verdict) => verdict.severity));

  const metricChanges: Record<string, number> = {};
  for (const verdict of evaluated) {
    metricChanges[verdict.metric] = verdict.currentMean - verdict.baselineMean;
  }

  return {
    systemId,
    timestamp,
    driftDetected: evaluated.some((verdict) => verdict.driftDetected),
    overallSeverity,
    verdicts,
    pendingMetrics: verdicts
      .filter((verdict) => verdict.status === 'insufficient_data')
      .map((verdict) => verdict.metric),
    metricChanges,
    recommendations: evaluated.flatMap((verdict) =>
      verdict.recommendation === null ? [] : [verdict.recommendation],
    ),
  };
}

/**
 * Compare two single-value metric dictionaries with the delta method.
 * Metrics missing from the baseline are skipped.
 */
export function compareMetrics(
  systemId: string,
  baselineMetrics: Readonly<Record<string, number>>,
  currentMetrics: Readonly<Record<string, number>>,
  now: () => Date = () => new Date(),
): DriftReport {
  const verdicts: EvaluatedDriftVerdict[] = [];

  for (const [metric, current] of Object.entries(currentMetrics)) {
    const baseline = baselineMetrics[metric];
    if (baseline === undefined) continue;

    const event = detectDeltaDrift(metric, [baseline], [current]);
    verdicts.push(reconcileDriftEvents(metric, [baseline], [current], [event]));
  }

  return buildDriftReport(systemId, verdicts, now().toISOString());
}

// ---------------------------------------------------------------------------
// Monitor
// ---------------------------------------------------------------------------

export class DriftMonitor {
  readonly options: DriftMonitorOptions;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly history: HistoryReader,
    options: Partial<DriftMonitorOptions> = {},
    deps: { logger?: Logger; now?: () => Date } = {},
  ) {
    const parsed = driftMonitorOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new InvalidInputError(
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }
    this.options = parsed.data;
    this.logger = deps.logger ?? rootLogger;
    this.now = deps.now ?? (() => new Date());
  }

  /** Points a check needs before it can produce a verdict */
  get requiredPoints(): number {
    return this.options.windowSize * 2;
  }

  /** Check one metric's history */
  async checkMetric(systemId: string, metric: string): Promise<MetricDriftVerdict> {
    const log = withSystemId(this.logger, systemId);
    const { windowSize, alpha, sigmaLimit } = this.options;
    const required = this.requiredPoints;

    // Copy the window before computing; appends may land meanwhile
    const points = [...(await this.history.getWindow(systemId, metric, required))];

    if (points.length < required) {
      log.debug({ metric, available: points.length, required }, 'insufficient history for drift check');
      return { status: 'insufficient_data', metric, available: points.length, required };
    }

    const values = points.slice(-required).map((point) => point.value);
    const baseline = values.slice(0, windowSize);
    const current = values.slice(windowSize);
    const latest = current[current.length - 1] ?? NaN;

    const verdict = reconcileDriftEvents(metric, baseline, current, [
      detectDeltaDrift(metric, baseline, current),
      detectStatisticalDrift(metric, baseline, current, alpha),
      detectControlChartDrift(metric, baseline, latest, sigmaLimit),
    ]);

    const summary = {
      metric,
      severity: verdict.severity,
      baselineMean: verdict.baselineMean,
      currentMean: verdict.currentMean,
    };
    if (verdict.driftDetected) {
      log.info(summary, 'fairness drift detected');
    } else {
      log.debug(summary, 'no fairness drift');
    }

    return verdict;
  }

  /** Check several metrics of one system and aggregate the verdicts */
  async checkSystem(systemId: string, metrics: readonly string[]): Promise<DriftReport> {
    const verdicts = await Promise.all(metrics.map((metric) => this.checkMetric(systemId, metric)));
    return buildDriftReport(systemId, verdicts, this.now().toISOString());
  }
}
