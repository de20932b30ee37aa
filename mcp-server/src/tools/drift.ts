/**
 * Drift Tools
 *
 * MCP tools for checking recorded history for fairness drift and for
 * comparing two ad-hoc metric readings. Ad-hoc comparisons are not
 * kept in the audit trail.
 */

import { z } from 'zod';
import type { DriftReport } from '../types/drift.js';
import { METRIC_NAMES } from '../types/metrics.js';
import { getConfig } from '../config.js';
import { DRIFT_DEFAULTS } from '../fairness/fairness.config.js';
import { DriftMonitor, compareMetrics } from '../monitoring/drift-monitor.js';
import { CATEGORY_SCORE_METRIC } from '../monitoring/history-recorder.js';
import { getHistoryStore } from './history.js';

/** Every series the recorder writes */
export const DEFAULT_DRIFT_METRICS: readonly string[] = [...METRIC_NAMES, CATEGORY_SCORE_METRIC];

/** Schema for check_drift tool input */
export const checkDriftSchema = z.object({
  systemId: z.string().min(1).describe('System whose recorded history to check'),
  metrics: z
    .array(z.string().min(1))
    .optional()
    .describe('Series to check (default: all six metrics and category_score)'),
  windowSize: z
    .number()
    .int()
    .min(DRIFT_DEFAULTS.minWindowSize)
    .optional()
    .describe('Points per window; a check needs twice this many (default: 5)'),
  alpha: z
    .number()
    .gt(0)
    .lt(1)
    .optional()
    .describe('Significance level for the t-test (default: 0.05)'),
});

/** Schema for compare_metrics tool input */
export const compareMetricsSchema = z.object({
  systemId: z.string().min(1).describe('System the readings belong to'),
  baseline: z.record(z.number()).describe('Baseline metric values by name'),
  current: z.record(z.number()).describe('Current metric values by name'),
});

export type CheckDriftInput = z.infer<typeof checkDriftSchema>;
export type CompareMetricsInput = z.infer<typeof compareMetricsSchema>;

/**
 * Run all three detection methods over each metric's recorded history.
 * Metrics without enough history are listed as pending. A report that
 * detects drift is kept in the store's audit trail.
 */
export async function checkDrift(input: CheckDriftInput): Promise<DriftReport> {
  const config = getConfig();
  const store = getHistoryStore();
  const monitor = new DriftMonitor(store, {
    windowSize: input.windowSize ?? config.driftWindowSize,
    alpha: input.alpha ?? config.driftAlpha,
  });

  const report = await monitor.checkSystem(input.systemId, input.metrics ?? DEFAULT_DRIFT_METRICS);
  if (report.driftDetected) {
    await store.appendDriftReport(report);
  }
  return report;
}

/**
 * Delta comparison of two metric dictionaries.
 */
export function compareMetricReadings(input: CompareMetricsInput): DriftReport {
  return compareMetrics(input.systemId, input.baseline, input.current);
}
