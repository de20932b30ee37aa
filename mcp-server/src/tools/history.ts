/**
 * History Tools
 *
 * Owns the process-wide history store and the recorder that writes to
 * it, and exposes the get_metric_history and get_drift_reports tools.
 */

import { z } from 'zod';
import type { DriftReport, MetricPoint } from '../types/drift.js';
import type { HistoryStore } from '../bridge/history-store.js';
import { InMemoryHistoryStore } from '../bridge/history-store.js';
import { HistoryRecorder } from '../monitoring/history-recorder.js';

/** Schema for get_metric_history tool input */
export const getMetricHistorySchema = z.object({
  systemId: z.string().min(1).describe('System whose history to read'),
  metric: z
    .string()
    .min(1)
    .describe('Metric name (e.g., "demographic_parity") or "category_score"'),
  window: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Only the most recent N points (default: whole history)'),
});

/** Schema for get_drift_reports tool input */
export const getDriftReportsSchema = z.object({
  systemId: z.string().min(1).describe('System whose drift audit trail to read'),
  limit: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Only the most recent N reports (default: 10)'),
});

export type GetMetricHistoryInput = z.infer<typeof getMetricHistorySchema>;
export type GetDriftReportsInput = z.infer<typeof getDriftReportsSchema>;

/** In-memory store (a durable HistoryStore can be swapped in) */
let historyStore: HistoryStore = new InMemoryHistoryStore();
let historyRecorder = new HistoryRecorder(historyStore);

export function getHistoryStore(): HistoryStore {
  return historyStore;
}

export function getHistoryRecorder(): HistoryRecorder {
  return historyRecorder;
}

/** Replace the store; the recorder is rebuilt around it */
export function setHistoryStore(store: HistoryStore): void {
  historyStore = store;
  historyRecorder = new HistoryRecorder(store);
}

export interface MetricHistory {
  systemId: string;
  metric: string;
  count: number;
  points: readonly MetricPoint[];
}

/**
 * Recorded values for one metric, oldest first.
 */
export async function getMetricHistory(input: GetMetricHistoryInput): Promise<MetricHistory> {
  const points = await historyStore.getHistory(input.systemId, input.metric, input.window);

  return {
    systemId: input.systemId,
    metric: input.metric,
    count: points.length,
    points,
  };
}

/**
 * Drift reports kept by check_drift, oldest first.
 */
export async function getDriftReports(
  input: GetDriftReportsInput,
): Promise<{ systemId: string; count: number; reports: readonly DriftReport[] }> {
  const reports = await historyStore.getDriftReports(input.systemId, input.limit ?? 10);
  return { systemId: input.systemId, count: reports.length, reports };
}
