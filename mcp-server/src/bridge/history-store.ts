/**
 * History Store
 *
 * The persistence collaborator contract. The core writes snapshots and
 * per-metric values through it and reads windows back for drift checks;
 * it never assumes a storage technology, only append-only,
 * timestamp-ordered retrieval.
 *
 * Drift reports that detected drift are kept alongside as an audit trail.
 *
 * InMemoryHistoryStore backs the MCP tools and the tests. A durable
 * store implements the same interface.
 */

import type { DriftReport, MetricPoint } from '../types/drift.js';
import type { FairnessSnapshot } from '../types/metrics.js';
import { InvalidInputError } from '../errors.js';
import { deepFreeze } from '../freeze.js';

/** Read side used by the drift monitor */
export interface HistoryReader {
  /** The most recent `count` points, oldest first */
  getWindow(systemId: string, metric: string, count: number): Promise<readonly MetricPoint[]>;
}

export interface HistoryStore extends HistoryReader {
  appendSnapshot(snapshot: FairnessSnapshot): Promise<void>;

  /** Rejects a timestamp older than the key's latest point */
  appendMetricValue(systemId: string, metric: string, timestamp: string, value: number): Promise<void>;

  /** Whole history, or the most recent `window` points, oldest first */
  getHistory(systemId: string, metric: string, window?: number): Promise<readonly MetricPoint[]>;

  /** Stored snapshots for a system, oldest first */
  getSnapshots(systemId: string, limit?: number): Promise<readonly FairnessSnapshot[]>;

  /** Audit trail of drift checks that detected drift */
  appendDriftReport(report: DriftReport): Promise<void>;

  /** Stored drift reports for a system, oldest first */
  getDriftReports(systemId: string, limit?: number): Promise<readonly DriftReport[]>;
}

/** Series identity; unambiguous whatever characters the ids contain */
export function historyKey(systemId: string, metric: string): string {
  return JSON.stringify([systemId, metric]);
}

function tail<T>(items: readonly T[], count: number | undefined): T[] {
  if (count === undefined) return [...items];
  if (count <= 0) return [];
  return items.slice(-count);
}

export class InMemoryHistoryStore implements HistoryStore {
  private readonly series = new Map<string, MetricPoint[]>();
  private readonly snapshots = new Map<string, FairnessSnapshot[]>();
  private readonly driftReports = new Map<string, DriftReport[]>();

  async appendSnapshot(snapshot: FairnessSnapshot): Promise<void> {
    const stored = this.snapshots.get(snapshot.systemId);
    const frozen = deepFreeze(snapshot);
    if (stored) stored.push(frozen);
    else this.snapshots.set(snapshot.systemId, [frozen]);
  }

  async appendMetricValue(
    systemId: string,
    metric: string,
    timestamp: string,
    value: number,
  ): Promise<void> {
    const at = Date.parse(timestamp);
    if (Number.isNaN(at)) {
      throw new InvalidInputError([`timestamp: not an ISO-8601 date: ${timestamp}`]);
    }
    if (!Number.isFinite(value)) {
      throw new InvalidInputError([`value: must be a finite number, got ${value}`]);
    }

    const key = historyKey(systemId, metric);
    const points = this.series.get(key) ?? [];
    const latest = points[points.length - 1];

    if (latest !== undefined && at < Date.parse(latest.timestamp)) {
      throw new InvalidInputError([
        `timestamp: ${timestamp} is older than the latest ${metric} point (${latest.timestamp})`,
      ]);
    }

    points.push({ timestamp, value });
    this.series.set(key, points);
  }

  async getWindow(systemId: string, metric: string, count: number): Promise<readonly MetricPoint[]> {
    return this.getHistory(systemId, metric, count);
  }

  async getHistory(systemId: string, metric: string, window?: number): Promise<readonly MetricPoint[]> {
    const points = this.series.get(historyKey(systemId, metric)) ?? [];
    return tail(points, window).map((point) => ({ ...point }));
  }

  async getSnapshots(systemId: string, limit?: number): Promise<readonly FairnessSnapshot[]> {
    return tail(this.snapshots.get(systemId) ?? [], limit);
  }

  async appendDriftReport(report: DriftReport): Promise<void> {
    // Reports are plain objects owned by the caller, so keep a frozen copy
    const copy = deepFreeze(structuredClone(report));
    const stored = this.driftReports.get(report.systemId);
    if (stored) stored.push(copy);
    else this.driftReports.set(report.systemId, [copy]);
  }

  async getDriftReports(systemId: string, limit?: number): Promise<readonly DriftReport[]> {
    return tail(this.driftReports.get(systemId) ?? [], limit);
  }
}
