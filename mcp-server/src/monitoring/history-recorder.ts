/**
 * History Recorder
 *
 * Commits a snapshot to the history store as one unit: one point per
 * defined metric plus the category score, all under the snapshot's
 * timestamp, then the snapshot itself. Recordings for one system run
 * through a KeyedQueue, so concurrent evaluations never interleave
 * writes and a rejected recording writes nothing.
 */

import type { Logger } from 'pino';
import type { FairnessSnapshot } from '../types/metrics.js';
import type { HistoryStore } from '../bridge/history-store.js';
import { KeyedQueue } from '../bridge/keyed-queue.js';
import { InvalidInputError } from '../errors.js';
import { logger as rootLogger, withSystemId } from '../logger.js';

/** Series name for the aggregated category score */
export const CATEGORY_SCORE_METRIC = 'category_score';

export interface RecordResult {
  snapshotId: string;
  /** Series that received a point, in append order */
  recordedMetrics: readonly string[];
}

/** The (metric, value) points a snapshot contributes to history */
export function snapshotPoints(snapshot: FairnessSnapshot): Array<readonly [string, number]> {
  const points: Array<readonly [string, number]> = [];

  for (const result of Object.values(snapshot.metrics)) {
    if (result.status === 'defined') {
      points.push([result.metric, result.gap]);
    }
  }
  if (snapshot.assessment.categoryScore !== null) {
    points.push([CATEGORY_SCORE_METRIC, snapshot.assessment.categoryScore]);
  }

  return points;
}

export class HistoryRecorder {
  private readonly queue = new KeyedQueue();

  constructor(
    private readonly store: HistoryStore,
    private readonly logger: Logger = rootLogger,
  ) {}

  async record(snapshot: FairnessSnapshot): Promise<RecordResult> {
    const { systemId, timestamp } = snapshot;
    const points = snapshotPoints(snapshot);
    const recordedMetrics = points.map(([metric]) => metric);

    await this.queue.run(systemId, async () => {
      await this.assertInOrder(snapshot, recordedMetrics);

      for (const [metric, value] of points) {
        await this.store.appendMetricValue(systemId, metric, timestamp, value);
      }
      await this.store.appendSnapshot(snapshot);
    });

    withSystemId(this.logger, systemId).debug(
      { snapshotId: snapshot.snapshotId, recordedMetrics },
      'snapshot recorded',
    );

    return { snapshotId: snapshot.snapshotId, recordedMetrics };
  }

  /** Reject the whole recording if any series already holds a later point */
  private async assertInOrder(snapshot: FairnessSnapshot, metrics: readonly string[]): Promise<void> {
    const { systemId, timestamp } = snapshot;
    const at = Date.parse(timestamp);
    const issues: string[] = [];

    for (const metric of metrics) {
      const [latest] = await this.store.getWindow(systemId, metric, 1);
      if (latest !== undefined && at < Date.parse(latest.timestamp)) {
        issues.push(`timestamp: ${timestamp} is older than the latest ${metric} point (${latest.timestamp})`);
      }
    }

    const [lastSnapshot] = await this.store.getSnapshots(systemId, 1);
    if (lastSnapshot !== undefined && at < Date.parse(lastSnapshot.timestamp)) {
      issues.push(`timestamp: ${timestamp} is older than the latest snapshot (${lastSnapshot.timestamp})`);
    }

    if (issues.length > 0) {
      throw new InvalidInputError(issues);
    }
  }
}
