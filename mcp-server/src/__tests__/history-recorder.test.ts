/**
 * History Recorder Tests
 *
 * What a snapshot contributes to history, and that concurrent
 * recordings keep per-metric order.
 */

import { describe, it, expect } from 'vitest';
import { HistoryRecorder, CATEGORY_SCORE_METRIC, snapshotPoints } from '../monitoring/history-recorder.js';
import { InMemoryHistoryStore } from '../bridge/history-store.js';
import { InvalidInputError } from '../errors.js';
import { evaluateFairness } from '../fairness/evaluate.js';
import type { FairnessSnapshot } from '../types/metrics.js';
import { dayClock, makeBatch, silentLogger } from './fixtures.js';

function snapshotOn(day: number, predictions = makeBatch().predictions): FairnessSnapshot {
  return evaluateFairness(makeBatch({ predictions }), {
    systemId: 'loan-model',
    now: dayClock(day),
    logger: silentLogger,
  });
}

describe('snapshotPoints', () => {
  it('takes every defined metric plus the category score', () => {
    const points = snapshotPoints(snapshotOn(0));

    expect(points.map(([metric]) => metric)).toEqual([
      'demographic_parity',
      'equal_opportunity',
      'equalized_odds',
      'predictive_parity',
      'subgroup_performance',
      CATEGORY_SCORE_METRIC,
    ]);
    expect(points[0]).toEqual(['demographic_parity', 0.25]);
    expect(points[4]).toEqual(['subgroup_performance', 0.75]);
  });
});

describe('HistoryRecorder', () => {
  it('writes the snapshot and its points under the snapshot timestamp', async () => {
    const store = new InMemoryHistoryStore();
    const recorder = new HistoryRecorder(store, silentLogger);
    const snapshot = snapshotOn(2);

    const result = await recorder.record(snapshot);

    expect(result.snapshotId).toBe(snapshot.snapshotId);
    expect(result.recordedMetrics).toHaveLength(6);
    expect(await store.getHistory('loan-model', 'equal_opportunity')).toEqual([
      { timestamp: '2030-01-03T00:00:00.000Z', value: 0.5 },
    ]);
    expect(await store.getHistory('loan-model', 'calibration')).toEqual([]);

    const [score] = await store.getHistory('loan-model', CATEGORY_SCORE_METRIC);
    expect(score?.value).toBeCloseTo(0.36, 10);
    expect(await store.getSnapshots('loan-model')).toEqual([snapshot]);
  });

  it('keeps call order for concurrent recordings', async () => {
    const store = new InMemoryHistoryStore();
    const recorder = new HistoryRecorder(store, silentLogger);

    // Day 0 has the gender=M miss, day 1 predicts perfectly
    await Promise.all([
      recorder.record(snapshotOn(0)),
      recorder.record(snapshotOn(1, [1, 1, 0, 0, 1, 1, 0, 0])),
    ]);

    expect((await store.getHistory('loan-model', 'demographic_parity')).map((p) => p.value)).toEqual([0.25, 0]);
    expect(await store.getSnapshots('loan-model')).toHaveLength(2);
  });

  it('rejects a snapshot older than recorded history', async () => {
    const store = new InMemoryHistoryStore();
    const recorder = new HistoryRecorder(store, silentLogger);
    await recorder.record(snapshotOn(5));

    await expect(recorder.record(snapshotOn(4))).rejects.toBeInstanceOf(InvalidInputError);
  });

  it('writes nothing when a recording is rejected', async () => {
    const store = new InMemoryHistoryStore();
    const recorder = new HistoryRecorder(store, silentLogger);
    await recorder.record(snapshotOn(5));

    const error = await recorder.record(snapshotOn(4)).then(
      () => undefined,
      (reason: unknown) => reason,
    );

    expect(error).toBeInstanceOf(InvalidInputError);
    const issues = error instanceof InvalidInputError ? error.issues : [];
    expect(issues).toHaveLength(7);
    expect(issues[0]).toBe(
      'timestamp: 2030-01-05T00:00:00.000Z is older than the latest demographic_parity point (2030-01-06T00:00:00.000Z)',
    );
    expect(issues[6]).toBe(
      'timestamp: 2030-01-05T00:00:00.000Z is older than the latest snapshot (2030-01-06T00:00:00.000Z)',
    );
    expect(await store.getSnapshots('loan-model')).toHaveLength(1);
    expect(await store.getHistory('loan-model', 'demographic_parity')).toHaveLength(1);
    expect(await store.getHistory('loan-model', CATEGORY_SCORE_METRIC)).toHaveLength(1);
  });

  it('rejects a snapshot older than the last one even with no series to write', async () => {
    const store = new InMemoryHistoryStore();
    const recorder = new HistoryRecorder(store, silentLogger);
    const empty = (day: number): FairnessSnapshot =>
      evaluateFairness(
        { labels: [], predictions: [], attributes: { gender: [] } },
        { systemId: 'loan-model', now: dayClock(day), logger: silentLogger },
      );

    expect((await recorder.record(empty(5))).recordedMetrics).toEqual([]);
    await expect(recorder.record(empty(4))).rejects.toThrow('older than the latest snapshot');
    expect(await store.getSnapshots('loan-model')).toHaveLength(1);
  });
});
