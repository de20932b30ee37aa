/**
 * MCP Tools Tests
 *
 * Verifies the tool handlers that the MCP server exposes:
 * - evaluate_fairness (scoring and recording)
 * - check_drift / compare_metrics (drift tools)
 * - get_metric_history / get_drift_reports (history tools)
 * - Zod schema validation and error responses
 *
 * Every test starts from a fresh in-memory history store.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { evaluateFairnessTool, evaluateFairnessSchema } from '../tools/evaluate.js';
import {
  DEFAULT_DRIFT_METRICS,
  checkDrift,
  checkDriftSchema,
  compareMetricReadings,
} from '../tools/drift.js';
import { getDriftReports, getHistoryStore, getMetricHistory, setHistoryStore } from '../tools/history.js';
import { respond, textResponse } from '../tools/response.js';
import { InMemoryHistoryStore } from '../bridge/history-store.js';
import { InvalidInputError } from '../errors.js';
import { dayClock, silentLogger } from './fixtures.js';

function makeInput(overrides: Partial<Parameters<typeof evaluateFairnessTool>[0]> = {}) {
  return {
    systemId: 'loan-model',
    labels: [1, 1, 0, 0, 1, 1, 0, 0],
    predictions: [1, 1, 0, 0, 1, 0, 0, 0],
    attributes: { gender: ['F', 'F', 'F', 'F', 'M', 'M', 'M', 'M'] },
    ...overrides,
  };
}

async function seedSteps(metric: string, before: number, after: number): Promise<void> {
  const store = getHistoryStore();
  for (let day = 0; day < 10; day++) {
    await store.appendMetricValue('loan-model', metric, dayClock(day)().toISOString(), day < 5 ? before : after);
  }
}

beforeEach(() => {
  setHistoryStore(new InMemoryHistoryStore());
});

// --- evaluate_fairness ---

describe('evaluateFairnessTool', () => {
  it('scores the batch and records it', async () => {
    const result = await evaluateFairnessTool(makeInput());

    expect(result.recorded).toBe(true);
    expect(result.snapshot.assessment.criticalIssues).toHaveLength(4);
    expect(result.recordedMetrics).toHaveLength(6);

    const history = await getMetricHistory({ systemId: 'loan-model', metric: 'demographic_parity' });
    expect(history.count).toBe(1);
    expect(history.points[0]?.value).toBe(0.25);
  });

  it('skips recording on request', async () => {
    const result = await evaluateFairnessTool(makeInput({ record: false }));

    expect(result.recorded).toBe(false);
    expect(result.recordedMetrics).toEqual([]);
    expect((await getMetricHistory({ systemId: 'loan-model', metric: 'demographic_parity' })).count).toBe(0);
  });

  it('passes the minimum group size through', async () => {
    const result = await evaluateFairnessTool(makeInput({ minGroupSize: 2, record: false }));
    expect(result.snapshot.metrics.demographic_parity.unreliable).toBe(false);
  });

  it('rejects a malformed batch', async () => {
    await expect(evaluateFairnessTool(makeInput({ labels: [1, 3, 0, 0, 1, 1, 0, 0] }))).rejects.toThrow(
      'Invalid input: labels.1: must be 0 or 1',
    );
  });
});

// --- check_drift / compare_metrics ---

describe('checkDrift', () => {
  it('reports a major step in recorded history', async () => {
    await seedSteps('demographic_parity', 0.05, 0.2);

    const report = await checkDrift({ systemId: 'loan-model', metrics: ['demographic_parity'] });
    expect(report.overallSeverity).toBe('major');
    expect(report.pendingMetrics).toEqual([]);
  });

  it('keeps reports that detect drift', async () => {
    await seedSteps('demographic_parity', 0.05, 0.2);
    await seedSteps('equal_opportunity', 0.1, 0.1);

    const report = await checkDrift({ systemId: 'loan-model', metrics: ['demographic_parity'] });
    await checkDrift({ systemId: 'loan-model', metrics: ['equal_opportunity'] });

    const kept = await getDriftReports({ systemId: 'loan-model' });
    expect(kept.count).toBe(1);
    expect(kept.reports[0]).toEqual(report);
  });

  it('checks every recorded series by default', async () => {
    await seedSteps('equal_opportunity', 0.1, 0.1);

    const report = await checkDrift({ systemId: 'loan-model' });
    expect(report.verdicts.map((v) => v.metric)).toEqual([...DEFAULT_DRIFT_METRICS]);
    expect(report.pendingMetrics).toHaveLength(6);
    expect(report.overallSeverity).toBe('none');
  });

  it('honours a smaller window', async () => {
    const store = getHistoryStore();
    await store.appendMetricValue('loan-model', 'calibration', dayClock(0)().toISOString(), 0.02);
    await store.appendMetricValue('loan-model', 'calibration', dayClock(1)().toISOString(), 0.02);
    await store.appendMetricValue('loan-model', 'calibration', dayClock(2)().toISOString(), 0.08);
    await store.appendMetricValue('loan-model', 'calibration', dayClock(3)().toISOString(), 0.08);

    const report = await checkDrift({ systemId: 'loan-model', metrics: ['calibration'], windowSize: 2 });
    expect(report.overallSeverity).toBe('major');
  });
});

describe('compareMetricReadings', () => {
  it('compares two readings', () => {
    const report = compareMetricReadings({
      systemId: 'loan-model',
      baseline: { equalized_odds: 0.1 },
      current: { equalized_odds: 0.05 },
    });

    expect(report.overallSeverity).toBe('minor');
    expect(report.recommendations).toEqual([
      'Minor drift in equalized_odds. Continue monitoring for escalation.',
    ]);
  });
});

// --- get_metric_history ---

describe('getMetricHistory', () => {
  it('returns the most recent points', async () => {
    await seedSteps('category_score', 0.8, 0.6);

    const history = await getMetricHistory({ systemId: 'loan-model', metric: 'category_score', window: 3 });
    expect(history.count).toBe(3);
    expect(history.points.map((p) => p.value)).toEqual([0.6, 0.6, 0.6]);
  });
});

// --- Schemas ---

describe('tool schemas', () => {
  it('requires a system id', () => {
    const parsed = evaluateFairnessSchema.safeParse({ labels: [], predictions: [], attributes: {} });
    expect(parsed.success).toBe(false);
  });

  it('rejects a drift window below two', () => {
    expect(checkDriftSchema.safeParse({ systemId: 'loan-model', windowSize: 1 }).success).toBe(false);
    expect(checkDriftSchema.safeParse({ systemId: 'loan-model', windowSize: 2 }).success).toBe(true);
  });
});

// --- Responses ---

describe('respond', () => {
  it('wraps a result as JSON text', async () => {
    expect(await respond('t', () => ({ ok: true }), silentLogger)).toEqual({
      content: [{ type: 'text', text: '{\n  "ok": true\n}' }],
    });
  });

  it('turns rejected input into an error result', async () => {
    const response = await respond(
      't',
      () => {
        throw new InvalidInputError(['systemId: required']);
      },
      silentLogger,
    );

    expect(response.isError).toBe(true);
    expect(response.content[0]?.text).toBe(
      JSON.stringify({ error: 'INVALID_INPUT', issues: ['systemId: required'] }, null, 2),
    );
  });

  it('lets other errors propagate', async () => {
    await expect(
      respond('t', () => {
        throw new Error('store offline');
      }, silentLogger),
    ).rejects.toThrow('store offline');
  });

  it('formats text responses', () => {
    expect(textResponse([1]).content[0]?.text).toBe('[\n  1\n]');
  });
});
