/**
 * Metric Computer Tests
 *
 * Each of the six metrics on hand-checked batches, plus the edge
 * policies: single groups, undefined rates, missing scores, small
 * groups and ties.
 */

import { describe, it, expect } from 'vitest';
import { computeMetrics } from '../fairness/metric-computer.js';
import type { MetricResult, DefinedMetricResult } from '../types/metrics.js';
import { makeBatch } from './fixtures.js';

function expectDefined(result: MetricResult): DefinedMetricResult {
  if (result.status !== 'defined') {
    throw new Error(`${result.metric} is undefined (${result.reason})`);
  }
  return result;
}

// --- Two-group batch ---

describe('computeMetrics on the two-group batch', () => {
  const { metrics, groupStats, subgroupStats, sampleCount } = computeMetrics(makeBatch());

  it('reports the batch shape', () => {
    expect(sampleCount).toBe(8);
    expect(groupStats.map((s) => s.label)).toEqual(['gender=F', 'gender=M']);
    expect(subgroupStats.map((s) => s.label)).toEqual(['gender=F', 'gender=M']);
  });

  it('computes demographic parity from selection rates', () => {
    const result = expectDefined(metrics.demographic_parity);

    expect(result.gap).toBe(0.25);
    expect(result.disparity).toBe(0.25);
    expect(result.score).toBe(0.2);
    expect(result.direction).toBe('lower');
    expect(result.driver).toEqual({
      attribute: 'gender',
      component: 'selection_rate',
      highest: { label: 'gender=F', value: 0.5 },
      lowest: { label: 'gender=M', value: 0.25 },
    });
  });

  it('computes equal opportunity from true positive rates', () => {
    const result = expectDefined(metrics.equal_opportunity);
    expect(result.gap).toBe(0.5);
    expect(result.score).toBe(0.2);
  });

  it('takes the larger of the TPR and FPR gaps for equalized odds', () => {
    const result = expectDefined(metrics.equalized_odds);

    expect(result.gap).toBe(0.5);
    expect(result.driver.component).toBe('tpr');
    expect(result.attributeGaps).toEqual([
      { attribute: 'gender', component: 'tpr', gap: 0.5 },
      { attribute: 'gender', component: 'fpr', gap: 0 },
    ]);
  });

  it('scores equal precision as parity', () => {
    const result = expectDefined(metrics.predictive_parity);
    expect(result.gap).toBe(0);
    expect(result.score).toBe(1);
  });

  it('leaves calibration undefined without scores', () => {
    const result = metrics.calibration;

    expect(result.status).toBe('undefined');
    expect(result.status === 'undefined' && result.reason).toBe('no_scores');
    expect(result.explanation).toBe('Calibration: undefined (no scores)');
  });

  it('computes subgroup performance as an accuracy ratio', () => {
    const result = expectDefined(metrics.subgroup_performance);

    expect(result.gap).toBe(0.75);
    expect(result.disparity).toBe(0.25);
    expect(result.score).toBe(0.2);
    expect(result.direction).toBe('higher');
    expect(result.driver.attribute).toBeNull();
  });

  it('marks results from small groups unreliable', () => {
    const result = expectDefined(metrics.demographic_parity);

    expect(result.unreliable).toBe(true);
    expect(result.smallGroups).toEqual(['gender=F', 'gender=M']);
    expect(result.explanation).toBe(
      'Demographic Parity: gap 0.2500 (selection_rate on gender: max gender=F 0.5000, min gender=M 0.2500) → 0.2' +
        ' [unreliable: 2 group(s) below 10 samples]',
    );
  });

  it('lists every group in the breakdown', () => {
    expect(metrics.equalized_odds.groups.map((g) => [g.label, g.component, g.value])).toEqual([
      ['gender=F', 'tpr', 1],
      ['gender=M', 'tpr', 0.5],
      ['gender=F', 'fpr', 0],
      ['gender=M', 'fpr', 0],
    ]);
  });
});

// --- Edge policies ---

describe('computeMetrics edge cases', () => {
  it('treats a single observed group as parity', () => {
    const { metrics } = computeMetrics({
      labels: [1, 0, 1],
      predictions: [1, 0, 0],
      attributes: { site: ['x', 'x', 'x'] },
    });

    expect(expectDefined(metrics.demographic_parity).gap).toBe(0);
    expect(expectDefined(metrics.equal_opportunity).score).toBe(1);
    expect(expectDefined(metrics.subgroup_performance).gap).toBe(1);
  });

  it('is undefined when only one of several groups has a defined rate', () => {
    // gender=M has no positive ground truth, so its TPR is undefined
    const { metrics } = computeMetrics({
      labels: [1, 0, 0, 0],
      predictions: [1, 1, 0, 1],
      attributes: { gender: ['F', 'F', 'M', 'M'] },
    });

    const opportunity = metrics.equal_opportunity;
    expect(opportunity.status).toBe('undefined');
    expect(opportunity.status === 'undefined' && opportunity.reason).toBe('insufficient_groups');
    expect(opportunity.attributeGaps).toEqual([{ attribute: 'gender', component: 'tpr', gap: null }]);

    // Equalized odds falls back to the FPR component alone
    const odds = expectDefined(metrics.equalized_odds);
    expect(odds.gap).toBe(0.5);
    expect(odds.driver.component).toBe('fpr');

    expect(expectDefined(metrics.predictive_parity).gap).toBe(0.5);
  });

  it('reports the worst attribute', () => {
    const { metrics } = computeMetrics({
      labels: [1, 1, 1, 1],
      predictions: [1, 1, 1, 0],
      attributes: {
        gender: ['F', 'M', 'F', 'M'],
        region: ['north', 'north', 'south', 'south'],
      },
    });

    // gender: 1.0 vs 0.5; region: 1.0 vs 0.5; the tie keeps the first attribute
    const result = expectDefined(metrics.demographic_parity);
    expect(result.gap).toBe(0.5);
    expect(result.driver.attribute).toBe('gender');
    expect(result.attributeGaps.map((g) => [g.attribute, g.gap])).toEqual([
      ['gender', 0.5],
      ['region', 0.5],
    ]);
  });

  it('includes intersectional subgroups in subgroup performance', () => {
    const { metrics, subgroupStats } = computeMetrics({
      labels: [1, 1, 1, 1],
      predictions: [1, 1, 1, 0],
      attributes: {
        gender: ['F', 'M', 'F', 'M'],
        region: ['north', 'north', 'south', 'south'],
      },
    });

    expect(subgroupStats).toHaveLength(8);
    const result = expectDefined(metrics.subgroup_performance);
    expect(result.gap).toBe(0);
    expect(result.driver.lowest.label).toBe('gender=M & region=south');
    expect(result.score).toBe(0.2);
  });

  it('honours the intersection depth option', () => {
    const { subgroupStats } = computeMetrics(
      {
        labels: [1, 1],
        predictions: [1, 0],
        attributes: { gender: ['F', 'M'], region: ['north', 'south'] },
      },
      { intersectionDepth: 1 },
    );

    expect(subgroupStats.map((s) => s.label)).toEqual([
      'gender=F', 'gender=M', 'region=north', 'region=south',
    ]);
  });

  it('gives ratio 1 when every subgroup has zero accuracy', () => {
    const { metrics } = computeMetrics({
      labels: [1, 0],
      predictions: [0, 1],
      attributes: { g: ['a', 'b'] },
    });

    const result = expectDefined(metrics.subgroup_performance);
    expect(result.gap).toBe(1);
    expect(result.score).toBe(1);
  });

  it('reports every metric undefined for an empty batch', () => {
    const { metrics } = computeMetrics({ labels: [], predictions: [], scores: [], attributes: { g: [] } });

    for (const result of Object.values(metrics)) {
      expect(result.status === 'undefined' && result.reason).toBe('no_samples');
    }
  });

  it('drops the unreliable flag at a lower minimum group size', () => {
    const { metrics } = computeMetrics(makeBatch(), { minGroupSize: 4 });
    expect(expectDefined(metrics.demographic_parity).unreliable).toBe(false);
  });

  it('computes calibration from per-group ECE', () => {
    const { metrics } = computeMetrics({
      labels: [1, 1, 0, 1],
      predictions: [1, 1, 0, 0],
      scores: [0.85, 0.85, 0.25, 0.25],
      attributes: { g: ['a', 'a', 'b', 'b'] },
    });

    // a: |0.85 − 1.0| = 0.15; b: |0.25 − 0.5| = 0.25
    const result = expectDefined(metrics.calibration);
    expect(result.gap).toBeCloseTo(0.1, 9);
    expect(result.score).toBe(0.5);
    expect(result.driver.highest.label).toBe('g=b');
  });
});

// --- Properties ---

describe('computeMetrics properties', () => {
  it('scores identically distributed groups as parity on every metric', () => {
    // Each group: TP 1, FN 1, FP 1, TN 1, ECE 0.25
    const { metrics } = computeMetrics({
      labels: [1, 1, 0, 0, 1, 1, 0, 0],
      predictions: [1, 0, 1, 0, 1, 0, 1, 0],
      scores: [0.75, 0.25, 0.75, 0.25, 0.75, 0.25, 0.75, 0.25],
      attributes: { g: ['a', 'a', 'a', 'a', 'b', 'b', 'b', 'b'] },
    });

    const results = Object.values(metrics).map(expectDefined);
    expect(results).toHaveLength(6);
    for (const result of results) {
      expect(result.disparity).toBe(0);
      expect(result.score).toBe(1);
    }
  });

  it('does not depend on the order groups appear in', () => {
    const batch = makeBatch();
    const reversed = {
      labels: [...batch.labels].reverse(),
      predictions: [...batch.predictions].reverse(),
      attributes: { gender: [...(batch.attributes.gender ?? [])].reverse() },
    };

    const forward = expectDefined(computeMetrics(batch).metrics.demographic_parity);
    const backward = expectDefined(computeMetrics(reversed).metrics.demographic_parity);

    expect(backward.gap).toBe(forward.gap);
    expect(backward.score).toBe(forward.score);
    expect(backward.driver.highest.label).toBe('gender=F');
  });

  it('never raises the score as the gap widens', () => {
    const scores: number[] = [];
    for (let selected = 0; selected <= 10; selected++) {
      const { metrics } = computeMetrics({
        labels: new Array<0 | 1>(20).fill(0),
        predictions: [
          ...new Array<0 | 1>(10).fill(0),
          ...Array.from({ length: 10 }, (_, i): 0 | 1 => (i < selected ? 1 : 0)),
        ],
        attributes: { g: [...new Array<string>(10).fill('a'), ...new Array<string>(10).fill('b')] },
      });
      scores.push(expectDefined(metrics.demographic_parity).score);
    }

    expect(scores).toEqual([1, 0.5, 0.2, 0.2, 0.2, 0.2, 0.2, 0.2, 0.2, 0.2, 0.2]);
    expect(scores.every((score, i) => score <= (scores[i - 1] ?? score))).toBe(true);
  });

  it('gives the same result for the same batch', () => {
    const batch = {
      labels: [1, 0, 1, 1, 0, 0] as const,
      predictions: [1, 1, 0, 1, 0, 1] as const,
      scores: [0.9, 0.6, 0.3, 0.8, 0.2, 0.55],
      attributes: { g: ['a', 'a', 'a', 'b', 'b', 'b'] },
    };

    expect(computeMetrics(batch)).toEqual(computeMetrics(batch));
  });
});
