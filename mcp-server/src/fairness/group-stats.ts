/**
 * Group Statistics
 *
 * Turns a labeled batch into per-subgroup confusion-matrix counts,
 * derived rates and calibration bins. Everything downstream reads
 * these stats; nothing here knows about gaps or scores.
 *
 * Subgroups are derived from the attribute columns on every call.
 * A subgroup that no sample belongs to never appears; there is no
 * zero-filling.
 */

import { z } from 'zod';
import type {
  BinaryLabel,
  CalibrationBin,
  GroupStats,
  SampleBatch,
  SubgroupKey,
  SubgroupScheme,
} from '../types/batch.js';
import { InvalidInputError } from '../errors.js';
import { METRIC_DEFAULTS } from './fairness.config.js';

const binaryLabelSchema = z
  .number()
  .refine((value): value is BinaryLabel => value === 0 || value === 1, 'must be 0 or 1');

const probabilitySchema = z
  .number()
  .min(0, 'must be within [0, 1]')
  .max(1, 'must be within [0, 1]');

const categorySchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

/** Schema for a sample batch; column lengths are cross-checked */
export const sampleBatchSchema = z
  .object({
    labels: z.array(binaryLabelSchema),
    predictions: z.array(binaryLabelSchema),
    scores: z.array(probabilitySchema).optional(),
    attributes: z.record(z.array(categorySchema)),
  })
  .superRefine((batch, ctx) => {
    const n = batch.labels.length;

    if (batch.predictions.length !== n) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['predictions'],
        message: `expected ${n} values, got ${batch.predictions.length}`,
      });
    }

    if (batch.scores !== undefined && batch.scores.length !== n) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['scores'],
        message: `expected ${n} values, got ${batch.scores.length}`,
      });
    }

    const attributeNames = Object.keys(batch.attributes);
    if (attributeNames.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['attributes'],
        message: 'at least one protected attribute is required',
      });
    }

    for (const name of attributeNames) {
      const column = batch.attributes[name] ?? [];
      if (column.length !== n) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['attributes', name],
          message: `expected ${n} values, got ${column.length}`,
        });
      }
    }
  });

export type SampleBatchInput = z.input<typeof sampleBatchSchema>;

/**
 * Validate raw input into a typed batch.
 * Rejects the batch wholesale, listing every problem found.
 */
export function parseSampleBatch(input: unknown): SampleBatch {
  const result = sampleBatchSchema.safeParse(input);

  if (!result.success) {
    throw new InvalidInputError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    );
  }

  return result.data;
}

/**
 * Identity of a subgroup key. Labels are for display only: an attribute
 * value may itself contain "=" or " & ".
 */
export function subgroupId(key: SubgroupKey): string {
  return JSON.stringify(key);
}

/** Render a subgroup key as "attr=value & attr=value" */
export function formatSubgroupKey(key: SubgroupKey): string {
  return key.map(([attribute, value]) => `${attribute}=${value}`).join(' & ');
}

/**
 * Every combination of attribute names of size 1..maxDepth,
 * shallowest first, in declaration order within each size.
 */
export function attributeCombinations(
  attributes: readonly string[],
  maxDepth: number,
): string[][] {
  const combinations: string[][] = [];
  const depth = Math.min(maxDepth, attributes.length);

  const extend = (start: number, current: string[], size: number): void => {
    if (current.length === size) {
      combinations.push([...current]);
      return;
    }
    for (let i = start; i < attributes.length; i++) {
      const attribute = attributes[i];
      if (attribute === undefined) continue;
      current.push(attribute);
      extend(i + 1, current, size);
      current.pop();
    }
  };

  for (let size = 1; size <= depth; size++) {
    extend(0, [], size);
  }

  return combinations;
}

interface Membership {
  key: SubgroupKey;
  indices: number[];
}

function resolveDepth(scheme: SubgroupScheme, attributeCount: number): number {
  if (scheme.kind === 'per_attribute') return 1;

  const depth = scheme.maxDepth ?? attributeCount;
  if (!Number.isInteger(depth) || depth < 1) {
    throw new InvalidInputError([`maxDepth: must be a positive integer, got ${depth}`]);
  }
  return depth;
}

/**
 * Partition sample indices by subgroup key.
 * Groups appear in order of first occurrence within each attribute combination.
 */
function collectMemberships(batch: SampleBatch, scheme: SubgroupScheme): Map<string, Membership> {
  const attributeNames = Object.keys(batch.attributes);
  const depth = resolveDepth(scheme, attributeNames.length);
  const memberships = new Map<string, Membership>();

  for (const combination of attributeCombinations(attributeNames, depth)) {
    for (let i = 0; i < batch.labels.length; i++) {
      const key: SubgroupKey = combination.map(
        (attribute) => [attribute, batch.attributes[attribute]?.[i] ?? ''] as const,
      );
      const id = subgroupId(key);

      const existing = memberships.get(id);
      if (existing) {
        existing.indices.push(i);
      } else {
        memberships.set(id, { key, indices: [i] });
      }
    }
  }

  return memberships;
}

/**
 * Observed subgroup keys of a batch under one extraction scheme, in
 * extraction order. Keys no sample belongs to never appear.
 */
export function enumerateSubgroupKeys(batch: SampleBatch, scheme: SubgroupScheme): SubgroupKey[] {
  return [...collectMemberships(parseSampleBatch(batch), scheme).values()].map(
    (membership) => membership.key,
  );
}

function ratio(numerator: number, denominator: number): number | null {
  return denominator > 0 ? numerator / denominator : null;
}

function buildCalibrationBins(
  indices: readonly number[],
  labels: readonly BinaryLabel[],
  scores: readonly number[],
): CalibrationBin[] {
  const binCount = METRIC_DEFAULTS.calibrationBins;
  const counts = new Array<number>(binCount).fill(0);
  const scoreSums = new Array<number>(binCount).fill(0);
  const positives = new Array<number>(binCount).fill(0);

  for (const i of indices) {
    const score = scores[i] ?? 0;
    // [0.9, 1.0] is closed on the right
    const bin = Math.min(Math.floor(score * binCount), binCount - 1);
    counts[bin] = (counts[bin] ?? 0) + 1;
    scoreSums[bin] = (scoreSums[bin] ?? 0) + score;
    positives[bin] = (positives[bin] ?? 0) + (labels[i] ?? 0);
  }

  return counts.map((count, bin) => ({
    low: bin / binCount,
    high: (bin + 1) / binCount,
    count,
    meanPredicted: ratio(scoreSums[bin] ?? 0, count),
    positiveRate: ratio(positives[bin] ?? 0, count),
  }));
}

/** Sample-weighted mean of |mean predicted − positive rate| over non-empty bins */
export function expectedCalibrationError(bins: readonly CalibrationBin[]): number | null {
  const total = bins.reduce((sum, bin) => sum + bin.count, 0);
  if (total === 0) return null;

  let ece = 0;
  for (const bin of bins) {
    if (bin.meanPredicted === null || bin.positiveRate === null) continue;
    ece += (bin.count / total) * Math.abs(bin.meanPredicted - bin.positiveRate);
  }
  return ece;
}

function computeGroupStats(
  key: SubgroupKey,
  label: string,
  indices: readonly number[],
  batch: SampleBatch,
): GroupStats {
  let truePositives = 0;
  let falsePositives = 0;
  let trueNegatives = 0;
  let falseNegatives = 0;

  for (const i of indices) {
    const actual = batch.labels[i];
    const predicted = batch.predictions[i];

    if (actual === 1 && predicted === 1) truePositives++;
    else if (actual === 1) falseNegatives++;
    else if (predicted === 1) falsePositives++;
    else trueNegatives++;
  }

  const sampleCount = indices.length;
  const calibrationBins = batch.scores
    ? buildCalibrationBins(indices, batch.labels, batch.scores)
    : [];

  return {
    key,
    label,
    truePositives,
    falsePositives,
    trueNegatives,
    falseNegatives,
    sampleCount,
    selectionRate: (truePositives + falsePositives) / sampleCount,
    truePositiveRate: ratio(truePositives, truePositives + falseNegatives),
    falsePositiveRate: ratio(falsePositives, falsePositives + trueNegatives),
    precision: ratio(truePositives, truePositives + falsePositives),
    accuracy: (truePositives + trueNegatives) / sampleCount,
    calibrationBins,
    expectedCalibrationError: batch.scores ? expectedCalibrationError(calibrationBins) : null,
  };
}

/**
 * Stats for an already-validated batch.
 * Callers outside this module go through buildGroupStats.
 */
export function collectGroupStats(
  batch: SampleBatch,
  scheme: SubgroupScheme,
): ReadonlyMap<string, GroupStats> {
  const stats = new Map<string, GroupStats>();

  for (const [id, membership] of collectMemberships(batch, scheme)) {
    const label = formatSubgroupKey(membership.key);
    stats.set(id, computeGroupStats(membership.key, label, membership.indices, batch));
  }

  return stats;
}

/**
 * Build per-subgroup statistics for a batch under one extraction scheme,
 * keyed by subgroupId. Throws InvalidInputError when columns disagree in length or values
 * are out of range.
 */
export function buildGroupStats(
  batch: SampleBatch,
  scheme: SubgroupScheme = { kind: 'per_attribute' },
): ReadonlyMap<string, GroupStats> {
  return collectGroupStats(parseSampleBatch(batch), scheme);
}
