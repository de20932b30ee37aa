/**
 * Evaluation Tools
 *
 * MCP tool for scoring one labeled batch. The snapshot is recorded to
 * history unless the caller opts out, so repeated evaluations feed
 * the drift monitor.
 */

import { z } from 'zod';
import type { FairnessSnapshot } from '../types/metrics.js';
import { getConfig } from '../config.js';
import { parseSampleBatch } from '../fairness/group-stats.js';
import { evaluateFairness } from '../fairness/evaluate.js';
import { getHistoryRecorder } from './history.js';

/** Schema for evaluate_fairness tool input; element checks happen in parseSampleBatch */
export const evaluateFairnessSchema = z.object({
  systemId: z.string().min(1).describe('Identifier of the AI system under evaluation'),
  modelVersion: z.string().optional().describe('Model version tag (default: "unversioned")'),
  labels: z.array(z.number()).describe('Ground-truth labels, 0 or 1'),
  predictions: z.array(z.number()).describe('Model decisions, 0 or 1'),
  scores: z
    .array(z.number())
    .optional()
    .describe('Predicted probabilities in [0, 1], required for the calibration metric'),
  attributes: z
    .record(z.array(z.union([z.string(), z.number(), z.boolean()])))
    .describe('Protected attribute columns, one value per sample (e.g., {"gender": ["F", "M"]})'),
  minGroupSize: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Groups smaller than this mark a result unreliable (default: 10)'),
  intersectionDepth: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Deepest attribute conjunction for subgroup performance (default: all attributes)'),
  record: z
    .boolean()
    .optional()
    .describe('Append the snapshot to metric history (default: true)'),
});

export type EvaluateFairnessInput = z.infer<typeof evaluateFairnessSchema>;

export interface EvaluateFairnessResult {
  snapshot: FairnessSnapshot;
  recorded: boolean;
  /** Series that received a point; empty when not recorded */
  recordedMetrics: readonly string[];
}

/**
 * Evaluate a batch and, by default, commit the snapshot to history.
 * Throws InvalidInputError for a malformed batch.
 */
export async function evaluateFairnessTool(
  input: EvaluateFairnessInput,
): Promise<EvaluateFairnessResult> {
  const config = getConfig();
  const batch = parseSampleBatch({
    labels: input.labels,
    predictions: input.predictions,
    scores: input.scores,
    attributes: input.attributes,
  });

  const snapshot = evaluateFairness(batch, {
    systemId: input.systemId,
    modelVersion: input.modelVersion,
    minGroupSize: input.minGroupSize ?? config.minGroupSize,
    intersectionDepth: input.intersectionDepth ?? config.intersectionDepth,
  });

  if (input.record === false) {
    return { snapshot, recorded: false, recordedMetrics: [] };
  }

  const { recordedMetrics } = await getHistoryRecorder().record(snapshot);
  return { snapshot, recorded: true, recordedMetrics };
}
