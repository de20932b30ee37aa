/**
 * Fairness Evaluation
 *
 * Single entry point for one batch: metrics, then aggregation, then an
 * immutable snapshot. Nothing here touches storage; committing the
 * snapshot is the caller's move.
 */

import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type { SampleBatch } from '../types/batch.js';
import type { FairnessSnapshot } from '../types/metrics.js';
import { deepFreeze } from '../freeze.js';
import { logger as rootLogger, withSystemId } from '../logger.js';
import { aggregateBias } from './bias-aggregator.js';
import type { AggregatorOptions } from './bias-aggregator.js';
import { computeMetrics } from './metric-computer.js';
import type { MetricComputerOptions } from './metric-computer.js';

export interface EvaluationOptions extends MetricComputerOptions, AggregatorOptions {
  systemId: string;
  modelVersion?: string;
  /** Clock override, defaults to now */
  now?: () => Date;
  logger?: Logger;
}

/**
 * Evaluate one batch into a frozen FairnessSnapshot.
 * Throws InvalidInputError for a malformed batch; every other
 * condition is reported inside the snapshot.
 */
export function evaluateFairness(
  batch: SampleBatch,
  options: EvaluationOptions,
): FairnessSnapshot {
  const log = withSystemId(options.logger ?? rootLogger, options.systemId);
  const computation = computeMetrics(batch, options);
  const assessment = aggregateBias(computation, options);
  const timestamp = (options.now ?? (() => new Date()))().toISOString();

  const snapshot: FairnessSnapshot = deepFreeze({
    snapshotId: uuidv4(),
    systemId: options.systemId,
    modelVersion: options.modelVersion ?? 'unversioned',
    timestamp,
    sampleCount: computation.sampleCount,
    metrics: { ...computation.metrics },
    assessment,
  });

  log.info(
    {
      snapshotId: snapshot.snapshotId,
      sampleCount: snapshot.sampleCount,
      categoryScore: assessment.categoryScore,
      definedMetrics: assessment.definedMetricCount,
      criticalIssues: assessment.criticalIssues.length,
    },
    'fairness snapshot computed',
  );

  return snapshot;
}
