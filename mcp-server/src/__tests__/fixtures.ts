/**
 * Shared test fixtures.
 *
 * The two-group batch: gender=F is classified perfectly, gender=M
 * misses one of its two positives.
 *
 *   gender=F  TP 2  TN 2            selection 0.50  TPR 1.0  accuracy 1.00
 *   gender=M  TP 1  FN 1  TN 2      selection 0.25  TPR 0.5  accuracy 0.75
 */

import { pino } from 'pino';
import type { SampleBatch } from '../types/batch.js';

export const silentLogger = pino({ level: 'silent' });

export function makeBatch(overrides: Partial<SampleBatch> = {}): SampleBatch {
  return {
    labels: [1, 1, 0, 0, 1, 1, 0, 0],
    predictions: [1, 1, 0, 0, 1, 0, 0, 0],
    attributes: {
      gender: ['F', 'F', 'F', 'F', 'M', 'M', 'M', 'M'],
    },
    ...overrides,
  };
}

/** Fixed clock: 2030-01-01T00:00:00.000Z plus `day` days */
export function dayClock(day = 0): () => Date {
  return () => new Date(Date.UTC(2030, 0, 1 + day));
}
