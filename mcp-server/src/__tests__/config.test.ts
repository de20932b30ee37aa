/**
 * Configuration Tests
 *
 * Env parsing, and the root logger built from it.
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';
import { InvalidInputError } from '../errors.js';
import { logger, withSystemId } from '../logger.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'info',
      minGroupSize: 10,
      driftWindowSize: 5,
      driftAlpha: 0.05,
      intersectionDepth: undefined,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      FAIRNESS_LOG_LEVEL: 'debug',
      FAIRNESS_MIN_GROUP_SIZE: '30',
      FAIRNESS_DRIFT_WINDOW: '8',
      FAIRNESS_DRIFT_ALPHA: '0.01',
      FAIRNESS_INTERSECTION_DEPTH: '2',
    });

    expect(config).toEqual({
      logLevel: 'debug',
      minGroupSize: 30,
      driftWindowSize: 8,
      driftAlpha: 0.01,
      intersectionDepth: 2,
    });
  });

  it('rejects a drift window below two', () => {
    expect(() => loadConfig({ FAIRNESS_DRIFT_WINDOW: '1' })).toThrow(InvalidInputError);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ FAIRNESS_LOG_LEVEL: 'loud' })).toThrow('FAIRNESS_LOG_LEVEL');
  });

  it('rejects a significance level of zero', () => {
    expect(() => loadConfig({ FAIRNESS_DRIFT_ALPHA: '0' })).toThrow(InvalidInputError);
  });
});

describe('logger', () => {
  it('takes its level from the environment', () => {
    expect(logger.level).toBe('silent');
  });

  it('binds the system id on child loggers', () => {
    expect(withSystemId(logger, 'loan-model').bindings()).toMatchObject({
      name: 'fairness-sentinel',
      systemId: 'loan-model',
    });
  });
});
