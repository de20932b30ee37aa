/**
 * Runtime Configuration
 *
 * Environment overrides for the defaults in fairness.config.ts.
 * Read once and validated with zod. A bad value stops the server at
 * startup.
 */

import { z } from 'zod';
import { InvalidInputError } from './errors.js';
import { DRIFT_DEFAULTS, METRIC_DEFAULTS } from './fairness/fairness.config.js';

const envSchema = z.object({
  FAIRNESS_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  FAIRNESS_MIN_GROUP_SIZE: z.coerce.number().int().positive().default(METRIC_DEFAULTS.minGroupSize),
  FAIRNESS_DRIFT_WINDOW: z.coerce.number().int().min(DRIFT_DEFAULTS.minWindowSize).default(DRIFT_DEFAULTS.windowSize),
  FAIRNESS_DRIFT_ALPHA: z.coerce.number().gt(0).lt(1).default(DRIFT_DEFAULTS.alpha),
  FAIRNESS_INTERSECTION_DEPTH: z.coerce.number().int().positive().optional(),
});

export type LogLevel = z.infer<typeof envSchema>['FAIRNESS_LOG_LEVEL'];

export interface RuntimeConfig {
  logLevel: LogLevel;
  minGroupSize: number;
  driftWindowSize: number;
  driftAlpha: number;
  /** Deepest attribute conjunction; undefined means every attribute */
  intersectionDepth: number | undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new InvalidInputError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const parsed = result.data;
  return {
    logLevel: parsed.FAIRNESS_LOG_LEVEL,
    minGroupSize: parsed.FAIRNESS_MIN_GROUP_SIZE,
    driftWindowSize: parsed.FAIRNESS_DRIFT_WINDOW,
    driftAlpha: parsed.FAIRNESS_DRIFT_ALPHA,
    intersectionDepth: parsed.FAIRNESS_INTERSECTION_DEPTH,
  };
}

let cached: RuntimeConfig | null = null;

/** Process-wide configuration, loaded on first use */
export function getConfig(): RuntimeConfig {
  if (cached === null) {
    cached = loadConfig();
  }
  return cached;
}
