/**
 * Drift Monitoring Types
 *
 * Three detection methods share one severity scale. A check that
 * cannot run for lack of history returns a status, not a severity;
 * the caller decides whether "pending" means "no drift".
 */

/** Three-level severity, no fourth tier */
export type DriftSeverity = 'none' | 'minor' | 'major';

/** Numeric ordering for comparison */
export const DRIFT_SEVERITY_RANK: Record<DriftSeverity, number> = {
  none: 0,
  minor: 1,
  major: 2,
};

export type DetectionMethod = 'delta' | 'statistical' | 'control_chart';

/** One point of a metric's history */
export interface MetricPoint {
  /** ISO-8601 */
  timestamp: string;
  value: number;
}

interface DriftEventBase {
  metric: string;
  /** Baseline value (window mean, or the single baseline value) */
  baseline: number;
  /** Current value (window mean, latest value, or single current value) */
  current: number;
  /** current − baseline */
  change: number;
  /** |current − baseline|, the input to the severity ladder */
  absoluteChange: number;
  /** Relative change in percent; null when the baseline is 0 */
  changePct: number | null;
  severity: DriftSeverity;
  /** The method's own significance verdict */
  flagged: boolean;
}

export interface DeltaDriftEvent extends DriftEventBase {
  method: 'delta';
}

export interface StatisticalDriftEvent extends DriftEventBase {
  method: 'statistical';
  pValue: number;
  tStatistic: number;
  degreesOfFreedom: number;
  alpha: number;
}

export interface ControlChartDriftEvent extends DriftEventBase {
  method: 'control_chart';
  /** |latest − mean| / std; Infinity when std = 0 and the value moved */
  distance: number;
  lowerLimit: number;
  upperLimit: number;
  sigmaLimit: number;
}

export type DriftEvent = DeltaDriftEvent | StatisticalDriftEvent | ControlChartDriftEvent;

export interface InsufficientDataVerdict {
  status: 'insufficient_data';
  metric: string;
  /** Points available */
  available: number;
  /** Points needed (2 × window size) */
  required: number;
}

export interface EvaluatedDriftVerdict {
  status: 'evaluated';
  metric: string;
  /** Maximum severity across methods */
  severity: DriftSeverity;
  driftDetected: boolean;
  baselineMean: number;
  currentMean: number;
  events: readonly DriftEvent[];
  recommendation: string | null;
}

export type MetricDriftVerdict = InsufficientDataVerdict | EvaluatedDriftVerdict;

/** Aggregated drift verdict for one system check */
export interface DriftReport {
  systemId: string;
  /** ISO-8601 */
  timestamp: string;
  driftDetected: boolean;
  /** Maximum severity across evaluated metrics */
  overallSeverity: DriftSeverity;
  verdicts: readonly MetricDriftVerdict[];
  /** Metrics that returned insufficient_data */
  pendingMetrics: readonly string[];
  /** Signed change per evaluated metric */
  metricChanges: Readonly<Record<string, number>>;
  recommendations: readonly string[];
}
