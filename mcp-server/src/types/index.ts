/**
 * Type System
 * Re-exports all type definitions for convenient imports.
 */

export type {
  BinaryLabel,
  SampleBatch,
  SubgroupCondition,
  SubgroupKey,
  SubgroupScheme,
  CalibrationBin,
  GroupStats,
} from './batch.js';

export type {
  MetricName,
  NormalizedScore,
  MetricDirection,
  RateComponent,
  UndefinedReason,
  GroupMetricValue,
  GroupExtreme,
  GapDriver,
  AttributeGap,
  DefinedMetricResult,
  UndefinedMetricResult,
  MetricResult,
  MetricResults,
  CriticalIssue,
  WorstGroup,
  LargestGap,
  BiasAssessment,
  FairnessSnapshot,
} from './metrics.js';

export { METRIC_NAMES } from './metrics.js';

export type {
  DriftSeverity,
  DetectionMethod,
  MetricPoint,
  DeltaDriftEvent,
  StatisticalDriftEvent,
  ControlChartDriftEvent,
  DriftEvent,
  InsufficientDataVerdict,
  EvaluatedDriftVerdict,
  MetricDriftVerdict,
  DriftReport,
} from './drift.js';

export { DRIFT_SEVERITY_RANK } from './drift.js';
