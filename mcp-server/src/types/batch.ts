/**
 * Sample Batch Types
 *
 * A batch is the unit of evaluation: parallel columns of ground truth,
 * predicted labels, optional predicted probabilities, and one column per
 * protected attribute. Subgroups are never stored; they are derived
 * from the attribute columns every time a batch is evaluated.
 */

/** Binary class label */
export type BinaryLabel = 0 | 1;

/** A labeled batch of classifier outputs */
export interface SampleBatch {
  /** Ground-truth labels */
  labels: readonly BinaryLabel[];

  /** Predicted labels */
  predictions: readonly BinaryLabel[];

  /** Predicted probability of the positive class, in [0, 1] */
  scores?: readonly number[];

  /**
   * Protected attribute columns, keyed by attribute name.
   * Declaration order of the keys fixes the order of subgroup keys.
   */
  attributes: Readonly<Record<string, readonly string[]>>;
}

/** One (attribute, value) conjunct of a subgroup key */
export type SubgroupCondition = readonly [attribute: string, value: string];

/**
 * Ordered tuple of conditions. A single condition is a plain group
 * (gender=F); two or more form an intersectional subgroup.
 */
export type SubgroupKey = readonly SubgroupCondition[];

/**
 * How subgroup keys are extracted from a batch.
 * - per_attribute: one key per observed value of each attribute
 * - intersectional: every observed conjunction up to maxDepth attributes
 */
export type SubgroupScheme =
  | { kind: 'per_attribute' }
  | { kind: 'intersectional'; maxDepth?: number };

/** A single equal-width probability bin */
export interface CalibrationBin {
  /** Bin range [low, high); the last bin also includes 1.0 */
  low: number;
  high: number;
  /** Number of samples whose score fell in the bin */
  count: number;
  /** Mean predicted probability (null when the bin is empty) */
  meanPredicted: number | null;
  /** Fraction of positive ground truth (null when the bin is empty) */
  positiveRate: number | null;
}

/**
 * Confusion-matrix counts and derived rates for one subgroup.
 * Rates are null when their denominator is zero (undefined, never 0).
 */
export interface GroupStats {
  key: SubgroupKey;
  label: string;

  truePositives: number;
  falsePositives: number;
  trueNegatives: number;
  falseNegatives: number;
  sampleCount: number;

  /** P(pred = 1) */
  selectionRate: number;
  /** TP / (TP + FN) */
  truePositiveRate: number | null;
  /** FP / (FP + TN) */
  falsePositiveRate: number | null;
  /** TP / (TP + FP) */
  precision: number | null;
  /** (TP + TN) / n */
  accuracy: number;

  /** Ten probability bins, empty when the batch carried no scores */
  calibrationBins: readonly CalibrationBin[];
  /** Expected calibration error, null when the batch carried no scores */
  expectedCalibrationError: number | null;
}
