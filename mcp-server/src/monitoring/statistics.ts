/**
 * Statistics
 *
 * Descriptive statistics and Welch's two-sample t-test. The p-value
 * comes from the Student t distribution through the regularized
 * incomplete beta function:
 *
 *   p = I_{df / (df + t²)}(df / 2, 1 / 2)
 */

import { roundForComparison } from '../fairness/ladder.js';

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Population standard deviation (divides by n) */
export function populationStd(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const m = mean(values);
  const squared = values.reduce((sum, value) => sum + (value - m) ** 2, 0);
  return Math.sqrt(squared / values.length);
}

/** Unbiased sample variance (divides by n − 1) */
export function sampleVariance(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  const m = mean(values);
  return values.reduce((sum, value) => sum + (value - m) ** 2, 0) / (values.length - 1);
}

// Lanczos approximation, g = 5
const LANCZOS_COEFFICIENTS = [
  76.18009172947146,
  -86.50532032941677,
  24.01409824083091,
  -1.231739572450155,
  0.1208650973866179e-2,
  -0.5395239384953e-5,
] as const;

/** ln Γ(x) for x > 0 */
export function logGamma(x: number): number {
  let y = x;
  const base = x + 5.5;
  const correction = base - (x + 0.5) * Math.log(base);
  let series = 1.000000000190015;
  for (const coefficient of LANCZOS_COEFFICIENTS) {
    y += 1;
    series += coefficient / y;
  }
  return -correction + Math.log((2.5066282746310005 * series) / x);
}

const MAX_ITERATIONS = 200;
const EPSILON = 3e-14;
const TINY = 1e-300;

/** Continued fraction for the incomplete beta function (modified Lentz) */
function betaContinuedFraction(a: number, b: number, x: number): number {
  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;

  let c = 1;
  let d = 1 - (qab * x) / qap;
  if (Math.abs(d) < TINY) d = TINY;
  d = 1 / d;
  let h = d;

  for (let m = 1; m <= MAX_ITERATIONS; m++) {
    const m2 = 2 * m;

    // Even step
    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < TINY) d = TINY;
    c = 1 + aa / c;
    if (Math.abs(c) < TINY) c = TINY;
    d = 1 / d;
    h *= d * c;

    // Odd step
    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < TINY) d = TINY;
    c = 1 + aa / c;
    if (Math.abs(c) < TINY) c = TINY;
    d = 1 / d;
    const delta = d * c;
    h *= delta;

    if (Math.abs(delta - 1) < EPSILON) break;
  }

  return h;
}

/** Regularized incomplete beta function I_x(a, b) */
export function regularizedIncompleteBeta(a: number, b: number, x: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;

  const front = Math.exp(
    logGamma(a + b) - logGamma(a) - logGamma(b) + a * Math.log(x) + b * Math.log(1 - x),
  );

  // The continued fraction converges fastest below (a + 1) / (a + b + 2)
  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(a, b, x)) / a;
  }
  return 1 - (front * betaContinuedFraction(b, a, 1 - x)) / b;
}

/** Two-tailed p-value of a t statistic with df degrees of freedom */
export function studentTTwoTailedPValue(t: number, df: number): number {
  if (Number.isNaN(t) || !(df > 0)) return 1;
  if (!Number.isFinite(t)) return 0;
  const p = regularizedIncompleteBeta(df / 2, 0.5, df / (df + t * t));
  return Math.min(1, Math.max(0, p));
}

export interface TTestResult {
  tStatistic: number;
  pValue: number;
  degreesOfFreedom: number;
}

/**
 * Welch's t-test (unequal variances) of sample against reference.
 * Both samples need at least two values. With zero variance on both
 * sides the test degenerates: equal means give p = 1, different means
 * give p = 0.
 */
export function welchTTest(sample: readonly number[], reference: readonly number[]): TTestResult {
  const n1 = sample.length;
  const n2 = reference.length;
  if (n1 < 2 || n2 < 2) {
    throw new RangeError(`Welch t-test needs at least two values per sample, got ${n1} and ${n2}`);
  }

  const mean1 = mean(sample);
  const mean2 = mean(reference);
  const se1 = sampleVariance(sample) / n1;
  const se2 = sampleVariance(reference) / n2;
  const standardError = Math.sqrt(se1 + se2);
  const difference = mean1 - mean2;

  if (roundForComparison(standardError) === 0) {
    const degreesOfFreedom = n1 + n2 - 2;
    if (roundForComparison(difference) === 0) {
      return { tStatistic: 0, pValue: 1, degreesOfFreedom };
    }
    return {
      tStatistic: difference > 0 ? Infinity : -Infinity,
      pValue: 0,
      degreesOfFreedom,
    };
  }

  const tStatistic = difference / standardError;
  // Welch–Satterthwaite
  const degreesOfFreedom = (se1 + se2) ** 2 / (se1 ** 2 / (n1 - 1) + se2 ** 2 / (n2 - 1));

  return {
    tStatistic,
    pValue: studentTTwoTailedPValue(tStatistic, degreesOfFreedom),
    degreesOfFreedom,
  };
}
