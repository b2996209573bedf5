/**
 * Numeric primitives shared by the valuation and risk engines.
 */
import { DataInsufficientError, ValidationError } from "@src/util/errors";

export function mean(values: readonly number[]): number {
  requireNonEmpty(values, "mean");
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Standard deviation with `ddof` delta degrees of freedom (0 = population).
 */
export function standardDeviation(
  values: readonly number[],
  ddof: 0 | 1 = 0
): number {
  requireNonEmpty(values, "standardDeviation");
  if (values.length - ddof <= 0) {
    throw new DataInsufficientError(
      `standardDeviation needs more than ${ddof} observation(s)`,
      ddof + 1,
      values.length
    );
  }
  const m = mean(values);
  let acc = 0;
  for (const v of values) acc += (v - m) * (v - m);
  const variance = acc / (values.length - ddof);
  // Identical values can leave a rounding residue
  return variance <= Number.EPSILON * m * m ? 0 : Math.sqrt(variance);
}

/**
 * Percentile in [0, 100] using linear interpolation between adjacent order
 * statistics: rank = p/100 × (n − 1).
 */
export function percentile(values: readonly number[], p: number): number {
  requireNonEmpty(values, "percentile");
  if (!Number.isFinite(p) || p < 0 || p > 100) {
    throw new ValidationError(`percentile must be within [0, 100], got ${p}`);
  }
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  if (lower === upper) return sorted[lower];
  const fraction = rank - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * fraction;
}

/**
 * Standard score; 0 for a degenerate (zero-sigma) distribution.
 */
export function zScore(value: number, mu: number, sigma: number): number {
  if (sigma === 0) return 0;
  return (value - mu) / sigma;
}

// Acklam's rational approximation, |relative error| < 1.15e-9
const A = [
  -3.969683028665376e1, 2.209460984245205e2, -2.759285104469687e2,
  1.38357751867269e2, -3.066479806614716e1, 2.506628277459239,
];
const B = [
  -5.447609879822406e1, 1.615858368580409e2, -1.556989798598866e2,
  6.680131188771972e1, -1.328068155288572e1,
];
const C = [
  -7.784894002430293e-3, -3.223964580411365e-1, -2.400758277161838,
  -2.549732539343734, 4.374664141464968, 2.938163982698783,
];
const D = [
  7.784695709041462e-3, 3.224671290700398e-1, 2.445134137142996,
  3.754408661907416,
];
const P_LOW = 0.02425;
const P_HIGH = 1 - P_LOW;

/**
 * Inverse of the standard normal CDF for p in (0, 1).
 */
export function inverseNormalCdf(p: number): number {
  if (!(p > 0 && p < 1)) {
    throw new ValidationError(`inverseNormalCdf needs p in (0, 1), got ${p}`);
  }
  if (p < P_LOW) {
    const q = Math.sqrt(-2 * Math.log(p));
    return (
      (((((C[0] * q + C[1]) * q + C[2]) * q + C[3]) * q + C[4]) * q + C[5]) /
      ((((D[0] * q + D[1]) * q + D[2]) * q + D[3]) * q + 1)
    );
  }
  if (p > P_HIGH) {
    const q = Math.sqrt(-2 * Math.log(1 - p));
    return -(
      (((((C[0] * q + C[1]) * q + C[2]) * q + C[3]) * q + C[4]) * q + C[5]) /
      ((((D[0] * q + D[1]) * q + D[2]) * q + D[3]) * q + 1)
    );
  }
  const q = p - 0.5;
  const r = q * q;
  return (
    ((((((A[0] * r + A[1]) * r + A[2]) * r + A[3]) * r + A[4]) * r + A[5]) *
      q) /
    (((((B[0] * r + B[1]) * r + B[2]) * r + B[3]) * r + B[4]) * r + 1)
  );
}

function requireNonEmpty(values: readonly number[], op: string): void {
  if (values.length === 0) {
    throw new DataInsufficientError(`${op} of an empty series`, 1, 0);
  }
}
