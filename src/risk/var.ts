/**
 * Value-at-Risk: historical (empirical percentile) and variance-covariance
 * (normal) methods, expressed in currency units of the position.
 */
import {
  inverseNormalCdf,
  percentile,
  standardDeviation,
} from "@src/timeseries/statistics";
import type { VarResult } from "./types";

/**
 * Loss at the (1 − confidence) percentile of returns. A non-negative
 * percentile return means no loss at that level, so VaR is 0.
 */
export function historicalVar(
  returns: readonly number[],
  confidence: number,
  positionValue: number
): number {
  const q = percentile(returns, (1 - confidence) * 100);
  return Math.max(0, -q) * positionValue;
}

/**
 * z(confidence) × σ × position value, σ the population standard deviation.
 */
export function varianceCovarianceVar(
  returns: readonly number[],
  confidence: number,
  positionValue: number
): number {
  const sigma = standardDeviation(returns, 0);
  if (sigma === 0) return 0;
  return inverseNormalCdf(confidence) * sigma * positionValue;
}

export function confidenceKey(level: number): string {
  return String(level);
}

export function computeVar(
  returns: readonly number[],
  confidenceLevels: readonly number[],
  positionValue: number
): VarResult {
  const out: VarResult = {};
  for (const level of confidenceLevels) {
    out[confidenceKey(level)] = {
      historical: historicalVar(returns, level, positionValue),
      varCov: varianceCovarianceVar(returns, level, positionValue),
    };
  }
  return out;
}
