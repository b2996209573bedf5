/**
 * Domain types for the risk engine.
 */
import type { AdvisoryMeta } from "@src/util/advisory";
import type { PriceSeries, ReturnMethod } from "@src/timeseries/returns";

export interface ShockScenario {
  label: string;
  /** Position (or network node) the shock applies to */
  node: string;
  /** Signed shock as a decimal, e.g. -0.1 for a 10% drop */
  pct: number;
}

export interface RiskOptions {
  confidenceLevels: number[];
  minObservations: number;
  /** Currency value of the whole portfolio */
  positionValue: number;
  returnMethod: ReturnMethod;
  /** Position name → weight; weights sum to 1 */
  portfolioWeights: Record<string, number>;
}

export interface VarEntry {
  historical: number;
  varCov: number;
}

/** Keyed by confidence level as written, e.g. "0.95" */
export type VarResult = Record<string, VarEntry>;

export interface StressImpact {
  node: string;
  pct: number;
  delta: number;
}

export interface StressResult {
  label: string;
  /** Portfolio-level shock: delta / positionValue */
  shockPct: number;
  delta: number;
  impacts: StressImpact[];
}

export interface RiskInput {
  ticker?: string;
  /** Precomputed periodic returns; mutually exclusive with priceSeries */
  returns?: number[];
  priceSeries?: PriceSeries;
  shockScenarios?: ShockScenario[];
  overrides?: Partial<RiskOptions>;
  meta?: AdvisoryMeta;
}

export interface RiskAssessment {
  ticker: string | null;
  observations: number;
  mean: number;
  standardDeviation: number;
  /** Standard score of the most recent return within the window */
  latestZScore: number;
  var: VarResult;
  stress: StressResult[];
  options: RiskOptions;
  meta: AdvisoryMeta;
}
