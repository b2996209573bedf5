/**
 * Export formats: VaR JSON and stress JSON.
 */
import type { StressResult, VarResult } from "./types";

export type VarJson = Record<string, { historical: number; var_cov: number }>;

export function toVarRecord(result: VarResult): VarJson {
  const out: VarJson = {};
  for (const [level, entry] of Object.entries(result)) {
    out[level] = { historical: entry.historical, var_cov: entry.varCov };
  }
  return out;
}

export function varToJson(result: VarResult): string {
  return JSON.stringify(toVarRecord(result), null, 2);
}

/**
 * `{ label: delta }` in scenario order.
 */
export function toStressRecord(results: readonly StressResult[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const r of results) out[r.label] = r.delta;
  return out;
}

export function stressToJson(results: readonly StressResult[]): string {
  return JSON.stringify(toStressRecord(results), null, 2);
}
