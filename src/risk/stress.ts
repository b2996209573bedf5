/**
 * Linear stress testing: each shock moves one position by `pct`; shocks that
 * share a label add up. Cross-position correlation is not modelled.
 */
import { ValidationError } from "@src/util/errors";
import type { ShockScenario, StressResult } from "./types";

export function runStressTests(
  scenarios: readonly ShockScenario[],
  weights: Readonly<Record<string, number>>,
  positionValue: number
): StressResult[] {
  const unknown = scenarios
    .map(s => s.node)
    .filter(node => !Object.prototype.hasOwnProperty.call(weights, node));
  if (unknown.length > 0) {
    throw new ValidationError(
      `shock scenarios reference unknown positions: ${Array.from(new Set(unknown)).join(", ")}`
    );
  }

  const byLabel = new Map<string, StressResult>();
  for (const scenario of scenarios) {
    const exposure = positionValue * weights[scenario.node];
    const delta = exposure * scenario.pct;
    let result = byLabel.get(scenario.label);
    if (!result) {
      result = { label: scenario.label, shockPct: 0, delta: 0, impacts: [] };
      byLabel.set(scenario.label, result);
    }
    result.delta += delta;
    result.impacts.push({ node: scenario.node, pct: scenario.pct, delta });
  }

  return Array.from(byLabel.values()).map(result => ({
    ...result,
    shockPct: positionValue > 0 ? result.delta / positionValue : 0,
  }));
}
