import {
  getNumber,
  getNumberList,
  getString,
} from "@src/util/env";
import { parseOrThrow } from "@src/util/validation";
import { riskOptionsSchema } from "./schema";
import type { RiskOptions } from "./types";

export const DEFAULT_RISK_OPTIONS: RiskOptions = {
  confidenceLevels: [0.95, 0.99],
  minObservations: 20,
  positionValue: 1_000_000,
  returnMethod: "simple",
  portfolioWeights: { equity: 0.6, bond: 0.4 },
};

export function resolveRiskOptions(
  overrides: Record<string, unknown> = {},
  base: RiskOptions = DEFAULT_RISK_OPTIONS
): RiskOptions {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return parseOrThrow(riskOptionsSchema, { ...base, ...defined }, "risk options");
}

/**
 * Risk defaults from VAR_* environment variables.
 */
export function loadRiskConfig(): RiskOptions {
  return resolveRiskOptions({
    confidenceLevels: getNumberList(
      "VAR_CONFIDENCE_LEVELS",
      DEFAULT_RISK_OPTIONS.confidenceLevels
    ),
    minObservations: getNumber(
      "VAR_MIN_OBSERVATIONS",
      DEFAULT_RISK_OPTIONS.minObservations
    ),
    positionValue: getNumber(
      "VAR_POSITION_VALUE",
      DEFAULT_RISK_OPTIONS.positionValue
    ),
    returnMethod: getString("VAR_RETURN_METHOD", DEFAULT_RISK_OPTIONS.returnMethod),
  });
}
