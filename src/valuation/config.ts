import { getNumber } from "@src/util/env";
import { parseOrThrow } from "@src/util/validation";
import { valuationOptionsSchema } from "./schema";
import type { ValuationOptions } from "./types";

export const DEFAULT_VALUATION_OPTIONS: ValuationOptions = {
  horizon: 10,
  growthRate: 0.05,
  terminalGrowth: 0.03,
};

/**
 * Merges caller overrides over `base` and validates the result eagerly.
 */
export function resolveValuationOptions(
  overrides: Partial<ValuationOptions> = {},
  base: ValuationOptions = DEFAULT_VALUATION_OPTIONS
): ValuationOptions {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return parseOrThrow(
    valuationOptionsSchema,
    { ...base, ...defined },
    "valuation options"
  );
}

/**
 * Valuation defaults from DCF_* environment variables.
 */
export function loadValuationConfig(): ValuationOptions {
  return resolveValuationOptions({
    horizon: getNumber("DCF_HORIZON", DEFAULT_VALUATION_OPTIONS.horizon),
    growthRate: getNumber(
      "DCF_GROWTH_RATE",
      DEFAULT_VALUATION_OPTIONS.growthRate
    ),
    terminalGrowth: getNumber(
      "DCF_TERMINAL_GROWTH",
      DEFAULT_VALUATION_OPTIONS.terminalGrowth
    ),
  });
}

