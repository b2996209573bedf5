import { getBoolean, getNumber, getOptionalNumber } from "@src/util/env";
import { parseOrThrow } from "@src/util/validation";
import { supplyOptionsSchema } from "./schema";
import type { SupplyOptions } from "./types";

export const DEFAULT_SUPPLY_OPTIONS: SupplyOptions = {
  betweennessWeight: 0.7,
  geoWeight: 0.3,
  weighted: true,
};

export function resolveSupplyOptions(
  overrides: Record<string, unknown> = {},
  base: SupplyOptions = DEFAULT_SUPPLY_OPTIONS
): SupplyOptions {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return parseOrThrow(
    supplyOptionsSchema,
    { ...base, ...defined },
    "supply options"
  );
}

/**
 * Supply defaults from SUPPLY_* environment variables; keeps the top 5
 * chokepoints unless SUPPLY_TOP_K says otherwise.
 */
export function loadSupplyConfig(): SupplyOptions {
  return resolveSupplyOptions({
    betweennessWeight: getNumber(
      "SUPPLY_BETWEENNESS_WEIGHT",
      DEFAULT_SUPPLY_OPTIONS.betweennessWeight
    ),
    geoWeight: getNumber("SUPPLY_GEO_WEIGHT", DEFAULT_SUPPLY_OPTIONS.geoWeight),
    weighted: getBoolean("SUPPLY_WEIGHTED", DEFAULT_SUPPLY_OPTIONS.weighted),
    topK: getNumber("SUPPLY_TOP_K", 5),
    threshold: getOptionalNumber("SUPPLY_THRESHOLD"),
  });
}
