import type { SupplyEdge } from "./types";

/**
 * For each supplier with a known country: the share of all located suppliers
 * that sit in the same country.
 */
export function deriveGeoWeights(
  edges: readonly SupplyEdge[]
): Record<string, number> {
  const countryOf = new Map<string, string>();
  for (const edge of edges) {
    if (edge.country && !countryOf.has(edge.supplier)) {
      countryOf.set(edge.supplier, edge.country);
    }
  }
  const perCountry = new Map<string, number>();
  for (const country of countryOf.values()) {
    perCountry.set(country, (perCountry.get(country) ?? 0) + 1);
  }
  const out: Record<string, number> = {};
  for (const [node, country] of countryOf) {
    out[node] = (perCountry.get(country) ?? 0) / countryOf.size;
  }
  return out;
}
