import { formatCsv } from "@src/util/csv";
import type { Chokepoint, NodeScore } from "./types";

/**
 * node, betweenness, in_degree, out_degree, composite_score per node.
 */
export function supplyMetricsToCsv(metrics: readonly NodeScore[]): string {
  return formatCsv(
    [
      "node",
      "betweenness",
      "in_degree",
      "out_degree",
      "geo_concentration",
      "composite_score",
    ],
    metrics.map(m => [
      m.node,
      m.betweenness,
      m.inDegree,
      m.outDegree,
      m.geoConcentration,
      m.compositeScore,
    ])
  );
}

export function chokepointsToJson(chokepoints: readonly Chokepoint[]): string {
  return JSON.stringify(chokepoints, null, 2);
}
