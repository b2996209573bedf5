import type {
  CentralityMetrics,
  Chokepoint,
  NodeScore,
  SupplyOptions,
} from "./types";

/**
 * Composite = betweennessWeight × betweenness + geoWeight × geo concentration.
 * Nodes without edges score 0 and rank after every connected node.
 */
export function scoreNodes(
  metrics: readonly CentralityMetrics[],
  geoWeights: Readonly<Record<string, number>>,
  options: Pick<SupplyOptions, "betweennessWeight" | "geoWeight">
): NodeScore[] {
  const scored = metrics.map(m => {
    const geoConcentration = Object.prototype.hasOwnProperty.call(
      geoWeights,
      m.node
    )
      ? geoWeights[m.node]
      : 0;
    const compositeScore =
      m.degree === 0
        ? 0
        : options.betweennessWeight * m.betweenness +
          options.geoWeight * geoConcentration;
    return { ...m, geoConcentration, compositeScore };
  });
  return scored.sort(compareScores);
}

function compareScores(a: NodeScore, b: NodeScore): number {
  if (b.compositeScore !== a.compositeScore) {
    return b.compositeScore - a.compositeScore;
  }
  const aConnected = a.degree > 0 ? 1 : 0;
  const bConnected = b.degree > 0 ? 1 : 0;
  if (aConnected !== bConnected) return bConnected - aConnected;
  if (b.betweenness !== a.betweenness) return b.betweenness - a.betweenness;
  return a.node < b.node ? -1 : a.node > b.node ? 1 : 0;
}

/**
 * Applies the caller's threshold and top-K cut to already ranked scores.
 */
export function selectChokepoints(
  ranked: readonly NodeScore[],
  options: Pick<SupplyOptions, "topK" | "threshold">
): Chokepoint[] {
  const { threshold, topK } = options;
  const kept =
    threshold === undefined
      ? ranked
      : ranked.filter(s => s.compositeScore >= threshold);
  const limited = topK === undefined ? kept : kept.slice(0, topK);
  return limited.map((s, i) => ({
    rank: i + 1,
    node: s.node,
    betweenness: s.betweenness,
    geoConcentration: s.geoConcentration,
    compositeScore: s.compositeScore,
  }));
}
