/**
 * Business logic: build the supply graph, score every node and rank the
 * chokepoints. Pure function of its input.
 */
import { echoMeta } from "@src/util/advisory";
import { getLogger } from "@src/util/logger";
import { parseOrThrow } from "@src/util/validation";
import { computeCentrality } from "./centrality";
import { scoreNodes, selectChokepoints } from "./chokepoints";
import { DEFAULT_SUPPLY_OPTIONS, resolveSupplyOptions } from "./config";
import { buildSupplyGraph } from "./graph";
import { supplyInputSchema } from "./schema";
import type { SupplyAnalysis, SupplyInput, SupplyOptions } from "./types";

export function analyzeSupply(
  input: SupplyInput,
  defaults: SupplyOptions = DEFAULT_SUPPLY_OPTIONS
): SupplyAnalysis {
  const logger = getLogger("supply/analyze_supply");
  const parsed = parseOrThrow(supplyInputSchema, input, "supply input");
  const options = resolveSupplyOptions(parsed.overrides, defaults);

  const graph = buildSupplyGraph(parsed.edges, parsed.nodes);
  const centrality = computeCentrality(graph, {
    weighted: options.weighted,
    normalized: true,
  });
  const metrics = scoreNodes(centrality, parsed.geoWeights, options);
  const chokepoints = selectChokepoints(metrics, options);

  logger.debug(
    {
      nodes: graph.nodes.length,
      edges: graph.edgeCount,
      chokepoints: chokepoints.length,
      top: chokepoints[0]?.node,
    },
    "supply analysis result"
  );

  return {
    nodeCount: graph.nodes.length,
    edgeCount: graph.edgeCount,
    metrics,
    chokepoints,
    options,
    meta: echoMeta(parsed.meta),
  };
}
