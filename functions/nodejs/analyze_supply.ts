// Lambda handler for supply network chokepoint analysis.
//
// Endpoint: POST /supply
// Body: { edges: [{ supplier, customer, weight?, country? }], nodes?, geoWeights?, overrides?, meta? }
// Behavior:
//   - Duplicate supplier→customer pairs are rejected with 400.
//   - When geoWeights is omitted, country shares are derived from edge countries.
//   - Returns per-node metrics and the ranked chokepoints (SUPPLY_TOP_K default 5).
import { withRequestContext } from "@src/util/logger";
import { parseOrThrow } from "@src/util/validation";
import { analyzeSupply } from "@src/supply/analyze_supply";
import { loadSupplyConfig } from "@src/supply/config";
import { deriveGeoWeights } from "@src/supply/geo_weights";
import { supplyInputSchema } from "@src/supply/schema";
import {
  errorResponse,
  HttpEvent,
  HttpResponse,
  LambdaContext,
  jsonResponse,
  parseJsonBody,
} from "./http";

export const handler = async (
  event: HttpEvent,
  context: LambdaContext = {}
): Promise<HttpResponse> => {
  const logger = withRequestContext("functions/analyze_supply", context);
  try {
    const body = parseJsonBody(event);
    const input = parseOrThrow(supplyInputSchema, body, "supply input");
    const hasGeoWeights = Object.keys(input.geoWeights).length > 0;
    const result = analyzeSupply(
      {
        ...input,
        geoWeights: hasGeoWeights ? input.geoWeights : deriveGeoWeights(input.edges),
      },
      loadSupplyConfig()
    );
    return jsonResponse(200, {
      nodeCount: result.nodeCount,
      edgeCount: result.edgeCount,
      metrics: result.metrics,
      chokepoints: result.chokepoints,
      meta: result.meta,
    });
  } catch (err) {
    return errorResponse(err, logger);
  }
};
