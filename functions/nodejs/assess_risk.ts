// Lambda handler for VaR and stress testing.
//
// Endpoint: POST /risk
// Body: { ticker?, returns? | priceSeries?, shockScenarios?, overrides?, meta? }
// Behavior:
//   - Runs the risk engine with VAR_* env defaults.
//   - Returns VaR keyed by confidence level and stress deltas keyed by label.
//   - Too few observations is a 400 with code DATA_INSUFFICIENT.
import { withRequestContext } from "@src/util/logger";
import { parseOrThrow } from "@src/util/validation";
import { toStressRecord, toVarRecord } from "@src/risk/artifacts";
import { assessRisk } from "@src/risk/assess_risk";
import { loadRiskConfig } from "@src/risk/config";
import { riskInputSchema } from "@src/risk/schema";
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
  const logger = withRequestContext("functions/assess_risk", context);
  try {
    const input = parseOrThrow(riskInputSchema, parseJsonBody(event), "risk input");
    const result = assessRisk(input, loadRiskConfig());
    return jsonResponse(200, {
      ticker: result.ticker,
      observations: result.observations,
      latestZScore: result.latestZScore,
      var: toVarRecord(result.var),
      stress: toStressRecord(result.stress),
      scenarios: result.stress,
      meta: result.meta,
    });
  } catch (err) {
    return errorResponse(err, logger);
  }
};
