/**
 * Business logic: return distribution, VaR at each confidence level and
 * stress impacts for one position set. Pure function of its input.
 */
import { echoMeta } from "@src/util/advisory";
import { getLogger } from "@src/util/logger";
import { parseOrThrow } from "@src/util/validation";
import { computeReturns, requireObservations } from "@src/timeseries/returns";
import { mean, standardDeviation, zScore } from "@src/timeseries/statistics";
import { DEFAULT_RISK_OPTIONS, resolveRiskOptions } from "./config";
import { riskInputSchema } from "./schema";
import { runStressTests } from "./stress";
import type { RiskAssessment, RiskInput, RiskOptions } from "./types";
import { computeVar } from "./var";

export function assessRisk(
  input: RiskInput,
  defaults: RiskOptions = DEFAULT_RISK_OPTIONS
): RiskAssessment {
  const logger = getLogger("risk/assess_risk");
  const parsed = parseOrThrow(riskInputSchema, input, "risk input");
  const options = resolveRiskOptions(parsed.overrides, defaults);
  const ticker = parsed.ticker ?? parsed.priceSeries?.ticker ?? null;

  const returns =
    parsed.returns ??
    computeReturns(
      (parsed.priceSeries?.points ?? []).map(p => p.close),
      options.returnMethod
    );
  requireObservations(
    returns,
    options.minObservations,
    `risk assessment${ticker ? ` for ${ticker}` : ""}`
  );

  const var_ = computeVar(
    returns,
    options.confidenceLevels,
    options.positionValue
  );
  const stress = runStressTests(
    parsed.shockScenarios,
    options.portfolioWeights,
    options.positionValue
  );

  const mu = mean(returns);
  const sigma = standardDeviation(returns, 0);
  const result: RiskAssessment = {
    ticker,
    observations: returns.length,
    mean: mu,
    standardDeviation: sigma,
    latestZScore: zScore(returns[returns.length - 1], mu, sigma),
    var: var_,
    stress,
    options,
    meta: echoMeta(parsed.meta),
  };
  logger.debug(
    {
      ticker,
      observations: result.observations,
      levels: options.confidenceLevels,
      scenarios: stress.length,
    },
    "risk assessment result"
  );
  return result;
}
