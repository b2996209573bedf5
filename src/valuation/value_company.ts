/**
 * Business logic: DCF valuation, WACC × growth sensitivity grid and peer comps
 * for one ticker. Pure function of its input.
 */
import { echoMeta } from "@src/util/advisory";
import { getLogger } from "@src/util/logger";
import { parseOrThrow } from "@src/util/validation";
import { buildCompsTable } from "./comps";
import { DEFAULT_VALUATION_OPTIONS, resolveValuationOptions } from "./config";
import { discountedCashFlow } from "./dcf";
import { valuationInputSchema } from "./schema";
import { buildSensitivityGrid, defaultRanges } from "./sensitivity";
import type {
  DcfResult,
  ValuationInput,
  ValuationOptions,
  ValuationResult,
} from "./types";
import { computeWacc } from "./wacc";

export function valueCompany(
  input: ValuationInput,
  defaults: ValuationOptions = DEFAULT_VALUATION_OPTIONS
): ValuationResult {
  const logger = getLogger("valuation/value_company");
  const parsed = parseOrThrow(valuationInputSchema, input, "valuation input");
  const options = resolveValuationOptions(parsed.overrides, defaults);
  const ticker = parsed.ticker.toUpperCase();

  const breakdown = computeWacc(parsed.waccInputs);
  const wacc = options.waccOverride ?? breakdown.wacc;

  const base = {
    baseCashFlow: parsed.financials.freeCashFlow,
    growthRate: options.growthRate,
    horizon: options.horizon,
    netDebt: parsed.financials.netDebt,
    sharesOutstanding: parsed.financials.sharesOutstanding,
  };
  const values = discountedCashFlow({
    ...base,
    wacc,
    terminalGrowth: options.terminalGrowth,
  });

  const dcf: DcfResult = {
    ticker,
    wacc,
    costOfEquity: breakdown.costOfEquity,
    afterTaxCostOfDebt: breakdown.afterTaxCostOfDebt,
    horizon: options.horizon,
    growthRate: options.growthRate,
    terminalGrowth: options.terminalGrowth,
    ...values,
  };

  const ranges = defaultRanges(wacc, options.terminalGrowth);
  const sensitivity = buildSensitivityGrid(
    base,
    options.waccRange ?? ranges.waccRange,
    options.growthRange ?? ranges.growthRange
  );
  const comps = buildCompsTable({ ...parsed.financials, ticker }, parsed.peers);

  logger.debug(
    {
      ticker,
      wacc,
      horizon: options.horizon,
      equityValuePerShare: dcf.equityValuePerShare,
      invalidCells: sensitivity.invalidCount,
      peers: comps.rows.length - 1,
    },
    "valuation result"
  );

  return {
    ticker,
    dcf,
    sensitivity,
    comps,
    options,
    meta: echoMeta(parsed.meta),
  };
}
