import { parseOrThrow } from "@src/util/validation";
import { waccInputsSchema } from "./schema";
import type { WaccBreakdown, WaccInputs } from "./types";

/**
 * CAPM cost of equity blended with after-tax cost of debt.
 */
export function computeWacc(inputs: WaccInputs): WaccBreakdown {
  const w = parseOrThrow(waccInputsSchema, inputs, "wacc inputs");
  const costOfEquity = w.riskFreeRate + w.beta * w.equityRiskPremium;
  const afterTaxCostOfDebt = w.preTaxCostOfDebt * (1 - w.taxRate);
  const wacc =
    w.equityWeight * costOfEquity + w.debtWeight * afterTaxCostOfDebt;
  return { costOfEquity, afterTaxCostOfDebt, wacc };
}
