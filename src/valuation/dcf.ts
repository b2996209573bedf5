/**
 * Discounted cash flow core: projection, Gordon-growth terminal value and the
 * enterprise-to-equity bridge.
 */
import { DivisionError, ValuationError } from "@src/util/errors";

export interface DcfParams {
  baseCashFlow: number;
  growthRate: number;
  horizon: number;
  wacc: number;
  terminalGrowth: number;
  netDebt: number;
  sharesOutstanding: number;
}

export interface DcfValues {
  projectedCashFlows: number[];
  discountedCashFlows: number[];
  terminalValue: number;
  presentValueOfTerminal: number;
  enterpriseValue: number;
  equityValue: number;
  equityValuePerShare: number;
}

/**
 * FCF_t = FCF_0 × (1 + g)^t for t = 1..horizon.
 */
export function projectCashFlows(
  baseCashFlow: number,
  growthRate: number,
  horizon: number
): number[] {
  const out: number[] = [];
  for (let t = 1; t <= horizon; t++) {
    out.push(baseCashFlow * Math.pow(1 + growthRate, t));
  }
  return out;
}

export function discountFactor(rate: number, period: number): number {
  return 1 / Math.pow(1 + rate, period);
}

/**
 * Gordon growth value at the end of the horizon, undiscounted.
 */
export function terminalValue(
  lastCashFlow: number,
  wacc: number,
  terminalGrowth: number
): number {
  if (wacc <= terminalGrowth) {
    throw new ValuationError(
      `WACC ${wacc} must exceed terminal growth ${terminalGrowth}`
    );
  }
  return (lastCashFlow * (1 + terminalGrowth)) / (wacc - terminalGrowth);
}

export function perShare(equityValue: number, shares: number): number {
  if (!(shares > 0)) {
    throw new DivisionError(
      `shares outstanding must be > 0 to compute per-share value, got ${shares}`
    );
  }
  return equityValue / shares;
}

export function discountedCashFlow(params: DcfParams): DcfValues {
  const projectedCashFlows = projectCashFlows(
    params.baseCashFlow,
    params.growthRate,
    params.horizon
  );
  const discountedCashFlows = projectedCashFlows.map(
    (cf, i) => cf * discountFactor(params.wacc, i + 1)
  );
  const tv = terminalValue(
    projectedCashFlows[projectedCashFlows.length - 1],
    params.wacc,
    params.terminalGrowth
  );
  const presentValueOfTerminal = tv * discountFactor(params.wacc, params.horizon);
  const enterpriseValue =
    discountedCashFlows.reduce((sum, v) => sum + v, 0) + presentValueOfTerminal;
  const equityValue = enterpriseValue - params.netDebt;

  const values: DcfValues = {
    projectedCashFlows,
    discountedCashFlows,
    terminalValue: tv,
    presentValueOfTerminal,
    enterpriseValue,
    equityValue,
    equityValuePerShare: perShare(equityValue, params.sharesOutstanding),
  };
  if (!Number.isFinite(values.equityValuePerShare)) {
    throw new ValuationError(
      `valuation is not finite at WACC ${params.wacc}, terminal growth ${params.terminalGrowth}`
    );
  }
  return values;
}
