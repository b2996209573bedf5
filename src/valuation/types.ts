/**
 * Domain types for the valuation engine.
 */
import type { AdvisoryMeta } from "@src/util/advisory";
import type { Result } from "@src/util/result";

export interface FinancialSnapshot {
  ticker: string;
  /** Trailing free cash flow */
  freeCashFlow: number;
  netDebt: number;
  /** Diluted shares outstanding; must be > 0 */
  sharesOutstanding: number;
  marketCap: number;
  netIncome?: number;
  ebitda?: number;
  revenue?: number;
}

export interface WaccInputs {
  beta: number;
  riskFreeRate: number;
  equityRiskPremium: number;
  preTaxCostOfDebt: number;
  taxRate: number;
  equityWeight: number;
  debtWeight: number;
}

export interface WaccBreakdown {
  costOfEquity: number;
  afterTaxCostOfDebt: number;
  wacc: number;
}

export interface ValuationOptions {
  /** Explicit projection horizon in periods */
  horizon: number;
  /** Growth of free cash flow during the explicit horizon */
  growthRate: number;
  terminalGrowth: number;
  /** Replaces the CAPM-derived WACC when set */
  waccOverride?: number;
  waccRange?: number[];
  growthRange?: number[];
}

export interface DcfResult {
  ticker: string;
  wacc: number;
  costOfEquity: number;
  afterTaxCostOfDebt: number;
  horizon: number;
  growthRate: number;
  terminalGrowth: number;
  projectedCashFlows: number[];
  discountedCashFlows: number[];
  terminalValue: number;
  presentValueOfTerminal: number;
  enterpriseValue: number;
  equityValue: number;
  equityValuePerShare: number;
}

export interface SensitivityGrid {
  /** Row axis */
  waccValues: number[];
  /** Column axis */
  growthValues: number[];
  /** cells[r][c] is the equity value per share at waccValues[r] × growthValues[c] */
  cells: Result<number>[][];
  invalidCount: number;
}

export type MultipleKey = "pe" | "evEbitda" | "ps";

export type Multiples = Record<MultipleKey, number | null>;

export interface CompsRow extends Multiples {
  ticker: string;
  isTarget: boolean;
}

export interface CompsTable {
  target: string;
  rows: CompsRow[];
  /** Target percentile in [0, 100] against the peers, null when undefined */
  percentiles: Record<MultipleKey, number | null>;
}

export interface ValuationInput {
  ticker: string;
  financials: FinancialSnapshot;
  peers: FinancialSnapshot[];
  waccInputs: WaccInputs;
  overrides?: Partial<ValuationOptions>;
  meta?: AdvisoryMeta;
}

export interface ValuationResult {
  ticker: string;
  dcf: DcfResult;
  sensitivity: SensitivityGrid;
  comps: CompsTable;
  options: ValuationOptions;
  meta: AdvisoryMeta;
}
