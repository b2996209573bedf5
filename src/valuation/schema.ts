import { z } from "zod";
import { advisoryMetaSchema } from "@src/util/advisory";

export const WEIGHT_TOLERANCE = 1e-6;

const finite = () => z.number().finite();
const rate = () => z.number().finite().gt(-1).lt(1);

export const financialSnapshotSchema = z.object({
  ticker: z.string().trim().min(1),
  freeCashFlow: finite(),
  netDebt: finite(),
  sharesOutstanding: finite().positive("sharesOutstanding must be > 0"),
  marketCap: finite().nonnegative(),
  netIncome: finite().optional(),
  ebitda: finite().optional(),
  revenue: finite().optional(),
});

export const waccInputsSchema = z
  .object({
    // Zero or negative beta is accepted as-is
    beta: finite(),
    riskFreeRate: rate(),
    equityRiskPremium: rate(),
    preTaxCostOfDebt: rate(),
    taxRate: z.number().min(0).max(1),
    equityWeight: z.number().min(0).max(1),
    debtWeight: z.number().min(0).max(1),
  })
  .refine(
    w => Math.abs(w.equityWeight + w.debtWeight - 1) <= WEIGHT_TOLERANCE,
    {
      message: "equityWeight + debtWeight must sum to 1",
      path: ["equityWeight"],
    }
  );

export const valuationOptionsSchema = z.object({
  horizon: z.number().int().min(1).max(50),
  growthRate: rate(),
  terminalGrowth: rate(),
  waccOverride: rate().optional(),
  waccRange: z.array(rate()).min(1).optional(),
  growthRange: z.array(rate()).min(1).optional(),
});

export const valuationInputSchema = z
  .object({
    ticker: z.string().trim().min(1),
    financials: financialSnapshotSchema,
    peers: z.array(financialSnapshotSchema).default([]),
    waccInputs: waccInputsSchema,
    overrides: valuationOptionsSchema.partial().optional(),
    meta: advisoryMetaSchema.optional(),
  })
  .refine(
    input =>
      input.ticker.toUpperCase() === input.financials.ticker.toUpperCase(),
    {
      message: "financials.ticker must match ticker",
      path: ["financials", "ticker"],
    }
  );
