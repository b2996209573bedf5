import { z } from "zod";
import { advisoryMetaSchema } from "@src/util/advisory";
import { priceSeriesSchema } from "@src/timeseries/returns";

export const WEIGHT_TOLERANCE = 1e-6;

export const shockScenarioSchema = z.object({
  label: z.string().trim().min(1),
  node: z.string().trim().min(1),
  pct: z.number().finite().min(-1),
});

export const portfolioWeightsSchema = z
  .record(z.string().min(1), z.number().finite())
  .refine(weights => Object.keys(weights).length > 0, {
    message: "at least one position weight is required",
  })
  .refine(
    weights =>
      Math.abs(Object.values(weights).reduce((s, w) => s + w, 0) - 1) <=
      WEIGHT_TOLERANCE,
    { message: "portfolio weights must sum to 1" }
  );

export const riskOptionsSchema = z.object({
  confidenceLevels: z
    .array(z.number().min(0.5).lt(1))
    .min(1)
    .transform(levels => Array.from(new Set(levels)).sort((a, b) => a - b)),
  minObservations: z.number().int().min(2),
  positionValue: z.number().finite().nonnegative(),
  returnMethod: z.enum(["simple", "log"]),
  portfolioWeights: portfolioWeightsSchema,
});

export const riskInputSchema = z
  .object({
    ticker: z.string().trim().min(1).optional(),
    returns: z.array(z.number().finite()).optional(),
    priceSeries: priceSeriesSchema.optional(),
    shockScenarios: z.array(shockScenarioSchema).default([]),
    overrides: riskOptionsSchema.partial().optional(),
    meta: advisoryMetaSchema.optional(),
  })
  .refine(input => (input.returns == null) !== (input.priceSeries == null), {
    message: "provide exactly one of returns or priceSeries",
    path: ["returns"],
  });
