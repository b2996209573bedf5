/**
 * Price series validation and periodic return computation.
 */
import { z } from "zod";
import { DataInsufficientError, ValidationError } from "@src/util/errors";
import { parseOrThrow } from "@src/util/validation";

export type ReturnMethod = "simple" | "log";

export interface PricePoint {
  date: string; // YYYY-MM-DD
  close: number;
  open?: number;
  high?: number;
  low?: number;
}

export interface PriceSeries {
  ticker: string;
  points: PricePoint[];
}

const price = z.number().finite().nonnegative();

export const pricePointSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD"),
  close: price,
  open: price.optional(),
  high: price.optional(),
  low: price.optional(),
});

export const priceSeriesSchema = z
  .object({
    ticker: z.string().trim().min(1),
    points: z.array(pricePointSchema),
  })
  .superRefine((series, ctx) => {
    for (let i = 1; i < series.points.length; i++) {
      if (series.points[i].date <= series.points[i - 1].date) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["points", i, "date"],
          message: `dates must be unique and ascending (${series.points[i - 1].date} then ${series.points[i].date})`,
        });
        return;
      }
    }
  });

export function validatePriceSeries(input: unknown): PriceSeries {
  return parseOrThrow(priceSeriesSchema, input, "price series");
}

/**
 * Returns between consecutive closes; output length is closes.length − 1.
 */
export function computeReturns(
  closes: readonly number[],
  method: ReturnMethod = "simple"
): number[] {
  const out: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const prev = closes[i - 1];
    const curr = closes[i];
    if (!(prev > 0) || !(curr > 0) || !Number.isFinite(prev + curr)) {
      throw new ValidationError(
        `returns need positive finite prices (index ${i - 1}: ${prev}, index ${i}: ${curr})`
      );
    }
    out.push(method === "log" ? Math.log(curr / prev) : curr / prev - 1);
  }
  return out;
}

export function returnsFromSeries(
  series: PriceSeries,
  method: ReturnMethod = "simple"
): number[] {
  return computeReturns(
    series.points.map(p => p.close),
    method
  );
}

/**
 * Guards statistics that are misleading on short windows.
 */
export function requireObservations(
  returns: readonly number[],
  minimum: number,
  context: string
): void {
  if (returns.length < minimum) {
    throw new DataInsufficientError(
      `${context}: ${returns.length} return observation(s), at least ${minimum} required`,
      minimum,
      returns.length
    );
  }
}
