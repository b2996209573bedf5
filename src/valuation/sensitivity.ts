import { isAnalyticsError } from "@src/util/errors";
import { fail, ok, Result } from "@src/util/result";
import { discountedCashFlow, DcfParams } from "./dcf";
import type { SensitivityGrid } from "./types";

const RANGE_PRECISION = 10;

/**
 * Inclusive stepped range, e.g. buildRange(0.08, 0.14, 0.01) → 7 values.
 */
export function buildRange(start: number, end: number, step: number): number[] {
  if (!(step > 0) || !Number.isFinite(start) || !Number.isFinite(end)) {
    throw new RangeError(`invalid range ${start}..${end} step ${step}`);
  }
  if (end < start) return [];
  const count = Math.floor((end - start) / step + 1e-9) + 1;
  return Array.from({ length: count }, (_, i) =>
    roundTo(start + i * step, RANGE_PRECISION)
  );
}

/**
 * WACC ± 2% by terminal growth ± 1%. The low WACC is floored at 1% and
 * dropped when the floor does not sit below WACC.
 */
export function defaultRanges(
  wacc: number,
  terminalGrowth: number
): { waccRange: number[]; growthRange: number[] } {
  const low = Math.max(wacc - 0.02, 0.01);
  return {
    waccRange: [...(low < wacc ? [low] : []), wacc, wacc + 0.02].map(v =>
      roundTo(v, RANGE_PRECISION)
    ),
    growthRange: [terminalGrowth - 0.01, terminalGrowth, terminalGrowth + 0.01].map(
      v => roundTo(v, RANGE_PRECISION)
    ),
  };
}

/**
 * Recomputes the full valuation for every WACC × terminal growth cell. A cell
 * whose valuation is undefined is returned as a failed Result; other cells are
 * unaffected.
 */
export function buildSensitivityGrid(
  base: Omit<DcfParams, "wacc" | "terminalGrowth">,
  waccValues: number[],
  growthValues: number[]
): SensitivityGrid {
  let invalidCount = 0;
  const cells = waccValues.map(wacc =>
    growthValues.map((terminalGrowth): Result<number> => {
      try {
        const values = discountedCashFlow({ ...base, wacc, terminalGrowth });
        return ok(values.equityValuePerShare);
      } catch (err) {
        if (!isAnalyticsError(err)) throw err;
        invalidCount++;
        return fail(err.message);
      }
    })
  );
  return {
    waccValues: [...waccValues],
    growthValues: [...growthValues],
    cells,
    invalidCount,
  };
}

function roundTo(value: number, precision: number): number {
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
}
