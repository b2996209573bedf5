/**
 * Export formats consumed by the reporting layer: DCF JSON, sensitivity CSV
 * and comps CSV.
 */
import { z } from "zod";
import { formatCsv } from "@src/util/csv";
import { ValidationError } from "@src/util/errors";
import { parseOrThrow } from "@src/util/validation";
import type { CompsTable, DcfResult, SensitivityGrid } from "./types";

export const dcfJsonSchema = z.object({
  ticker: z.string(),
  enterprise_value: z.number(),
  equity_value: z.number(),
  equity_value_per_share: z.number(),
  terminal_value: z.number(),
  projected_cash_flows: z.array(z.number()),
  wacc: z.number(),
});

export type DcfJson = z.infer<typeof dcfJsonSchema>;

export function toDcfRecord(dcf: DcfResult): DcfJson {
  return {
    ticker: dcf.ticker,
    enterprise_value: dcf.enterpriseValue,
    equity_value: dcf.equityValue,
    equity_value_per_share: dcf.equityValuePerShare,
    terminal_value: dcf.terminalValue,
    projected_cash_flows: [...dcf.projectedCashFlows],
    wacc: dcf.wacc,
  };
}

export function toDcfJson(dcf: DcfResult): string {
  return JSON.stringify(toDcfRecord(dcf), null, 2);
}

export function parseDcfJson(text: string): DcfJson {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ValidationError("dcf json: not valid JSON");
  }
  return parseOrThrow(dcfJsonSchema, raw, "dcf json");
}

/**
 * WACC rows by terminal growth columns; invalid cells are left empty.
 */
export function sensitivityToCsv(grid: SensitivityGrid): string {
  const header = ["wacc", ...grid.growthValues.map(g => `g=${g}`)];
  const rows = grid.waccValues.map((wacc, r) => [
    wacc,
    ...grid.cells[r].map(cell => (cell.ok ? cell.data : null)),
  ]);
  return formatCsv(header, rows);
}

export function compsToCsv(table: CompsTable): string {
  const header = [
    "ticker",
    "pe",
    "ev_ebitda",
    "ps",
    "pe_percentile",
    "ev_ebitda_percentile",
    "ps_percentile",
  ];
  const rows = table.rows.map(row => [
    row.ticker,
    row.pe,
    row.evEbitda,
    row.ps,
    row.isTarget ? table.percentiles.pe : null,
    row.isTarget ? table.percentiles.evEbitda : null,
    row.isTarget ? table.percentiles.ps : null,
  ]);
  return formatCsv(header, rows);
}
