/**
 * Supply edge list loader for `supplier,customer,relationship,country,weight`
 * CSV files.
 */
import { readFile } from "fs/promises";
import { ValidationError } from "@src/util/errors";
import { parseCsv } from "@src/util/csv";
import type { SupplyEdge } from "./types";

const REQUIRED_COLUMNS = ["supplier", "customer"] as const;

export function parseEdgesCsv(text: string): SupplyEdge[] {
  const [header, ...rows] = parseCsv(text);
  if (!header) return [];
  const columns = header.map(h => h.trim().toLowerCase());
  for (const required of REQUIRED_COLUMNS) {
    if (!columns.includes(required)) {
      throw new ValidationError(`edge CSV is missing column "${required}"`);
    }
  }
  const col = (row: string[], name: string): string | undefined => {
    const idx = columns.indexOf(name);
    const value = idx >= 0 ? row[idx]?.trim() : undefined;
    return value ? value : undefined;
  };

  return rows.map((row, i) => {
    const supplier = col(row, "supplier");
    const customer = col(row, "customer");
    if (!supplier || !customer) {
      throw new ValidationError(
        `edge CSV row ${i + 2}: supplier and customer are required`
      );
    }
    const rawWeight = col(row, "weight");
    const weight = rawWeight === undefined ? 1 : Number(rawWeight);
    if (!Number.isFinite(weight) || weight <= 0) {
      throw new ValidationError(
        `edge CSV row ${i + 2}: weight must be a positive number, got "${rawWeight}"`
      );
    }
    return {
      supplier,
      customer,
      weight,
      relationship: col(row, "relationship"),
      country: col(row, "country"),
    };
  });
}

export async function loadEdgesCsv(path: string): Promise<SupplyEdge[]> {
  const text = await readFile(path, "utf-8");
  return parseEdgesCsv(text);
}
