import { buildCompsTable, computeMultiples, percentileRank } from "../comps";
import type { FinancialSnapshot } from "../types";

const snapshot = (
  ticker: string,
  fields: Partial<FinancialSnapshot>
): FinancialSnapshot => ({
  ticker,
  freeCashFlow: 0,
  netDebt: 0,
  sharesOutstanding: 10,
  marketCap: 1000,
  ...fields,
});

describe("comparable multiples", () => {
  test("computeMultiples divides by positive denominators only", () => {
    expect(
      computeMultiples(
        snapshot("ACME", {
          marketCap: 1500,
          netDebt: 300,
          netIncome: 100,
          ebitda: 150,
          revenue: 500,
        })
      )
    ).toEqual({ pe: 15, evEbitda: 12, ps: 3 });
    expect(
      computeMultiples(snapshot("LOSS", { netIncome: -5, ebitda: 0 }))
    ).toEqual({ pe: null, evEbitda: null, ps: null });
  });

  test("percentileRank counts peers at or below the target", () => {
    expect(percentileRank(15, [10, 20])).toBe(50);
    expect(percentileRank(20, [10, 20, null])).toBe(100);
    expect(percentileRank(5, [10, 20])).toBe(0);
    expect(percentileRank(null, [10])).toBeNull();
    expect(percentileRank(10, [null])).toBeNull();
  });

  test("table puts the target first and drops duplicate peers", () => {
    const table = buildCompsTable(
      snapshot("ACME", { marketCap: 1500, netIncome: 100, ebitda: 150, revenue: 500 }),
      [
        snapshot("P1", { netIncome: 100, ebitda: 200, revenue: 500 }),
        snapshot("P2", { marketCap: 2000, netIncome: 100, ebitda: 100, revenue: 400 }),
        snapshot("p1", { netIncome: 1 }),
        snapshot("acme", { netIncome: 1 }),
        snapshot("P3", { marketCap: 1200, netIncome: -5, ebitda: 100 }),
      ]
    );
    expect(table.rows.map(r => r.ticker)).toEqual(["ACME", "P1", "P2", "P3"]);
    expect(table.rows[0].isTarget).toBe(true);
    expect(table.percentiles.pe).toBe(50);
    expect(table.percentiles.evEbitda).toBeCloseTo(100 / 3, 9);
    expect(table.percentiles.ps).toBe(50);
  });
});
