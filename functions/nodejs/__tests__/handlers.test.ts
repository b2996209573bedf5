import type { ValuationRun } from "@src/valuation/db/valuation_run_repository";
import { handler as analyzeSupplyHandler } from "../analyze_supply";
import { handler as assessRiskHandler } from "../assess_risk";
import { createValueCompanyHandler } from "../value_company";

const valuationBody = (overrides: Record<string, unknown> = {}) =>
  JSON.stringify({
    ticker: "ACME",
    financials: {
      ticker: "ACME",
      freeCashFlow: 100,
      netDebt: 0,
      sharesOutstanding: 100,
      marketCap: 1500,
      netIncome: 100,
    },
    waccInputs: {
      beta: 1,
      riskFreeRate: 0.04,
      equityRiskPremium: 0.06,
      preTaxCostOfDebt: 0.05,
      taxRate: 0.2,
      equityWeight: 1,
      debtWeight: 0,
    },
    overrides: { horizon: 5, growthRate: 0, terminalGrowth: 0.03, ...overrides },
  });

const ladder = Array.from({ length: 20 }, (_, i) => (i - 10) / 1000);

describe("value_company handler", () => {
  const now = () => new Date("2024-06-28T12:00:00Z");

  it("returns the valuation and saves a run summary", async () => {
    const save = jest
      .fn<Promise<void>, [ValuationRun]>()
      .mockResolvedValue(undefined);
    const handler = createValueCompanyHandler({ repository: { save }, now });

    const res = await handler({ body: valuationBody() });
    const body = JSON.parse(res.body);

    expect(res.statusCode).toBe(200);
    expect(res.headers["Content-Type"]).toBe("application/json");
    expect(body.dcf.ticker).toBe("ACME");
    expect(body.dcf.equity_value_per_share).toBeCloseTo(12.927, 3);
    expect(body.sensitivity.wacc_values).toEqual([0.08, 0.1, 0.12]);
    expect(body.historySaved).toBe(true);
    expect(save).toHaveBeenCalledTimes(1);
    expect(save.mock.calls[0][0]).toMatchObject({
      ticker: "ACME",
      createdAt: "2024-06-28T12:00:00.000Z",
      horizon: 5,
      peers: [],
      invalidCells: 0,
      dataQuality: "live",
    });
  });

  it("keeps serving when the history save fails", async () => {
    const save = jest
      .fn<Promise<void>, [ValuationRun]>()
      .mockRejectedValue(new Error("table unavailable"));
    const handler = createValueCompanyHandler({ repository: { save }, now });

    const res = await handler({ body: valuationBody() });

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body).historySaved).toBe(false);
  });

  it("serializes invalid grid cells as null", async () => {
    const handler = createValueCompanyHandler({ repository: null });
    const res = await handler({
      body: valuationBody({ waccRange: [0.02, 0.1], growthRange: [0.03] }),
    });
    const body = JSON.parse(res.body);
    expect(body.sensitivity.matrix[0]).toEqual([null]);
    expect(typeof body.sensitivity.matrix[1][0]).toBe("number");
    expect(body.historySaved).toBe(false);
  });

  it("maps engine failures to 400 with their code", async () => {
    const handler = createValueCompanyHandler({ repository: null });

    const undefinedValue = await handler({
      body: valuationBody({ waccOverride: 0.02 }),
    });
    expect(undefinedValue.statusCode).toBe(400);
    expect(JSON.parse(undefinedValue.body)).toEqual({
      error: "WACC 0.02 must exceed terminal growth 0.03",
      code: "VALUATION_ERROR",
    });

    const badJson = await handler({ body: "{" });
    expect(badJson.statusCode).toBe(400);
    expect(JSON.parse(badJson.body)).toEqual({
      error: "request body is not valid JSON",
      code: "VALIDATION_ERROR",
      issues: [],
    });

    const missing = await handler({});
    expect(JSON.parse(missing.body).error).toBe("request body is required");
  });

  it("decodes base64 bodies", async () => {
    const handler = createValueCompanyHandler({ repository: null });
    const res = await handler({
      body: Buffer.from(valuationBody()).toString("base64"),
      isBase64Encoded: true,
    });
    expect(res.statusCode).toBe(200);
  });
});

describe("assess_risk handler", () => {
  it("returns VaR keyed by confidence level", async () => {
    const res = await assessRiskHandler({
      body: JSON.stringify({
        ticker: "ACME",
        returns: ladder,
        shockScenarios: [{ label: "crash", node: "equity", pct: -0.1 }],
      }),
    });
    const body = JSON.parse(res.body);
    expect(res.statusCode).toBe(200);
    expect(Object.keys(body.var)).toEqual(["0.95", "0.99"]);
    expect(body.var["0.95"].historical).toBeCloseTo(9050, 4);
    expect(body.stress.crash).toBeCloseTo(-60_000, 6);
  });

  it("reports insufficient data as a 400", async () => {
    const res = await assessRiskHandler({
      body: JSON.stringify({ returns: [0.01, -0.02, 0.03] }),
    });
    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body)).toEqual({
      error: "risk assessment: 3 return observation(s), at least 20 required",
      code: "DATA_INSUFFICIENT",
    });
  });
});

describe("analyze_supply handler", () => {
  it("derives geographic weights from edge countries", async () => {
    const res = await analyzeSupplyHandler({
      body: JSON.stringify({
        edges: [
          { supplier: "A", customer: "B", country: "JP" },
          { supplier: "B", customer: "C", country: "JP" },
        ],
      }),
    });
    const body = JSON.parse(res.body);
    expect(res.statusCode).toBe(200);
    expect(body.chokepoints.map((c: { node: string }) => c.node)).toEqual([
      "B",
      "A",
      "C",
    ]);
    expect(body.chokepoints[1].geoConcentration).toBe(1);
  });

  it("rejects duplicate edges", async () => {
    const res = await analyzeSupplyHandler({
      body: JSON.stringify({
        edges: [
          { supplier: "A", customer: "B" },
          { supplier: "A", customer: "B", weight: 2 },
        ],
      }),
    });
    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body).error).toBe("duplicate supply edges: A->B");
  });
});
