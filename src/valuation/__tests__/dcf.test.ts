import { DivisionError, ValuationError } from "@src/util/errors";
import {
  discountedCashFlow,
  perShare,
  projectCashFlows,
  terminalValue,
} from "../dcf";
import { computeWacc } from "../wacc";

const base = {
  baseCashFlow: 100,
  growthRate: 0,
  horizon: 5,
  wacc: 0.1,
  terminalGrowth: 0.03,
  netDebt: 0,
  sharesOutstanding: 100,
};

describe("discounted cash flow", () => {
  test("projects compounding cash flows", () => {
    const flows = projectCashFlows(100, 0.1, 3);
    expect(flows[0]).toBeCloseTo(110, 9);
    expect(flows[1]).toBeCloseTo(121, 9);
    expect(flows[2]).toBeCloseTo(133.1, 9);
  });

  test("flat cash flows match the annuity plus Gordon closed form", () => {
    const out = discountedCashFlow(base);
    const annuity = (100 * (1 - Math.pow(1.1, -5))) / 0.1;
    const tv = (100 * 1.03) / 0.07;
    const expectedEv = annuity + tv / Math.pow(1.1, 5);

    expect(out.terminalValue).toBeCloseTo(tv, 9);
    expect(out.enterpriseValue).toBeCloseTo(expectedEv, 9);
    expect(out.equityValuePerShare).toBeCloseTo(expectedEv / 100, 9);
    expect(out.equityValuePerShare).toBeCloseTo(12.927, 3);
  });

  test("net debt bridges enterprise to equity value", () => {
    const out = discountedCashFlow({ ...base, netDebt: 250 });
    expect(out.equityValue).toBeCloseTo(out.enterpriseValue - 250, 9);
  });

  test("value falls as WACC rises", () => {
    const values = [0.06, 0.08, 0.1, 0.12].map(
      wacc => discountedCashFlow({ ...base, wacc }).equityValuePerShare
    );
    for (let i = 1; i < values.length; i++) {
      expect(values[i]).toBeLessThan(values[i - 1]);
    }
  });

  test("WACC at or below terminal growth is a ValuationError", () => {
    expect(() => terminalValue(100, 0.03, 0.03)).toThrow(
      "WACC 0.03 must exceed terminal growth 0.03"
    );
    expect(() => discountedCashFlow({ ...base, wacc: 0.02 })).toThrow(
      ValuationError
    );
  });

  test("per-share value needs positive shares", () => {
    expect(perShare(1000, 4)).toBe(250);
    expect(() => perShare(1000, 0)).toThrow(DivisionError);
  });
});

describe("computeWacc", () => {
  test("blends CAPM cost of equity with after-tax debt", () => {
    const out = computeWacc({
      beta: 1.2,
      riskFreeRate: 0.04,
      equityRiskPremium: 0.05,
      preTaxCostOfDebt: 0.06,
      taxRate: 0.25,
      equityWeight: 0.7,
      debtWeight: 0.3,
    });
    expect(out.costOfEquity).toBeCloseTo(0.1, 12);
    expect(out.afterTaxCostOfDebt).toBeCloseTo(0.045, 12);
    expect(out.wacc).toBeCloseTo(0.0835, 12);
  });

  test("weights must sum to one", () => {
    expect(() =>
      computeWacc({
        beta: 1,
        riskFreeRate: 0.04,
        equityRiskPremium: 0.05,
        preTaxCostOfDebt: 0.06,
        taxRate: 0.25,
        equityWeight: 0.6,
        debtWeight: 0.3,
      })
    ).toThrow("wacc inputs: equityWeight: equityWeight + debtWeight must sum to 1");
  });
});
