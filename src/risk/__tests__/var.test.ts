import { computeVar, historicalVar, varianceCovarianceVar } from "../var";

// -0.010, -0.009, ..., 0.009
const ladder = Array.from({ length: 20 }, (_, i) => (i - 10) / 1000);

describe("value at risk", () => {
  test("historical VaR interpolates the loss percentile", () => {
    expect(historicalVar(ladder, 0.95, 1_000_000)).toBeCloseTo(9050, 4);
    expect(historicalVar(ladder, 0.99, 1_000_000)).toBeCloseTo(9810, 4);
  });

  test("variance-covariance VaR is z × population sigma × value", () => {
    // population variance of 20 consecutive integers is (20² − 1) / 12
    const sigma = Math.sqrt(399 / 12) / 1000;
    expect(varianceCovarianceVar(ladder, 0.95, 1_000_000)).toBeCloseTo(
      1.6448536 * sigma * 1_000_000,
      2
    );
  });

  test("higher confidence never lowers VaR", () => {
    const out = computeVar(ladder, [0.9, 0.95, 0.99], 1_000_000);
    expect(Object.keys(out)).toEqual(["0.9", "0.95", "0.99"]);
    expect(out["0.95"].historical).toBeGreaterThanOrEqual(out["0.9"].historical);
    expect(out["0.99"].historical).toBeGreaterThanOrEqual(out["0.95"].historical);
    expect(out["0.95"].varCov).toBeGreaterThanOrEqual(out["0.9"].varCov);
    expect(out["0.99"].varCov).toBeGreaterThanOrEqual(out["0.95"].varCov);
  });

  test("constant returns carry no risk", () => {
    const flat = new Array<number>(20).fill(0.001);
    expect(computeVar(flat, [0.95], 1_000_000)).toEqual({
      "0.95": { historical: 0, varCov: 0 },
    });
  });

  test("a loss-free distribution has zero historical VaR", () => {
    const gains = ladder.map(r => r + 0.02);
    expect(historicalVar(gains, 0.99, 1_000_000)).toBe(0);
  });
});
