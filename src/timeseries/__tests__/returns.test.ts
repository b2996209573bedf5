import { DataInsufficientError, ValidationError } from "@src/util/errors";
import {
  computeReturns,
  requireObservations,
  returnsFromSeries,
  validatePriceSeries,
} from "../returns";

describe("returns", () => {
  test("simple and log returns between consecutive closes", () => {
    const simple = computeReturns([100, 110, 99]);
    expect(simple).toHaveLength(2);
    expect(simple[0]).toBeCloseTo(0.1, 12);
    expect(simple[1]).toBeCloseTo(-0.1, 12);

    const log = computeReturns([100, 110], "log");
    expect(log[0]).toBeCloseTo(Math.log(1.1), 12);
  });

  test("non-positive prices are rejected", () => {
    expect(() => computeReturns([100, 0, 101])).toThrow(ValidationError);
  });

  test("series dates must ascend", () => {
    expect(() =>
      validatePriceSeries({
        ticker: "ACME",
        points: [
          { date: "2024-01-03", close: 10 },
          { date: "2024-01-02", close: 11 },
        ],
      })
    ).toThrow(
      "price series: points.1.date: dates must be unique and ascending (2024-01-03 then 2024-01-02)"
    );
  });

  test("returnsFromSeries uses closes in order", () => {
    const series = validatePriceSeries({
      ticker: "ACME",
      points: [
        { date: "2024-01-02", close: 50 },
        { date: "2024-01-03", close: 40 },
      ],
    });
    expect(returnsFromSeries(series)).toEqual([40 / 50 - 1]);
  });

  test("requireObservations reports counts", () => {
    expect(() => requireObservations([0.1, 0.2], 2, "ctx")).not.toThrow();
    try {
      requireObservations([0.1], 20, "risk for ACME");
      throw new Error("expected failure");
    } catch (err) {
      expect(err).toBeInstanceOf(DataInsufficientError);
      expect(err).toMatchObject({
        message: "risk for ACME: 1 return observation(s), at least 20 required",
        required: 20,
        actual: 1,
      });
    }
  });
});
