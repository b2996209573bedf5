import { ValidationError } from "@src/util/errors";
import { runStressTests } from "../stress";

const weights = { equity: 0.6, bond: 0.4 };

describe("stress tests", () => {
  test("shocks sharing a label add up linearly", () => {
    const results = runStressTests(
      [
        { label: "crash", node: "equity", pct: -0.2 },
        { label: "crash", node: "bond", pct: -0.05 },
        { label: "rates", node: "bond", pct: -0.1 },
      ],
      weights,
      1_000_000
    );
    expect(results.map(r => r.label)).toEqual(["crash", "rates"]);
    expect(results[0].delta).toBeCloseTo(-140_000, 6);
    expect(results[0].shockPct).toBeCloseTo(-0.14, 12);
    expect(results[0].impacts).toHaveLength(2);
    expect(results[0].impacts[0].delta).toBeCloseTo(-120_000, 6);
    expect(results[1].delta).toBeCloseTo(-40_000, 6);
  });

  test("no scenarios yields no results", () => {
    expect(runStressTests([], weights, 1_000_000)).toEqual([]);
  });

  test("unknown positions are rejected", () => {
    expect(() =>
      runStressTests(
        [
          { label: "metals", node: "gold", pct: -0.1 },
          { label: "metals", node: "gold", pct: -0.2 },
        ],
        weights,
        1_000_000
      )
    ).toThrow(
      new ValidationError("shock scenarios reference unknown positions: gold")
    );
  });
});
