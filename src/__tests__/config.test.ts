import { ValidationError } from "@src/util/errors";
import { DEFAULT_RISK_OPTIONS, loadRiskConfig } from "@src/risk/config";
import { loadSupplyConfig } from "@src/supply/config";
import {
  DEFAULT_VALUATION_OPTIONS,
  loadValuationConfig,
  resolveValuationOptions,
} from "@src/valuation/config";

describe("engine configuration", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv, STAGE: "test-config" };
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("defaults apply when nothing is set", () => {
    expect(loadValuationConfig()).toEqual(DEFAULT_VALUATION_OPTIONS);
    expect(loadRiskConfig()).toEqual(DEFAULT_RISK_OPTIONS);
    expect(loadSupplyConfig()).toEqual({
      betweennessWeight: 0.7,
      geoWeight: 0.3,
      weighted: true,
      topK: 5,
    });
  });

  test("environment overrides are parsed and validated", () => {
    process.env.DCF_HORIZON = "7";
    process.env.VAR_CONFIDENCE_LEVELS = "0.99,0.95";
    process.env.SUPPLY_WEIGHTED = "false";
    process.env.SUPPLY_THRESHOLD = "0.2";

    expect(loadValuationConfig().horizon).toBe(7);
    expect(loadRiskConfig().confidenceLevels).toEqual([0.95, 0.99]);
    expect(loadSupplyConfig()).toMatchObject({ weighted: false, threshold: 0.2 });
  });

  test("stage-specific values win over plain ones", () => {
    process.env.DCF_HORIZON = "7";
    process.env["DCF_HORIZON__test-config"] = "12";
    expect(loadValuationConfig().horizon).toBe(12);
  });

  test("out-of-range values are rejected", () => {
    process.env.VAR_RETURN_METHOD = "geometric";
    expect(() => loadRiskConfig()).toThrow(ValidationError);
    expect(() => resolveValuationOptions({ terminalGrowth: 1.5 })).toThrow(
      ValidationError
    );
  });

  test("undefined overrides keep the base value", () => {
    expect(
      resolveValuationOptions({ horizon: undefined, growthRate: 0.07 })
    ).toEqual({ ...DEFAULT_VALUATION_OPTIONS, growthRate: 0.07 });
  });
});
