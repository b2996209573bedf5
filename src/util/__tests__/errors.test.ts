import { z } from "zod";
import {
  DataInsufficientError,
  fromZodError,
  isAnalyticsError,
  ValidationError,
  ValuationError,
} from "../errors";
import { parseOrThrow } from "../validation";
import { fail, ok } from "../result";

describe("error taxonomy", () => {
  test("subclasses carry name and code", () => {
    const err = new ValuationError("bad");
    expect(err.name).toBe("ValuationError");
    expect(err.code).toBe("VALUATION_ERROR");
    expect(isAnalyticsError(err)).toBe(true);
    expect(isAnalyticsError(new Error("x"))).toBe(false);

    const short = new DataInsufficientError("short", 20, 5);
    expect(short.required).toBe(20);
    expect(short.actual).toBe(5);
  });

  test("fromZodError lists path and message per issue", () => {
    const schema = z.object({ a: z.object({ b: z.number() }) });
    const parsed = schema.safeParse({ a: { b: "x" } });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    const err = fromZodError("input", parsed.error);
    expect(err).toBeInstanceOf(ValidationError);
    expect(err.issues).toEqual(["a.b: Expected number, received string"]);
    expect(err.message).toBe("input: a.b: Expected number, received string");
  });

  test("parseOrThrow returns parsed data or throws ValidationError", () => {
    const schema = z.object({ n: z.number().default(3) });
    expect(parseOrThrow(schema, {}, "ctx")).toEqual({ n: 3 });
    expect(() => parseOrThrow(schema, null, "ctx")).toThrow(ValidationError);
  });

  test("result helpers", () => {
    expect(ok(1)).toEqual({ ok: true, data: 1 });
    expect(fail("nope")).toEqual({ ok: false, error: "nope" });
  });
});
