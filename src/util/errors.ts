import type { ZodError } from "zod";

export type AnalyticsErrorCode =
  | "VALIDATION_ERROR"
  | "VALUATION_ERROR"
  | "DATA_INSUFFICIENT"
  | "DIVISION_ERROR";

/**
 * Base class for every failure raised by the analytics engines.
 */
export abstract class AnalyticsError extends Error {
  abstract readonly code: AnalyticsErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed configuration or input record; aborts the engine call. */
export class ValidationError extends AnalyticsError {
  readonly code = "VALIDATION_ERROR" as const;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.issues = issues;
  }
}

/** Mathematically undefined valuation, e.g. WACC <= terminal growth. */
export class ValuationError extends AnalyticsError {
  readonly code = "VALUATION_ERROR" as const;
}

/** Not enough observations for a meaningful statistic. */
export class DataInsufficientError extends AnalyticsError {
  readonly code = "DATA_INSUFFICIENT" as const;
  readonly required: number;
  readonly actual: number;

  constructor(message: string, required: number, actual: number) {
    super(message);
    this.required = required;
    this.actual = actual;
  }
}

export class DivisionError extends AnalyticsError {
  readonly code = "DIVISION_ERROR" as const;
}

export function isAnalyticsError(err: unknown): err is AnalyticsError {
  return err instanceof AnalyticsError;
}

/**
 * Converts a zod failure into a ValidationError listing `path: message` per issue.
 */
export function fromZodError(context: string, err: ZodError): ValidationError {
  const issues = err.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
  return new ValidationError(`${context}: ${issues.join("; ")}`, issues);
}
