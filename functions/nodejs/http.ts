// Shared request/response helpers for the analytics Lambda handlers.
import type { Logger } from "pino";
import { isAnalyticsError, ValidationError } from "@src/util/errors";

export interface HttpEvent {
  body?: string | null;
  isBase64Encoded?: boolean;
}

/** Subset of the Lambda context the handlers log with */
export interface LambdaContext {
  awsRequestId?: string;
  functionName?: string;
}

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export function parseJsonBody(event: HttpEvent): unknown {
  const raw = event.body ?? "";
  if (raw.trim() === "") throw new ValidationError("request body is required");
  const text = event.isBase64Encoded
    ? Buffer.from(raw, "base64").toString("utf-8")
    : raw;
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError("request body is not valid JSON");
  }
}

export function jsonResponse(statusCode: number, payload: unknown): HttpResponse {
  return {
    statusCode,
    headers: {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": "*",
    },
    body: JSON.stringify(payload),
  };
}

/**
 * Engine failures are the caller's fault (400); anything else is a 500.
 */
export function errorResponse(err: unknown, logger: Logger): HttpResponse {
  if (isAnalyticsError(err)) {
    logger.warn({ code: err.code, message: err.message }, "request rejected");
    const issues = err instanceof ValidationError ? err.issues : undefined;
    return jsonResponse(400, { error: err.message, code: err.code, issues });
  }
  logger.error({ err }, "handler failed");
  return jsonResponse(500, { error: "Internal server error" });
}
