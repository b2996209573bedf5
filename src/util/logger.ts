import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isLocal, isProduction, isTest } from "./env";

/**
 * Centralized structured logger for local runs, Lambda handlers and tests.
 * - Local/dev: pretty-printed logs for readability
 * - Lambda/prod: JSON logs optimized for CloudWatch and log analysis
 * - Tests: silent unless LOG_LEVEL is set explicitly
 */
function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

const transport: LoggerOptions["transport"] =
  isLocal() && !isProduction() && !isTest()
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: false,
          ignore: "pid,hostname",
        },
      }
    : undefined;

const options: LoggerOptions = {
  level: resolveLevel(),
  base: {
    service: "quant-analytics-be",
    stage: getStage(),
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
  transport,
};

const rootLogger: Logger = pino(options);

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Returns a child logger augmented with AWS Lambda request context fields.
 */
export function withRequestContext(
  moduleName: string | undefined,
  request: {
    awsRequestId?: string;
    functionName?: string;
  }
): Logger {
  return getLogger(moduleName).child({
    requestId: request.awsRequestId,
    functionName: request.functionName,
  });
}
