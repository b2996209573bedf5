/**
 * Environment utilities for runtime/stage detection and typed env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  // Prefer explicit STAGE; derive from NODE_ENV otherwise
  const stage = process.env.STAGE;
  if (stage && stage.length > 0) return stage;
  return getNodeEnv() === "production" ? "prod" : "dev";
}

export function isProduction(): boolean {
  const stage = getStage();
  return stage === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test" || Boolean(process.env.JEST_WORKER_ID);
}

export function isLocal(): boolean {
  // Absence of a Lambda execution env implies local
  const isLambda = Boolean(
    process.env.AWS_LAMBDA_FUNCTION_NAME || process.env.AWS_EXECUTION_ENV
  );
  return process.env.IS_LOCAL === "true" || !isLambda;
}

export interface GetEnvVarOptions {
  required?: boolean;
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
}

/**
 * Reads the raw value of an environment variable.
 * - If `stageAware` is true (default), checks NAME__<stage> first, then NAME.
 * - Empty strings count as missing; throws when `required` is set and nothing is found.
 */
export function getEnvVar(
  name: string,
  options: GetEnvVarOptions = {}
): string | undefined {
  const stageKey = `${name}__${getStage()}`;
  const stageAware = options.stageAware !== false;

  const candidate = stageAware
    ? process.env[stageKey] ?? process.env[name]
    : process.env[name];

  if (candidate != null && candidate !== "") return candidate;

  if (options.required) {
    const tried = stageAware ? `${stageKey} or ${name}` : name;
    throw new Error(`Missing required env var: ${tried}`);
  }
  return undefined;
}

export function getString(name: string, defaultValue: string): string {
  return getEnvVar(name) ?? defaultValue;
}

export function getOptionalString(name: string): string | undefined {
  return getEnvVar(name);
}

export function getNumber(name: string, defaultValue: number): number {
  const raw = getEnvVar(name);
  if (raw === undefined) return defaultValue;
  return parseNumber(name, raw);
}

export function getOptionalNumber(name: string): number | undefined {
  const raw = getEnvVar(name);
  return raw === undefined ? undefined : parseNumber(name, raw);
}

export function getBoolean(name: string, defaultValue: boolean): boolean {
  const raw = getEnvVar(name);
  if (raw === undefined) return defaultValue;
  const lowered = raw.toLowerCase();
  if (["1", "true", "yes", "y"].includes(lowered)) return true;
  if (["0", "false", "no", "n"].includes(lowered)) return false;
  throw new Error(`Env var ${name} is not a boolean: ${raw}`);
}

/**
 * Comma-separated list of numbers, e.g. VAR_CONFIDENCE_LEVELS=0.95,0.99
 */
export function getNumberList(name: string, defaultValue: number[]): number[] {
  const raw = getEnvVar(name);
  if (raw === undefined) return defaultValue;
  return splitList(raw).map(part => parseNumber(name, part));
}

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

function parseNumber(name: string, raw: string): number {
  const n = Number(raw);
  if (raw.trim() === "" || Number.isNaN(n))
    throw new Error(`Env var ${name} is not a number: ${raw}`);
  return n;
}
