import { getStage } from "./env";

export enum DynamoTable {
  ValuationRuns = "ValuationRuns",
}

interface GetDynamoTableNameOptions {
  appName?: string;
  stage?: string;
}

function resolveAppName(): string {
  return process.env.APP_NAME || "quant-analytics-be";
}

/**
 * Default table name `<app>-<stage>-<Table>Table` when the deploy layer does
 * not inject an explicit name.
 */
export function getDynamoTableName(
  table: DynamoTable,
  options: GetDynamoTableNameOptions = {}
): string {
  const appName = options.appName ?? resolveAppName();
  const stage = options.stage ?? getStage();
  return `${appName}-${stage}-${table}Table`;
}
