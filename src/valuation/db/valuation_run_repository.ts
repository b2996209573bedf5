/**
 * Valuation run history stored in DynamoDB.
 *
 * Layout:
 * - pk = "TICKER#<ticker>", sk = "RUN#<ISO timestamp>"
 * - One item per run; newest first when querying with ScanIndexForward=false
 */
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import {
  DynamoDBDocumentClient,
  PutCommand,
  QueryCommand,
} from "@aws-sdk/lib-dynamodb";
import { z } from "zod";
import { getLogger } from "@src/util/logger";
import type { ValuationResult } from "../types";

export const valuationRunSchema = z.object({
  ticker: z.string(),
  createdAt: z.string(),
  wacc: z.number(),
  terminalGrowth: z.number(),
  horizon: z.number(),
  enterpriseValue: z.number(),
  equityValue: z.number(),
  equityValuePerShare: z.number(),
  peers: z.array(z.string()),
  invalidCells: z.number(),
  dataQuality: z.enum(["live", "synthetic"]),
});

export type ValuationRun = z.infer<typeof valuationRunSchema>;

export interface ValuationRunRepositoryOptions {
  tableName: string;
  client?: DynamoDBDocumentClient;
}

export function toValuationRun(
  result: ValuationResult,
  createdAt: Date = new Date()
): ValuationRun {
  return {
    ticker: result.ticker,
    createdAt: createdAt.toISOString(),
    wacc: result.dcf.wacc,
    terminalGrowth: result.dcf.terminalGrowth,
    horizon: result.dcf.horizon,
    enterpriseValue: result.dcf.enterpriseValue,
    equityValue: result.dcf.equityValue,
    equityValuePerShare: result.dcf.equityValuePerShare,
    peers: result.comps.rows.filter(r => !r.isTarget).map(r => r.ticker),
    invalidCells: result.sensitivity.invalidCount,
    dataQuality: result.meta.dataQuality,
  };
}

export class ValuationRunRepository {
  private readonly table: string;
  private readonly doc: DynamoDBDocumentClient;
  private readonly logger = getLogger("valuation/valuation_run_repository");

  constructor(options: ValuationRunRepositoryOptions) {
    this.table = options.tableName;
    this.doc =
      options.client ?? DynamoDBDocumentClient.from(new DynamoDBClient({}));
  }

  async save(run: ValuationRun): Promise<void> {
    await this.doc.send(
      new PutCommand({
        TableName: this.table,
        Item: {
          pk: `TICKER#${run.ticker}`,
          sk: `RUN#${run.createdAt}`,
          ...run,
        },
      })
    );
    this.logger.debug(
      { table: this.table, ticker: run.ticker, createdAt: run.createdAt },
      "valuation run saved"
    );
  }

  /**
   * Latest runs for a ticker, newest first.
   */
  async listByTicker(params: {
    ticker: string;
    limit?: number;
  }): Promise<ValuationRun[]> {
    const { ticker, limit } = params;
    const out = await this.doc.send(
      new QueryCommand({
        TableName: this.table,
        KeyConditionExpression: "pk = :pk AND begins_with(sk, :prefix)",
        ExpressionAttributeValues: {
          ":pk": `TICKER#${ticker}`,
          ":prefix": "RUN#",
        },
        Limit: limit ?? 20,
        ScanIndexForward: false,
      })
    );
    const runs: ValuationRun[] = [];
    for (const item of out.Items ?? []) {
      const parsed = valuationRunSchema.safeParse(item);
      if (parsed.success) {
        runs.push(parsed.data);
      } else {
        this.logger.warn(
          { table: this.table, ticker, issues: parsed.error.issues.length },
          "skipping malformed valuation run item"
        );
      }
    }
    return runs;
  }
}
