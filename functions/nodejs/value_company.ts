// Lambda handler for DCF valuation with sensitivity grid and peer comps.
//
// Endpoint: POST /valuation
// Body: ValuationInput JSON { ticker, financials, peers, waccInputs, overrides?, meta? }
// Behavior:
//   - Validates the body, runs the valuation engine with DCF_* env defaults.
//   - Returns the DCF record, the sensitivity matrix (null = invalid cell) and comps.
//   - Saves a run summary when VALUATION_RUNS_TABLE is configured (or
//     VALUATION_HISTORY=true with the default table name); a failed save is
//     logged and reported as historySaved=false.
import { DynamoTable, getDynamoTableName } from "@src/util/dynamodb";
import { getBoolean, getOptionalString } from "@src/util/env";
import { withRequestContext } from "@src/util/logger";
import { parseOrThrow } from "@src/util/validation";
import { toDcfRecord } from "@src/valuation/artifacts";
import { loadValuationConfig } from "@src/valuation/config";
import {
  toValuationRun,
  ValuationRun,
  ValuationRunRepository,
} from "@src/valuation/db/valuation_run_repository";
import { valuationInputSchema } from "@src/valuation/schema";
import { valueCompany } from "@src/valuation/value_company";
import {
  errorResponse,
  HttpEvent,
  HttpResponse,
  LambdaContext,
  jsonResponse,
  parseJsonBody,
} from "./http";

interface RunSaver {
  save(run: ValuationRun): Promise<void>;
}

export interface ValueCompanyHandlerDependencies {
  repository?: RunSaver | null;
  now?: () => Date;
}

export function createValueCompanyHandler(
  deps: ValueCompanyHandlerDependencies = {}
): (event: HttpEvent, context?: LambdaContext) => Promise<HttpResponse> {
  return async (event: HttpEvent, context: LambdaContext = {}) => {
    const logger = withRequestContext("functions/value_company", context);
    try {
      const body = parseJsonBody(event);
      const input = parseOrThrow(valuationInputSchema, body, "valuation input");
      const result = valueCompany(input, loadValuationConfig());

      let historySaved = false;
      const repository = resolveRepository(deps);
      if (repository) {
        try {
          await repository.save(toValuationRun(result, deps.now?.()));
          historySaved = true;
        } catch (err) {
          logger.error({ err, ticker: result.ticker }, "valuation run save failed");
        }
      }

      return jsonResponse(200, {
        dcf: toDcfRecord(result.dcf),
        sensitivity: {
          wacc_values: result.sensitivity.waccValues,
          growth_values: result.sensitivity.growthValues,
          matrix: result.sensitivity.cells.map(row =>
            row.map(cell => (cell.ok ? cell.data : null))
          ),
        },
        comps: result.comps,
        meta: result.meta,
        historySaved,
      });
    } catch (err) {
      return errorResponse(err, logger);
    }
  };
}

function resolveRepository(
  deps: ValueCompanyHandlerDependencies
): RunSaver | null {
  if (deps.repository !== undefined) return deps.repository;
  const tableName =
    getOptionalString("VALUATION_RUNS_TABLE") ??
    (getBoolean("VALUATION_HISTORY", false)
      ? getDynamoTableName(DynamoTable.ValuationRuns)
      : undefined);
  return tableName ? new ValuationRunRepository({ tableName }) : null;
}

export const handler = createValueCompanyHandler();
