// Load envs from .env
// npm run sample
import "dotenv/config";
import { join } from "path";
import { assessRisk } from "../risk/assess_risk";
import { loadRiskConfig } from "../risk/config";
import { portfolioReturns, targetPeerWeights } from "../risk/portfolio";
import { stressToJson, varToJson } from "../risk/artifacts";
import { analyzeSupply } from "../supply/analyze_supply";
import { chokepointsToJson, supplyMetricsToCsv } from "../supply/artifacts";
import { loadSupplyConfig } from "../supply/config";
import { loadEdgesCsv } from "../supply/edges_csv";
import { deriveGeoWeights } from "../supply/geo_weights";
import {
  synthesizeFundamentals,
  synthesizePriceSeries,
} from "../timeseries/synthetic";
import { compsToCsv, sensitivityToCsv, toDcfJson } from "../valuation/artifacts";
import { loadValuationConfig } from "../valuation/config";
import { buildRange } from "../valuation/sensitivity";
import { valueCompany } from "../valuation/value_company";

async function main() {
  const endDate = "2024-12-31";
  const meta = {
    dataQuality: "synthetic" as const,
    warnings: ["sample run on synthetic prices and fundamentals"],
  };
  const tickers = ["TARGET", "PEER1", "PEER2"];
  const series = tickers.map(t => synthesizePriceSeries(t, { endDate }));
  const snapshots = series.map(s =>
    synthesizeFundamentals(s.ticker, s.points[s.points.length - 1].close)
  );

  const valuation = valueCompany(
    {
      ticker: "TARGET",
      financials: snapshots[0],
      peers: snapshots.slice(1),
      waccInputs: {
        beta: 1.2,
        riskFreeRate: 0.04,
        equityRiskPremium: 0.05,
        preTaxCostOfDebt: 0.045,
        taxRate: 0.15,
        equityWeight: 0.8,
        debtWeight: 0.2,
      },
      overrides: {
        waccRange: buildRange(0.06, 0.12, 0.01),
        growthRange: buildRange(0.01, 0.04, 0.01),
      },
      meta,
    },
    loadValuationConfig()
  );
  console.log(toDcfJson(valuation.dcf));
  console.log(sensitivityToCsv(valuation.sensitivity));
  console.log(compsToCsv(valuation.comps));

  const weights = targetPeerWeights("TARGET", tickers.slice(1));
  const risk = assessRisk(
    {
      ticker: "TARGET",
      returns: portfolioReturns(series, weights),
      shockScenarios: [
        { label: "target drawdown", node: "TARGET", pct: -0.15 },
        { label: "peer shock", node: "PEER1", pct: -0.1 },
        { label: "peer shock", node: "PEER2", pct: -0.1 },
      ],
      overrides: { portfolioWeights: weights },
      meta,
    },
    loadRiskConfig()
  );
  console.log(varToJson(risk.var));
  console.log(stressToJson(risk.stress));

  const edges = await loadEdgesCsv(
    join(__dirname, "../../data/supply_chain/sample_edges.csv")
  );
  const supply = analyzeSupply(
    { edges, geoWeights: deriveGeoWeights(edges), meta },
    loadSupplyConfig()
  );
  console.log(supplyMetricsToCsv(supply.metrics));
  console.log(chokepointsToJson(supply.chokepoints));
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
