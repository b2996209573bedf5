/**
 * Domain types for the supply network analyzer.
 */
import type { AdvisoryMeta } from "@src/util/advisory";

export interface SupplyEdge {
  supplier: string;
  customer: string;
  /** Edge length for weighted shortest paths; defaults to 1 */
  weight?: number;
  relationship?: string;
  /** Supplier's country */
  country?: string;
}

export interface SupplyOptions {
  betweennessWeight: number;
  geoWeight: number;
  /** Dijkstra over edge weights when true, hop count otherwise */
  weighted: boolean;
  topK?: number;
  /** Keep chokepoints whose composite score is >= threshold */
  threshold?: number;
}

export interface CentralityMetrics {
  node: string;
  betweenness: number;
  degree: number;
  inDegree: number;
  outDegree: number;
  inWeight: number;
  outWeight: number;
}

export interface NodeScore extends CentralityMetrics {
  geoConcentration: number;
  compositeScore: number;
}

export interface Chokepoint {
  rank: number;
  node: string;
  betweenness: number;
  geoConcentration: number;
  compositeScore: number;
}

export interface SupplyInput {
  edges: SupplyEdge[];
  /** Extra nodes with no edges */
  nodes?: string[];
  /** Node → geographic concentration share in [0, 1] */
  geoWeights?: Record<string, number>;
  overrides?: Partial<SupplyOptions>;
  meta?: AdvisoryMeta;
}

export interface SupplyAnalysis {
  nodeCount: number;
  edgeCount: number;
  /** Every node, in chokepoint ranking order */
  metrics: NodeScore[];
  chokepoints: Chokepoint[];
  options: SupplyOptions;
  meta: AdvisoryMeta;
}
