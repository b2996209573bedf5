/**
 * Directed weighted supply graph: a node set plus one edge per ordered
 * (supplier, customer) pair. Nodes keep first-seen order.
 */
import { ValidationError } from "@src/util/errors";

export interface GraphEdge {
  from: number;
  to: number;
  weight: number;
}

export interface SupplyGraph {
  nodes: string[];
  indexOf: ReadonlyMap<string, number>;
  outgoing: GraphEdge[][];
  incoming: GraphEdge[][];
  edgeCount: number;
}

export interface EdgeLike {
  supplier: string;
  customer: string;
  weight: number;
}

/**
 * Duplicate ordered pairs and self-loops are rejected rather than merged.
 */
export function buildSupplyGraph(
  edges: readonly EdgeLike[],
  extraNodes: readonly string[] = []
): SupplyGraph {
  const nodes: string[] = [];
  const indexOf = new Map<string, number>();
  const intern = (id: string): number => {
    const existing = indexOf.get(id);
    if (existing !== undefined) return existing;
    indexOf.set(id, nodes.length);
    nodes.push(id);
    return nodes.length - 1;
  };

  const seenPairs = new Set<string>();
  const duplicates: string[] = [];
  const selfLoops: string[] = [];
  const resolved: GraphEdge[] = [];

  for (const edge of edges) {
    if (edge.supplier === edge.customer) {
      selfLoops.push(edge.supplier);
      continue;
    }
    const from = intern(edge.supplier);
    const to = intern(edge.customer);
    const pairKey = `${from}->${to}`;
    if (seenPairs.has(pairKey)) {
      duplicates.push(`${edge.supplier}->${edge.customer}`);
      continue;
    }
    seenPairs.add(pairKey);
    resolved.push({ from, to, weight: edge.weight });
  }

  if (duplicates.length > 0) {
    throw new ValidationError(
      `duplicate supply edges: ${Array.from(new Set(duplicates)).join(", ")}`
    );
  }
  if (selfLoops.length > 0) {
    throw new ValidationError(
      `self-referencing supply edges: ${Array.from(new Set(selfLoops)).join(", ")}`
    );
  }

  for (const id of extraNodes) intern(id);

  const outgoing: GraphEdge[][] = nodes.map(() => []);
  const incoming: GraphEdge[][] = nodes.map(() => []);
  for (const edge of resolved) {
    outgoing[edge.from].push(edge);
    incoming[edge.to].push(edge);
  }

  return { nodes, indexOf, outgoing, incoming, edgeCount: resolved.length };
}
