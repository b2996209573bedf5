/**
 * Exact betweenness centrality (Brandes, 2001) and degree metrics.
 *
 * Unweighted: BFS per source, O(V·E). Weighted: Dijkstra per source with edge
 * weights as lengths, O(V·E + V² log V). Both terminate on cyclic graphs since
 * every node is settled once per source.
 */
import type { CentralityMetrics } from "./types";
import type { SupplyGraph } from "./graph";

export interface BetweennessOptions {
  weighted?: boolean;
  /** Divide by (n − 1)(n − 2), the number of ordered pairs excluding the node */
  normalized?: boolean;
}

export function betweennessCentrality(
  graph: SupplyGraph,
  options: BetweennessOptions = {}
): number[] {
  const n = graph.nodes.length;
  const weighted = options.weighted ?? true;
  const normalized = options.normalized ?? true;
  const centrality = new Array<number>(n).fill(0);

  for (let s = 0; s < n; s++) {
    const { order, predecessors, sigma } = weighted
      ? dijkstraPaths(graph, s)
      : bfsPaths(graph, s);

    const delta = new Array<number>(n).fill(0);
    for (let i = order.length - 1; i >= 0; i--) {
      const w = order[i];
      const coefficient = (1 + delta[w]) / sigma[w];
      for (const v of predecessors[w]) {
        delta[v] += sigma[v] * coefficient;
      }
      if (w !== s) centrality[w] += delta[w];
    }
  }

  if (normalized && n > 2) {
    const scale = 1 / ((n - 1) * (n - 2));
    for (let i = 0; i < n; i++) centrality[i] *= scale;
  }
  return centrality;
}

interface ShortestPaths {
  /** Nodes in non-decreasing distance from the source */
  order: number[];
  predecessors: number[][];
  /** Number of shortest paths from the source */
  sigma: number[];
}

function bfsPaths(graph: SupplyGraph, source: number): ShortestPaths {
  const n = graph.nodes.length;
  const order: number[] = [];
  const predecessors: number[][] = Array.from({ length: n }, () => []);
  const sigma = new Array<number>(n).fill(0);
  const dist = new Array<number>(n).fill(-1);
  sigma[source] = 1;
  dist[source] = 0;

  const queue: number[] = [source];
  for (let head = 0; head < queue.length; head++) {
    const v = queue[head];
    order.push(v);
    for (const { to: w } of graph.outgoing[v]) {
      if (dist[w] < 0) {
        dist[w] = dist[v] + 1;
        queue.push(w);
      }
      if (dist[w] === dist[v] + 1) {
        sigma[w] += sigma[v];
        predecessors[w].push(v);
      }
    }
  }
  return { order, predecessors, sigma };
}

function dijkstraPaths(graph: SupplyGraph, source: number): ShortestPaths {
  const n = graph.nodes.length;
  const order: number[] = [];
  const predecessors: number[][] = Array.from({ length: n }, () => []);
  const sigma = new Array<number>(n).fill(0);
  const dist = new Array<number>(n).fill(Number.POSITIVE_INFINITY);
  const settled = new Array<boolean>(n).fill(false);
  sigma[source] = 1;
  dist[source] = 0;

  const heap = new MinHeap();
  heap.push(0, source);
  while (heap.size > 0) {
    const entry = heap.pop();
    if (!entry) break;
    const v = entry.node;
    if (settled[v] || entry.priority > dist[v]) continue;
    settled[v] = true;
    order.push(v);
    for (const { to: w, weight } of graph.outgoing[v]) {
      if (settled[w]) continue;
      const candidate = dist[v] + weight;
      if (candidate < dist[w]) {
        dist[w] = candidate;
        sigma[w] = sigma[v];
        predecessors[w] = [v];
        heap.push(candidate, w);
      } else if (candidate === dist[w]) {
        sigma[w] += sigma[v];
        predecessors[w].push(v);
      }
    }
  }
  return { order, predecessors, sigma };
}

export function degreeMetrics(
  graph: SupplyGraph
): Omit<CentralityMetrics, "betweenness">[] {
  return graph.nodes.map((node, i) => {
    const inDegree = graph.incoming[i].length;
    const outDegree = graph.outgoing[i].length;
    return {
      node,
      degree: inDegree + outDegree,
      inDegree,
      outDegree,
      inWeight: graph.incoming[i].reduce((s, e) => s + e.weight, 0),
      outWeight: graph.outgoing[i].reduce((s, e) => s + e.weight, 0),
    };
  });
}

export function computeCentrality(
  graph: SupplyGraph,
  options: BetweennessOptions = {}
): CentralityMetrics[] {
  const betweenness = betweennessCentrality(graph, options);
  return degreeMetrics(graph).map((metrics, i) => ({
    ...metrics,
    betweenness: betweenness[i],
  }));
}

interface HeapEntry {
  priority: number;
  node: number;
  seq: number;
}

/**
 * Binary min-heap ordered by priority, then insertion order.
 */
class MinHeap {
  private readonly items: HeapEntry[] = [];
  private counter = 0;

  get size(): number {
    return this.items.length;
  }

  push(priority: number, node: number): void {
    this.items.push({ priority, node, seq: this.counter++ });
    let i = this.items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(i, parent)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  pop(): HeapEntry | undefined {
    const top = this.items[0];
    const last = this.items.pop();
    if (top === undefined || last === undefined) return undefined;
    if (this.items.length === 0) return top;
    this.items[0] = last;
    let i = 0;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < this.items.length && this.less(left, smallest)) smallest = left;
      if (right < this.items.length && this.less(right, smallest))
        smallest = right;
      if (smallest === i) break;
      this.swap(i, smallest);
      i = smallest;
    }
    return top;
  }

  private less(a: number, b: number): boolean {
    const x = this.items[a];
    const y = this.items[b];
    return x.priority < y.priority || (x.priority === y.priority && x.seq < y.seq);
  }

  private swap(a: number, b: number): void {
    const tmp = this.items[a];
    this.items[a] = this.items[b];
    this.items[b] = tmp;
  }
}
