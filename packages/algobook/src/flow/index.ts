import { z } from 'zod';

import { assertIndex, invalidArgument, parseWith } from '../errors';

/**
 * Residual-graph edge. `rev` is the index of the paired edge in
 * `graph[v]`; pushes keep `flow + partner.flow === 0`.
 */
export type FlowEdge = {
  v: number;
  rev: number;
  cap: number;
  flow: number;
};

export type FlowGraph = FlowEdge[][];

export type EdgeRef = { u: number; index: number };

export function createFlowGraph(n: number): FlowGraph {
  if (!Number.isInteger(n) || n < 0) throw invalidArgument(`node count ${n} is not a non-negative integer`);
  return Array.from({ length: n }, () => []);
}

/** Adds `u -> v` with its zero-capacity partner and returns the forward edge's index in `graph[u]`. */
export function addFlowEdge(graph: FlowGraph, u: number, v: number, cap: number): number {
  assertIndex(u, graph.length, 'node');
  assertIndex(v, graph.length, 'node');
  if (!Number.isFinite(cap) || cap < 0) throw invalidArgument(`capacity ${cap} of edge (${u}, ${v}) is negative`);
  const index = graph[u].length;
  const forward: FlowEdge = { v, rev: graph[v].length + (u === v ? 1 : 0), cap, flow: 0 };
  const backward: FlowEdge = { v: u, rev: index, cap: 0, flow: 0 };
  graph[u].push(forward);
  graph[v].push(backward);
  return index;
}

export const residual = (edge: FlowEdge) => edge.cap - edge.flow;

export function resetFlow(graph: FlowGraph): void {
  for (const list of graph) {
    for (const edge of list) edge.flow = 0;
  }
}

function push(graph: FlowGraph, u: number, index: number, amount: number): void {
  const edge = graph[u][index];
  edge.flow += amount;
  graph[edge.v][edge.rev].flow -= amount;
}

function assertTerminals(graph: FlowGraph, s: number, t: number): void {
  assertIndex(s, graph.length, 'source');
  assertIndex(t, graph.length, 'sink');
  if (s === t) throw invalidArgument(`source and sink are both ${s}`);
}

/** Pushes the bottleneck along `path` and returns it. */
function augmentPath(graph: FlowGraph, path: ReadonlyArray<EdgeRef>): number {
  let bottleneck = Infinity;
  for (const { u, index } of path) bottleneck = Math.min(bottleneck, residual(graph[u][index]));
  for (const { u, index } of path) push(graph, u, index, bottleneck);
  return bottleneck;
}

function bfsLevels(graph: FlowGraph, s: number): number[] {
  const level: number[] = Array(graph.length).fill(-1);
  level[s] = 0;
  const queue: number[] = [s];
  for (let head = 0; head < queue.length; head += 1) {
    const u = queue[head];
    for (const edge of graph[u]) {
      if (level[edge.v] === -1 && residual(edge) > 0) {
        level[edge.v] = level[u] + 1;
        queue.push(edge.v);
      }
    }
  }
  return level;
}

/** One augmenting path through the level graph, resuming each node at `ptr[u]`. */
function blockingStep(graph: FlowGraph, s: number, t: number, level: number[], ptr: number[]): number {
  const path: EdgeRef[] = [];
  let u = s;
  while (true) {
    if (u === t) return augmentPath(graph, path);
    const list = graph[u];
    let advanced = false;
    while (ptr[u] < list.length) {
      const edge = list[ptr[u]];
      if (residual(edge) > 0 && level[edge.v] === level[u] + 1) {
        path.push({ u, index: ptr[u] });
        u = edge.v;
        advanced = true;
        break;
      }
      ptr[u] += 1;
    }
    if (advanced) continue;
    const last = path.pop();
    if (last === undefined) return 0;
    u = last.u;
    ptr[u] += 1;
  }
}

/**
 * Dinic's algorithm. Flow is written into `graph` in place; the returned value
 * is the flow added by this call.
 */
export function dinic(graph: FlowGraph, s: number, t: number): number {
  assertTerminals(graph, s, t);
  let total = 0;
  while (true) {
    const level = bfsLevels(graph, s);
    if (level[t] === -1) return total;
    const ptr: number[] = Array(graph.length).fill(0);
    while (true) {
      const pushed = blockingStep(graph, s, t, level, ptr);
      if (pushed === 0) break;
      total += pushed;
    }
  }
}

/** Shortest augmenting paths found by BFS. */
export function edmondsKarp(graph: FlowGraph, s: number, t: number): number {
  assertTerminals(graph, s, t);
  let total = 0;
  while (true) {
    const pred: Array<EdgeRef | null> = Array(graph.length).fill(null);
    const seen: boolean[] = Array(graph.length).fill(false);
    seen[s] = true;
    const queue: number[] = [s];
    for (let head = 0; head < queue.length && !seen[t]; head += 1) {
      const u = queue[head];
      graph[u].forEach((edge, index) => {
        if (!seen[edge.v] && residual(edge) > 0) {
          seen[edge.v] = true;
          pred[edge.v] = { u, index };
          queue.push(edge.v);
        }
      });
    }
    if (!seen[t]) return total;

    const path: EdgeRef[] = [];
    for (let ref = pred[t]; ref !== null; ref = pred[ref.u]) path.push(ref);
    total += augmentPath(graph, path.reverse());
  }
}

/**
 * Depth-first augmenting paths. Integer capacities only: on irrational inputs
 * the method need not terminate, so non-integers are rejected up front.
 */
export function fordFulkerson(graph: FlowGraph, s: number, t: number): number {
  assertTerminals(graph, s, t);
  graph.forEach((list, u) => {
    for (const edge of list) {
      if (!Number.isInteger(edge.cap) || !Number.isInteger(edge.flow)) {
        throw invalidArgument(`edge (${u}, ${edge.v}) has non-integer capacity ${edge.cap}`);
      }
    }
  });

  let total = 0;
  while (true) {
    const seen: boolean[] = Array(graph.length).fill(false);
    const path: EdgeRef[] = [];
    const next: number[] = Array(graph.length).fill(0);
    seen[s] = true;
    let u = s;
    while (u !== t) {
      const list = graph[u];
      while (next[u] < list.length && (seen[list[next[u]].v] || residual(list[next[u]]) <= 0)) next[u] += 1;
      if (next[u] < list.length) {
        const edge = list[next[u]];
        path.push({ u, index: next[u] });
        seen[edge.v] = true;
        u = edge.v;
        continue;
      }
      const last = path.pop();
      if (last === undefined) return total;
      u = last.u;
    }
    total += augmentPath(graph, path);
  }
}

export type MinCut = {
  /** `true` for nodes on the source side of the cut. */
  sourceSide: boolean[];
  /** Saturated forward edges crossing from the source side. */
  edges: EdgeRef[];
  capacity: number;
};

/** Reads the minimum cut off a graph that already carries a maximum flow. */
export function minCut(graph: FlowGraph, s: number): MinCut {
  assertIndex(s, graph.length, 'source');
  const sourceSide: boolean[] = Array(graph.length).fill(false);
  sourceSide[s] = true;
  const queue: number[] = [s];
  for (let head = 0; head < queue.length; head += 1) {
    for (const edge of graph[queue[head]]) {
      if (!sourceSide[edge.v] && residual(edge) > 0) {
        sourceSide[edge.v] = true;
        queue.push(edge.v);
      }
    }
  }

  const edges: EdgeRef[] = [];
  let capacity = 0;
  graph.forEach((list, u) => {
    if (!sourceSide[u]) return;
    list.forEach((edge, index) => {
      if (edge.cap > 0 && !sourceSide[edge.v]) {
        edges.push({ u, index });
        capacity += edge.cap;
      }
    });
  });
  return { sourceSide, edges, capacity };
}

export type FlowNetworkJSON = {
  nodeCount: number;
  edges: Array<{ from: number; to: number; cap: number }>;
};

const networkSchema = z.object({
  nodeCount: z.number().int().nonnegative(),
  edges: z.array(
    z.object({
      from: z.number().int().nonnegative(),
      to: z.number().int().nonnegative(),
      cap: z.number().finite().nonnegative(),
    }),
  ),
});

export function flowGraphFromJSON(raw: unknown): FlowGraph {
  const network = parseWith(networkSchema, raw, 'network');
  const graph = createFlowGraph(network.nodeCount);
  for (const edge of network.edges) addFlowEdge(graph, edge.from, edge.to, edge.cap);
  return graph;
}
