import { assertIndex, fail, invalidGraph, negativeCycle, ok, type Result } from '../errors';
import type { VertexId, WeightedEdge } from '../graph';

export type SingleSourcePaths = {
  /** `Infinity` for vertices the source cannot reach. */
  dist: number[];
  /** Predecessor on the shortest-path tree, -1 at the source and for unreachable vertices. */
  pred: number[];
};

export type AllPairsPaths = {
  dist: number[][];
  /** `next[u][v]` is the vertex after `u` on a shortest `u -> v` path. */
  next: number[][];
};

function assertEdges(n: number, edges: ReadonlyArray<WeightedEdge>): void {
  for (const [u, v, w] of edges) {
    if (!Number.isInteger(u) || !Number.isInteger(v) || u < 0 || v < 0 || u >= n || v >= n) {
      throw invalidGraph(`edge (${u}, ${v}) references a vertex outside [0, ${n})`);
    }
    if (Number.isNaN(w)) throw invalidGraph(`edge (${u}, ${v}) has weight NaN`);
  }
}

/**
 * Bellman–Ford over an edge list. A negative cycle reachable from `source`
 * comes back as a `negative_cycle` failure instead of distances.
 */
export function bellmanFord(n: number, edges: ReadonlyArray<WeightedEdge>, source: VertexId): Result<SingleSourcePaths> {
  assertEdges(n, edges);
  assertIndex(source, n, 'source');
  const dist: number[] = Array(n).fill(Infinity);
  const pred: number[] = Array(n).fill(-1);
  dist[source] = 0;

  for (let round = 1; round < n; round += 1) {
    let changed = false;
    for (const [u, v, w] of edges) {
      if (dist[u] === Infinity) continue;
      if (dist[u] + w < dist[v]) {
        dist[v] = dist[u] + w;
        pred[v] = u;
        changed = true;
      }
    }
    if (!changed) break;
  }

  for (const [u, v, w] of edges) {
    if (dist[u] !== Infinity && dist[u] + w < dist[v]) {
      return fail(negativeCycle(`edge (${u}, ${v}) still relaxes after ${n - 1} rounds`));
    }
  }
  return ok({ dist, pred });
}

/** Walks the predecessor array back from `target`; empty when unreachable. */
export function pathTo(pred: ReadonlyArray<number>, source: VertexId, target: VertexId): VertexId[] {
  const path: VertexId[] = [];
  let v = target;
  while (v !== -1 && path.length <= pred.length) {
    path.push(v);
    if (v === source) return path.reverse();
    v = pred[v];
  }
  return [];
}

export function floydWarshall(n: number, edges: ReadonlyArray<WeightedEdge>): Result<AllPairsPaths> {
  assertEdges(n, edges);
  const dist: number[][] = Array.from({ length: n }, (_, i) =>
    Array.from({ length: n }, (_, j) => (i === j ? 0 : Infinity)),
  );
  const next: number[][] = Array.from({ length: n }, () => Array.from({ length: n }, (_, j) => j));
  for (const [u, v, w] of edges) {
    if (w < dist[u][v]) dist[u][v] = w;
  }

  for (let k = 0; k < n; k += 1) {
    for (let i = 0; i < n; i += 1) {
      if (dist[i][k] === Infinity) continue;
      for (let j = 0; j < n; j += 1) {
        if (dist[i][k] + dist[k][j] < dist[i][j]) {
          dist[i][j] = dist[i][k] + dist[k][j];
          next[i][j] = next[i][k];
        }
      }
    }
  }

  for (let i = 0; i < n; i += 1) {
    if (dist[i][i] < 0) return fail(negativeCycle(`vertex ${i} lies on a negative cycle`));
  }
  return ok({ dist, next });
}

export function reconstructPath(paths: AllPairsPaths, u: VertexId, v: VertexId): VertexId[] {
  if (paths.dist[u][v] === Infinity) return [];
  const path: VertexId[] = [u];
  let at = u;
  while (at !== v) {
    at = paths.next[at][v];
    path.push(at);
  }
  return path;
}
