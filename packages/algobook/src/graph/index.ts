import { z } from 'zod';

import { invalidGraph, parseWith } from '../errors';

export type VertexId = number;
export type EdgeId = number;

/**
 * `adj[u]` lists the neighbours of `u` in traversal order. An undirected edge
 * `{u, v}` appears in both `adj[u]` and `adj[v]`; an undirected self-loop on
 * `u` appears once in `adj[u]`.
 */
export type AdjacencyList = ReadonlyArray<ReadonlyArray<VertexId>>;

/** Edge-list form `(u, v, w)`. */
export type WeightedEdge = readonly [u: VertexId, v: VertexId, w: number];

export type EdgeRecord = {
  id: EdgeId;
  u: VertexId;
  v: VertexId;
  weight: number;
  directed: boolean;
};

export type AdjEntry = {
  edge: EdgeId;
  to: VertexId;
  dir: 'out' | 'in' | 'undirected';
};

export type GraphJSON = {
  vertexCount: number;
  edges: Array<{ u: VertexId; v: VertexId; w?: number; directed?: boolean }>;
};

const graphSchema = z.object({
  vertexCount: z.number().int().nonnegative(),
  edges: z.array(
    z.object({
      u: z.number().int().nonnegative(),
      v: z.number().int().nonnegative(),
      w: z.number().finite().optional(),
      directed: z.boolean().optional(),
    }),
  ),
});

export class Graph {
  private readonly _edges: EdgeRecord[];
  private readonly _adj: AdjEntry[][];

  constructor(edges: EdgeRecord[], adj: AdjEntry[][]) {
    this._edges = edges;
    this._adj = adj;
  }

  static fromJSON(json: GraphJSON): Graph {
    const builder = new GraphBuilder();
    for (let i = 0; i < json.vertexCount; i += 1) builder.addVertex();
    for (const edge of json.edges) {
      builder.addEdge(edge.u, edge.v, edge.directed ?? false, edge.w ?? 1);
    }
    return builder.build();
  }

  toJSON(): GraphJSON {
    return {
      vertexCount: this._adj.length,
      edges: this._edges.map((edge) => ({ u: edge.u, v: edge.v, w: edge.weight, directed: edge.directed })),
    };
  }

  vertexCount(): number {
    return this._adj.length;
  }

  edgeCount(): number {
    return this._edges.length;
  }

  edges(): EdgeRecord[] {
    return [...this._edges];
  }

  edge(e: EdgeId): EdgeRecord {
    const record = this._edges[e];
    if (!record) throw invalidGraph(`edge ${e} not found`);
    return record;
  }

  adjacency(v: VertexId): ReadonlyArray<AdjEntry> {
    return this._adj[v] ?? [];
  }

  /** Vertices reachable over one edge, following edge direction. */
  neighbors(v: VertexId): VertexId[] {
    return this.adjacency(v)
      .filter((entry) => entry.dir !== 'in')
      .map((entry) => entry.to);
  }

  /**
   * Plain adjacency list view consumed by the traversal, matching and path
   * routines. Undirected edges appear in both endpoint lists.
   */
  toAdjList(): VertexId[][] {
    return this._adj.map((_, v) => this.neighbors(v));
  }

  toWeightedEdges(): WeightedEdge[] {
    const out: WeightedEdge[] = [];
    for (const edge of this._edges) {
      out.push([edge.u, edge.v, edge.weight]);
      if (!edge.directed && edge.u !== edge.v) out.push([edge.v, edge.u, edge.weight]);
    }
    return out;
  }
}

export class GraphBuilder {
  private edges: EdgeRecord[] = [];
  private adj: AdjEntry[][] = [];

  addVertex(): VertexId {
    const id = this.adj.length;
    this.adj.push([]);
    return id;
  }

  addVertices(count: number): VertexId[] {
    return Array.from({ length: count }, () => this.addVertex());
  }

  addEdge(u: VertexId, v: VertexId, directed = false, weight = 1): EdgeId {
    const n = this.adj.length;
    if (!Number.isInteger(u) || !Number.isInteger(v) || u < 0 || v < 0 || u >= n || v >= n) {
      throw invalidGraph(`edge (${u}, ${v}) references a vertex outside [0, ${n})`);
    }
    const id = this.edges.length;
    this.edges.push({ id, u, v, weight, directed });

    if (directed) {
      this.adj[u].push({ edge: id, to: v, dir: 'out' });
      this.adj[v].push({ edge: id, to: u, dir: 'in' });
    } else {
      this.adj[u].push({ edge: id, to: v, dir: 'undirected' });
      if (u !== v) this.adj[v].push({ edge: id, to: u, dir: 'undirected' });
    }

    return id;
  }

  build(): Graph {
    return new Graph([...this.edges], this.adj.map((list) => [...list]));
  }
}

export function fromEdgeList(
  n: number,
  edges: ReadonlyArray<readonly [VertexId, VertexId]>,
  directed = false,
): VertexId[][] {
  const adj: VertexId[][] = Array.from({ length: n }, () => []);
  for (const [u, v] of edges) {
    if (!inRange(u, n) || !inRange(v, n)) {
      throw invalidGraph(`edge (${u}, ${v}) references a vertex outside [0, ${n})`);
    }
    adj[u].push(v);
    if (!directed && u !== v) adj[v].push(u);
  }
  return adj;
}

const inRange = (v: number, n: number) => Number.isInteger(v) && v >= 0 && v < n;

export function assertAdjacency(n: number, adj: AdjacencyList): void {
  if (!Number.isInteger(n) || n < 0) throw invalidGraph(`vertex count ${n} is not a non-negative integer`);
  if (adj.length < n) throw invalidGraph(`adjacency has ${adj.length} lists for ${n} vertices`);
  for (let u = 0; u < n; u += 1) {
    for (const v of adj[u]) {
      if (!inRange(v, n)) throw invalidGraph(`edge (${u}, ${v}) references a vertex outside [0, ${n})`);
    }
  }
}

/** Checks that `v` occurs in `adj[u]` exactly as often as `u` occurs in `adj[v]`. */
export function assertSymmetric(n: number, adj: AdjacencyList): void {
  assertAdjacency(n, adj);
  const counts = new Map<string, number>();
  for (let u = 0; u < n; u += 1) {
    for (const v of adj[u]) {
      const key = `${u},${v}`;
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }
  for (const [key, count] of counts) {
    const [u, v] = key.split(',');
    if (u === v) continue;
    if ((counts.get(`${v},${u}`) ?? 0) !== count) {
      throw invalidGraph(`undirected edge (${u}, ${v}) is missing its reverse entry`);
    }
  }
}

export function parseGraphJSON(raw: unknown): Graph {
  return Graph.fromJSON(parseWith(graphSchema, raw, 'graph'));
}
