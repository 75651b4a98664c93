import { invalidGraph } from '../errors';
import { assertAdjacency, assertSymmetric, type AdjacencyList, type EdgeId, type Graph, type VertexId } from '../graph';

export type SCCResult = {
  /** Components in reverse topological order of the condensation. */
  components: VertexId[][];
  componentOf: number[];
};

type Frame = { node: VertexId; next: number };

export function sccTarjan(n: number, adj: AdjacencyList): SCCResult {
  assertAdjacency(n, adj);
  const tin: number[] = Array(n).fill(-1);
  const low: number[] = Array(n).fill(0);
  const onStack: boolean[] = Array(n).fill(false);
  const stack: VertexId[] = [];
  const components: VertexId[][] = [];
  const componentOf: number[] = Array(n).fill(-1);
  const frames: Frame[] = [];
  let timer = 0;

  const enter = (v: VertexId) => {
    tin[v] = timer;
    low[v] = timer;
    timer += 1;
    stack.push(v);
    onStack[v] = true;
    frames.push({ node: v, next: 0 });
  };

  for (let root = 0; root < n; root += 1) {
    if (tin[root] !== -1) continue;
    enter(root);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const u = frame.node;
      if (frame.next < adj[u].length) {
        const v = adj[u][frame.next];
        frame.next += 1;
        if (tin[v] === -1) {
          enter(v);
        } else if (onStack[v]) {
          low[u] = Math.min(low[u], tin[v]);
        }
        continue;
      }

      frames.pop();
      if (low[u] === tin[u]) {
        const component: VertexId[] = [];
        while (true) {
          const w = stack.pop();
          if (w === undefined) break;
          onStack[w] = false;
          componentOf[w] = components.length;
          component.push(w);
          if (w === u) break;
        }
        components.push(component);
      }
      if (frames.length > 0) {
        const parent = frames[frames.length - 1].node;
        low[parent] = Math.min(low[parent], low[u]);
      }
    }
  }

  return { components, componentOf };
}

/** Post-order of an iterative DFS over every vertex, roots taken in index order. */
function finishOrder(n: number, adj: AdjacencyList): VertexId[] {
  const visited: boolean[] = Array(n).fill(false);
  const order: VertexId[] = [];
  const frames: Frame[] = [];
  for (let root = 0; root < n; root += 1) {
    if (visited[root]) continue;
    visited[root] = true;
    frames.push({ node: root, next: 0 });
    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const list = adj[frame.node];
      if (frame.next < list.length) {
        const v = list[frame.next];
        frame.next += 1;
        if (!visited[v]) {
          visited[v] = true;
          frames.push({ node: v, next: 0 });
        }
        continue;
      }
      frames.pop();
      order.push(frame.node);
    }
  }
  return order;
}

/**
 * Kosaraju's two-pass algorithm. Components come out in topological order of
 * the condensation, the reverse of {@link sccTarjan}.
 */
export function sccKosaraju(n: number, adj: AdjacencyList): SCCResult {
  assertAdjacency(n, adj);
  const reversed: VertexId[][] = Array.from({ length: n }, () => []);
  for (let u = 0; u < n; u += 1) {
    for (const v of adj[u]) reversed[v].push(u);
  }

  const order = finishOrder(n, adj);
  const componentOf: number[] = Array(n).fill(-1);
  const components: VertexId[][] = [];
  for (let i = order.length - 1; i >= 0; i -= 1) {
    const root = order[i];
    if (componentOf[root] !== -1) continue;
    const id = components.length;
    const component: VertexId[] = [];
    const pending: VertexId[] = [root];
    componentOf[root] = id;
    while (pending.length > 0) {
      const u = pending.pop();
      if (u === undefined) break;
      component.push(u);
      for (const v of reversed[u]) {
        if (componentOf[v] === -1) {
          componentOf[v] = id;
          pending.push(v);
        }
      }
    }
    components.push(component);
  }
  return { components, componentOf };
}

/** DAG over component ids; parallel condensed edges are merged. */
export function condensation(n: number, adj: AdjacencyList, scc: SCCResult): number[][] {
  const dag: number[][] = scc.components.map(() => []);
  const seen = new Set<string>();
  for (let u = 0; u < n; u += 1) {
    const cu = scc.componentOf[u];
    for (const v of adj[u]) {
      const cv = scc.componentOf[v];
      if (cu === cv) continue;
      const key = `${cu},${cv}`;
      if (seen.has(key)) continue;
      seen.add(key);
      dag[cu].push(cv);
    }
  }
  return dag;
}

export function topologicalSort(n: number, adj: AdjacencyList): VertexId[] {
  assertAdjacency(n, adj);
  const state: number[] = Array(n).fill(0);
  const order: VertexId[] = [];
  const frames: Frame[] = [];
  for (let root = 0; root < n; root += 1) {
    if (state[root] !== 0) continue;
    state[root] = 1;
    frames.push({ node: root, next: 0 });
    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const list = adj[frame.node];
      if (frame.next < list.length) {
        const v = list[frame.next];
        frame.next += 1;
        if (state[v] === 1) throw invalidGraph(`cycle through edge (${frame.node}, ${v})`);
        if (state[v] === 0) {
          state[v] = 1;
          frames.push({ node: v, next: 0 });
        }
        continue;
      }
      frames.pop();
      state[frame.node] = 2;
      order.push(frame.node);
    }
  }
  return order.reverse();
}

export type BiconnectivityResult = {
  bridges: Array<[VertexId, VertexId]>;
  /** Cut-nodes in the order their DFS subtree finishes. */
  cutNodes: VertexId[];
  /** Edge-biconnected components. */
  components: VertexId[][];
  componentOf: number[];
  /** `blockForest[c]` holds one entry per original edge leaving component `c`. */
  blockForest: number[][];
};

type BridgeFrame = {
  node: VertexId;
  parent: VertexId;
  parentSkipped: boolean;
  next: number;
  children: number;
  cut: boolean;
};

/**
 * Bridges, cut-nodes and edge-biconnected components of an undirected graph in
 * one DFS. Only the first adjacency entry leading back to the parent is treated
 * as the tree edge, so parallel edges count as back edges.
 */
export function biconnectivity(n: number, adj: AdjacencyList): BiconnectivityResult {
  assertSymmetric(n, adj);
  const tin: number[] = Array(n).fill(-1);
  const low: number[] = Array(n).fill(0);
  const stack: VertexId[] = [];
  const bridges: Array<[VertexId, VertexId]> = [];
  const cutNodes: VertexId[] = [];
  const components: VertexId[][] = [];
  const frames: BridgeFrame[] = [];
  let timer = 0;

  const enter = (v: VertexId, parent: VertexId) => {
    tin[v] = timer;
    low[v] = timer;
    timer += 1;
    stack.push(v);
    frames.push({ node: v, parent, parentSkipped: false, next: 0, children: 0, cut: false });
  };

  for (let root = 0; root < n; root += 1) {
    if (tin[root] !== -1) continue;
    enter(root, -1);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const u = frame.node;
      if (frame.next < adj[u].length) {
        const v = adj[u][frame.next];
        frame.next += 1;
        if (v === frame.parent && !frame.parentSkipped) {
          frame.parentSkipped = true;
        } else if (tin[v] !== -1) {
          low[u] = Math.min(low[u], tin[v]);
        } else {
          enter(v, u);
        }
        continue;
      }

      frames.pop();
      const isRoot = frame.parent === -1;
      if (isRoot ? frame.children >= 2 : frame.cut) cutNodes.push(u);
      if (low[u] === tin[u]) {
        const component: VertexId[] = [];
        while (true) {
          const w = stack.pop();
          if (w === undefined) break;
          component.push(w);
          if (w === u) break;
        }
        components.push(component);
      }

      if (!isRoot) {
        const parentFrame = frames[frames.length - 1];
        const p = parentFrame.node;
        low[p] = Math.min(low[p], low[u]);
        if (low[u] >= tin[p]) parentFrame.cut = true;
        if (low[u] > tin[p]) bridges.push([p, u]);
        parentFrame.children += 1;
      }
    }
  }

  const componentOf: number[] = Array(n).fill(-1);
  components.forEach((component, id) => {
    for (const v of component) componentOf[v] = id;
  });
  const blockForest: number[][] = components.map(() => []);
  for (let u = 0; u < n; u += 1) {
    for (const v of adj[u]) {
      if (componentOf[u] !== componentOf[v]) blockForest[componentOf[u]].push(componentOf[v]);
    }
  }

  return { bridges, cutNodes, components, componentOf, blockForest };
}

export type VertexBlocksResult = {
  /** Vertex-biconnected blocks as edge id lists; a self-loop is its own block. */
  blocks: EdgeId[][];
  cutNodes: VertexId[];
  edgeToBlock: number[];
};

type EdgeFrame = { node: VertexId; parentEdge: EdgeId; next: number; children: number };

/** Vertex-biconnected blocks via an edge stack, directions ignored. */
export function vertexBlocks(graph: Graph): VertexBlocksResult {
  const n = graph.vertexCount();
  const disc: number[] = Array(n).fill(-1);
  const low: number[] = Array(n).fill(0);
  const usedEdge: boolean[] = Array(graph.edgeCount()).fill(false);
  const edgeStack: EdgeId[] = [];
  const blocks: EdgeId[][] = [];
  const cutSet = new Set<VertexId>();
  const frames: EdgeFrame[] = [];
  let time = 0;

  const popBlockUntil = (stopEdge: EdgeId) => {
    const block: EdgeId[] = [];
    while (edgeStack.length > 0) {
      const e = edgeStack.pop();
      if (e === undefined) break;
      block.push(e);
      if (e === stopEdge) break;
    }
    if (block.length > 0) blocks.push(block);
  };

  const enter = (v: VertexId, parentEdge: EdgeId) => {
    disc[v] = time;
    low[v] = time;
    time += 1;
    frames.push({ node: v, parentEdge, next: 0, children: 0 });
  };

  for (let root = 0; root < n; root += 1) {
    if (disc[root] !== -1) continue;
    enter(root, -1);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const u = frame.node;
      const entries = graph.adjacency(u);
      if (frame.next < entries.length) {
        const { edge: e, to: v } = entries[frame.next];
        frame.next += 1;
        if (usedEdge[e]) continue;
        usedEdge[e] = true;
        if (v === u) {
          blocks.push([e]);
        } else if (disc[v] === -1) {
          frame.children += 1;
          edgeStack.push(e);
          enter(v, e);
        } else {
          low[u] = Math.min(low[u], disc[v]);
          edgeStack.push(e);
        }
        continue;
      }

      frames.pop();
      if (frames.length === 0) continue;
      const parentFrame = frames[frames.length - 1];
      const p = parentFrame.node;
      low[p] = Math.min(low[p], low[u]);
      if (low[u] >= disc[p]) {
        if (parentFrame.parentEdge !== -1 || parentFrame.children > 1) cutSet.add(p);
        popBlockUntil(frame.parentEdge);
      }
    }
    if (edgeStack.length > 0) blocks.push(edgeStack.splice(0));
  }

  const edgeToBlock: number[] = Array(graph.edgeCount()).fill(-1);
  blocks.forEach((block, idx) => {
    for (const e of block) edgeToBlock[e] = idx;
  });

  return { blocks, cutNodes: [...cutSet], edgeToBlock };
}

export type BlockCutNode =
  | { id: number; type: 'block'; edges: EdgeId[] }
  | { id: number; type: 'cut'; vertex: VertexId };

export type BlockCutTree = {
  nodes: BlockCutNode[];
  adj: number[][];
  blockNodes: number[];
  cutNodes: number[];
};

/** Bipartite forest joining every block to the cut-nodes it contains. */
export function blockCutTree(graph: Graph, blocks: VertexBlocksResult = vertexBlocks(graph)): BlockCutTree {
  const nodes: BlockCutNode[] = [];
  const adj: number[][] = [];
  const blockNodes: number[] = [];
  const cutNodes: number[] = [];

  for (const block of blocks.blocks) {
    const id = nodes.length;
    nodes.push({ id, type: 'block', edges: [...block] });
    adj.push([]);
    blockNodes.push(id);
  }

  const cutToNode = new Map<VertexId, number>();
  for (const vertex of blocks.cutNodes) {
    const id = nodes.length;
    nodes.push({ id, type: 'cut', vertex });
    adj.push([]);
    cutNodes.push(id);
    cutToNode.set(vertex, id);
  }

  blocks.blocks.forEach((block, blockId) => {
    const touched = new Set<number>();
    for (const edgeId of block) {
      const { u, v } = graph.edge(edgeId);
      for (const vertex of [u, v]) {
        const cutNode = cutToNode.get(vertex);
        if (cutNode !== undefined) touched.add(cutNode);
      }
    }
    for (const cutNode of touched) {
      adj[blockNodes[blockId]].push(cutNode);
      adj[cutNode].push(blockNodes[blockId]);
    }
  });

  return { nodes, adj, blockNodes, cutNodes };
}
