import { z } from 'zod';

import { invalidGraph, parseWith } from '../errors';
import type { AdjacencyList } from '../graph';

export type MatchingResult = {
  size: number;
  /** `match[v]` is the left vertex paired with right vertex `v`, or -1. */
  match: number[];
  /** `matchOfLeft[u]` is the right vertex paired with left vertex `u`, or -1. */
  matchOfLeft: number[];
  /** Number of BFS/DFS rounds that produced at least one augmenting path. */
  phases: number;
};

type AugmentFrame = { u: number; next: number; via: number };

function assertBipartite(n1: number, n2: number, adj: AdjacencyList): void {
  if (!Number.isInteger(n1) || n1 < 0 || !Number.isInteger(n2) || n2 < 0) {
    throw invalidGraph(`side sizes ${n1} and ${n2} must be non-negative integers`);
  }
  if (adj.length < n1) throw invalidGraph(`adjacency has ${adj.length} lists for ${n1} left vertices`);
  for (let u = 0; u < n1; u += 1) {
    for (const v of adj[u]) {
      if (!Number.isInteger(v) || v < 0 || v >= n2) {
        throw invalidGraph(`edge (${u}, ${v}) references a right vertex outside [0, ${n2})`);
      }
    }
  }
}

/**
 * Searches for an augmenting path from the free left vertex `root` and flips it
 * when found. `canEnter(u, w)` decides whether the search may continue from
 * left vertex `u` into the left vertex `w` matched across the next edge.
 */
function augment(
  root: number,
  adj: AdjacencyList,
  match: number[],
  visited: boolean[],
  canEnter: (u: number, w: number) => boolean,
): boolean {
  const frames: AugmentFrame[] = [{ u: root, next: 0, via: -1 }];
  visited[root] = true;
  while (frames.length > 0) {
    const frame = frames[frames.length - 1];
    const list = adj[frame.u];
    if (frame.next >= list.length) {
      frames.pop();
      continue;
    }
    const v = list[frame.next];
    frame.next += 1;
    const w = match[v];
    if (w < 0) {
      frame.via = v;
      for (const f of frames) match[f.via] = f.u;
      return true;
    }
    if (!visited[w] && canEnter(frame.u, w)) {
      visited[w] = true;
      frame.via = v;
      frames.push({ u: w, next: 0, via: -1 });
    }
  }
  return false;
}

function leftMatches(n1: number, match: number[]): number[] {
  const matchOfLeft: number[] = Array(n1).fill(-1);
  match.forEach((u, v) => {
    if (u >= 0) matchOfLeft[u] = v;
  });
  return matchOfLeft;
}

/**
 * Hopcroft–Karp: BFS layers the left side from every free vertex, then DFS
 * follows strictly increasing layers to find a maximal set of shortest
 * augmenting paths per phase.
 */
export function hopcroftKarp(n1: number, n2: number, adj: AdjacencyList): MatchingResult {
  assertBipartite(n1, n2, adj);
  const match: number[] = Array(n2).fill(-1);
  const used: boolean[] = Array(n1).fill(false);
  let size = 0;
  let phases = 0;

  while (true) {
    const dist: number[] = Array(n1).fill(-1);
    const queue: number[] = [];
    for (let u = 0; u < n1; u += 1) {
      if (!used[u]) {
        dist[u] = 0;
        queue.push(u);
      }
    }
    for (let head = 0; head < queue.length; head += 1) {
      const u = queue[head];
      for (const v of adj[u]) {
        const w = match[v];
        if (w >= 0 && dist[w] < 0) {
          dist[w] = dist[u] + 1;
          queue.push(w);
        }
      }
    }

    const visited: boolean[] = Array(n1).fill(false);
    let found = 0;
    for (let u = 0; u < n1; u += 1) {
      if (used[u]) continue;
      if (augment(u, adj, match, visited, (from, to) => dist[to] === dist[from] + 1)) {
        used[u] = true;
        found += 1;
      }
    }
    if (found === 0) break;
    size += found;
    phases += 1;
  }

  return { size, match, matchOfLeft: leftMatches(n1, match), phases };
}

/** Kuhn's algorithm: one augmenting-path search per left vertex. */
export function kuhnMatching(n1: number, n2: number, adj: AdjacencyList): MatchingResult {
  assertBipartite(n1, n2, adj);
  const match: number[] = Array(n2).fill(-1);
  let size = 0;
  for (let u = 0; u < n1; u += 1) {
    const visited: boolean[] = Array(n1).fill(false);
    if (augment(u, adj, match, visited, () => true)) size += 1;
  }
  return { size, match, matchOfLeft: leftMatches(n1, match), phases: size };
}

export type BipartiteJSON = {
  left: number;
  right: number;
  edges: Array<[number, number]>;
};

const bipartiteSchema = z.object({
  left: z.number().int().nonnegative(),
  right: z.number().int().nonnegative(),
  edges: z.array(z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()])),
});

export type BipartiteInput = { n1: number; n2: number; adj: number[][] };

export function bipartiteFromJSON(raw: unknown): BipartiteInput {
  const parsed = parseWith(bipartiteSchema, raw, 'bipartite');
  const adj: number[][] = Array.from({ length: parsed.left }, () => []);
  for (const [u, v] of parsed.edges) {
    if (u >= parsed.left) throw invalidGraph(`edge (${u}, ${v}) references a left vertex outside [0, ${parsed.left})`);
    adj[u].push(v);
  }
  assertBipartite(parsed.left, parsed.right, adj);
  return { n1: parsed.left, n2: parsed.right, adj };
}
