import { describe, expect, it } from 'vitest';
import fc from 'fast-check';

import { condensation, sccKosaraju, sccTarjan, topologicalSort } from '../src/dfs';
import { unwrap } from '../src/errors';
import {
  CompressedFenwickTree,
  CompressedFenwickTree2D,
  FenwickTree,
  FenwickTree2D,
  RangeFenwickTree,
  RangeFenwickTree2D,
} from '../src/fenwick';
import { addFlowEdge, createFlowGraph, dinic, edmondsKarp, fordFulkerson, minCut } from '../src/flow';
import { fromEdgeList } from '../src/graph';
import { hopcroftKarp, kuhnMatching } from '../src/matching';
import {
  cabs,
  cadd,
  cmul,
  complex,
  createRandom,
  findAllRoots,
  findAllRootsComplex,
  polynomialFromRoots,
  type Complex,
} from '../src/numeric';
import { bellmanFord, floydWarshall } from '../src/paths';
import {
  AhoCorasick,
  alignSequences,
  hirschbergAlign,
  hirschbergLcs,
  kmpSearch,
  lcpArray,
  longestCommonSubsequence,
  SuffixAutomaton,
  suffixArray,
  suffixArrayDC3,
  zSearch,
} from '../src/strings';

const edgesArb = (maxN: number, maxEdges: number) =>
  fc.array(fc.tuple(fc.nat(maxN - 1), fc.nat(maxN - 1)), { maxLength: maxEdges });

const word = (maxLength: number) => fc.stringOf(fc.constantFrom('a', 'b', 'c'), { maxLength });
const needle = fc.stringOf(fc.constantFrom('a', 'b'), { minLength: 1, maxLength: 4 });

/** `p(x)` together with `sum |c_i| |x|^i`, the scale its rounding error is measured against. */
const evaluateWithScale = (p: ReadonlyArray<Complex>, x: Complex) => {
  let value = complex(0);
  let scale = 0;
  for (let i = p.length - 1; i >= 0; i -= 1) {
    value = cadd(cmul(value, x), p[i]);
    scale = scale * cabs(x) + cabs(p[i]);
  }
  return { value, scale };
};

/** Coefficients of `lead * prod (x - r)`, ascending. */
const expandRoots = (roots: ReadonlyArray<Complex>, lead: Complex) => {
  let out: Complex[] = [lead];
  for (const r of roots) {
    const next: Complex[] = Array.from({ length: out.length + 1 }, () => complex(0));
    out.forEach((c, i) => {
      next[i + 1] = cadd(next[i + 1], c);
      next[i] = cadd(next[i], cmul(c, complex(-r.re, -r.im)));
    });
    out = next;
  }
  return out;
};

/** Coefficients drawn uniformly from [-10, 10] with a leading term of magnitude at least 1. */
const randomPolynomial = (seed: number, degree: number) => {
  const random = createRandom(seed);
  const coefficients = Array.from({ length: degree }, () => random() * 20 - 10);
  const lead = (1 + random() * 9) * (random() < 0.5 ? -1 : 1);
  return [...coefficients, lead];
};

const isSubsequence = (sub: string, s: string) => {
  let j = 0;
  for (let i = 0; i < s.length && j < sub.length; i += 1) {
    if (s[i] === sub[j]) j += 1;
  }
  return j === sub.length;
};

describe('property checks', () => {
  it('Tarjan and Kosaraju agree and the condensation is a dag', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 8 }), edgesArb(8, 20), (n, rawEdges) => {
        const edges = rawEdges.map(([u, v]) => [u % n, v % n] as const);
        const adj = fromEdgeList(n, edges, true);
        const tarjan = sccTarjan(n, adj);
        const kosaraju = sccKosaraju(n, adj);
        expect(tarjan.components.length).toBe(kosaraju.components.length);
        for (let u = 0; u < n; u += 1) {
          for (let v = 0; v < n; v += 1) {
            const sameT = tarjan.componentOf[u] === tarjan.componentOf[v];
            const sameK = kosaraju.componentOf[u] === kosaraju.componentOf[v];
            expect(sameT).toBe(sameK);
          }
        }
        for (const [u, v] of edges) {
          expect(tarjan.componentOf[u]).toBeGreaterThanOrEqual(tarjan.componentOf[v]);
        }
        const dag = condensation(n, adj, tarjan);
        expect(topologicalSort(dag.length, dag)).toHaveLength(tarjan.components.length);
      }),
      { numRuns: 50 },
    );
  });

  it('every max-flow method agrees with the minimum cut', () => {
    const networkArb = fc.record({
      n: fc.integer({ min: 2, max: 7 }),
      edges: fc.array(fc.tuple(fc.nat(6), fc.nat(6), fc.nat(10)), { maxLength: 18 }),
    });
    fc.assert(
      fc.property(networkArb, ({ n, edges }) => {
        const build = () => {
          const graph = createFlowGraph(n);
          for (const [u, v, cap] of edges) addFlowEdge(graph, u % n, v % n, cap);
          return graph;
        };
        const graph = build();
        const flow = dinic(graph, 0, n - 1);
        expect(edmondsKarp(build(), 0, n - 1)).toBe(flow);
        expect(fordFulkerson(build(), 0, n - 1)).toBe(flow);
        expect(minCut(graph, 0).capacity).toBe(flow);
      }),
      { numRuns: 50 },
    );
  });

  it('Hopcroft–Karp and Kuhn find matchings of equal size', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 6 }),
        fc.integer({ min: 1, max: 6 }),
        edgesArb(6, 20),
        (n1, n2, rawEdges) => {
          const adj: number[][] = Array.from({ length: n1 }, () => []);
          for (const [u, v] of rawEdges) if (n1 > 0) adj[u % n1].push(v % n2);
          const fast = hopcroftKarp(n1, n2, adj);
          expect(kuhnMatching(n1, n2, adj).size).toBe(fast.size);
          fast.matchOfLeft.forEach((v, u) => {
            if (v >= 0) {
              expect(adj[u]).toContain(v);
              expect(fast.match[v]).toBe(u);
            }
          });
        },
      ),
      { numRuns: 50 },
    );
  });

  it('Bellman–Ford and Floyd–Warshall agree on non-negative weights', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 6 }),
        fc.array(fc.tuple(fc.nat(5), fc.nat(5), fc.nat(9)), { maxLength: 15 }),
        (n, rawEdges) => {
          const edges = rawEdges.map(([u, v, w]) => [u % n, v % n, w] as const);
          const all = unwrap(floydWarshall(n, edges));
          for (let s = 0; s < n; s += 1) {
            expect(unwrap(bellmanFord(n, edges, s)).dist).toEqual(all.dist[s]);
          }
        },
      ),
      { numRuns: 50 },
    );
  });

  it('Aho–Corasick finds what KMP and the Z-function find', () => {
    fc.assert(
      fc.property(fc.array(needle, { minLength: 1, maxLength: 4 }), word(24), (needles, text) => {
        const matches = new AhoCorasick(needles).search(text);
        needles.forEach((pattern, index) => {
          const starts = matches.filter((m) => m.needle === index).map((m) => m.start).sort((a, b) => a - b);
          expect(starts).toEqual(kmpSearch(text, pattern));
          expect(starts).toEqual(zSearch(text, pattern));
        });
      }),
      { numRuns: 50 },
    );
  });

  it('suffix arrays sort suffixes and LCP entries are exact', () => {
    fc.assert(
      fc.property(word(30), (s) => {
        const naive = Array.from({ length: s.length }, (_, i) => i).sort((a, b) =>
          s.slice(a) < s.slice(b) ? -1 : 1,
        );
        const sa = suffixArray(s);
        expect(sa).toEqual(naive);
        expect(suffixArrayDC3(s)).toEqual(naive);
        const lcp = lcpArray(s, sa);
        lcp.forEach((len, r) => {
          const a = s.slice(sa[r]);
          const b = s.slice(sa[r + 1]);
          expect(a.slice(0, len)).toBe(b.slice(0, len));
          expect(len === a.length || len === b.length || a[len] !== b[len]).toBe(true);
        });
      }),
      { numRuns: 50 },
    );
  });

  it('Aho–Corasick builds the same automaton from the same needles', () => {
    fc.assert(
      fc.property(fc.array(needle, { minLength: 1, maxLength: 6 }), (needles) => {
        expect(new AhoCorasick(needles).snapshot()).toEqual(new AhoCorasick(needles).snapshot());
      }),
      { numRuns: 50 },
    );
  });

  it('the suffix automaton stays within its state and transition bounds', () => {
    fc.assert(
      fc.property(word(40), (s) => {
        const automaton = new SuffixAutomaton(s);
        const n = s.length;
        if (n >= 3) {
          expect(automaton.stateCount).toBeLessThanOrEqual(2 * n - 1);
          expect(automaton.transitionCount).toBeLessThanOrEqual(3 * n - 4);
        }
      }),
      { numRuns: 50 },
    );
  });

  it('the suffix automaton agrees with KMP', () => {
    fc.assert(
      fc.property(word(20), needle, (text, pattern) => {
        expect(new SuffixAutomaton(text).findAll(pattern)).toEqual(kmpSearch(text, pattern));
      }),
      { numRuns: 50 },
    );
  });

  it('Hirschberg matches the full-table results', () => {
    fc.assert(
      fc.property(
        word(12),
        word(12),
        fc.integer({ min: 1, max: 3 }),
        fc.integer({ min: 1, max: 5 }),
        (a, b, gapCost, subCost) => {
          const lcs = hirschbergLcs(a, b);
          expect(lcs.length).toBe(longestCommonSubsequence(a, b).length);
          expect(isSubsequence(lcs, a)).toBe(true);
          expect(isSubsequence(lcs, b)).toBe(true);

          const options = { gapCost, subCost };
          const linear = hirschbergAlign(a, b, options);
          expect(linear.cost).toBe(alignSequences(a, b, options).cost);
          expect(linear.first.length).toBe(linear.second.length);
          expect(linear.first.replaceAll('_', '')).toBe(a);
          expect(linear.second.replaceAll('_', '')).toBe(b);
        },
      ),
      { numRuns: 50 },
    );
  });

  it('recovers distinct integer roots', () => {
    fc.assert(
      fc.property(fc.uniqueArray(fc.integer({ min: -10, max: 10 }), { minLength: 1, maxLength: 6 }), (roots) => {
        const found = findAllRoots(polynomialFromRoots(roots));
        expect(found).toHaveLength(roots.length);
        for (const root of roots) {
          const nearest = Math.min(...found.map((z) => Math.hypot(z.re - root, z.im)));
          expect(nearest).toBeLessThan(1e-5);
        }
      }),
      { numRuns: 50 },
    );
  });

  it('RPOLY roots of random real polynomials have small residuals and rebuild the polynomial', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 1_000_000 }), fc.integer({ min: 1, max: 15 }), (seed, degree) => {
        const p = randomPolynomial(seed, degree);
        const coefficients = p.map((c) => complex(c));
        const roots = findAllRoots(p);
        expect(roots).toHaveLength(degree);
        for (const root of roots) {
          const { value, scale } = evaluateWithScale(coefficients, root);
          expect(cabs(value)).toBeLessThanOrEqual(1e-8 * scale);
        }
        const rebuilt = expandRoots(roots, complex(p[degree]));
        const size = p.reduce((acc, c) => Math.max(acc, Math.abs(c)), 0);
        const spread = roots.reduce((acc, r) => acc * (1 + cabs(r)), Math.abs(p[degree]));
        rebuilt.forEach((c, i) => {
          expect(cabs({ re: c.re - p[i], im: c.im })).toBeLessThanOrEqual(1e-7 * Math.max(size, spread));
        });
      }),
      { numRuns: 50 },
    );
  });

  it('Laguerre roots of random complex polynomials have small residuals', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 1_000_000 }), fc.integer({ min: 1, max: 10 }), (seed, degree) => {
        const re = randomPolynomial(seed, degree);
        const im = randomPolynomial(seed + 1_000_001, degree);
        const p = re.map((c, i) => complex(c, im[i]));
        const roots = findAllRootsComplex(p);
        expect(roots).toHaveLength(degree);
        for (const root of roots) {
          const { value, scale } = evaluateWithScale(p, root);
          expect(cabs(value)).toBeLessThanOrEqual(1e-8 * scale);
        }
      }),
      { numRuns: 50 },
    );
  });

  it('Fenwick trees track a plain array', () => {
    const opArb = fc.tuple(fc.nat(15), fc.nat(15), fc.integer({ min: -20, max: 20 }));
    fc.assert(
      fc.property(fc.array(opArb, { minLength: 1, maxLength: 30 }), (ops) => {
        const size = 16;
        const plain: number[] = Array(size).fill(0);
        const point = new FenwickTree(size);
        const range = new RangeFenwickTree(size);
        const sparse = new CompressedFenwickTree(10_000);
        for (const [i, j, x] of ops) {
          const lo = Math.min(i, j);
          const hi = Math.max(i, j);
          plain[i] += x;
          point.add(i, x);
          range.add(i, x);
          sparse.add(i, x);
          for (let k = lo; k <= hi; k += 1) plain[k] += x;
          range.addRange(lo, hi, x);
          sparse.addRange(lo, hi, x);
          for (let k = lo; k <= hi; k += 1) point.add(k, x);

          const expected = plain.slice(lo, hi + 1).reduce((acc, v) => acc + v, 0);
          expect(point.sum(lo, hi)).toBe(expected);
          expect(range.sum(lo, hi)).toBe(expected);
          expect(sparse.sum(lo, hi)).toBe(expected);
        }
        const total = plain.reduce((acc, v) => acc + v, 0);
        expect(sparse.sum(0, 10_000)).toBe(total);
      }),
      { numRuns: 50 },
    );
  });

  it('2D Fenwick trees track a plain grid', () => {
    const rows = 4;
    const cols = 5;
    const opArb = fc.tuple(
      fc.nat(rows - 1),
      fc.nat(cols - 1),
      fc.nat(rows - 1),
      fc.nat(cols - 1),
      fc.integer({ min: -20, max: 20 }),
    );
    fc.assert(
      fc.property(fc.array(opArb, { minLength: 1, maxLength: 20 }), (ops) => {
        const grid: number[][] = Array.from({ length: rows }, () => Array(cols).fill(0));
        const point = new FenwickTree2D(rows, cols);
        const range = new RangeFenwickTree2D(rows, cols);
        const sparse = new CompressedFenwickTree2D(1000, 1000);
        const gridSum = (r1: number, c1: number, r2: number, c2: number) => {
          let total = 0;
          for (let r = r1; r <= r2; r += 1) for (let c = c1; c <= c2; c += 1) total += grid[r][c];
          return total;
        };
        for (const [a, b, c, d, x] of ops) {
          const r1 = Math.min(a, c);
          const r2 = Math.max(a, c);
          const c1 = Math.min(b, d);
          const c2 = Math.max(b, d);

          grid[a][b] += x;
          point.add(a, b, x);
          range.add(a, b, x);
          sparse.add(a, b, x);

          for (let r = r1; r <= r2; r += 1) {
            for (let col = c1; col <= c2; col += 1) {
              grid[r][col] += x;
              point.add(r, col, x);
            }
          }
          range.addRange(r1, c1, r2, c2, x);
          sparse.addRange(r1, c1, r2, c2, x);

          const expected = gridSum(r1, c1, r2, c2);
          expect(point.sum(r1, c1, r2, c2)).toBe(expected);
          expect(range.sum(r1, c1, r2, c2)).toBe(expected);
          expect(sparse.sum(r1, c1, r2, c2)).toBe(expected);
          expect(range.at(a, b)).toBe(grid[a][b]);
        }
        const total = gridSum(0, 0, rows - 1, cols - 1);
        expect(point.sum(0, 0, rows - 1, cols - 1)).toBe(total);
        expect(sparse.sum(0, 0, 1000, 1000)).toBe(total);
      }),
      { numRuns: 50 },
    );
  });
});
