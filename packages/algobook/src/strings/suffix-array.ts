import { invalidArgument } from '../errors';

/** Maps code units onto dense ranks starting at `base`, preserving order. */
function compress(s: string, base: number): { codes: number[]; alphabet: number } {
  const distinct = [...new Set(Array.from({ length: s.length }, (_, i) => s.charCodeAt(i)))].sort((a, b) => a - b);
  const rankOf = new Map<number, number>();
  distinct.forEach((code, i) => rankOf.set(code, i + base));
  const codes = Array.from({ length: s.length }, (_, i) => rankOf.get(s.charCodeAt(i)) ?? base);
  return { codes, alphabet: distinct.length };
}

/**
 * Prefix doubling: each round sorts suffixes by the rank pair
 * `(rank[i], rank[i + k])` with two counting passes, so O(n log n) overall.
 */
export function suffixArray(s: string): number[] {
  const n = s.length;
  if (n === 0) return [];
  const { codes, alphabet } = compress(s, 0);

  let sa = countingSort(Array.from({ length: n }, (_, i) => i), codes, alphabet);
  let rank: number[] = Array(n).fill(0);
  let classes = 1;
  for (let i = 1; i < n; i += 1) {
    if (codes[sa[i]] !== codes[sa[i - 1]]) classes += 1;
    rank[sa[i]] = classes - 1;
  }

  for (let k = 1; classes < n && k < n; k *= 2) {
    // Suffixes with no second half sort first; the rest follow their second half's order.
    const bySecond: number[] = [];
    for (let i = n - k; i < n; i += 1) bySecond.push(i);
    for (const i of sa) {
      if (i >= k) bySecond.push(i - k);
    }
    sa = countingSort(bySecond, rank, classes);

    const next: number[] = Array(n).fill(0);
    classes = 1;
    for (let i = 1; i < n; i += 1) {
      const a = sa[i - 1];
      const b = sa[i];
      const secondA = a + k < n ? rank[a + k] : -1;
      const secondB = b + k < n ? rank[b + k] : -1;
      if (rank[a] !== rank[b] || secondA !== secondB) classes += 1;
      next[b] = classes - 1;
    }
    rank = next;
  }
  return sa;
}

/** Stable sort of `items` by `keys[item]`, keys in `[0, range)`. */
function countingSort(items: ReadonlyArray<number>, keys: ReadonlyArray<number>, range: number): number[] {
  const start: number[] = Array(range + 1).fill(0);
  for (const item of items) start[keys[item] + 1] += 1;
  for (let i = 1; i <= range; i += 1) start[i] += start[i - 1];
  const out: number[] = Array(items.length).fill(0);
  for (const item of items) {
    out[start[keys[item]]] = item;
    start[keys[item]] += 1;
  }
  return out;
}

function radixPass(from: ReadonlyArray<number>, to: number[], keys: ReadonlyArray<number>, offset: number, count: number, alphabet: number) {
  const bucket: number[] = Array(alphabet + 1).fill(0);
  for (let i = 0; i < count; i += 1) bucket[keys[from[i] + offset]] += 1;
  for (let i = 0, sum = 0; i <= alphabet; i += 1) {
    const c = bucket[i];
    bucket[i] = sum;
    sum += c;
  }
  for (let i = 0; i < count; i += 1) {
    const key = keys[from[i] + offset];
    to[bucket[key]] = from[i];
    bucket[key] += 1;
  }
}

const leq2 = (a1: number, a2: number, b1: number, b2: number) => a1 < b1 || (a1 === b1 && a2 <= b2);
const leq3 = (a1: number, a2: number, a3: number, b1: number, b2: number, b3: number) =>
  a1 < b1 || (a1 === b1 && leq2(a2, a3, b2, b3));

/**
 * Skew construction over `s[0..n)` with symbols in `[1, alphabet]` and three
 * trailing zeros, so reads past the end compare below every real symbol.
 */
function skew(s: ReadonlyArray<number>, n: number, alphabet: number): number[] {
  const n0 = Math.floor((n + 2) / 3);
  const n1 = Math.floor((n + 1) / 3);
  const n2 = Math.floor(n / 3);
  const n02 = n0 + n2;
  const s12: number[] = Array(n02 + 3).fill(0);
  let sa12: number[] = Array(n02 + 3).fill(0);
  const s0: number[] = Array(n0).fill(0);
  const sa0: number[] = Array(n0).fill(0);

  // A dummy mod-1 position at n is included when n % 3 === 1.
  for (let i = 0, j = 0; i < n + (n0 - n1); i += 1) {
    if (i % 3 !== 0) {
      s12[j] = i;
      j += 1;
    }
  }
  radixPass(s12, sa12, s, 2, n02, alphabet);
  radixPass(sa12, s12, s, 1, n02, alphabet);
  radixPass(s12, sa12, s, 0, n02, alphabet);

  let name = 0;
  let c0 = -1;
  let c1 = -1;
  let c2 = -1;
  for (let i = 0; i < n02; i += 1) {
    const p = sa12[i];
    if (s[p] !== c0 || s[p + 1] !== c1 || s[p + 2] !== c2) {
      name += 1;
      c0 = s[p];
      c1 = s[p + 1];
      c2 = s[p + 2];
    }
    if (p % 3 === 1) s12[Math.floor(p / 3)] = name;
    else s12[Math.floor(p / 3) + n0] = name;
  }

  if (name < n02) {
    sa12 = skew(s12, n02, name);
    for (let i = 0; i < n02; i += 1) s12[sa12[i]] = i + 1;
  } else {
    for (let i = 0; i < n02; i += 1) sa12[s12[i] - 1] = i;
  }

  for (let i = 0, j = 0; i < n02; i += 1) {
    if (sa12[i] < n0) {
      s0[j] = 3 * sa12[i];
      j += 1;
    }
  }
  radixPass(s0, sa0, s, 0, n0, alphabet);

  const sa: number[] = Array(n).fill(0);
  const positionOf = (t: number) => (sa12[t] < n0 ? sa12[t] * 3 + 1 : (sa12[t] - n0) * 3 + 2);
  let p = 0;
  let t = n0 - n1;
  for (let k = 0; k < n; k += 1) {
    const i = positionOf(t);
    const j = sa0[p];
    const takeTwelve =
      sa12[t] < n0
        ? leq2(s[i], s12[sa12[t] + n0], s[j], s12[Math.floor(j / 3)])
        : leq3(s[i], s[i + 1], s12[sa12[t] - n0 + 1], s[j], s[j + 1], s12[Math.floor(j / 3) + n0]);
    if (takeTwelve) {
      sa[k] = i;
      t += 1;
      if (t === n02) {
        for (k += 1; p < n0; p += 1, k += 1) sa[k] = sa0[p];
      }
    } else {
      sa[k] = j;
      p += 1;
      if (p === n0) {
        for (k += 1; t < n02; t += 1, k += 1) sa[k] = positionOf(t);
      }
    }
  }
  return sa;
}

/** Linear-time DC3 construction; identical output to {@link suffixArray}. */
export function suffixArrayDC3(s: string): number[] {
  const n = s.length;
  if (n <= 1) return n === 0 ? [] : [0];
  const { codes, alphabet } = compress(s, 1);
  return skew([...codes, 0, 0, 0], n, alphabet);
}

/**
 * Kasai's algorithm. Entry `i` is the common prefix length of the suffixes at
 * `sa[i]` and `sa[i + 1]`.
 */
export function lcpArray(s: string, sa: ReadonlyArray<number>): number[] {
  const n = s.length;
  if (sa.length !== n) throw invalidArgument(`suffix array has ${sa.length} entries for a string of length ${n}`);
  const rank: number[] = Array(n).fill(0);
  sa.forEach((p, i) => {
    rank[p] = i;
  });
  const lcp: number[] = Array(Math.max(n - 1, 0)).fill(0);
  let k = 0;
  for (let i = 0; i < n; i += 1) {
    if (rank[i] === n - 1) {
      k = 0;
      continue;
    }
    const j = sa[rank[i] + 1];
    while (i + k < n && j + k < n && s[i + k] === s[j + k]) k += 1;
    lcp[rank[i]] = k;
    if (k > 0) k -= 1;
  }
  return lcp;
}

/** Substring lookup by binary search over a suffix array. */
export class SuffixIndex {
  readonly text: string;
  private readonly order: number[];
  private lcpCache: number[] | null = null;

  constructor(text: string, sa: ReadonlyArray<number> = suffixArray(text)) {
    if (sa.length !== text.length) {
      throw invalidArgument(`suffix array has ${sa.length} entries for a string of length ${text.length}`);
    }
    this.text = text;
    this.order = [...sa];
  }

  /** A copy of the suffix array. */
  get sa(): number[] {
    return [...this.order];
  }

  /** A copy of the LCP array, computed on first access. */
  get lcp(): number[] {
    if (this.lcpCache === null) this.lcpCache = lcpArray(this.text, this.order);
    return [...this.lcpCache];
  }

  private compareAt(rank: number, needle: string): number {
    const start = this.order[rank];
    const prefix = this.text.slice(start, start + needle.length);
    if (prefix === needle) return 0;
    return prefix < needle ? -1 : 1;
  }

  /** Rank of the first suffix not less than `needle` (when `strict`, greater than). */
  private bound(needle: string, strict: boolean): number {
    let lo = 0;
    let hi = this.order.length;
    while (lo < hi) {
      const mid = lo + Math.floor((hi - lo) / 2);
      const cmp = this.compareAt(mid, needle);
      if (cmp < 0 || (strict && cmp === 0)) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  /** Some position where `needle` occurs, or -1. */
  find(needle: string): number {
    if (needle.length === 0) throw invalidArgument('needle must not be empty');
    const lo = this.bound(needle, false);
    return lo < this.order.length && this.compareAt(lo, needle) === 0 ? this.order[lo] : -1;
  }

  findAll(needle: string): number[] {
    if (needle.length === 0) throw invalidArgument('needle must not be empty');
    const lo = this.bound(needle, false);
    const hi = this.bound(needle, true);
    return this.order.slice(lo, hi).sort((a, b) => a - b);
  }
}
